import * as winston from 'winston';
import { Logtail } from '@logtail/node';
import { LogtailTransport } from '@logtail/winston';
import { LogLevel } from '@logtail/types';
import type { ILogtailLog } from '@logtail/types';

// הרחבת TransformableInfo עבור השדות שאנחנו מוסיפים לכל רשומה
declare module 'winston' {
  namespace Logform {
    interface TransformableInfo {
      environment?: string;
      module?: string;
      label?: string;
    }
  }
}

/*
משתני סביבה שהלוגר קורא:
  LOG_LEVEL          error | warn | info | debug | trace
  LOG_TO_CONSOLE     ברירת מחדל true
  LOG_TO_FILE        true כדי לכתוב לקובץ (LOG_FILE_PATH)
  LOG_MODULES        רשימה מופרדת בפסיקים של מודולים להצגה ("*" לכולם)
  LOG_HIDE_MODULES   רשימה של מודולים להסתרה
  LOG_TO_LOGTAIL     שליחה ל-Better Stack (LOGTAIL_SOURCE_TOKEN, LOGTAIL_INGESTING_HOST)
*/

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export type CustomLogger = winston.Logger & {
  [level in keyof typeof logLevels]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta',
};

winston.addColors(logColors);

const consoleEnabled = (): boolean =>
  process.env.LOG_TO_CONSOLE === undefined || process.env.LOG_TO_CONSOLE === 'true';

const splitModuleList = (value: string): string[] =>
  value.split(',').map(m => m.trim()).filter(m => m);

// --- פורמטים ---

const hideByModuleNameFormat = winston.format((info) => {
  const hidden = process.env.LOG_HIDE_MODULES;
  if (hidden && typeof info.label === 'string' && splitModuleList(hidden).includes(info.label)) {
    return false;
  }
  return info;
});

const filterByModuleNameFormat = winston.format((info) => {
  const allowed = process.env.LOG_MODULES?.trim();
  if (!allowed || allowed === '*') {
    return info;
  }
  const modules = splitModuleList(allowed);
  if (typeof info.label === 'string' && modules.length > 0 && !modules.includes(info.label)) {
    return false;
  }
  return info;
});

function readField(value: object, key: string): unknown {
  return key in value ? Reflect.get(value, key) : undefined;
}

const ERROR_LIKE_KEYS = ['message', 'code', 'errno', 'syscall', 'address', 'port'] as const;

/**
 * @hebrew מפרמט את שדות המטא-דאטה של רשומת לוג לשורה אחת.
 * שגיאות ואובייקטים דמויי שגיאה (שגיאות רשת של axios או dgram) מוצגים בשדות המרכזיים שלהם.
 */
function formatLogMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata);
  if (entries.length === 0) {
    return '';
  }

  const metaString = entries
    .map(([key, value]) => {
      if (value instanceof Error) {
        return `${key}=${value.name}: ${value.message}${value.stack ? `\nStack: ${value.stack}` : ''}`;
      }
      if (typeof value === 'object' && value !== null && ERROR_LIKE_KEYS.some(k => k in value)) {
        const parts = ERROR_LIKE_KEYS
          .filter(k => readField(value, k) !== undefined)
          .map(k => `${k}: ${JSON.stringify(readField(value, k))}`);
        return `${key}=PotentialError: { ${parts.join(', ')} }`;
      }
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[UnstringifiableObject]`;
      }
    })
    .join(' ');

  return metaString ? ` ${metaString}` : '';
}

function renderLine(info: winston.Logform.TransformableInfo, levelText: string): string {
  let line = `${String(info.timestamp)} [${info.environment?.toUpperCase()}] [${levelText}]`;
  if (info.module) {
    line += ` (${info.module})`;
  }
  line += `: ${String(info.message)}`;

  const {
    level: _level, message: _message, timestamp: _timestamp, label: _label,
    module: _module, environment: _environment,
    [Symbol.for('level')]: _levelSymbol, [Symbol.for('message')]: _messageSymbol,
    [Symbol.for('splat')]: _splatSymbol,
    stack,
    ...otherMeta
  } = info;

  line += formatLogMetadata(otherMeta);
  if (typeof stack === 'string') {
    line += `\n${stack}`;
  }
  return line;
}

const createTextFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => {
    const originalLevel = info[Symbol.for('level')];
    const levelText = typeof originalLevel === 'string' ? originalLevel.toUpperCase() : 'UNKNOWN_LEVEL';
    return renderLine(info, levelText);
  })
);

export const consoleFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase())),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

export const fileFormat = () => createTextFormat();

// --- טרנספורטים ---

export const fileTransport = (filePath?: string) => new winston.transports.File({
  filename: filePath || process.env.LOG_FILE_PATH || 'logs/wemo.log',
  format: fileFormat(),
  maxsize: 5242880, // 5MB
  maxFiles: 5,
  tailable: true,
});

/**
 * @hebrew מאתחל טרנספורט של Logtail אם LOG_TO_LOGTAIL מופעל ויש טוקן וכתובת.
 */
function setupLogtailTransport(moduleName: string, environment: string): winston.transport | null {
  const sourceToken = process.env.LOGTAIL_SOURCE_TOKEN;
  const ingestingHost = process.env.LOGTAIL_INGESTING_HOST;
  if (process.env.LOG_TO_LOGTAIL !== 'true') {
    return null;
  }

  if (!sourceToken || !ingestingHost) {
    if (consoleEnabled()) {
      console.warn(`[LoggerSetup] LOG_TO_LOGTAIL=true but LOGTAIL_SOURCE_TOKEN or LOGTAIL_INGESTING_HOST is missing (module: ${moduleName}).`);
    }
    return null;
  }

  try {
    const logtail = new Logtail(sourceToken, { endpoint: `https://${ingestingHost}` });
    const envLocation = process.env.ENV_LOCATION;

    // Logtail לא מכיר את trace, ממפים ל-debug ושומרים את הרמה המקורית
    logtail.use(async (log: ILogtailLog): Promise<ILogtailLog> => {
      const enriched: ILogtailLog = { ...log };
      if (envLocation) {
        enriched.env_location = envLocation;
      }
      if (String(log.level) === 'trace') {
        enriched.original_level = 'trace';
        enriched.level = LogLevel.Debug;
      }
      return enriched;
    });

    if (consoleEnabled()) {
      console.log(`[LoggerSetup] Logtail transport enabled for module: ${moduleName} in environment: ${environment}`);
    }
    return new LogtailTransport(logtail);
  } catch (error) {
    console.warn(`[LoggerSetup] Failed to initialize Logtail transport for module: ${moduleName}.`, error);
    return null;
  }
}

const createModuleLogger = (moduleName: string): CustomLogger => {
  const environment = process.env.NODE_ENV || 'unknown';
  const activeTransports: winston.transport[] = [];
  const writeToFile = process.env.LOG_TO_FILE === 'true';

  if (consoleEnabled()) {
    activeTransports.push(new winston.transports.Console({ format: consoleFormat() }));
  }

  if (writeToFile) {
    activeTransports.push(fileTransport());
  }

  const logtailTransport = setupLogtailTransport(moduleName, environment);
  if (logtailTransport) {
    activeTransports.push(logtailTransport);
  }

  // winston מתריע כשאין אף טרנספורט
  if (activeTransports.length === 0) {
    activeTransports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels: logLevels,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        info.module = moduleName;
        info.label = moduleName;
        return info;
      })(),
      winston.format.errors({ stack: true })
    ),
    transports: activeTransports,
    exceptionHandlers: writeToFile
      ? [new winston.transports.File({ filename: process.env.LOG_EXCEPTIONS_PATH || 'logs/exceptions.log', format: fileFormat() })]
      : undefined,
    rejectionHandlers: writeToFile
      ? [new winston.transports.File({ filename: process.env.LOG_REJECTIONS_PATH || 'logs/rejections.log', format: fileFormat() })]
      : undefined,
    exitOnError: false,
  }) as CustomLogger;
};

export default createModuleLogger;
export { createTextFormat, createModuleLogger };
