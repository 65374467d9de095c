import { env, getProcessedEnv } from './envLoader';
import type { EnvValue } from './envLoader';
import { createModuleLogger } from './logger';
import { WEMO_SEARCH_TARGET } from './types';

const logger = createModuleLogger('config');

/**
 * ערכי ברירת המחדל של הספרייה. כל עלה ניתן לדריסה במשתנה סביבה לפי הנתיב שלו
 * ב-SNAKE_CASE, למשל discovery.timeoutMs -> DISCOVERY_TIMEOUT_MS.
 */
export const defaultConfig = {
  discovery: {
    timeoutMs: 5000,
    searchTarget: WEMO_SEARCH_TARGET,
    bindAddress: '0.0.0.0',
  },
  control: {
    timeoutMs: 10_000,
    retries: 3,
    retryDelayMs: 1000,
  },
  eventing: {
    requestedDurationSeconds: 300,
    requestTimeoutMs: 5000,
  },
  listener: {
    bindAddress: '0.0.0.0',
    bindPort: 0,
    pathPrefix: '/wemo/events',
    advertiseAddress: '',
    handlerWarnMs: 5000,
  },
  renewal: {
    renewFraction: 2 / 3,
  },
};

export type WemoConfig = typeof defaultConfig;

type ConfigLeaf = string | number | boolean;
interface ConfigNode {
  [key: string]: ConfigLeaf | ConfigNode;
}

const camelToSnakeCase = (str: string) => str.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();

function coerceLeaf(envVarName: string, fallback: ConfigLeaf, raw: EnvValue): ConfigLeaf {
  if (raw === undefined) {
    return fallback;
  }
  if (typeof fallback === 'boolean') {
    if (raw === 'true' || raw === 'false') {
      return raw === 'true';
    }
  } else if (typeof fallback === 'number') {
    if (typeof raw === 'number') {
      return raw;
    }
  } else {
    return String(raw);
  }
  logger.warn(`Ignoring ${envVarName}=${String(raw)}: expected a ${typeof fallback}`);
  return fallback;
}

/**
 * @hebrew בונה את התצורה באופן רקורסיבי מתוך ברירות המחדל ודורס כל עלה
 * במשתנה הסביבה המתאים, אם קיים והטיפוס שלו מתאים.
 */
export function initializeConfig<T extends ConfigNode>(
  defaults: T,
  source: Record<string, EnvValue> = env,
  path: string[] = []
): T {
  const initialized: ConfigNode = {};

  for (const [key, value] of Object.entries(defaults)) {
    const newPath = [...path, key];
    if (typeof value === 'object') {
      initialized[key] = initializeConfig(value, source, newPath);
    } else {
      const envVarName = newPath.map(camelToSnakeCase).join('_');
      initialized[key] = coerceLeaf(envVarName, value, source[envVarName]);
    }
  }
  return initialized as T;
}

/**
 * @hebrew טוען מחדש את התצורה מ-process.env (שימושי בבדיקות ובתהליכים ארוכים).
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): WemoConfig {
  return initializeConfig(defaultConfig, getProcessedEnv(source));
}

export const config: WemoConfig = initializeConfig(defaultConfig);
