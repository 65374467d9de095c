import { HTTPParser } from 'http-parser-js';
import { createModuleLogger } from './logger';

export const HTTP_REQUEST_TYPE = HTTPParser.REQUEST;
export const HTTP_RESPONSE_TYPE = HTTPParser.RESPONSE;

const logger = createModuleLogger('genericHttpParser');

export interface ParsedHttpPacket {
  method?: string;
  url?: string;
  versionMajor?: number;
  versionMinor?: number;
  /** שמות הכותרות באותיות קטנות. */
  headers: Record<string, string>;
  body?: Buffer;
  statusCode?: number;
  statusMessage?: string;
}

/**
 * @hebrew מנתח הודעת HTTP גולמית (בקשה או תגובה) באמצעות http-parser-js.
 * משמש לפענוח תשובות SSDP שמגיעות כ-HTTP מעל UDP.
 * @returns ParsedHttpPacket אם הפירסור הצליח, אחרת null.
 */
export function parseHttpPacket(
  messageBuffer: Buffer,
  parserType: typeof HTTP_REQUEST_TYPE | typeof HTTP_RESPONSE_TYPE
): ParsedHttpPacket | null {
  const parser = new HTTPParser(parserType);

  const result: ParsedHttpPacket = { headers: {} };
  const bodyChunks: Buffer[] = [];
  let complete = false;

  parser[HTTPParser.kOnHeadersComplete] = (info) => {
    const rawHeaders = info.headers;
    for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
      result.headers[rawHeaders[i].toLowerCase()] = rawHeaders[i + 1];
    }

    if (parserType === HTTP_REQUEST_TYPE) {
      result.method = HTTPParser.methods[info.method];
      result.url = info.url;
    } else {
      result.statusCode = info.statusCode;
      result.statusMessage = info.statusMessage;
    }
    result.versionMajor = info.versionMajor;
    result.versionMinor = info.versionMinor;
  };

  parser[HTTPParser.kOnBody] = (chunk, offset, length) => {
    bodyChunks.push(Buffer.from(chunk.subarray(offset, offset + length)));
  };

  parser[HTTPParser.kOnMessageComplete] = () => {
    complete = true;
  };

  try {
    const executeResult = parser.execute(messageBuffer);
    if (executeResult instanceof Error) {
      logger.debug('parseHttpPacket: parser.execute() returned an error', { error: executeResult.message });
      return null;
    }
    if (executeResult !== messageBuffer.length) {
      logger.trace(`parseHttpPacket: Parser did not consume entire buffer. Parsed: ${executeResult}, Buffer length: ${messageBuffer.length}`);
    }

    const finishResult = parser.finish();
    if (finishResult instanceof Error) {
      logger.debug('parseHttpPacket: parser.finish() returned an error', { error: finishResult.message });
      return null;
    }
  } catch (err: unknown) {
    logger.debug('parseHttpPacket: Exception during parsing process', { error: err });
    return null;
  }

  if (!complete) {
    logger.debug('parseHttpPacket: Parsing did not complete (kOnMessageComplete not called).');
    return null;
  }

  if (bodyChunks.length > 0) {
    result.body = Buffer.concat(bodyChunks);
  }
  return result;
}
