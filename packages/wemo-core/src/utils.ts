import { createModuleLogger } from './logger';
import type { CustomLogger } from './logger';

const defaultLogger = createModuleLogger('Utils');

/**
 * @hebrew פונקציית עזר להמתנה (sleep).
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** מספר הניסיונות הכולל. ברירת מחדל: 3. */
  retries?: number;
  delayMs?: number;
  logger?: CustomLogger;
  onRetry?: (error: Error, attempt: number) => void;
  /** מחליט אם שגיאה ראויה לניסיון נוסף. ברירת מחדל: כל שגיאה. */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * @hebrew מריץ פונקציה אסינכרונית עם ניסיונות חוזרים.
 * שגיאה ש-shouldRetry דוחה נזרקת מיד.
 * @throws השגיאה האחרונה אם כל הניסיונות נכשלו.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    retries = 3,
    delayMs = 1000,
    logger = defaultLogger,
    onRetry,
    shouldRetry = () => true,
  } = options;

  let lastError: Error = new Error('retry: no attempts were made');

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(lastError)) {
        throw lastError;
      }
      logger.warn(`Attempt ${attempt} of ${retries} failed: ${lastError.message}`);

      if (onRetry) {
        try {
          onRetry(lastError, attempt);
        } catch (callbackError: unknown) {
          logger.error('Error in onRetry callback', { error: callbackError });
        }
      }

      if (attempt < retries) {
        logger.debug(`Waiting ${delayMs}ms before next retry...`);
        await delay(delayMs);
      }
    }
  }

  logger.error(`All ${retries} attempts failed. Last error: ${lastError.message}`);
  throw lastError;
}
