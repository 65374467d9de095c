import { describe, it, expect, vi } from 'vitest';
import { retry } from './utils';

describe('retry', () => {
  it('מחזיר את התוצאה אחרי כשל זמני וקורא ל-onRetry', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(retry(fn, { retries: 3, delayMs: 0, onRetry })).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ message: 'first' }), 1);
  });

  it('זורק את השגיאה האחרונה כשכל הניסיונות נכשלו', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(retry(fn, { retries: 2, delayMs: 0 })).rejects.toThrow('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('לא מנסה שוב שגיאה ש-shouldRetry דוחה', async () => {
    const fn = vi.fn().mockRejectedValue(new RangeError('fatal'));

    await expect(retry(fn, { retries: 5, delayMs: 0, shouldRetry: error => !(error instanceof RangeError) })).rejects.toThrow(RangeError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('עוטף ערך שנזרק שאינו Error', async () => {
    const fn = vi.fn().mockRejectedValue('plain string');

    await expect(retry(fn, { retries: 1, delayMs: 0 })).rejects.toThrow('plain string');
  });

  it('שגיאה ב-onRetry לא עוצרת את הניסיונות', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockResolvedValueOnce(42);
    const onRetry = vi.fn(() => {
      throw new Error('callback failed');
    });

    await expect(retry(fn, { retries: 2, delayMs: 0, onRetry })).resolves.toBe(42);
  });
});
