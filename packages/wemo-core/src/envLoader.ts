import dotenv from 'dotenv';
import path from 'node:path';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// .env בשורש המאגר, ואחריו .env של החבילה שדורס אותו
const rootEnvPath = path.resolve(moduleDir, '../../../.env');
const packageEnvPath = path.resolve(moduleDir, '../.env');

const loadEnvFile = (filePath: string, override: boolean = false): void => {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const result = dotenv.config({ path: filePath, override });
  if (result.error) {
    console.warn(`[EnvLoader] Error loading .env file from ${filePath}:`, result.error.message);
  }
};

loadEnvFile(rootEnvPath);
loadEnvFile(packageEnvPath, true);

/**
 * בודק אם מחרוזת ניתנת להמרה למספר ללא איבוד מידע ("1.0" נחשב מספרי, "0x10" ו-"" לא).
 */
export function isStringLosslesslyNumeric(value: unknown): value is string {
  if (typeof value !== 'string' || value.trim() === '') {
    return false;
  }
  const num = Number(value);
  if (!Number.isFinite(num)) {
    return false;
  }
  return String(num) === value || num === parseFloat(value);
}

export type EnvValue = string | number | undefined;

/**
 * @hebrew ממיר את process.env לאובייקט שבו ערכים מספריים הפכו למספרים.
 */
export const getProcessedEnv = (source: NodeJS.ProcessEnv = process.env): Record<string, EnvValue> => {
  const processed: Record<string, EnvValue> = {};
  for (const [key, value] of Object.entries(source)) {
    processed[key] = isStringLosslesslyNumeric(value) ? Number(value) : value;
  }
  return processed;
};

/**
 * משתני הסביבה לאחר טעינה ועיבוד. יש לייבא אותו במקום לגשת ישירות ל-process.env.
 */
export const env = getProcessedEnv();
