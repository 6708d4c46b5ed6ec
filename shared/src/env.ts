import path from 'node:path';
import { config as loadDotenv } from 'dotenv';

let envLoaded = false;

/** Loads `.env`, or the file named by `ENV_FILE`, once per process. */
export function loadEnvFile(): void {
  if (envLoaded) {
    return;
  }

  envLoaded = true;
  loadDotenv({ path: readPathEnv('ENV_FILE', path.resolve(process.cwd(), '.env')) });
}

export function readEnv(name: string, fallback = ''): string {
  const value = process.env[name]?.trim();
  return value === undefined ? fallback : value;
}

export interface IntegerBounds {
  min?: number;
  max?: number;
}

/** Plain decimal digits within `bounds` (default 1 and up); anything else yields `fallback`. */
export function readIntegerEnv(name: string, fallback: number, bounds: IntegerBounds = {}): number {
  const raw = readEnv(name);

  if (!/^\d+$/.test(raw)) {
    return fallback;
  }

  const value = Number(raw);
  const min = bounds.min ?? 1;
  const max = bounds.max ?? Number.MAX_SAFE_INTEGER;
  return Number.isSafeInteger(value) && value >= min && value <= max ? value : fallback;
}

export function readPortEnv(name: string, fallback: number): number {
  return readIntegerEnv(name, fallback, { min: 1, max: 65_535 });
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export function readBooleanEnv(name: string, fallback: boolean): boolean {
  const normalized = readEnv(name).toLowerCase();

  if (TRUE_VALUES.has(normalized)) {
    return true;
  }

  return FALSE_VALUES.has(normalized) ? false : fallback;
}

export function readListEnv(name: string, fallback: string[]): string[] {
  const raw = readEnv(name);
  const source = raw.length > 0 ? raw : fallback.join(',');
  return source
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function readPathEnv(name: string, fallbackAbsolutePath: string, baseDir = process.cwd()): string {
  const value = readEnv(name);

  if (!value) {
    return fallbackAbsolutePath;
  }

  if (path.isAbsolute(value)) {
    return value;
  }

  return path.resolve(baseDir, value);
}
