import { ConfigService } from '@nestjs/config';

/**
 * Coerce a config value to a finite number, falling back to the default.
 */
export function toNumber(value: unknown, defaultValue: number): number {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : defaultValue;
}

/**
 * Comma-separated config value to a trimmed, non-empty list.
 */
export function toList(value: unknown, defaultValue: string[]): string[] {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return defaultValue;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function readPositiveInt(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  return Math.max(1, Math.floor(toNumber(configService.get(key), defaultValue)));
}
