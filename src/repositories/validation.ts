import validator from 'validator';

export const RESERVED_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isTimestamp(value: unknown): value is string {
  return typeof value === 'string' && validator.isISO8601(value, { strict: true });
}

export function isUsableKey(key: string): boolean {
  return !validator.isEmpty(key, { ignore_whitespace: true }) && !RESERVED_KEYS.has(key);
}
