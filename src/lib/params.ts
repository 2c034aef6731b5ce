/**
 * Readers that narrow untyped invocation params, throwing ValidationError on a mismatch.
 */

import { ValidationError } from './errors';

export type Params = Record<string, unknown>;

export function isParams(value: unknown): value is Params {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(params: Params, key: string): string {
  const v = params[key];
  if (typeof v !== 'string') throw new ValidationError(`${key} must be a string`);
  return v;
}

export function readOptionalString(params: Params, key: string): string | undefined {
  return params[key] === undefined ? undefined : readString(params, key);
}

export function readNumber(params: Params, key: string): number {
  const v = params[key];
  if (typeof v !== 'number' || Number.isNaN(v)) throw new ValidationError(`${key} must be a number`);
  return v;
}

export function readOptionalNumber(params: Params, key: string): number | undefined {
  return params[key] === undefined ? undefined : readNumber(params, key);
}

export function readOptionalBoolean(params: Params, key: string): boolean | undefined {
  const v = params[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'boolean') throw new ValidationError(`${key} must be a boolean`);
  return v;
}

export function readStringArray(params: Params, key: string): string[] {
  const v = params[key];
  if (!Array.isArray(v) || !v.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`${key} must be an array of strings`);
  }
  return v;
}

export function readNumberRecord(params: Params, key: string): Record<string, number> {
  const raw = params[key];
  if (raw === undefined) return {};
  if (!isParams(raw)) throw new ValidationError(`${key} must be an object of numbers`);
  const out: Record<string, number> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v !== 'number') throw new ValidationError(`${key}.${k} must be a number`);
    out[k] = v;
  }
  return out;
}
