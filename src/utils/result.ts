// src/utils/result.ts

import type { SspError } from '../errors.js';
import type { SspResult } from '../types/ssp-types.js';

export function ok<T>(value: T): SspResult<T, never> {
  return { ok: true, value };
}

export function fail<E extends SspError>(error: E): SspResult<never, E> {
  return { ok: false, error };
}
