// src/utils/utils.ts

import { setTimeout as delay } from 'node:timers/promises';

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view of a slice of the input array (shares the underlying buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

export function isUint8Array(obj: unknown): obj is Uint8Array {
  return obj instanceof Uint8Array;
}

/**
 * Converts a Uint8Array to a hex string (lookup table, no separators).
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf);
  }
  return hex;
}

/**
 * Converts a Little Endian byte pair to a number.
 */
export function fromBytesLE(lo: number, hi: number): number {
  return ((hi & 0xff) << 8) | (lo & 0xff);
}

export function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

/**
 * Resolves after `ms` milliseconds; 0 or less resolves on the next tick.
 */
export async function sleep(ms: number): Promise<void> {
  await delay(Math.max(0, ms));
}
