// src/utils/crc.ts

import { SSP_CONSTANTS } from '../constants/constants.js';

/**
 * Calculates the SSP CRC-16 (polynomial 0x8408 reflected, init 0xFFFF, no final XOR)
 * for the given bytes. Same parameters as CRC-16/MCRF4XX: "123456789" gives 0x6F91.
 * @param buffer - input data
 * @returns 16-bit register value
 */
function crc16Ssp(buffer: Uint8Array | readonly number[]): number {
  let crc: number = SSP_CONSTANTS.CRC_SEED;
  for (const b of buffer) {
    crc ^= b & 0xff;
    for (let i: number = 0; i < 8; i++) {
      if (crc & 0x0001) {
        crc = (crc >> 1) ^ SSP_CONSTANTS.CRC_POLYNOMIAL;
      } else {
        crc >>= 1;
      }
    }
  }
  return crc;
}

/**
 * Same as `crc16Ssp`, as the two trailer bytes of a packet.
 * @returns 2-byte array in little-endian format
 */
function crc16SspBytes(buffer: Uint8Array | readonly number[]): Uint8Array {
  const crc: number = crc16Ssp(buffer);
  return new Uint8Array([crc & 0xff, (crc >> 8) & 0xff]);
}

export { crc16Ssp, crc16SspBytes };
