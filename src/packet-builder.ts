// src/packet-builder.ts

import { SSP_CONSTANTS } from './constants/constants.js';
import {
  SspCRCError,
  SspInvalidByteError,
  SspMalformedPacketError,
  SspPacketLengthError,
} from './errors.js';
import type { SspPacket } from './types/ssp-types.js';
import { crc16Ssp, crc16SspBytes } from './utils/crc.js';
import { concatUint8Arrays, fromBytesLE, isByte, isUint8Array, sliceUint8Array } from './utils/utils.js';

const FRAME_OVERHEAD: number = SSP_CONSTANTS.HEADER_LENGTH + SSP_CONSTANTS.CRC_LENGTH;

/**
 * Формирует SSP-пакет: STX(0x7F) + sequence + length + command + data + CRC (LE)
 * @param command - код команды
 * @param sequence - байт последовательности (старший бит установлен)
 * @param data - данные команды, не более 254 байт
 * @returns полный пакет с CRC
 */
function buildPacket(
  command: number,
  sequence: number = SSP_CONSTANTS.INITIAL_SEQUENCE,
  data: Uint8Array | readonly number[] = []
): Uint8Array {
  if (!isByte(command)) throw new SspInvalidByteError('command', command);
  if (!isByte(sequence)) throw new SspInvalidByteError('sequence', sequence);
  if (data.length > SSP_CONSTANTS.MAX_DATA_LENGTH) {
    throw new SspPacketLengthError(data.length, SSP_CONSTANTS.MAX_DATA_LENGTH);
  }

  let payload: Uint8Array;
  if (isUint8Array(data)) {
    payload = data;
  } else {
    for (const value of data) {
      if (!isByte(value)) throw new SspInvalidByteError('data byte', value);
    }
    payload = Uint8Array.from(data);
  }

  const body: Uint8Array = concatUint8Arrays([
    new Uint8Array([SSP_CONSTANTS.STX, sequence, payload.length + 1, command]),
    payload,
  ]);
  return concatUint8Arrays([body, crc16SspBytes(body)]);
}

/**
 * Проверяет структуру пакета и CRC, не выбрасывая исключений
 * @param packet - принятые байты
 * @returns true, если это целый пакет с верным CRC
 */
function validatePacket(packet: Uint8Array): boolean {
  return inspectPacket(packet) === null;
}

/**
 * Разбирает SSP-пакет и проверяет CRC
 * @throws SspMalformedPacketError, SspCRCError
 */
function parsePacket(packet: Uint8Array): SspPacket {
  const problem = inspectPacket(packet);
  if (problem) throw problem;

  return {
    sequence: packet[1] ?? 0,
    command: packet[3] ?? 0,
    data: sliceUint8Array(packet, SSP_CONSTANTS.HEADER_LENGTH, -SSP_CONSTANTS.CRC_LENGTH),
  };
}

function inspectPacket(packet: Uint8Array): SspMalformedPacketError | SspCRCError | null {
  if (!isUint8Array(packet) || packet.length < FRAME_OVERHEAD) {
    return new SspMalformedPacketError(packet, 'too short');
  }
  if (packet[0] !== SSP_CONSTANTS.STX) {
    return new SspMalformedPacketError(packet, 'missing STX');
  }
  const lengthByte: number = packet[2] ?? 0;
  if (lengthByte + FRAME_OVERHEAD - 1 !== packet.length) {
    return new SspMalformedPacketError(packet, `length byte ${lengthByte} does not match size`);
  }

  const received: number = fromBytesLE(packet[packet.length - 2] ?? 0, packet[packet.length - 1] ?? 0);
  const calculated: number = crc16Ssp(sliceUint8Array(packet, 0, -SSP_CONSTANTS.CRC_LENGTH));
  return received === calculated ? null : new SspCRCError(received, calculated);
}

/**
 * Следующее значение счётчика последовательности: 7 младших бит по модулю 128,
 * старший бит всегда установлен.
 * @param sequence - текущее значение
 * @param step - на сколько сдвинуть (default: 1)
 */
function advanceSequence(sequence: number, step: number = 1): number {
  return SSP_CONSTANTS.SEQUENCE_FLAG | ((sequence + step) & SSP_CONSTANTS.SEQUENCE_MASK);
}

export { buildPacket, validatePacket, parsePacket, advanceSequence };
