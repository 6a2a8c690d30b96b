// src/errors.ts

import type { TransportContext } from './types/ssp-types.js';
import { toHex } from './utils/utils.js';

/**
 * Base class for all SSP errors
 */
export class SspError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SspError';
  }
}

// --- Device lookup and host access ---

/**
 * No enumerated port carries the target vendor/product IDs
 */
export class SspDeviceNotFoundError extends SspError {
  vendorId: number;
  productId: number;

  constructor(vendorId: number, productId: number) {
    super(
      `No serial port with vendor 0x${vendorId.toString(16).padStart(4, '0')} and product 0x${productId.toString(16).padStart(4, '0')}`
    );
    this.name = 'SspDeviceNotFoundError';
    this.vendorId = vendorId;
    this.productId = productId;
  }
}

/**
 * The device path is not readable and writable by the current user
 */
export class SspAccessDeniedError extends SspError {
  path: string;

  constructor(path: string, reason: string = 'read/write permission missing') {
    super(`Access denied to ${path}: ${reason}`);
    this.name = 'SspAccessDeniedError';
    this.path = path;
  }
}

/**
 * Every baud rate and DTR/RTS combination was tried without a reply
 */
export class SspConfigurationNotFoundError extends SspError {
  path: string;
  baudRates: readonly number[];

  constructor(path: string, baudRates: readonly number[]) {
    super(`No working link configuration on ${path} (baud rates tried: ${baudRates.join(', ')})`);
    this.name = 'SspConfigurationNotFoundError';
    this.path = path;
    this.baudRates = baudRates;
  }
}

/**
 * Invalid configuration value
 */
export class SspConfigError extends SspError {
  constructor(message: string = 'Invalid configuration') {
    super(message);
    this.name = 'SspConfigError';
  }
}

// --- Transport faults ---

function describeContext(context: TransportContext): string {
  const parts: string[] = [context.path];
  if (context.baudRate != null) parts.push(`${context.baudRate} baud`);
  if (context.dtr != null) parts.push(`DTR=${context.dtr ? 'on' : 'off'}`);
  if (context.rts != null) parts.push(`RTS=${context.rts ? 'on' : 'off'}`);
  return parts.join(', ');
}

/**
 * I/O fault while a serial transport is in use
 */
export class SspTransportError extends SspError {
  context: TransportContext;

  constructor(message: string, context: TransportContext, cause?: unknown) {
    super(`${message} (${describeContext(context)})`, cause === undefined ? undefined : { cause });
    this.name = 'SspTransportError';
    this.context = context;
  }

  /**
   * Wraps anything thrown by a transport, keeping an existing SspTransportError as is.
   */
  static from(err: unknown, context: TransportContext): SspTransportError {
    if (err instanceof SspTransportError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new SspTransportError(message, context, err);
  }
}

export class SspConnectionError extends SspTransportError {
  constructor(message: string, context: TransportContext, cause?: unknown) {
    super(message, context, cause);
    this.name = 'SspConnectionError';
  }
}

export class SspNotConnectedError extends SspTransportError {
  constructor(context: TransportContext) {
    super('Port is not open', context);
    this.name = 'SspNotConnectedError';
  }
}

export class SspWriteError extends SspTransportError {
  constructor(message: string, context: TransportContext, cause?: unknown) {
    super(message, context, cause);
    this.name = 'SspWriteError';
  }
}

export class SspReadError extends SspTransportError {
  constructor(message: string, context: TransportContext, cause?: unknown) {
    super(message, context, cause);
    this.name = 'SspReadError';
  }
}

// --- Frame codec ---

/**
 * Payload does not fit the one-byte length field
 */
export class SspPacketLengthError extends SspError {
  constructor(dataLength: number, max: number) {
    super(`Packet data too long: ${dataLength} bytes, at most ${max} allowed`);
    this.name = 'SspPacketLengthError';
  }
}

export class SspInvalidByteError extends SspError {
  constructor(field: string, value: number) {
    super(`Invalid ${field}: ${value}. Must be an integer between 0-255.`);
    this.name = 'SspInvalidByteError';
  }
}

export class SspMalformedPacketError extends SspError {
  constructor(rawData: Uint8Array, reason: string) {
    super(`Malformed SSP packet (${reason}): ${toHex(rawData)}`);
    this.name = 'SspMalformedPacketError';
  }
}

export class SspCRCError extends SspError {
  constructor(received: number, calculated: number) {
    super(
      `CRC mismatch: received 0x${received.toString(16).padStart(4, '0')}, calculated 0x${calculated.toString(16).padStart(4, '0')}`
    );
    this.name = 'SspCRCError';
  }
}
