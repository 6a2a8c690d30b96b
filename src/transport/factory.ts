// src/transport/factory.ts

import { NodeSerialTransport } from './node-transports/node-serialport.js';
import type { LinkTransport, LinkTransportOptions, TransportFactory } from '../types/ssp-types.js';

/**
 * Creates a serialport-backed transport for `path`. Nothing is opened until
 * `connect()` is called.
 *
 * @param path - Device path, e.g. `/dev/ttyUSB0`
 * @param options - Frame parameters, read timeout and logger for the transport
 * @throws {Error} If the path is empty.
 */
export const createTransport: TransportFactory = (
  path: string,
  options: LinkTransportOptions = {}
): LinkTransport => {
  if (!path) {
    throw new Error('Missing "path" option for serial transport');
  }
  return new NodeSerialTransport(path, options);
};
