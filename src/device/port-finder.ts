// src/device/port-finder.ts

import { SerialPort } from 'serialport';
import Logger from '../logger.js';
import { SspDeviceNotFoundError } from '../errors.js';
import type { DeviceIds, LoggerInstance, PortInfo, SspResult } from '../types/ssp-types.js';
import { fail, ok } from '../utils/result.js';

const loggerInstance = new Logger();
const defaultLogger = loggerInstance.createLogger('PortFinder');

/**
 * Parses a USB identifier as reported by the OS (`"191c"`, `"0x191C"`).
 */
export function parseUsbId(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number.parseInt(raw.trim().replace(/^0x/i, ''), 16);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Lists serial ports through `serialport`, with numeric vendor/product IDs.
 */
export async function listSerialPorts(): Promise<PortInfo[]> {
  const ports = await SerialPort.list();
  return ports.map(port => ({
    path: port.path,
    vendorId: parseUsbId(port.vendorId),
    productId: parseUsbId(port.productId),
    manufacturer: port.manufacturer,
    serialNumber: port.serialNumber,
    locationId: port.locationId,
    pnpId: port.pnpId,
  }));
}

/**
 * Picks the first port whose vendor and product IDs match `target` and logs
 * what the OS knows about it.
 */
export function findDevice(
  ports: readonly PortInfo[],
  target: DeviceIds,
  logger: LoggerInstance = defaultLogger
): SspResult<PortInfo, SspDeviceNotFoundError> {
  const port = ports.find(p => p.vendorId === target.vendorId && p.productId === target.productId);
  if (!port) {
    const error = new SspDeviceNotFoundError(target.vendorId, target.productId);
    logger.warn(error.message);
    return fail(error);
  }

  logger.info(`Device found on ${port.path}`, { port: port.path });
  logger.group();
  logger.info(`Manufacturer: ${port.manufacturer ?? 'n/a'}`);
  logger.info(`Serial number: ${port.serialNumber ?? 'n/a'}`);
  logger.info(`Location: ${port.locationId ?? 'n/a'}`);
  logger.info(`Interface: ${port.pnpId ?? 'n/a'}`);
  logger.groupEnd();
  return ok(port);
}
