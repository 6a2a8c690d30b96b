// src/device/udev-rule.ts

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import Logger from '../logger.js';
import { UDEV_RULE } from '../constants/constants.js';
import type { DeviceIds, LoggerInstance } from '../types/ssp-types.js';

const loggerInstance = new Logger();
const defaultLogger = loggerInstance.createLogger('UdevRule');

const hex4 = (value: number): string => value.toString(16).padStart(4, '0');

/**
 * udev rule that opens the device to the serial group and links it as /dev/smarthopper.
 */
export function renderUdevRule(ids: DeviceIds): string {
  return [
    '# udev rule for the SMART Hopper 3 cash-handling peripheral',
    `ACTION=="add", SUBSYSTEM=="tty", ATTRS{idVendor}=="${hex4(ids.vendorId)}", ATTRS{idProduct}=="${hex4(ids.productId)}", MODE="${UDEV_RULE.MODE}", GROUP="${UDEV_RULE.GROUP}", SYMLINK+="${UDEV_RULE.SYMLINK}"`,
    '',
  ].join('\n');
}

export function installInstructions(rulePath: string): string[] {
  return [
    `sudo cp ${rulePath} ${UDEV_RULE.INSTALL_DIR}/${UDEV_RULE.FILE_NAME}`,
    'sudo udevadm control --reload-rules && sudo udevadm trigger',
  ];
}

/**
 * Writes the rule into `directory` (never into /etc) and logs how to install it.
 * @returns path of the written file
 */
export async function writeUdevRule(
  directory: string,
  ids: DeviceIds,
  logger: LoggerInstance = defaultLogger
): Promise<string> {
  const rulePath = join(directory, UDEV_RULE.FILE_NAME);
  await writeFile(rulePath, renderUdevRule(ids), 'utf8');
  logger.info(`udev rule written to ${rulePath}`);
  logger.info(`To create /dev/${UDEV_RULE.SYMLINK} and fix permissions, run:`);
  logger.group();
  for (const line of installInstructions(rulePath)) logger.info(line);
  logger.groupEnd();
  return rulePath;
}
