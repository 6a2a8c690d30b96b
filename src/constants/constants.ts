// src/constants/constants.ts

/**
 * SSP command opcodes understood by the hopper
 */
export const COMMAND_CODES = {
  RESET: 0x01,
  SETUP_REQUEST: 0x05,
  POLL: 0x07,
  DISABLE: 0x09,
  ENABLE: 0x0a,
  SYNC: 0x11,
} as const; // as const: readonly literal types for keys/values

export type CommandName = keyof typeof COMMAND_CODES;

export const COMMAND_NAMES: ReadonlyMap<number, CommandName> = new Map<number, CommandName>([
  [COMMAND_CODES.RESET, 'RESET'],
  [COMMAND_CODES.SETUP_REQUEST, 'SETUP_REQUEST'],
  [COMMAND_CODES.POLL, 'POLL'],
  [COMMAND_CODES.DISABLE, 'DISABLE'],
  [COMMAND_CODES.ENABLE, 'ENABLE'],
  [COMMAND_CODES.SYNC, 'SYNC'],
]);

/**
 * Framing constants
 */
export const SSP_CONSTANTS = {
  STX: 0x7f,
  SEQUENCE_FLAG: 0x80,
  SEQUENCE_MASK: 0x7f,
  INITIAL_SEQUENCE: 0x80,
  /** STX + sequence + length + command */
  HEADER_LENGTH: 4,
  CRC_LENGTH: 2,
  /** length byte is 1 + data length, so data tops out at 254 */
  MAX_DATA_LENGTH: 254,
  CRC_SEED: 0xffff,
  CRC_POLYNOMIAL: 0x8408,
} as const;

/**
 * USB identifiers of the SMART Hopper 3
 */
export const DEVICE_IDS = {
  VENDOR_ID: 0x191c,
  PRODUCT_ID: 0x4104,
} as const;

/**
 * Link probing defaults
 */
export const LINK_DEFAULTS = {
  BAUD_RATES: [9600, 19200, 38400, 115200],
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
  DATA_BITS: 8,
  STOP_BITS: 1,
  PARITY: 'none',
  READ_TIMEOUT_MS: 2000,
  SETTLE_DELAY_MS: 500,
  COMMAND_DELAY_MS: 500,
  RESPONSE_LENGTH: 64,
  EXTRA_POLLS: 3,
} as const;

/**
 * DTR/RTS combinations tried for every baud rate, in order
 */
export const HANDSHAKE_CONFIGURATIONS: ReadonlyArray<{ readonly dtr: boolean; readonly rts: boolean }> =
  [
    { dtr: false, rts: false },
    { dtr: true, rts: false },
    { dtr: false, rts: true },
    { dtr: true, rts: true },
  ];

/**
 * udev rule parameters
 */
export const UDEV_RULE = {
  FILE_NAME: '99-smarthopper.rules',
  INSTALL_DIR: '/etc/udev/rules.d',
  MODE: '0666',
  GROUP: 'dialout',
  SYMLINK: 'smarthopper',
} as const;

/**
 * Process exit statuses reported by the CLI
 */
export enum ExitCode {
  Success = 0,
  DeviceNotFound = 1,
  ConfigurationNotFound = 2,
  TransportFault = 3,
  Unexpected = 4,
}
