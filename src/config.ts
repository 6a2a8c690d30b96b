// src/config.ts

import { tmpdir } from 'node:os';
import { DEVICE_IDS, LINK_DEFAULTS } from './constants/constants.js';
import { SspConfigError } from './errors.js';
import type { DeviceIds, LogLevel } from './types/ssp-types.js';
import { parseUsbId } from './device/port-finder.js';

export interface ProbeConfig {
  /** explicit device path; skips port enumeration when set */
  portPath?: string;
  target: DeviceIds;
  baudRates: number[];
  readTimeoutMs: number;
  settleDelayMs: number;
  commandDelayMs: number;
  logLevel: LogLevel;
  ruleDirectory: string;
  remediate: boolean;
  colors: boolean;
}

export type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

function envNumber(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(min, parsed);
}

function envBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on') {
    return true;
  }
  if (raw === '0' || raw === 'false' || raw === 'no' || raw === 'off') {
    return false;
  }
  return fallback;
}

function envList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }
  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function envUsbId(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = parseUsbId(raw);
  if (value === undefined || value < 0 || value > 0xffff) {
    throw new SspConfigError(`${name}="${raw}" is not a 16-bit hex USB id`);
  }
  return value;
}

function envLogLevel(env: Env): LogLevel {
  const raw = env.SSP_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) {
    return 'info';
  }
  const level = LOG_LEVELS.find(candidate => candidate === raw);
  if (!level) {
    throw new SspConfigError(`SSP_LOG_LEVEL="${raw}" must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function envBaudRates(env: Env): number[] {
  const entries = envList(env, 'SSP_BAUD_RATES', LINK_DEFAULTS.BAUD_RATES.map(String));
  if (entries.length === 0) {
    throw new SspConfigError(`SSP_BAUD_RATES="${env.SSP_BAUD_RATES ?? ''}" has no valid baud rate`);
  }
  return entries.map(entry => {
    const rate = Number(entry);
    if (
      !Number.isInteger(rate) ||
      rate < LINK_DEFAULTS.MIN_BAUD_RATE ||
      rate > LINK_DEFAULTS.MAX_BAUD_RATE
    ) {
      throw new SspConfigError(
        `SSP_BAUD_RATES entry "${entry}" is not a baud rate between ${LINK_DEFAULTS.MIN_BAUD_RATE} and ${LINK_DEFAULTS.MAX_BAUD_RATE}`
      );
    }
    return rate;
  });
}

/**
 * Reads the probe settings from environment variables.
 * @throws SspConfigError for an unknown log level, a bad USB id or an unusable baud list
 */
export function loadConfig(env: Env = process.env): ProbeConfig {
  const portPath = env.SSP_PORT?.trim();
  return {
    ...(portPath ? { portPath } : {}),
    target: {
      vendorId: envUsbId(env, 'SSP_VENDOR_ID', DEVICE_IDS.VENDOR_ID),
      productId: envUsbId(env, 'SSP_PRODUCT_ID', DEVICE_IDS.PRODUCT_ID),
    },
    baudRates: envBaudRates(env),
    readTimeoutMs: envNumber(env, 'SSP_READ_TIMEOUT_MS', LINK_DEFAULTS.READ_TIMEOUT_MS, 1),
    settleDelayMs: envNumber(env, 'SSP_SETTLE_DELAY_MS', LINK_DEFAULTS.SETTLE_DELAY_MS, 0),
    commandDelayMs: envNumber(env, 'SSP_COMMAND_DELAY_MS', LINK_DEFAULTS.COMMAND_DELAY_MS, 0),
    logLevel: envLogLevel(env),
    ruleDirectory: env.SSP_RULE_DIR?.trim() || tmpdir(),
    remediate: envBoolean(env, 'SSP_REMEDIATE', true),
    colors: !env.NO_COLOR,
  };
}
