import { tmpdir } from 'node:os';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { SspConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('falls back to the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      target: { vendorId: 0x191c, productId: 0x4104 },
      baudRates: [9600, 19200, 38400, 115200],
      readTimeoutMs: 2000,
      settleDelayMs: 500,
      commandDelayMs: 500,
      logLevel: 'info',
      ruleDirectory: tmpdir(),
      remediate: true,
      colors: true,
    });
  });

  it('reads every setting from the environment', () => {
    const config = loadConfig({
      SSP_PORT: ' /dev/ttyACM0 ',
      SSP_VENDOR_ID: '0x1234',
      SSP_PRODUCT_ID: 'ABCD',
      SSP_BAUD_RATES: '19200, 9600',
      SSP_READ_TIMEOUT_MS: '250',
      SSP_SETTLE_DELAY_MS: '100',
      SSP_COMMAND_DELAY_MS: '50',
      SSP_LOG_LEVEL: 'DEBUG',
      SSP_RULE_DIR: '/var/tmp/rules',
      SSP_REMEDIATE: 'no',
      NO_COLOR: '1',
    });

    expect(config).toEqual({
      portPath: '/dev/ttyACM0',
      target: { vendorId: 0x1234, productId: 0xabcd },
      baudRates: [19200, 9600],
      readTimeoutMs: 250,
      settleDelayMs: 100,
      commandDelayMs: 50,
      logLevel: 'debug',
      ruleDirectory: '/var/tmp/rules',
      remediate: false,
      colors: false,
    });
  });

  it('clamps and ignores unusable numbers', () => {
    const config = loadConfig({
      SSP_READ_TIMEOUT_MS: '0',
      SSP_SETTLE_DELAY_MS: '-20',
      SSP_COMMAND_DELAY_MS: 'soon',
    });

    expect(config.readTimeoutMs).toBe(1);
    expect(config.settleDelayMs).toBe(0);
    expect(config.commandDelayMs).toBe(500);
  });

  it('keeps the default for an unrecognised boolean', () => {
    expect(loadConfig({ SSP_REMEDIATE: 'maybe' }).remediate).toBe(true);
    expect(loadConfig({ SSP_REMEDIATE: 'off' }).remediate).toBe(false);
  });

  it('rejects a USB id that is not 16-bit hex', () => {
    expect(() => loadConfig({ SSP_VENDOR_ID: 'zz' })).toThrow(
      new SspConfigError('SSP_VENDOR_ID="zz" is not a 16-bit hex USB id')
    );
    expect(() => loadConfig({ SSP_PRODUCT_ID: '0x10000' })).toThrow(SspConfigError);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ SSP_LOG_LEVEL: 'verbose' })).toThrow(
      'SSP_LOG_LEVEL="verbose" must be one of trace, debug, info, warn, error'
    );
  });

  it('rejects a baud list without a usable rate', () => {
    expect(() => loadConfig({ SSP_BAUD_RATES: ' , ' })).toThrow(
      'SSP_BAUD_RATES=" , " has no valid baud rate'
    );
  });

  it('rejects baud rates the serial driver does not accept', () => {
    expect(() => loadConfig({ SSP_BAUD_RATES: '9600, 250000' })).toThrow(
      new SspConfigError('SSP_BAUD_RATES entry "250000" is not a baud rate between 300 and 115200')
    );
    expect(() => loadConfig({ SSP_BAUD_RATES: 'fast' })).toThrow(
      'SSP_BAUD_RATES entry "fast" is not a baud rate between 300 and 115200'
    );
    expect(() => loadConfig({ SSP_BAUD_RATES: '110' })).toThrow(SspConfigError);
  });

  it('accepts the bounds of the supported range', () => {
    expect(loadConfig({ SSP_BAUD_RATES: '300,115200' }).baudRates).toEqual([300, 115200]);
  });
});
