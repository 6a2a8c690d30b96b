// src/index.ts

export * from './constants/constants.js';
export * from './errors.js';
export type * from './types/ssp-types.js';
export { crc16Ssp, crc16SspBytes } from './utils/crc.js';
export { toHex } from './utils/utils.js';
export { ok, fail } from './utils/result.js';
export { buildPacket, validatePacket, parsePacket, advanceSequence } from './packet-builder.js';
export { default as Logger } from './logger.js';
export { NodeSerialTransport } from './transport/node-transports/node-serialport.js';
export { createTransport } from './transport/factory.js';
export { findDevice, listSerialPorts, parseUsbId } from './device/port-finder.js';
export { checkAccess, SudoPermissionRemediator } from './device/access.js';
export type { CommandRunner } from './device/access.js';
export { renderUdevRule, writeUdevRule, installInstructions } from './device/udev-rule.js';
export { ParameterDiscovery } from './discovery.js';
export type { DiscoveryOptions } from './discovery.js';
export { CommandSequencer, DEFAULT_COMMANDS } from './sequencer.js';
export type { SequencerOptions } from './sequencer.js';
export { loadConfig } from './config.js';
export type { Env, ProbeConfig } from './config.js';
export { runProbe } from './runner.js';
export { main } from './main.js';
export type { MainOptions } from './main.js';
export type { ProbeDependencies, ProbeReport } from './runner.js';
