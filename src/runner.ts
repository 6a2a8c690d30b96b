// src/runner.ts

import Logger from './logger.js';
import { ExitCode, LINK_DEFAULTS } from './constants/constants.js';
import type { ProbeConfig } from './config.js';
import { ParameterDiscovery } from './discovery.js';
import { CommandSequencer } from './sequencer.js';
import { findDevice } from './device/port-finder.js';
import type {
  AccessChecker,
  CommandOutcome,
  DeviceIds,
  LinkConfiguration,
  LoggerInstance,
  PermissionRemediator,
  PortInfo,
  PortLister,
  TransportFactory,
} from './types/ssp-types.js';

export interface ProbeDependencies {
  listPorts: PortLister;
  createTransport: TransportFactory;
  checkAccess: AccessChecker;
  /** absent when remediation is disabled */
  remediator?: PermissionRemediator;
  writeRule: (directory: string, ids: DeviceIds, logger: LoggerInstance) => Promise<string>;
  logger: Logger;
}

export interface ProbeReport {
  exitCode: ExitCode;
  path?: string;
  link?: LinkConfiguration;
  outcomes?: CommandOutcome[];
}

async function resolvePath(
  config: ProbeConfig,
  deps: ProbeDependencies,
  logger: LoggerInstance
): Promise<string | null> {
  if (config.portPath) {
    logger.info(`Using configured port ${config.portPath}`, { port: config.portPath });
    return config.portPath;
  }

  let ports: PortInfo[];
  try {
    ports = await deps.listPorts();
  } catch (err: unknown) {
    logger.error('Failed to list serial ports', err instanceof Error ? err : String(err));
    ports = [];
  }
  const found = findDevice(ports, config.target, deps.logger.createLogger('PortFinder'));
  if (!found.ok) {
    logger.error(found.error.message);
    return null;
  }
  return found.value.path;
}

/**
 * Full probe: find the device, emit the udev rule, check access, discover the
 * link parameters and run the start-up command sequence.
 */
export async function runProbe(config: ProbeConfig, deps: ProbeDependencies): Promise<ProbeReport> {
  const logger = deps.logger.createLogger('Runner');
  logger.info('Starting SSP link probe');

  const path = await resolvePath(config, deps, logger);
  if (!path) {
    return { exitCode: ExitCode.DeviceNotFound };
  }

  try {
    await deps.writeRule(config.ruleDirectory, config.target, deps.logger.createLogger('UdevRule'));
  } catch (err: unknown) {
    logger.error('Failed to write udev rule', err instanceof Error ? err : String(err));
  }

  const access = await deps.checkAccess(path);
  if (!access.ok) {
    logger.error(access.error.message, { port: path });
    if (deps.remediator) {
      try {
        await deps.remediator.remediate(path);
      } catch (err: unknown) {
        logger.error(
          `Could not update permissions: ${err instanceof Error ? err.message : String(err)}`,
          { port: path }
        );
        logger.info(`Try: sudo usermod -a -G dialout $USER, then log out and back in`);
      }
    }
  }

  const discovery = new ParameterDiscovery(deps.createTransport, {
    baudRates: config.baudRates,
    readTimeoutMs: config.readTimeoutMs,
    settleDelayMs: config.settleDelayMs,
    responseLength: LINK_DEFAULTS.RESPONSE_LENGTH,
    logger: deps.logger.createLogger('ParameterDiscovery'),
  });
  const discovered = await discovery.discover(path);
  if (!discovered.ok) {
    logger.error('Could not establish a link with the device', { port: path });
    return { exitCode: ExitCode.ConfigurationNotFound, path };
  }
  const link = discovered.value;

  logger.info('Starting command sequence', {
    port: link.path,
    baudRate: link.baudRate,
    dtr: link.dtr,
    rts: link.rts,
  });
  const sequencer = new CommandSequencer(deps.createTransport, {
    commandDelayMs: config.commandDelayMs,
    readTimeoutMs: config.readTimeoutMs,
    logger: deps.logger.createLogger('CommandSequencer'),
  });
  const run = await sequencer.run(link);
  if (!run.ok) {
    return { exitCode: ExitCode.TransportFault, path, link };
  }

  logger.info('Device session finished');
  return { exitCode: ExitCode.Success, path, link, outcomes: run.value };
}
