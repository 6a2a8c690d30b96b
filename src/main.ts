// src/main.ts

import Logger from './logger.js';
import { loadConfig } from './config.js';
import type { Env } from './config.js';
import { ExitCode } from './constants/constants.js';
import { runProbe } from './runner.js';
import type { ProbeDependencies } from './runner.js';
import { createTransport } from './transport/factory.js';
import { listSerialPorts } from './device/port-finder.js';
import { checkAccess, SudoPermissionRemediator } from './device/access.js';
import { writeUdevRule } from './device/udev-rule.js';

export interface MainOptions {
  env?: Env;
  logger?: Logger;
  /** replaces the hardware-facing dependencies */
  dependencies?: Partial<Omit<ProbeDependencies, 'logger'>>;
}

/**
 * Loads the configuration from the environment and runs the probe. Never
 * throws: anything unexpected is logged and mapped to `ExitCode.Unexpected`.
 * At debug level and below a per-level count of log lines is printed at the end.
 */
export async function main(options: MainOptions = {}): Promise<ExitCode> {
  const logger = options.logger ?? new Logger();
  const cliLogger = logger.createLogger('Cli');

  try {
    const config = loadConfig(options.env ?? process.env);
    logger.setLevel(config.logLevel);
    if (!config.colors) logger.disableColors();

    const report = await runProbe(config, {
      listPorts: listSerialPorts,
      createTransport: (path, transportOptions) =>
        createTransport(path, {
          ...transportOptions,
          logger: logger.createLogger('NodeSerialTransport'),
        }),
      checkAccess,
      ...(config.remediate
        ? { remediator: new SudoPermissionRemediator({ logger: logger.createLogger('Access') }) }
        : {}),
      writeRule: writeUdevRule,
      ...options.dependencies,
      logger,
    });

    if (config.logLevel === 'trace' || config.logLevel === 'debug') logger.summary();
    return report.exitCode;
  } catch (err: unknown) {
    cliLogger.error(err instanceof Error ? err.message : String(err));
    return ExitCode.Unexpected;
  }
}
