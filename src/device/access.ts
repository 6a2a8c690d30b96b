// src/device/access.ts

import { access, constants } from 'node:fs/promises';
import { execFile } from 'node:child_process';
import { userInfo } from 'node:os';
import { promisify } from 'node:util';
import Logger from '../logger.js';
import { SspAccessDeniedError } from '../errors.js';
import type { LoggerInstance, PermissionRemediator, SspResult } from '../types/ssp-types.js';
import { fail, ok } from '../utils/result.js';
import { UDEV_RULE } from '../constants/constants.js';

const execFileAsync = promisify(execFile);

const loggerInstance = new Logger();
const defaultLogger = loggerInstance.createLogger('Access');

/**
 * Checks that the current user may read and write `path`.
 */
export async function checkAccess(path: string): Promise<SspResult<void, SspAccessDeniedError>> {
  try {
    await access(path, constants.R_OK | constants.W_OK);
    return ok(undefined);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail(new SspAccessDeniedError(path, reason));
  }
}

export type CommandRunner = (file: string, args: readonly string[]) => Promise<void>;

const runCommand: CommandRunner = async (file, args) => {
  await execFileAsync(file, [...args]);
};

/**
 * Adds the user to the serial group and opens up the device node through
 * non-interactive `sudo`. Fails fast when sudo wants a password.
 */
export class SudoPermissionRemediator implements PermissionRemediator {
  private run: CommandRunner;
  private user: string;
  private logger: LoggerInstance;

  constructor(
    options: { run?: CommandRunner; user?: string; logger?: LoggerInstance } = {}
  ) {
    this.run = options.run ?? runCommand;
    this.user = options.user ?? userInfo().username;
    this.logger = options.logger ?? defaultLogger;
  }

  async remediate(path: string): Promise<void> {
    this.logger.info(`Adding ${this.user} to ${UDEV_RULE.GROUP} and granting rw on ${path}`, {
      port: path,
    });
    await this.run('sudo', ['-n', 'usermod', '-a', '-G', UDEV_RULE.GROUP, this.user]);
    await this.run('sudo', ['-n', 'chmod', 'a+rw', path]);
    this.logger.info(`Permissions on ${path} updated`, { port: path });
  }
}
