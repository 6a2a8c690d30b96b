// src/sequencer.ts

import Logger from './logger.js';
import { COMMAND_CODES, LINK_DEFAULTS, SSP_CONSTANTS } from './constants/constants.js';
import { SspTransportError } from './errors.js';
import { advanceSequence, buildPacket, validatePacket } from './packet-builder.js';
import type {
  CommandDescriptor,
  CommandOutcome,
  LinkConfiguration,
  LinkTransport,
  LoggerInstance,
  SspResult,
  TransportContext,
  TransportFactory,
} from './types/ssp-types.js';
import { fail, ok } from './utils/result.js';
import { sleep, toHex } from './utils/utils.js';

const loggerInstance = new Logger();
const defaultLogger = loggerInstance.createLogger('CommandSequencer');

/** Start-up sequence: SYNC → SETUP_REQUEST → ENABLE → POLL */
export const DEFAULT_COMMANDS: readonly CommandDescriptor[] = [
  { command: COMMAND_CODES.SYNC, name: 'SYNC' },
  { command: COMMAND_CODES.SETUP_REQUEST, name: 'SETUP_REQUEST' },
  { command: COMMAND_CODES.ENABLE, name: 'ENABLE' },
  { command: COMMAND_CODES.POLL, name: 'POLL' },
];

export interface SequencerOptions {
  commands?: readonly CommandDescriptor[];
  /** POLL packets sent after the first POLL reply */
  extraPolls?: number;
  commandDelayMs?: number;
  readTimeoutMs?: number;
  responseLength?: number;
  logger?: LoggerInstance;
}

/**
 * Drives the command sequence over an established link. The sequence counter
 * starts at 0x80 and advances after every command whether or not the device
 * answered. A transport fault ends the run; a missing reply does not.
 */
export class CommandSequencer {
  private createTransport: TransportFactory;
  private commands: readonly CommandDescriptor[];
  private extraPolls: number;
  private commandDelayMs: number;
  private readTimeoutMs: number;
  private responseLength: number;
  private logger: LoggerInstance;

  constructor(createTransport: TransportFactory, options: SequencerOptions = {}) {
    this.createTransport = createTransport;
    this.commands = options.commands ?? DEFAULT_COMMANDS;
    this.extraPolls = options.extraPolls ?? LINK_DEFAULTS.EXTRA_POLLS;
    this.commandDelayMs = options.commandDelayMs ?? LINK_DEFAULTS.COMMAND_DELAY_MS;
    this.readTimeoutMs = options.readTimeoutMs ?? LINK_DEFAULTS.READ_TIMEOUT_MS;
    this.responseLength = options.responseLength ?? LINK_DEFAULTS.RESPONSE_LENGTH;
    this.logger = options.logger ?? defaultLogger;
  }

  async run(config: LinkConfiguration): Promise<SspResult<CommandOutcome[], SspTransportError>> {
    const context: TransportContext = {
      path: config.path,
      baudRate: config.baudRate,
      dtr: config.dtr,
      rts: config.rts,
    };
    const outcomes: CommandOutcome[] = [];
    let transport: LinkTransport | null = null;

    try {
      transport = this.createTransport(config.path, {
        baudRate: config.baudRate,
        readTimeout: this.readTimeoutMs,
      });
      await transport.connect();
      await transport.setSignals({ dtr: config.dtr, rts: config.rts });
      await transport.flush();

      let sequence: number = SSP_CONSTANTS.INITIAL_SEQUENCE;
      for (const descriptor of this.commands) {
        const outcome = await this.send(transport, descriptor, sequence);
        outcomes.push(outcome);

        if (outcome.responded && descriptor.command === COMMAND_CODES.POLL && this.extraPolls > 0) {
          this.logger.info(`Sending ${this.extraPolls} extra POLL commands`);
          for (let i = 0; i < this.extraPolls; i++) {
            outcomes.push(
              await this.send(transport, descriptor, advanceSequence(sequence, i + 1), i + 1)
            );
          }
        }

        sequence = advanceSequence(sequence);
      }
    } catch (err: unknown) {
      const error = SspTransportError.from(err, context);
      this.logger.error(`Command sequence aborted: ${error.message}`, {
        port: config.path,
        baudRate: config.baudRate,
        dtr: config.dtr,
        rts: config.rts,
      });
      return fail(error);
    } finally {
      if (transport) await this.release(transport, context);
    }

    const answered = outcomes.filter(o => o.responded).length;
    this.logger.info(`Command sequence finished: ${answered}/${outcomes.length} commands answered`);
    return ok(outcomes);
  }

  private async send(
    transport: LinkTransport,
    descriptor: CommandDescriptor,
    sequence: number,
    repeat?: number
  ): Promise<CommandOutcome> {
    const label = repeat === undefined ? descriptor.name : `${descriptor.name} #${repeat}`;
    const logContext = { command: descriptor.command, sequence };
    const packet = buildPacket(descriptor.command, sequence);
    this.logger.info(`Sending ${label}: ${toHex(packet)}`, logContext);

    await transport.write(packet);
    await sleep(this.commandDelayMs);
    const response = await transport.read(this.responseLength, this.readTimeoutMs);

    const responded = response.length > 0;
    const valid = responded && validatePacket(response);
    if (responded) {
      this.logger.info(`Response to ${label}: ${toHex(response)}${valid ? '' : ' (invalid frame)'}`, logContext);
    } else {
      this.logger.warn(`No response to ${label}`, logContext);
    }

    return {
      command: descriptor.command,
      name: descriptor.name,
      sequence,
      packet,
      response,
      responded,
      valid,
      ...(repeat === undefined ? {} : { repeat }),
    };
  }

  private async release(transport: LinkTransport, context: TransportContext): Promise<void> {
    try {
      await transport.disconnect();
    } catch (err: unknown) {
      this.logger.warn(`Failed to close transport: ${SspTransportError.from(err, context).message}`, {
        port: context.path,
      });
    }
  }
}
