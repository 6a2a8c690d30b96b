// src/discovery.ts

import Logger from './logger.js';
import { COMMAND_CODES, HANDSHAKE_CONFIGURATIONS, LINK_DEFAULTS, SSP_CONSTANTS } from './constants/constants.js';
import { SspConfigurationNotFoundError, SspTransportError } from './errors.js';
import { buildPacket } from './packet-builder.js';
import type {
  HandshakeLines,
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
const defaultLogger = loggerInstance.createLogger('ParameterDiscovery');

export interface DiscoveryOptions {
  baudRates?: readonly number[];
  handshakeConfigurations?: readonly HandshakeLines[];
  readTimeoutMs?: number;
  settleDelayMs?: number;
  responseLength?: number;
  logger?: LoggerInstance;
}

type ProbeOutcome = 'response' | 'silent' | 'fault';

const PROBES: ReadonlyArray<{ command: number; name: string }> = [
  { command: COMMAND_CODES.SYNC, name: 'SYNC' },
  { command: COMMAND_CODES.RESET, name: 'RESET' },
];

/**
 * Finds the baud rate and DTR/RTS levels under which the device answers.
 *
 * Candidates are tried one at a time, baud rate in the outer loop and line
 * levels in the inner one. Each candidate gets its own transport, which is
 * closed again before the next one is opened, whatever happened in between.
 * A fault on one candidate is logged and counts as silence.
 */
export class ParameterDiscovery {
  private createTransport: TransportFactory;
  private baudRates: readonly number[];
  private handshakeConfigurations: readonly HandshakeLines[];
  private readTimeoutMs: number;
  private settleDelayMs: number;
  private responseLength: number;
  private logger: LoggerInstance;

  constructor(createTransport: TransportFactory, options: DiscoveryOptions = {}) {
    this.createTransport = createTransport;
    this.baudRates = options.baudRates ?? LINK_DEFAULTS.BAUD_RATES;
    this.handshakeConfigurations = options.handshakeConfigurations ?? HANDSHAKE_CONFIGURATIONS;
    this.readTimeoutMs = options.readTimeoutMs ?? LINK_DEFAULTS.READ_TIMEOUT_MS;
    this.settleDelayMs = options.settleDelayMs ?? LINK_DEFAULTS.SETTLE_DELAY_MS;
    this.responseLength = options.responseLength ?? LINK_DEFAULTS.RESPONSE_LENGTH;
    this.logger = options.logger ?? defaultLogger;
  }

  async discover(path: string): Promise<SspResult<LinkConfiguration, SspConfigurationNotFoundError>> {
    for (const baudRate of this.baudRates) {
      this.logger.info(`Probing ${path} at ${baudRate} baud`, { port: path, baudRate });

      for (const lines of this.handshakeConfigurations) {
        const outcome = await this.probeCandidate(path, baudRate, lines);
        if (outcome === 'response') {
          const config: LinkConfiguration = Object.freeze({
            path,
            baudRate,
            dtr: lines.dtr,
            rts: lines.rts,
          });
          this.logger.info('Working link configuration found', {
            port: path,
            baudRate,
            dtr: lines.dtr,
            rts: lines.rts,
          });
          return ok(config);
        }
      }
    }

    const error = new SspConfigurationNotFoundError(path, this.baudRates);
    this.logger.warn(error.message, { port: path });
    return fail(error);
  }

  private async probeCandidate(
    path: string,
    baudRate: number,
    lines: HandshakeLines
  ): Promise<ProbeOutcome> {
    const context: TransportContext = { path, baudRate, dtr: lines.dtr, rts: lines.rts };
    const logContext = { port: path, baudRate, dtr: lines.dtr, rts: lines.rts };
    this.logger.debug('Trying line levels', logContext);

    let transport: LinkTransport | null = null;
    try {
      transport = this.createTransport(path, { baudRate, readTimeout: this.readTimeoutMs });
      await transport.connect();
      await transport.setSignals(lines);
      await sleep(this.settleDelayMs);

      for (const probe of PROBES) {
        await transport.flush();
        const packet = buildPacket(probe.command, SSP_CONSTANTS.INITIAL_SEQUENCE);
        this.logger.debug(`Sending ${probe.name} probe: ${toHex(packet)}`, {
          ...logContext,
          command: probe.command,
        });
        await transport.write(packet);

        const response = await transport.read(this.responseLength, this.readTimeoutMs);
        if (response.length > 0) {
          this.logger.info(`Response to ${probe.name}: ${toHex(response)}`, logContext);
          return 'response';
        }
        this.logger.debug(`No response to ${probe.name}`, logContext);
      }
      return 'silent';
    } catch (err: unknown) {
      const error = SspTransportError.from(err, context);
      this.logger.warn(`Probe failed: ${error.message}`, logContext);
      return 'fault';
    } finally {
      if (transport) await this.release(transport, context);
    }
  }

  private async release(transport: LinkTransport, context: TransportContext): Promise<void> {
    try {
      await transport.disconnect();
    } catch (err: unknown) {
      this.logger.warn(`Failed to close transport: ${SspTransportError.from(err, context).message}`, {
        port: context.path,
        baudRate: context.baudRate,
      });
    }
  }
}
