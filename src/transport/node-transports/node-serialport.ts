// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, toHex } from '../../utils/utils.js';
import Logger from '../../logger.js';
import {
  SspConnectionError,
  SspNotConnectedError,
  SspReadError,
  SspTransportError,
  SspWriteError,
} from '../../errors.js';
import type {
  HandshakeLines,
  LinkTransport,
  LinkTransportOptions,
  LoggerInstance,
  TransportContext,
} from '../../types/ssp-types.js';
import { LINK_DEFAULTS } from '../../constants/constants.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  DEFAULT_MAX_BUFFER_SIZE: 4096,
  POLL_INTERVAL_MS: 10,
} as const;

// ========== LOGGER ==========
const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger', 'port', 'baudRate']);
const defaultLogger = loggerInstance.createLogger('NodeSerialTransport');

type ResolvedOptions = Required<Omit<LinkTransportOptions, 'logger'>>;

/**
 * Serial channel on top of `serialport`. Incoming bytes are collected into an
 * internal buffer; `read` drains up to the requested length, returning early once
 * it is full and otherwise whatever arrived before the timeout.
 */
class NodeSerialTransport implements LinkTransport {
  private path: string;
  private options: ResolvedOptions;
  private logger: LoggerInstance;
  private port: SerialPort | null = null;
  private readBuffer: Uint8Array = new Uint8Array(0);
  private _isOpen: boolean = false;
  private lines: HandshakeLines | null = null;
  private _operationMutex: Mutex = new Mutex();

  constructor(path: string, options: LinkTransportOptions = {}) {
    this.path = path;
    const { logger, ...rest } = options;
    this.logger = logger ?? defaultLogger;
    this.options = {
      baudRate: 9600,
      dataBits: LINK_DEFAULTS.DATA_BITS,
      stopBits: LINK_DEFAULTS.STOP_BITS,
      parity: LINK_DEFAULTS.PARITY,
      readTimeout: LINK_DEFAULTS.READ_TIMEOUT_MS,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      ...rest,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  private get context(): TransportContext {
    return {
      path: this.path,
      baudRate: this.options.baudRate,
      ...(this.lines ?? {}),
    };
  }

  async connect(): Promise<void> {
    if (this._isOpen) {
      this.logger.warn(`Serial port ${this.path} is already open`);
      return;
    }
    if (
      this.options.baudRate < LINK_DEFAULTS.MIN_BAUD_RATE ||
      this.options.baudRate > LINK_DEFAULTS.MAX_BAUD_RATE
    ) {
      throw new SspConnectionError(`Invalid baud rate: ${this.options.baudRate}`, this.context);
    }

    await this._createAndOpenPort();
    this.logger.debug(`Serial port ${this.path} opened`, {
      port: this.path,
      baudRate: this.options.baudRate,
    });
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.options.baudRate,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
        autoOpen: false,
      });
      this.port = port;

      port.open((err: Error | null) => {
        if (err) {
          this._isOpen = false;
          this.port = null;
          const message = err.message.toLowerCase();
          if (message.includes('permission')) {
            reject(new SspConnectionError('Permission denied', this.context, err));
          } else if (message.includes('busy') || message.includes('lock')) {
            reject(new SspConnectionError('Serial port is busy', this.context, err));
          } else if (message.includes('no such file')) {
            reject(new SspConnectionError('Serial port does not exist', this.context, err));
          } else {
            reject(new SspConnectionError(err.message, this.context, err));
          }
          return;
        }

        this._isOpen = true;
        this.readBuffer = new Uint8Array(0);
        port.on('data', (data: Buffer) => this._onData(data));
        port.on('error', (error: Error) => this._onError(error));
        port.on('close', () => this._onClose());
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      this.logger.warn(
        `Read buffer overflow, keeping the last ${this.options.maxBufferSize} bytes`,
        { port: this.path }
      );
      this.readBuffer = sliceUint8Array(this.readBuffer, -this.options.maxBufferSize);
    }
  }

  private _onError(err: Error): void {
    this.logger.error(`Serial port ${this.path} error: ${err.message}`, { port: this.path });
  }

  private _onClose(): void {
    this.logger.debug(`Serial port ${this.path} closed`, { port: this.path });
    this._isOpen = false;
  }

  private requirePort(): SerialPort {
    if (!this._isOpen || !this.port || !this.port.isOpen) {
      throw new SspNotConnectedError(this.context);
    }
    return this.port;
  }

  async setSignals(lines: HandshakeLines): Promise<void> {
    const port = this.requirePort();
    this.lines = { dtr: lines.dtr, rts: lines.rts };
    await new Promise<void>((resolve, reject) => {
      port.set({ dtr: lines.dtr, rts: lines.rts }, (err: Error | null) => {
        if (err) reject(new SspTransportError(`Failed to set lines: ${err.message}`, this.context, err));
        else resolve();
      });
    });
  }

  async flush(): Promise<void> {
    const port = this.requirePort();
    const release = await this._operationMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        port.flush((err: Error | null) => {
          if (err) reject(new SspTransportError(`Flush failed: ${err.message}`, this.context, err));
          else resolve();
        });
      });
      this.readBuffer = new Uint8Array(0);
    } finally {
      release();
    }
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.requirePort();
    if (buffer.length === 0) throw new SspWriteError('Nothing to write', this.context);
    const release = await this._operationMutex.acquire();
    try {
      this.logger.trace(`TX ${toHex(buffer)}`, { port: this.path });
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(buffer), (err: Error | null | undefined) => {
          if (err) return reject(new SspWriteError(err.message, this.context, err));
          port.drain((drainErr: Error | null) => {
            if (drainErr) return reject(new SspWriteError(drainErr.message, this.context, drainErr));
            resolve();
          });
        });
      });
    } finally {
      release();
    }
  }

  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (length <= 0) throw new SspReadError(`Invalid read length: ${length}`, this.context);
    const release = await this._operationMutex.acquire();
    const start = Date.now();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const take = (): Uint8Array => {
          const data = this.readBuffer.slice(0, length);
          this.readBuffer = this.readBuffer.slice(data.length);
          return data;
        };
        const check = (): void => {
          if (!this._isOpen || !this.port?.isOpen) {
            reject(new SspReadError('Port closed', this.context));
            return;
          }
          if (this.readBuffer.length >= length || Date.now() - start >= timeout) {
            const data = take();
            if (data.length > 0) this.logger.trace(`RX ${toHex(data)}`, { port: this.path });
            resolve(data);
            return;
          }
          setTimeout(check, NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    const context = this.context;
    this.port = null;
    this.lines = null;
    this.readBuffer = new Uint8Array(0);
    if (!port || !port.isOpen) {
      this._isOpen = false;
      return;
    }
    port.removeAllListeners('data');
    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => {
        this._isOpen = false;
        if (err) reject(new SspConnectionError(`Close failed: ${err.message}`, context, err));
        else resolve();
      });
    });
  }
}

export { NodeSerialTransport };
