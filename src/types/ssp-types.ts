// src/types/ssp-types.ts

import type { CommandName } from '../constants/constants.js';
import type { SspError } from '../errors.js';

// !=============================================================================
// ! Результаты операций
// !=============================================================================

/** Явный результат операции вместо выброшенного исключения */
export type SspResult<T, E extends SspError = SspError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// !=============================================================================
// ! Пакеты и команды
// !=============================================================================

/** Разобранный SSP-пакет */
export interface SspPacket {
  sequence: number;
  command: number;
  data: Uint8Array;
}

export interface CommandDescriptor {
  command: number;
  name: CommandName;
}

/** Итог отправки одной команды */
export interface CommandOutcome {
  command: number;
  name: CommandName;
  sequence: number;
  packet: Uint8Array;
  response: Uint8Array;
  responded: boolean;
  /** the response is a well-formed packet with a matching CRC */
  valid: boolean;
  /** 1-based index of an extra POLL sent after the first POLL reply */
  repeat?: number;
}

// !=============================================================================
// ! Устройство и параметры линии
// !=============================================================================

export interface DeviceIds {
  vendorId: number;
  productId: number;
}

/** Описание найденного последовательного порта */
export interface PortInfo {
  path: string;
  vendorId?: number;
  productId?: number;
  manufacturer?: string;
  serialNumber?: string;
  locationId?: string;
  pnpId?: string;
}

export type PortLister = () => Promise<PortInfo[]>;

export interface HandshakeLines {
  readonly dtr: boolean;
  readonly rts: boolean;
}

/** Рабочие параметры связи, найденные перебором */
export interface LinkConfiguration extends HandshakeLines {
  readonly path: string;
  readonly baudRate: number;
}

/** Контекст ошибки транспорта, достаточный для воспроизведения */
export interface TransportContext {
  path: string;
  baudRate?: number;
  dtr?: boolean;
  rts?: boolean;
}

// !=============================================================================
// ! Интерфейсы для транспорта
// !=============================================================================

export type Parity = 'none' | 'even' | 'odd' | 'mark' | 'space';

export interface LinkTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: Parity;
  readTimeout?: number;
  maxBufferSize?: number;
  logger?: LoggerInstance;
}

/** Абстрактный последовательный канал */
export interface LinkTransport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Set DTR/RTS line levels */
  setSignals(lines: HandshakeLines): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /**
   * Resolves with at most `length` bytes: as soon as that many arrived, or with
   * whatever was buffered when `timeout` elapsed (possibly nothing).
   */
  read(length: number, timeout?: number): Promise<Uint8Array>;
  /** Discard pending input and output */
  flush(): Promise<void>;
}

export type TransportFactory = (path: string, options: LinkTransportOptions) => LinkTransport;

// !=============================================================================
// ! Права доступа
// !=============================================================================

export type AccessChecker = (path: string) => Promise<SspResult<void>>;

/** Внешнее средство восстановления прав доступа к устройству */
export interface PermissionRemediator {
  remediate(path: string): Promise<void>;
}

// !=============================================================================
// ! Логгер
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  port?: string;
  baudRate?: number;
  dtr?: boolean;
  rts?: boolean;
  command?: number;
  sequence?: number;
  [key: string]: unknown;
}

export type LogField =
  | 'timestamp'
  | 'level'
  | 'logger'
  | 'port'
  | 'baudRate'
  | 'lines'
  | 'command'
  | 'sequence';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(level: LogLevel): void;
  pause(): void;
  resume(): void;
}
