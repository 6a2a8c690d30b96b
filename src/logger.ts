// src/logger.ts

import { COMMAND_NAMES } from './constants/constants.js';
import type {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/ssp-types.js';

type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

const VALID_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'port',
  'baudRate',
  'lines',
  'command',
  'sequence',
];

// поля, которые уже выведены в заголовке
const HEADER_KEYS: readonly string[] = ['logger', 'port', 'baudRate', 'dtr', 'rts', 'command', 'sequence'];

const onOff = (value: unknown): string => (value ? 'on' : 'off');

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private groupLevel: number = 0;
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = [...VALID_FIELDS];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private sink: LogSink;

  constructor(sink: LogSink = console) {
    this.sink = sink;
  }

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private field(name: LogField, value: unknown, fallback: (value: unknown) => string): string {
    const formatter = this.customFormatters[name] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log line: coloured header built from `logFormat`, then the message
   * arguments, then any context keys that did not make it into the header.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    for (const name of this.logFormat) {
      switch (name) {
        case 'timestamp':
          headerParts.push(this.field(name, this.getTimestamp(), v => `[${v}]`));
          break;
        case 'level':
          headerParts.push(this.field(name, level.toUpperCase(), v => `[${v}]`));
          break;
        case 'logger':
          if (context.logger) headerParts.push(this.field(name, context.logger, v => `[${v}]`));
          break;
        case 'port':
          if (context.port) headerParts.push(this.field(name, context.port, v => `[P:${v}]`));
          break;
        case 'baudRate':
          if (context.baudRate != null) headerParts.push(this.field(name, context.baudRate, v => `[B:${v}]`));
          break;
        case 'lines':
          if (context.dtr != null || context.rts != null) {
            headerParts.push(
              this.field(name, context, () => `[DTR:${onOff(context.dtr)} RTS:${onOff(context.rts)}]`)
            );
          }
          break;
        case 'command':
          if (context.command != null) {
            const code = context.command;
            const commandName = COMMAND_NAMES.get(code) ?? 'Unknown';
            headerParts.push(
              this.field(
                name,
                code,
                v => `[C:0x${Number(v).toString(16).padStart(2, '0')}/${commandName}]`
              )
            );
          }
          break;
        case 'sequence':
          if (context.sequence != null) {
            headerParts.push(
              this.field(name, context.sequence, v => `[SEQ:0x${Number(v).toString(16).padStart(2, '0')}]`)
            );
          }
          break;
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(context)) {
      if (!HEADER_KEYS.includes(key)) extra[key] = value;
    }
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    const header = headerParts.join('');
    return `${color}${header}${reset}${header ? ' ' : ''}${this.getIndent()}${formattedArgs.join(' ')}`;
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    const category = context.logger;
    if (category) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const line = this.format(level, args, context);
    // console.trace prints a stack, so trace goes to debug
    const method = level === 'trace' ? 'debug' : level;
    this.sink[method](line);
  }

  /**
   * Splits the arguments into the message arguments and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (typeof lastArg === 'object' && lastArg !== null && !(lastArg instanceof Error)) {
        return { args: args.slice(0, -1), context: { ...lastArg } };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  group(): void {
    this.groupLevel++;
  }

  groupEnd(): void {
    if (this.groupLevel > 0) this.groupLevel--;
  }

  isLevel(value: string): value is LogLevel {
    return this.LEVELS.some(level => level === value);
  }

  setLevel(level: LogLevel): void {
    if (this.isLevel(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.isLevel(level)) throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  disableColors(): void {
    this.useColors = false;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    if (!VALID_FIELDS.includes(field)) {
      throw new Error(`Invalid formatter field: ${field}`);
    }
    this.customFormatters[field] = formatter;
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  summary(): void {
    const total = Object.values(this.logCounts).reduce((sum: number, count: number) => sum + count, 0);
    this.sink.info(
      `Log summary: trace=${this.logCounts.trace} debug=${this.logCounts.debug} info=${this.logCounts.info} warn=${this.logCounts.warn} error=${this.logCounts.error} total=${total}`
    );
  }

  /**
   * Creates a logger instance bound to a category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

export default Logger;
