import Logger from '../../src/logger.js';
import type { LogRecord } from '../../src/types/ssp-types.js';

/**
 * Logger that prints nothing and keeps every record it would have printed.
 */
export function createRecordingLogger(): { logger: Logger; records: LogRecord[] } {
  const noop = (): void => {};
  const logger = new Logger({ debug: noop, info: noop, warn: noop, error: noop });
  logger.setLevel('trace');
  const records: LogRecord[] = [];
  logger.watch(record => records.push(record));
  return { logger, records };
}

export function messages(records: LogRecord[], level?: LogRecord['level']): string[] {
  return records
    .filter(record => level === undefined || record.level === level)
    .map(record => record.args.map(String).join(' '));
}
