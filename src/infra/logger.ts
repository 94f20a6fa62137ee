import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuid } from 'uuid';
import { toJson } from '../utils/json.js';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogRecord {
  id: string;
  ts: string;
  level: LogLevel;
  event: string;
  data: Record<string, unknown>;
}

/**
 * Append-only NDJSON event log. One line per record; bigints are written as
 * decimal strings.
 */
export class EventLogger {
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<LogRecord> {
    const record: LogRecord = {
      id: uuid(),
      ts: isoNow(),
      level,
      event,
      data,
    };

    const line = `${toJson(record)}\n`;
    // Chain appends so records land in call order.
    const write = this.writes.then(() => fs.appendFile(this.logFilePath, line));
    this.writes = write.catch(() => undefined);
    await write;
    return record;
  }

  async flush(): Promise<void> {
    await this.writes;
  }
}
