/**
 * On-disk service state: one JSON record per service. Every CLI
 * invocation re-reads these records, so they are the source of truth
 * across processes.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { logger as defaultLogger, type Logger } from '../logger.js';

export const StateRecordSchema = z.object({
  name: z.string(),
  status: z.enum(['stopped', 'starting', 'running', 'stopping', 'failed']),
  pid: z.number().int().positive().optional(),
  startedAt: z.string().optional(),
  exitCode: z.number().int().optional(),
  signal: z.string().optional(),
  /** Kernel start time of `pid`, so a recycled pid is not mistaken for the service. */
  startTime: z.string().optional(),
  updatedAt: z.string(),
});

export type StateRecord = z.infer<typeof StateRecordSchema>;

export class StateStore {
  private logger: Logger;

  constructor(
    readonly dir: string,
    opts?: { logger?: Logger },
  ) {
    this.logger = opts?.logger ?? defaultLogger;
  }

  filePath(name: string): string {
    return path.join(this.dir, `${name}.json`);
  }

  /** Undefined when the service has no record or the record is unreadable. */
  read(name: string): StateRecord | undefined {
    const file = this.filePath(name);
    if (!fs.existsSync(file)) return undefined;

    try {
      return StateRecordSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
    } catch (err) {
      this.logger.warn({ err, file }, `Ignoring unreadable state record for "${name}"`);
      return undefined;
    }
  }

  /** Atomic write: temp file, then rename over the record. */
  write(record: Omit<StateRecord, 'updatedAt'>): StateRecord {
    const full: StateRecord = { ...record, updatedAt: new Date().toISOString() };
    fs.mkdirSync(this.dir, { recursive: true });
    const file = this.filePath(record.name);
    const tempPath = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(full, null, 2));
    fs.renameSync(tempPath, file);
    return full;
  }
}
