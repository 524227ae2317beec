/**
 * Undo log: append-only JSON Lines record of every filesystem mutation.
 *
 * A mutation is written as a `begin` line before the filesystem call and a
 * `commit` or `fail` line after it. Each line carries a checksum of its
 * entry; a torn trailing line (no newline) or a line failing its checksum
 * is discarded on load. A lock file keeps a second writer out.
 */

import { createHash, randomBytes } from 'crypto';
import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
  unlinkSync,
  writeFileSync,
  writeSync,
} from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { AppError, logger, errorMessage } from './logger.js';
import type { ActionOperation, ActionRecord } from './types.js';

const beginEntrySchema = z.object({
  type: z.literal('begin'),
  sequenceId: z.number().int().positive(),
  runId: z.string(),
  operation: z.enum(['relocate', 'remove', 'restore', 'prune']),
  originalPath: z.string(),
  destinationPath: z.string().nullable(),
  restoresSequenceId: z.number().int().positive().optional(),
  timestamp: z.string(),
});

const finishEntrySchema = z.object({
  type: z.enum(['commit', 'fail']),
  sequenceId: z.number().int().positive(),
  timestamp: z.string(),
  error: z.string().optional(),
});

const entrySchema = z.discriminatedUnion('type', [
  beginEntrySchema,
  finishEntrySchema.extend({ type: z.literal('commit') }),
  finishEntrySchema.extend({ type: z.literal('fail') }),
]);

const lineSchema = z.object({
  checksum: z.string(),
  entry: z.unknown(),
});

export type UndoLogEntry = z.infer<typeof entrySchema>;

export interface BeginInput {
  runId: string;
  operation: ActionOperation;
  originalPath: string;
  destinationPath: string | null;
  restoresSequenceId?: number;
}

export interface LoadReport {
  entries: number;
  discardedLines: number;
  truncatedTail: boolean;
}

export class UndoLogLockedError extends AppError {
  constructor(lockPath: string, pid: number) {
    super(`Undo log is locked by running process ${pid}: ${lockPath}`, 'UNDO_LOG_LOCKED', 423, { lockPath, pid });
    this.name = 'UndoLogLockedError';
  }
}

export function entryChecksum(entry: UndoLogEntry): string {
  return createHash('sha256').update(JSON.stringify(entry)).digest('hex').slice(0, 16);
}

export function serializeEntry(entry: UndoLogEntry): string {
  return `${JSON.stringify({ checksum: entryChecksum(entry), entry })}\n`;
}

/**
 * Sortable run id, e.g. `2024-05-01T10-22-03-512Z-3f9a1c`
 */
export function createRunId(now: Date = new Date()): string {
  return `${now.toISOString().replace(/[:.]/g, '-')}-${randomBytes(3).toString('hex')}`;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive but owned by someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

export class UndoLog {
  private fd: number | null = null;
  private recordsBySequence = new Map<number, ActionRecord>();
  private lastSequenceId = 0;
  private lockPath: string;
  private loadReport: LoadReport = { entries: 0, discardedLines: 0, truncatedTail: false };

  constructor(private path: string) {
    this.lockPath = `${path}.lock`;
  }

  isOpen(): boolean {
    return this.fd !== null;
  }

  getLoadReport(): LoadReport {
    return this.loadReport;
  }

  /**
   * Take the writer lock, load existing records and cut off a torn tail.
   */
  open(): void {
    if (this.fd !== null) return;

    mkdirSync(dirname(this.path), { recursive: true });
    this.acquireLock();

    try {
      const validLength = this.load();
      if (existsSync(this.path) && validLength !== null) {
        truncateSync(this.path, validLength);
      }
      this.fd = openSync(this.path, 'a');
    } catch (error) {
      this.releaseLock();
      throw error;
    }
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
    this.releaseLock();
  }

  /**
   * Read-only load, for inspecting the log while another run holds the lock
   */
  reload(): void {
    this.load();
  }

  private acquireLock(): void {
    try {
      writeFileSync(this.lockPath, String(process.pid), { flag: 'wx' });
      return;
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
        throw error;
      }
    }

    const owner = Number.parseInt(readFileSync(this.lockPath, 'utf-8').trim(), 10);
    if (Number.isFinite(owner) && owner !== process.pid && isProcessAlive(owner)) {
      throw new UndoLogLockedError(this.lockPath, owner);
    }

    logger.warn('Taking over stale undo log lock', { lockPath: this.lockPath, owner }, 'UndoLog');
    writeFileSync(this.lockPath, String(process.pid));
  }

  private releaseLock(): void {
    try {
      if (existsSync(this.lockPath) && readFileSync(this.lockPath, 'utf-8').trim() === String(process.pid)) {
        unlinkSync(this.lockPath);
      }
    } catch (error) {
      logger.warn('Failed to release undo log lock', { lockPath: this.lockPath, error: errorMessage(error) }, 'UndoLog');
    }
  }

  /**
   * Returns the byte length to truncate to when the tail is torn, else null.
   */
  private load(): number | null {
    this.recordsBySequence.clear();
    this.lastSequenceId = 0;
    this.loadReport = { entries: 0, discardedLines: 0, truncatedTail: false };

    if (!existsSync(this.path)) return null;

    const content = readFileSync(this.path, 'utf-8');
    const lastNewline = content.lastIndexOf('\n');
    const complete = content.slice(0, lastNewline + 1);
    const tail = content.slice(lastNewline + 1);

    if (tail.length > 0) {
      this.loadReport.truncatedTail = true;
      logger.warn('Discarding incomplete trailing undo log record', { path: this.path, bytes: tail.length }, 'UndoLog');
    }

    for (const line of complete.split('\n')) {
      if (line.trim().length === 0) continue;
      const entry = this.parseLine(line);
      if (!entry) {
        this.loadReport.discardedLines++;
        continue;
      }
      this.apply(entry);
      this.loadReport.entries++;
    }

    if (this.loadReport.discardedLines > 0) {
      logger.warn(`Discarded ${this.loadReport.discardedLines} corrupt undo log lines`, { path: this.path }, 'UndoLog');
    }

    return tail.length > 0 ? Buffer.byteLength(complete, 'utf-8') : null;
  }

  private parseLine(line: string): UndoLogEntry | null {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return null;
    }

    const wrapper = lineSchema.safeParse(raw);
    if (!wrapper.success) return null;

    const entry = entrySchema.safeParse(wrapper.data.entry);
    if (!entry.success) return null;

    return entryChecksum(entry.data) === wrapper.data.checksum ? entry.data : null;
  }

  private apply(entry: UndoLogEntry): void {
    if (entry.type === 'begin') {
      this.recordsBySequence.set(entry.sequenceId, {
        sequenceId: entry.sequenceId,
        runId: entry.runId,
        operation: entry.operation,
        originalPath: entry.originalPath,
        destinationPath: entry.destinationPath,
        ...(entry.restoresSequenceId !== undefined ? { restoresSequenceId: entry.restoresSequenceId } : {}),
        timestamp: entry.timestamp,
        state: 'in_progress',
        consumed: false,
      });
      this.lastSequenceId = Math.max(this.lastSequenceId, entry.sequenceId);
      return;
    }

    const record = this.recordsBySequence.get(entry.sequenceId);
    if (!record) {
      logger.warn('Undo log finish line without a begin line', { sequenceId: entry.sequenceId }, 'UndoLog');
      return;
    }

    record.state = entry.type === 'commit' ? 'committed' : 'failed';
    if (entry.error) record.error = entry.error;

    if (record.state === 'committed' && record.operation === 'restore' && record.restoresSequenceId !== undefined) {
      const restored = this.recordsBySequence.get(record.restoresSequenceId);
      if (restored) restored.consumed = true;
    }
  }

  private append(entry: UndoLogEntry): void {
    if (this.fd === null) {
      throw new AppError('Undo log is not open', 'UNDO_LOG_CLOSED', 500, { path: this.path });
    }
    writeSync(this.fd, serializeEntry(entry));
    fsyncSync(this.fd);
    this.apply(entry);
  }

  /**
   * Record the pre-image of a mutation. Must happen before the filesystem call.
   */
  begin(input: BeginInput): ActionRecord {
    const sequenceId = this.lastSequenceId + 1;
    this.append({
      type: 'begin',
      sequenceId,
      runId: input.runId,
      operation: input.operation,
      originalPath: input.originalPath,
      destinationPath: input.destinationPath,
      ...(input.restoresSequenceId !== undefined ? { restoresSequenceId: input.restoresSequenceId } : {}),
      timestamp: new Date().toISOString(),
    });
    return this.require(sequenceId);
  }

  commit(sequenceId: number): ActionRecord {
    this.append({ type: 'commit', sequenceId, timestamp: new Date().toISOString() });
    return this.require(sequenceId);
  }

  fail(sequenceId: number, error: string): ActionRecord {
    this.append({ type: 'fail', sequenceId, timestamp: new Date().toISOString(), error });
    return this.require(sequenceId);
  }

  private require(sequenceId: number): ActionRecord {
    const record = this.recordsBySequence.get(sequenceId);
    if (!record) {
      throw new AppError(`Unknown undo log sequence ${sequenceId}`, 'UNDO_LOG_UNKNOWN_SEQUENCE', 500);
    }
    return record;
  }

  get(sequenceId: number): ActionRecord | undefined {
    const record = this.recordsBySequence.get(sequenceId);
    return record ? { ...record } : undefined;
  }

  /**
   * All records in sequence order (copies)
   */
  records(): ActionRecord[] {
    return [...this.recordsBySequence.values()]
      .sort((a, b) => a.sequenceId - b.sequenceId)
      .map(record => ({ ...record }));
  }

  pending(): ActionRecord[] {
    return this.records().filter(record => record.state === 'in_progress');
  }

  /**
   * Committed relocate/remove records, newest first
   */
  restorable(): ActionRecord[] {
    return this.records()
      .filter(record => (record.operation === 'relocate' || record.operation === 'remove') && record.state === 'committed')
      .reverse();
  }
}
