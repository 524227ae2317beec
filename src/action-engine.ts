/**
 * Action engine: the only component that changes the filesystem.
 *
 * Every mutation follows the same sequence: `begin` record in the undo
 * log, filesystem call, then `commit` or `fail`. Files are never deleted;
 * `remove` moves them into the trash directory so they stay restorable.
 */

import { lstat, readdir, rmdir, unlink } from 'fs/promises';
import { dirname, join, relative, resolve } from 'path';
import pLimit from 'p-limit';
import type { CaseFolding } from './config.js';
import {
  AmbiguousMatchError,
  MutationFailedError,
  RestoreConflictError,
  type ItemError,
  type ItemErrorCode,
} from './errors.js';
import { DestinationExistsError, movePath, PathLocks, pathExists, sameContent } from './file-operations.js';
import { DEFAULT_JUNK_FILES, comparePaths } from './filesystem-scanner.js';
import { AppError, logger, errorMessage } from './logger.js';
import { expandHome, isInside, normalizePath, pathDepth } from './path-normalizer.js';
import { isInFileTypes } from './reconciler.js';
import { TimeoutError, withTimeout } from './timeout.js';
import type {
  ActionRecord,
  ActionScope,
  ActionSummary,
  ApplyMode,
  ClassificationResult,
  ClassifiedFile,
  ItemOutcome,
} from './types.js';
import { createRunId, type UndoLog } from './undo-log.js';

const CONTEXT = 'ActionEngine';

export type MoveFunction = (source: string, destination: string) => Promise<void>;

export interface ActionEngineOptions {
  quarantineDir: string;
  trashDir: string;
  concurrency?: number;
  timeoutMs?: number;
  junkFiles?: string[];
  caseFolding?: CaseFolding;
  platform?: NodeJS.Platform;
  move?: MoveFunction;
}

export interface ApplyOptions {
  dryRun?: boolean;
  runId?: string;
  prune?: boolean;
}

interface MoveRequest {
  operation: 'relocate' | 'remove' | 'restore';
  source: string;
  destination: string;
  lockPath: string;
  restoresSequenceId?: number;
  // Checked under the path lock; an outcome here stops the move
  guard?: () => Promise<ItemOutcome | null>;
  refuse?: (error: unknown) => ItemError | null;
}

function summarize(
  mode: ActionSummary['mode'],
  runId: string,
  dryRun: boolean,
  items: ItemOutcome[],
  directories: ItemOutcome[],
  recovered: ActionRecord[] = []
): ActionSummary {
  const all = [...items, ...directories];
  return {
    mode,
    runId,
    dryRun,
    committed: all.filter(item => item.status === 'committed').length,
    failed: all.filter(item => item.status === 'failed').length,
    skipped: all.filter(item => item.status === 'skipped').length,
    items,
    directories,
    recovered,
  };
}

function skipped(path: string, code: ItemErrorCode, message: string): ItemOutcome {
  return { path, status: 'skipped', code, message };
}

function refusal(path: string, error: ItemError): ItemOutcome {
  return skipped(path, error.itemCode, error.message);
}

export class ActionEngine {
  private readonly locks = new PathLocks();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly quarantineDir: string;
  private readonly trashDir: string;
  private readonly junkFiles: Set<string>;
  private readonly move: MoveFunction;

  constructor(private readonly log: UndoLog, private readonly options: ActionEngineOptions) {
    this.quarantineDir = resolve(expandHome(options.quarantineDir));
    this.trashDir = resolve(expandHome(options.trashDir));
    this.junkFiles = new Set(options.junkFiles ?? DEFAULT_JUNK_FILES);
    this.move = options.move ?? movePath;
  }

  private key(path: string): string {
    return normalizePath(path, {
      caseFolding: this.options.caseFolding ?? 'auto',
      platform: this.options.platform,
    });
  }

  private requireOpenLog(): void {
    if (!this.log.isOpen()) {
      throw new AppError('Undo log must be open before mutating the filesystem', 'UNDO_LOG_CLOSED', 500);
    }
  }

  /**
   * Resolve records left `in_progress` by an interrupted run against disk.
   */
  async recover(): Promise<ActionRecord[]> {
    this.requireOpenLog();
    const resolved: ActionRecord[] = [];

    for (const record of this.log.pending()) {
      if (record.operation === 'prune') {
        const stillThere = await pathExists(record.originalPath);
        resolved.push(stillThere
          ? this.log.fail(record.sequenceId, 'interrupted before the directory was removed')
          : this.log.commit(record.sequenceId));
        continue;
      }

      const originPresent = await pathExists(record.originalPath);
      const destinationPresent = record.destinationPath !== null && await pathExists(record.destinationPath);

      if (destinationPresent && !originPresent) {
        resolved.push(this.log.commit(record.sequenceId));
      } else if (originPresent && !destinationPresent) {
        resolved.push(this.log.fail(record.sequenceId, 'interrupted before the move'));
      } else {
        const state = originPresent ? 'both origin and destination exist' : 'neither origin nor destination exists';
        logger.warn(`Interrupted ${record.operation} needs attention: ${state}`, {
          sequenceId: record.sequenceId,
          originalPath: record.originalPath,
          destinationPath: record.destinationPath,
        }, CONTEXT);
        resolved.push(this.log.fail(record.sequenceId, `interrupted: ${state}`));
      }
    }

    if (resolved.length > 0) {
      logger.info(`Recovered ${resolved.length} interrupted actions`, {
        committed: resolved.filter(record => record.state === 'committed').length,
      }, CONTEXT);
    }
    return resolved.map(record => ({ ...record }));
  }

  /**
   * Wait up to `graceMs` for moves that outlived their timeout to settle in
   * the log. Returns the records still `in_progress` after that; the next
   * run's `recover()` resolves them.
   */
  async settle(graceMs: number = this.options.timeoutMs ?? 60000): Promise<ActionRecord[]> {
    if (this.inFlight.size === 0) return [];

    try {
      await withTimeout(Promise.all([...this.inFlight]), graceMs, 'settling in-flight moves');
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
    }
    if (this.inFlight.size === 0) return [];

    const stranded = this.log.pending();
    logger.warn(`${stranded.length} moves still in flight, left for recovery`, {
      sequenceIds: stranded.map(record => record.sequenceId),
      graceMs,
    }, CONTEXT);
    return stranded;
  }

  async apply(
    classification: ClassificationResult,
    mode: ApplyMode,
    scope: ActionScope,
    options: ApplyOptions = {}
  ): Promise<ActionSummary> {
    if (mode === 'restore') {
      return this.restore(scope, options);
    }

    const dryRun = options.dryRun ?? false;
    const runId = options.runId ?? createRunId();
    if (!dryRun) this.requireOpenLog();

    const { selected, refused } = this.select(classification, scope);
    const baseDir = mode === 'relocate' ? this.quarantineDir : this.trashDir;
    const limit = pLimit(this.options.concurrency ?? 4);

    const moved = await Promise.all(
      selected.map(file => limit(() => {
        const destination = join(baseDir, runId, ...file.entry.relativePath.split('/'));
        if (dryRun) {
          return Promise.resolve<ItemOutcome>({ path: file.entry.absolutePath, destinationPath: destination, status: 'planned' });
        }
        return this.runMove(runId, {
          operation: mode,
          source: file.entry.absolutePath,
          destination,
          lockPath: file.entry.absolutePath,
        });
      }))
    );

    const items = [...refused, ...moved].sort((a, b) => comparePaths(a.path, b.path));
    const directories = options.prune === false
      ? []
      : await this.pruneDirectories(this.clearedDirectories(classification, scope, moved), { dryRun, runId });

    const summary = summarize(mode, runId, dryRun, items, directories);
    logger.info(`${mode} finished`, {
      runId,
      dryRun,
      committed: summary.committed,
      failed: summary.failed,
      skipped: summary.skipped,
    }, CONTEXT);
    return summary;
  }

  private select(
    classification: ClassificationResult,
    scope: ActionScope
  ): { selected: ClassifiedFile[]; refused: ItemOutcome[] } {
    if (scope.kind === 'unlinked') {
      const fileTypes = (scope.fileTypes ?? []).map(type => type.toLowerCase());
      return {
        selected: classification.files.filter(file =>
          file.status === 'unlinked' && !file.outOfScope && isInFileTypes(file.entry.absolutePath, fileTypes)
        ),
        refused: [],
      };
    }

    if (scope.kind !== 'paths') {
      throw new AppError(`Scope '${scope.kind}' only applies to restore`, 'INVALID_SCOPE', 400);
    }

    const byKey = new Map(classification.files.map(file => [this.key(file.entry.absolutePath), file]));
    const selected = new Map<string, ClassifiedFile>();
    const refused: ItemOutcome[] = [];

    for (const requested of scope.paths) {
      const absolutePath = resolve(expandHome(requested));
      const key = this.key(absolutePath);
      if (selected.has(key)) continue;

      const file = byKey.get(key);
      if (!file) {
        refused.push(skipped(absolutePath, 'NOT_IN_SCAN', 'path is not a scanned file under the attachment root'));
      } else if (file.status === 'linked') {
        refused.push(skipped(file.entry.absolutePath, 'LINKED_PROTECTED', `linked to ${file.itemIds.join(', ')}`));
      } else if (file.status === 'ambiguous' && !scope.includeAmbiguous) {
        refused.push(refusal(file.entry.absolutePath, new AmbiguousMatchError(file.entry.absolutePath, file.itemIds, file.reason)));
      } else {
        selected.set(key, file);
      }
    }

    return { selected: [...selected.values()], refused };
  }

  /**
   * Directories this run leaves with nothing but junk in them. Every scanned
   * file inside must have been moved. Under the `paths` scope only ancestors
   * of moved files qualify, and an empty directory left inside blocks its
   * parent.
   */
  private clearedDirectories(
    classification: ClassificationResult,
    scope: ActionScope,
    moved: readonly ItemOutcome[]
  ): string[] {
    const movedKeys = new Set(
      moved.filter(item => item.status === 'committed' || item.status === 'planned').map(item => this.key(item.path))
    );
    const fileKeys = classification.files.map(file => this.key(file.entry.absolutePath));
    const emptyKeys = classification.emptyDirectories.map(directory => this.key(directory));

    return classification.clearableDirectories.filter(directory => {
      const directoryKey = this.key(directory);
      const inside = fileKeys.filter(key => isInside(directoryKey, key));
      if (inside.some(key => !movedKeys.has(key))) return false;
      if (scope.kind !== 'paths') return true;
      return inside.length > 0
        && !emptyKeys.some(key => key !== directoryKey && isInside(directoryKey, key));
    });
  }

  /**
   * Log, move, and settle one file.
   */
  private async runMove(runId: string, request: MoveRequest): Promise<ItemOutcome> {
    const release = await this.locks.acquire(this.key(request.lockPath));
    const outcome: ItemOutcome = { path: request.lockPath, destinationPath: request.destination, status: 'failed' };

    if (request.guard) {
      let stopped: ItemOutcome | null;
      try {
        stopped = await request.guard();
      } catch (error) {
        release();
        return { ...outcome, code: 'MUTATION_FAILED', message: errorMessage(error) };
      }
      if (stopped) {
        release();
        return stopped;
      }
    }

    let record: ActionRecord;
    try {
      record = this.log.begin({
        runId,
        operation: request.operation,
        originalPath: request.source,
        destinationPath: request.destination,
        restoresSequenceId: request.restoresSequenceId,
      });
    } catch (error) {
      release();
      return { ...outcome, code: 'MUTATION_FAILED', message: `undo log write failed: ${errorMessage(error)}` };
    }

    const work = Promise.resolve().then(() => this.move(request.source, request.destination));
    return {
      ...outcome,
      ...(await this.track(record, work, release, `${request.operation} ${request.source}`, request.refuse)),
    };
  }

  /**
   * Bound `work` by the configured timeout. A timed-out item is reported as
   * failed while its record stays `in_progress` until the work settles, or
   * until the log is closed and the next run recovers it.
   */
  private async track(
    record: ActionRecord,
    work: Promise<void>,
    release: () => void,
    label: string,
    refuse?: (error: unknown) => ItemError | null
  ): Promise<Pick<ItemOutcome, 'status' | 'sequenceId' | 'code' | 'message'>> {
    const logFailures: unknown[] = [];
    const finish = (failure: { error: unknown } | null): void => {
      if (!this.log.isOpen()) {
        logger.warn(`${label} settled after the undo log was closed`, { sequenceId: record.sequenceId }, CONTEXT);
        return;
      }
      if (failure) {
        this.log.fail(record.sequenceId, errorMessage(failure.error));
      } else {
        this.log.commit(record.sequenceId);
      }
    };
    const settled: Promise<void> = work
      .then(() => finish(null), (error: unknown) => finish({ error }))
      .catch((error: unknown) => {
        logFailures.push(error);
        logger.error(`Undo log write failed for sequence ${record.sequenceId}`, error instanceof Error ? error : undefined, CONTEXT);
      })
      .finally(() => {
        release();
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);

    const sequenceId = record.sequenceId;
    try {
      await withTimeout(work, this.options.timeoutMs ?? 60000, label);
      await settled;
    } catch (error) {
      const refused = refuse?.(error);
      if (refused) {
        logger.warn(`${label} refused`, { code: refused.itemCode, error: refused.message }, CONTEXT);
        return { status: 'skipped', sequenceId, code: refused.itemCode, message: refused.message };
      }
      const failure = new MutationFailedError(
        errorMessage(error),
        error instanceof TimeoutError ? 'TIMEOUT' : 'MUTATION_FAILED',
        { sequenceId }
      );
      logger.warn(`${label} failed`, { code: failure.itemCode, error: failure.message }, CONTEXT);
      return { status: 'failed', sequenceId, code: failure.itemCode, message: failure.message };
    }

    if (logFailures.length > 0) {
      return { status: 'failed', sequenceId, code: 'MUTATION_FAILED', message: `undo log write failed: ${errorMessage(logFailures[0])}` };
    }
    return { status: 'committed', sequenceId };
  }

  /**
   * Keep, per original path, only the most recent record not yet restored.
   * Older ones are refused: restoring them would hide the newer copy.
   */
  private newestPerPath(
    records: readonly ActionRecord[],
    restorable: readonly ActionRecord[]
  ): { candidates: ActionRecord[]; refused: ItemOutcome[] } {
    const newest = new Map<string, number>();
    for (const record of restorable) {
      const key = this.key(record.originalPath);
      if (!record.consumed && !newest.has(key)) newest.set(key, record.sequenceId);
    }

    const candidates: ActionRecord[] = [];
    const refused: ItemOutcome[] = [];
    for (const record of records) {
      const newestId = newest.get(this.key(record.originalPath));
      if (record.consumed || newestId === record.sequenceId) {
        candidates.push(record);
        continue;
      }
      const conflict = new RestoreConflictError(
        record.originalPath,
        `a newer move of this path (sequence ${newestId}) is restored instead`
      );
      refused.push({
        ...refusal(record.originalPath, conflict),
        ...(record.destinationPath !== null ? { destinationPath: record.destinationPath } : {}),
        sequenceId: record.sequenceId,
      });
    }
    return { candidates, refused };
  }

  private restoreCandidates(scope: ActionScope): { candidates: ActionRecord[]; refused: ItemOutcome[] } {
    const restorable = this.log.restorable();

    switch (scope.kind) {
      case 'all':
        return this.newestPerPath(restorable.filter(record => !record.consumed).reverse(), restorable);
      case 'run':
        return this.newestPerPath(restorable.filter(record => record.runId === scope.runId).reverse(), restorable);
      case 'paths': {
        const candidates: ActionRecord[] = [];
        const refused: ItemOutcome[] = [];
        const seen = new Set<number>();
        for (const requested of scope.paths) {
          const absolutePath = resolve(expandHome(requested));
          const key = this.key(absolutePath);
          // Newest first, so the first hit is the most recent action on the path
          const record = restorable.find(candidate => this.key(candidate.originalPath) === key);
          if (!record) {
            refused.push(skipped(absolutePath, 'NOT_FOUND', 'no committed relocate or remove record for this path'));
          } else if (!seen.has(record.sequenceId)) {
            seen.add(record.sequenceId);
            candidates.push(record);
          }
        }
        return { candidates, refused };
      }
      default:
        throw new AppError(`Scope '${scope.kind}' does not apply to restore`, 'INVALID_SCOPE', 400);
    }
  }

  async restore(scope: ActionScope, options: ApplyOptions = {}): Promise<ActionSummary> {
    const dryRun = options.dryRun ?? false;
    const runId = options.runId ?? createRunId();
    if (!dryRun) this.requireOpenLog();

    const { candidates, refused } = this.restoreCandidates(scope);
    const limit = pLimit(this.options.concurrency ?? 4);

    const restored = await Promise.all(
      candidates.map(record => limit(() => this.restoreOne(runId, record, dryRun)))
    );

    const items = [...refused, ...restored].sort((a, b) => comparePaths(a.path, b.path));

    let directories: ItemOutcome[] = [];
    if (options.prune !== false) {
      const emptied = candidates
        .filter((_, index) => restored[index]?.status === 'committed' || (dryRun && restored[index]?.status === 'planned'))
        .flatMap(record => this.runDirectories(record));
      directories = await this.pruneDirectories([...new Set(emptied)], { dryRun, runId });
    }

    const summary = summarize('restore', runId, dryRun, items, directories);
    logger.info('restore finished', {
      runId,
      dryRun,
      committed: summary.committed,
      failed: summary.failed,
      skipped: summary.skipped,
    }, CONTEXT);
    return summary;
  }

  private async restoreOne(runId: string, record: ActionRecord, dryRun: boolean): Promise<ItemOutcome> {
    const target = record.originalPath;
    const source = record.destinationPath;

    if (record.consumed) {
      return { path: target, status: 'already_restored', sequenceId: record.sequenceId, message: 'already restored by an earlier run' };
    }
    if (source === null || !(await pathExists(source))) {
      return {
        path: target,
        status: 'failed',
        sequenceId: record.sequenceId,
        code: 'NOT_FOUND',
        message: `moved copy is missing: ${source ?? '(none)'}`,
      };
    }

    const occupied = async (): Promise<ItemOutcome | null> => {
      if (!(await pathExists(target))) return null;
      if (await sameContent(source, target)) {
        return { path: target, status: 'already_restored', sequenceId: record.sequenceId, message: 'identical file already at the original path' };
      }
      return { ...refusal(target, new RestoreConflictError(target)), destinationPath: source, sequenceId: record.sequenceId };
    };

    if (dryRun) {
      return (await occupied()) ?? { path: target, destinationPath: source, status: 'planned', sequenceId: record.sequenceId };
    }

    const outcome = await this.runMove(runId, {
      operation: 'restore',
      source,
      destination: target,
      lockPath: target,
      restoresSequenceId: record.sequenceId,
      guard: occupied,
      refuse: error => (error instanceof DestinationExistsError ? new RestoreConflictError(target) : null),
    });
    if (outcome.status === 'already_restored') return outcome;
    // Reported from the point of view of the restored file
    return { ...outcome, path: target, destinationPath: source };
  }

  /**
   * The directories between a moved copy and its quarantine/trash base,
   * the run directory included.
   */
  private runDirectories(record: ActionRecord): string[] {
    const moved = record.destinationPath;
    if (moved === null) return [];
    const base = [this.quarantineDir, this.trashDir].find(dir => isInside(dir, moved));
    if (!base) return [];

    const directories: string[] = [];
    let current = dirname(moved);
    while (current !== base && isInside(base, current) && relative(base, current) !== '') {
      directories.push(current);
      current = dirname(current);
    }
    return directories;
  }

  private async holdsOnlyJunk(directory: string): Promise<string[] | null> {
    let stats;
    try {
      stats = await lstat(directory);
    } catch {
      return null;
    }
    if (!stats.isDirectory()) return null;

    const entries = await readdir(directory, { withFileTypes: true });
    if (entries.some(entry => !entry.isFile() || !this.junkFiles.has(entry.name))) {
      return null;
    }
    return entries.map(entry => join(directory, entry.name));
  }

  /**
   * Remove directories that hold nothing but junk files, deepest first.
   * Each directory is re-checked right before it is removed.
   */
  async pruneDirectories(
    candidates: readonly string[],
    options: ApplyOptions = {}
  ): Promise<ItemOutcome[]> {
    const dryRun = options.dryRun ?? false;
    const runId = options.runId ?? createRunId();
    if (!dryRun) this.requireOpenLog();

    const ordered = [...new Set(candidates)].sort(
      (a, b) => pathDepth(b) - pathDepth(a) || comparePaths(a, b)
    );

    if (dryRun) {
      return ordered.map(directory => ({ path: directory, status: 'planned' }));
    }

    const outcomes: ItemOutcome[] = [];
    for (const directory of ordered) {
      const release = await this.locks.acquire(this.key(directory));
      let junk: string[] | null;
      let record: ActionRecord;
      try {
        junk = await this.holdsOnlyJunk(directory);
        if (junk === null) {
          logger.debug('Directory kept', { path: directory }, CONTEXT);
          release();
          continue;
        }
        record = this.log.begin({ runId, operation: 'prune', originalPath: directory, destinationPath: null });
      } catch (error) {
        release();
        outcomes.push({ path: directory, status: 'failed', code: 'MUTATION_FAILED', message: errorMessage(error) });
        continue;
      }

      const files = junk;
      const work = (async () => {
        for (const file of files) await unlink(file);
        await rmdir(directory);
      })();
      outcomes.push({ path: directory, ...(await this.track(record, work, release, `prune ${directory}`)) });
    }

    return outcomes;
  }

  /**
   * Standalone prune run over the given directories.
   */
  async prune(candidates: readonly string[], options: ApplyOptions = {}): Promise<ActionSummary> {
    const runId = options.runId ?? createRunId();
    const dryRun = options.dryRun ?? false;
    const directories = await this.pruneDirectories(candidates, { dryRun, runId });
    return summarize('prune', runId, dryRun, [], directories);
  }
}
