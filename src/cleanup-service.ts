/**
 * Cleanup service: wires configuration, library index, scanner, reconciler,
 * undo log and action engine into the runs the CLI exposes.
 */

import { join, resolve } from 'path';
import { ActionEngine, type MoveFunction } from './action-engine.js';
import type { AppConfig } from './config.js';
import { ConfigError } from './errors.js';
import { scanRoot, type ScanOptions } from './filesystem-scanner.js';
import { buildIndex, resolveRecordTargets } from './library-index.js';
import { logger } from './logger.js';
import { expandHome } from './path-normalizer.js';
import { classify } from './reconciler.js';
import type {
  ActionRecord,
  ActionScope,
  ActionSummary,
  ClassificationResult,
  LibraryIndex,
  ScanResult,
} from './types.js';
import { UndoLog } from './undo-log.js';
import { ZoteroAttachmentSource, type AttachmentSource } from './zotero-client.js';
import { defaultProfileDirectory, readZoteroPreferences, type ZoteroPreferences } from './zotero-preferences.js';

export const QUARANTINE_DIRNAME = '_unlinked_files';
export const TRASH_DIRNAME = '_unlinked_trash';

export interface ResolvedPaths {
  attachmentRoot: string;
  dataDirectory?: string;
  quarantineDir: string;
  trashDir: string;
  undoLogPath: string;
  fileTypes: string[];
}

export interface Analysis {
  index: LibraryIndex;
  scan: ScanResult;
  classification: ClassificationResult;
}

export interface CleanupDependencies {
  source?: AttachmentSource;
  preferences?: ZoteroPreferences;
  move?: MoveFunction;
}

export interface RunOptions {
  dryRun?: boolean;
  prune?: boolean;
}

export interface RunResult {
  summary: ActionSummary;
  analysis?: Analysis;
}

/**
 * Fill unset paths from the Zotero profile, then from defaults under the root.
 */
export function resolvePaths(config: AppConfig, preferences: ZoteroPreferences): ResolvedPaths {
  const rootSetting = config.paths.attachmentRoot || preferences.attachmentRoot;
  if (!rootSetting) {
    throw new ConfigError(
      'No attachment root configured and none found in the Zotero profile',
      ['paths.attachmentRoot is required']
    );
  }

  const attachmentRoot = resolve(expandHome(rootSetting));
  const dataSetting = config.paths.dataDirectory || preferences.dataDirectory;

  return {
    attachmentRoot,
    ...(dataSetting ? { dataDirectory: resolve(expandHome(dataSetting)) } : {}),
    quarantineDir: resolve(expandHome(config.paths.quarantineDir || join(attachmentRoot, QUARANTINE_DIRNAME))),
    trashDir: resolve(expandHome(config.paths.trashDir || join(attachmentRoot, TRASH_DIRNAME))),
    undoLogPath: resolve(expandHome(config.paths.undoLogPath)),
    fileTypes: config.scan.fileTypes.length > 0 ? config.scan.fileTypes : preferences.fileTypes ?? [],
  };
}

/**
 * 0: everything requested was done. 1: some items failed or were refused.
 */
export function exitCodeFor(summary: ActionSummary): 0 | 1 {
  const refused = [...summary.items, ...summary.directories].some(
    item => item.status === 'skipped' && item.code !== undefined
  );
  return summary.failed > 0 || refused ? 1 : 0;
}

export class CleanupService {
  private readonly preferences: ZoteroPreferences;
  private readonly resolved: ResolvedPaths;

  constructor(private readonly config: AppConfig, private readonly deps: CleanupDependencies = {}) {
    this.preferences = deps.preferences
      ?? readZoteroPreferences(config.paths.profileDirectory ? expandHome(config.paths.profileDirectory) : defaultProfileDirectory());
    this.resolved = resolvePaths(config, this.preferences);
  }

  paths(): ResolvedPaths {
    return { ...this.resolved };
  }

  private source(): AttachmentSource {
    if (this.deps.source) return this.deps.source;

    const { apiKey, libraryId, libraryType, pageSize } = this.config.zotero;
    if (!apiKey || !libraryId) {
      throw new ConfigError('Zotero credentials missing', [
        'zotero.apiKey (or ZOTERO_API_KEY) and zotero.libraryId (or ZOTERO_LIBRARY_ID) are required',
      ]);
    }
    return new ZoteroAttachmentSource({ apiKey, libraryId, libraryType, pageSize });
  }

  private scanOptions(): ScanOptions {
    const { scan } = this.config;
    return {
      ignore: scan.ignore,
      junkFiles: scan.junkFiles,
      followSymlinks: scan.followSymlinks,
      excludeDirs: [this.resolved.quarantineDir, this.resolved.trashDir],
    };
  }

  /**
   * Fetch the index and scan the root concurrently, then classify.
   */
  async analyze(): Promise<Analysis> {
    const { zotero, matching } = this.config;
    const source = this.source();

    const [index, scan] = await Promise.all([
      buildIndex(source, {
        attachmentRoot: this.resolved.attachmentRoot,
        dataDirectory: this.resolved.dataDirectory,
        maxRetries: zotero.maxRetries,
        retryDelayMs: zotero.retryDelayMs,
        timeoutMs: zotero.timeoutMs,
      }).then(built => (matching.resolveSymlinks ? resolveRecordTargets(built) : built)),
      scanRoot(this.resolved.attachmentRoot, this.scanOptions()),
    ]);

    const classification = classify(index, scan, {
      caseFolding: matching.caseFolding,
      resolveSymlinks: matching.resolveSymlinks,
      fuzzyFilenameCaseInsensitive: matching.fuzzyFilenameCaseInsensitive,
      fileTypes: this.resolved.fileTypes,
    });

    logger.info('Classification complete', {
      linked: classification.linked.length,
      unlinked: classification.unlinked.length,
      ambiguous: classification.ambiguous.length,
      emptyDirectories: classification.emptyDirectories.length,
    }, 'CleanupService');

    return { index, scan, classification };
  }

  private engine(log: UndoLog): ActionEngine {
    return new ActionEngine(log, {
      quarantineDir: this.resolved.quarantineDir,
      trashDir: this.resolved.trashDir,
      concurrency: this.config.actions.concurrency,
      timeoutMs: this.config.actions.timeoutMs,
      junkFiles: this.config.scan.junkFiles,
      caseFolding: this.config.matching.caseFolding,
      move: this.deps.move,
    });
  }

  /**
   * Open the log (or load it read-only for a dry run), recover interrupted
   * actions, run `action`, then give stragglers up to `actions.timeoutMs`
   * to settle before closing. Whatever is still in flight is left
   * `in_progress` for the next run to recover.
   */
  private async withEngine(
    dryRun: boolean,
    action: (engine: ActionEngine) => Promise<RunResult>
  ): Promise<RunResult> {
    const log = new UndoLog(this.resolved.undoLogPath);
    const engine = this.engine(log);

    if (dryRun) {
      log.reload();
      return action(engine);
    }

    log.open();
    try {
      const recovered = await engine.recover();
      const result = await action(engine);
      return { ...result, summary: { ...result.summary, recovered } };
    } finally {
      await engine.settle();
      log.close();
    }
  }

  async relocateOrRemove(mode: 'relocate' | 'remove', scope: ActionScope, options: RunOptions = {}): Promise<RunResult> {
    const dryRun = options.dryRun ?? false;
    // Analysis runs after recovery so the scan sees the recovered state
    return this.withEngine(dryRun, async engine => {
      const analysis = await this.analyze();
      const summary = await engine.apply(analysis.classification, mode, scope, {
        dryRun,
        prune: options.prune ?? this.config.actions.pruneEmptyDirectories,
      });
      return { summary, analysis };
    });
  }

  /**
   * Restore needs no library round-trip: everything comes from the undo log.
   */
  async restore(scope: ActionScope, options: RunOptions = {}): Promise<RunResult> {
    const dryRun = options.dryRun ?? false;
    return this.withEngine(dryRun, async engine => ({
      summary: await engine.restore(scope, {
        dryRun,
        prune: options.prune ?? this.config.actions.pruneEmptyDirectories,
      }),
    }));
  }

  /**
   * Remove directories with no files left at all. Needs only the scan.
   */
  async prune(options: RunOptions = {}): Promise<RunResult> {
    const dryRun = options.dryRun ?? false;
    return this.withEngine(dryRun, async engine => {
      const scan = await scanRoot(this.resolved.attachmentRoot, this.scanOptions());
      const emptyIndex: LibraryIndex = {
        records: [],
        attachmentRoot: scan.root,
        fetchedAt: new Date().toISOString(),
        pages: 0,
        skipped: 0,
      };
      const { emptyDirectories } = classify(emptyIndex, scan, { caseFolding: this.config.matching.caseFolding });
      return { summary: await engine.prune(emptyDirectories, { dryRun }) };
    });
  }

  history(): ActionRecord[] {
    const log = new UndoLog(this.resolved.undoLogPath);
    log.reload();
    return log.records();
  }
}
