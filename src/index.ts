/**
 * Library entry point. The `zotclean` command lives in clean-cli.ts.
 */

export { ActionEngine, type ActionEngineOptions, type ApplyOptions, type MoveFunction } from './action-engine.js';
export {
  CleanupService,
  exitCodeFor,
  resolvePaths,
  QUARANTINE_DIRNAME,
  TRASH_DIRNAME,
  type Analysis,
  type CleanupDependencies,
  type ResolvedPaths,
  type RunOptions,
  type RunResult,
} from './cleanup-service.js';
export { ConfigManager, DEFAULT_CONFIG, createExampleConfig, parseFileTypes, type AppConfig } from './config.js';
export * from './errors.js';
export { scanRoot, type ScanOptions } from './filesystem-scanner.js';
export { buildIndex, parseAttachmentRecord, resolveRecordTargets } from './library-index.js';
export { AppError, Logger, logger, type LogLevel } from './logger.js';
export { classify, type ClassifyOptions } from './reconciler.js';
export type * from './types.js';
export { UndoLog, UndoLogLockedError, createRunId } from './undo-log.js';
export { ZoteroAttachmentSource, type AttachmentSource, type AttachmentPage } from './zotero-client.js';
export { readZoteroPreferences, type ZoteroPreferences } from './zotero-preferences.js';
