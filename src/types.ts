/**
 * Core types for attachment reconciliation
 */

import type { ItemErrorCode } from './errors.js';

export type AttachmentKind = 'stored' | 'linked';

/**
 * One attachment known to the library. Snapshot only, never persisted.
 */
export interface AttachmentRecord {
  itemId: string;
  storedOrLinkedPath: string;
  kind: AttachmentKind;
  parentItemId?: string;
  filename: string | null;
  absolutePath: string | null;   // null when the path cannot be resolved locally
  realPath?: string;             // symlink-resolved target, when it exists
  contentType?: string;
}

export interface LibraryIndex {
  records: readonly AttachmentRecord[];
  attachmentRoot: string;
  fetchedAt: string;
  pages: number;
  skipped: number;               // records without a local file (linked URLs, notes)
}

export interface FileEntry {
  absolutePath: string;
  relativePath: string;          // POSIX separators, relative to the scan root
  sizeBytes: number;
  modifiedTime: string;
  isDirectory: boolean;
  realPath?: string;             // set when the real location differs
  viaSymlink?: boolean;          // reached through a followed symbolic link
}

export type ScanWarningCode = 'SYMLINK_CYCLE' | 'DANGLING_SYMLINK' | 'UNREADABLE';

export interface ScanWarning {
  code: ScanWarningCode;
  path: string;
  target?: string;
  message: string;
}

export interface ScanResult {
  root: string;
  files: readonly FileEntry[];
  directories: readonly FileEntry[];
  warnings: readonly ScanWarning[];
}

export type MatchStatus = 'linked' | 'unlinked' | 'ambiguous';

export interface ClassifiedFile {
  entry: FileEntry;
  status: MatchStatus;
  itemIds: string[];             // records that matched exactly (linked) or partially (ambiguous)
  reason?: string;
  outOfScope: boolean;           // extension not among the configured file types
}

export interface ClassificationResult {
  root: string;
  files: readonly ClassifiedFile[];
  byPath: ReadonlyMap<string, ClassifiedFile>;
  linked: readonly FileEntry[];
  unlinked: readonly FileEntry[];
  ambiguous: readonly ClassifiedFile[];
  emptyDirectories: readonly string[];
  clearableDirectories: readonly string[];
  missing: readonly AttachmentRecord[];
}

export type ActionOperation = 'relocate' | 'remove' | 'restore' | 'prune';

export type ActionState = 'in_progress' | 'committed' | 'failed';

/**
 * Undo log entry. For relocate/remove the file moves from originalPath
 * into the quarantine/trash at destinationPath; for restore it moves from
 * originalPath (quarantine/trash) back to destinationPath.
 */
export interface ActionRecord {
  sequenceId: number;
  runId: string;
  operation: ActionOperation;
  originalPath: string;
  destinationPath: string | null;
  restoresSequenceId?: number;
  timestamp: string;
  state: ActionState;
  error?: string;
  consumed: boolean;
}

export type ApplyMode = 'relocate' | 'remove' | 'restore';

export type ActionScope =
  | { kind: 'unlinked'; fileTypes?: string[] }
  | { kind: 'paths'; paths: string[]; includeAmbiguous?: boolean }
  | { kind: 'run'; runId: string }
  | { kind: 'all' };

export type ItemStatus = 'committed' | 'failed' | 'skipped' | 'already_restored' | 'planned';

export interface ItemOutcome {
  path: string;
  destinationPath?: string;
  status: ItemStatus;
  sequenceId?: number;
  code?: ItemErrorCode;
  message?: string;
}

export interface ActionSummary {
  mode: ApplyMode | 'prune';
  runId: string;
  dryRun: boolean;
  committed: number;
  failed: number;
  skipped: number;
  items: ItemOutcome[];
  directories: ItemOutcome[];
  recovered: ActionRecord[];
}
