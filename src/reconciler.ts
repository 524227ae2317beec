/**
 * Reconciler: classifies every scanned file against the library index.
 *
 * - linked: a normalized key of the file (path, real path) equals a
 *   normalized key of some attachment record
 * - ambiguous: no exact match, but the path differs only by case, or the
 *   filename is attached somewhere else (moved but still linked?)
 * - unlinked: neither
 *
 * Pure: the same two snapshots always give the same result, whatever
 * their order.
 */

import { extname, join, relative } from 'path';
import type { CaseFolding } from './config.js';
import { comparePaths } from './filesystem-scanner.js';
import { filenameKey, isInside, normalizePath, shouldFoldCase, toPosixPath } from './path-normalizer.js';
import type {
  AttachmentRecord,
  ClassificationResult,
  ClassifiedFile,
  FileEntry,
  LibraryIndex,
  ScanResult,
} from './types.js';

export interface ClassifyOptions {
  caseFolding?: CaseFolding;
  resolveSymlinks?: boolean;
  fuzzyFilenameCaseInsensitive?: boolean;
  fileTypes?: string[];
  platform?: NodeJS.Platform;
}

type KeyIndex = Map<string, Set<string>>;

function addKey(index: KeyIndex, key: string, itemId: string): void {
  const ids = index.get(key);
  if (ids) {
    ids.add(itemId);
  } else {
    index.set(key, new Set([itemId]));
  }
}

function collect(index: KeyIndex, keys: string[]): string[] {
  const ids = new Set<string>();
  for (const key of keys) {
    for (const id of index.get(key) ?? []) ids.add(id);
  }
  return [...ids].sort();
}

export function isInFileTypes(path: string, fileTypes: string[]): boolean {
  if (fileTypes.length === 0) return true;
  const extension = extname(path).replace(/^\./, '').toLowerCase();
  return fileTypes.includes(extension);
}

/**
 * Every directory between the root (exclusive) and the entry (exclusive)
 */
function ancestorDirectories(root: string, relativePath: string): string[] {
  const segments = relativePath.split('/').slice(0, -1);
  const ancestors: string[] = [];
  let current = root;
  for (const segment of segments) {
    current = join(current, segment);
    ancestors.push(current);
  }
  return ancestors;
}

export function classify(index: LibraryIndex, scan: ScanResult, options: ClassifyOptions = {}): ClassificationResult {
  const normalizeOptions = { caseFolding: options.caseFolding ?? 'auto', platform: options.platform };
  const foldCase = shouldFoldCase(normalizeOptions.caseFolding, options.platform);
  const resolveSymlinks = options.resolveSymlinks ?? true;
  const fuzzyFold = options.fuzzyFilenameCaseInsensitive ?? true;
  const fileTypes = (options.fileTypes ?? []).map(type => type.toLowerCase());

  const recordKeys = (record: AttachmentRecord): string[] => {
    const keys: string[] = [];
    if (record.absolutePath) keys.push(normalizePath(record.absolutePath, normalizeOptions));
    if (resolveSymlinks && record.realPath) keys.push(normalizePath(record.realPath, normalizeOptions));
    return keys;
  };

  const fileKeys = (entry: FileEntry): string[] => {
    const keys = [normalizePath(entry.absolutePath, normalizeOptions)];
    if (resolveSymlinks && entry.realPath) keys.push(normalizePath(entry.realPath, normalizeOptions));
    return keys;
  };

  const exact: KeyIndex = new Map();
  const caseless: KeyIndex = new Map();
  const byFilename: KeyIndex = new Map();

  for (const record of index.records) {
    for (const key of recordKeys(record)) {
      addKey(exact, key, record.itemId);
      addKey(caseless, key.toLowerCase(), record.itemId);
    }
    if (record.filename) {
      addKey(byFilename, filenameKey(record.filename, fuzzyFold), record.itemId);
    }
  }

  const sortedFiles = [...scan.files].sort((a, b) => comparePaths(a.absolutePath, b.absolutePath));
  const seenKeys = new Set<string>();
  const files: ClassifiedFile[] = [];

  for (const entry of sortedFiles) {
    const keys = fileKeys(entry);
    keys.forEach(key => seenKeys.add(key));
    const outOfScope = !isInFileTypes(entry.absolutePath, fileTypes);

    const linkedIds = collect(exact, keys);
    if (linkedIds.length > 0) {
      files.push({ entry, status: 'linked', itemIds: linkedIds, outOfScope });
      continue;
    }

    const caseIds = foldCase ? [] : collect(caseless, keys.map(key => key.toLowerCase()));
    if (caseIds.length > 0) {
      files.push({ entry, status: 'ambiguous', itemIds: caseIds, reason: 'path differs from an attachment only by case', outOfScope });
      continue;
    }

    const nameIds = collect(byFilename, [filenameKey(entry.absolutePath, fuzzyFold)]);
    if (nameIds.length > 0) {
      files.push({
        entry,
        status: 'ambiguous',
        itemIds: nameIds,
        reason: 'filename matches an attachment in another location',
        outOfScope,
      });
      continue;
    }

    files.push({ entry, status: 'unlinked', itemIds: [], outOfScope });
  }

  // Directory candidates, bottom-up: a directory is protected by any linked
  // or ambiguous descendant, and by unlinked files the unlinked scope skips.
  const occupied = new Set<string>();
  const protectedDirs = new Set<string>();
  for (const file of files) {
    const isProtected = file.status !== 'unlinked' || file.outOfScope;
    for (const ancestor of ancestorDirectories(scan.root, file.entry.relativePath)) {
      occupied.add(ancestor);
      if (isProtected) protectedDirs.add(ancestor);
    }
  }

  // Unreadable directories may hold anything
  for (const warning of scan.warnings) {
    if (warning.code !== 'UNREADABLE') continue;
    const relativePath = toPosixPath(relative(scan.root, warning.path));
    for (const directory of [...ancestorDirectories(scan.root, relativePath), warning.path]) {
      occupied.add(directory);
      protectedDirs.add(directory);
    }
  }

  const linkedDirectories = scan.directories.filter(dir => dir.viaSymlink).map(dir => dir.absolutePath);
  const prunable = scan.directories
    .map(dir => dir.absolutePath)
    .filter(dir => !linkedDirectories.some(linkDir => isInside(linkDir, dir)))
    .sort(comparePaths);

  const emptyDirectories = prunable.filter(dir => !occupied.has(dir));
  const clearableDirectories = prunable.filter(dir => !protectedDirs.has(dir));

  const normalizedRoot = normalizePath(scan.root, normalizeOptions);
  const missing = index.records.filter(record => {
    const keys = recordKeys(record);
    return keys.length > 0
      && keys.some(key => isInside(normalizedRoot, key))
      && !keys.some(key => seenKeys.has(key));
  }).sort((a, b) => comparePaths(a.itemId, b.itemId));

  return {
    root: scan.root,
    files,
    byPath: new Map(files.map(file => [file.entry.absolutePath, file])),
    linked: files.filter(file => file.status === 'linked').map(file => file.entry),
    unlinked: files.filter(file => file.status === 'unlinked').map(file => file.entry),
    ambiguous: files.filter(file => file.status === 'ambiguous'),
    emptyDirectories,
    clearableDirectories,
    missing,
  };
}
