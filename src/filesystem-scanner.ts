/**
 * Filesystem scanner: lists every file and directory under the attachment
 * root. Symbolic links to directories are followed by hand so each real
 * target is entered at most once.
 */

import { access, realpath, stat } from 'fs/promises';
import { constants, type Stats } from 'fs';
import { join, relative, resolve } from 'path';
import fg from 'fast-glob';
import { RootNotFoundError } from './errors.js';
import { logger, errorMessage } from './logger.js';
import { expandHome, isInside, toPosixPath } from './path-normalizer.js';
import type { FileEntry, ScanResult, ScanWarning } from './types.js';

export const DEFAULT_JUNK_FILES = ['.DS_Store', 'desktop.ini', 'Thumbs.db'];

export interface ScanOptions {
  ignore?: string[];
  junkFiles?: string[];
  excludeDirs?: string[];       // absolute paths never descended into (quarantine, trash)
  followSymlinks?: boolean;
}

interface WalkState {
  root: string;
  realRoot: string;
  ignore: string[];
  excludeDirs: string[];
  followSymlinks: boolean;
  visited: Set<string>;
  files: FileEntry[];
  directories: FileEntry[];
  warnings: ScanWarning[];
}

export function comparePaths(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function toEntry(root: string, absolutePath: string, stats: Stats, realPath?: string, viaSymlink = false): FileEntry {
  return {
    absolutePath,
    relativePath: toPosixPath(relative(root, absolutePath)),
    sizeBytes: stats.isDirectory() ? 0 : stats.size,
    modifiedTime: stats.mtime.toISOString(),
    isDirectory: stats.isDirectory(),
    ...(realPath ? { realPath } : {}),
    ...(viaSymlink ? { viaSymlink } : {}),
  };
}

function warn(state: WalkState, warning: ScanWarning): void {
  state.warnings.push(warning);
  logger.warn(warning.message, { path: warning.path, target: warning.target }, 'Scanner');
}

async function followLink(state: WalkState, linkPath: string, realDir: string): Promise<void> {
  let target: string;
  let targetStats: Stats;
  try {
    target = await realpath(linkPath);
    targetStats = await stat(target);
  } catch (error) {
    warn(state, {
      code: 'DANGLING_SYMLINK',
      path: linkPath,
      message: `Skipping dangling symbolic link: ${linkPath} (${errorMessage(error)})`,
    });
    return;
  }

  if (!targetStats.isDirectory()) {
    state.files.push(toEntry(state.root, linkPath, targetStats, target, true));
    return;
  }

  if (!state.followSymlinks) {
    logger.debug('Not following directory link', { path: linkPath, target }, 'Scanner');
    return;
  }

  if (isInside(target, realDir) || state.visited.has(target)) {
    warn(state, {
      code: 'SYMLINK_CYCLE',
      path: linkPath,
      target,
      message: `Symbolic link cycle excluded from scan: ${linkPath} -> ${target}`,
    });
    return;
  }

  if (isInside(state.realRoot, target)) {
    // Already reachable through the regular walk
    logger.debug('Skipping link back into the attachment root', { path: linkPath, target }, 'Scanner');
    return;
  }

  state.visited.add(target);
  state.directories.push(toEntry(state.root, linkPath, targetStats, target, true));
  await walk(state, linkPath, target, true);
}

async function walk(state: WalkState, directory: string, realDir: string, viaSymlink = false): Promise<void> {
  const entries = await fg('**/*', {
    cwd: directory,
    onlyFiles: false,
    dot: true,
    stats: true,
    followSymbolicLinks: false,
    unique: true,
    absolute: false,
    ignore: state.ignore,
    suppressErrors: true,
  });

  entries.sort((a, b) => comparePaths(a.path, b.path));

  for (const entry of entries) {
    const absolutePath = join(directory, entry.path);
    if (state.excludeDirs.some(excluded => isInside(excluded, absolutePath))) {
      continue;
    }

    if (entry.dirent.isSymbolicLink()) {
      await followLink(state, absolutePath, join(realDir, entry.path, '..'));
      continue;
    }

    let stats = entry.stats;
    if (!stats) {
      try {
        stats = await stat(absolutePath);
      } catch (error) {
        warn(state, { code: 'UNREADABLE', path: absolutePath, message: `Cannot stat ${absolutePath}: ${errorMessage(error)}` });
        continue;
      }
    }

    // Below a followed link (or a linked root) the real location differs
    const realPath = realDir !== directory ? join(realDir, entry.path) : undefined;
    if (entry.dirent.isDirectory()) {
      // fast-glob skips what it cannot list without saying so
      try {
        await access(absolutePath, constants.R_OK | constants.X_OK);
      } catch (error) {
        warn(state, { code: 'UNREADABLE', path: absolutePath, message: `Cannot read directory ${absolutePath}: ${errorMessage(error)}` });
      }
      state.directories.push(toEntry(state.root, absolutePath, stats, realPath, viaSymlink));
    } else if (entry.dirent.isFile()) {
      state.files.push(toEntry(state.root, absolutePath, stats, realPath, viaSymlink));
    }
  }
}

/**
 * Walk `rootPath` and return a sorted snapshot of its files and directories.
 */
export async function scanRoot(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const root = resolve(expandHome(rootPath));

  let realRoot: string;
  try {
    const rootStats = await stat(root);
    if (!rootStats.isDirectory()) {
      throw new RootNotFoundError(root);
    }
    realRoot = await realpath(root);
  } catch (error) {
    if (error instanceof RootNotFoundError) throw error;
    throw new RootNotFoundError(root);
  }

  const junkFiles = options.junkFiles ?? DEFAULT_JUNK_FILES;
  const state: WalkState = {
    root,
    realRoot,
    ignore: [...(options.ignore ?? []), ...junkFiles.map(name => `**/${fg.escapePath(name)}`)],
    excludeDirs: (options.excludeDirs ?? []).map(dir => resolve(expandHome(dir))),
    followSymlinks: options.followSymlinks ?? true,
    visited: new Set([realRoot]),
    files: [],
    directories: [],
    warnings: [],
  };

  await walk(state, root, realRoot);

  state.files.sort((a, b) => comparePaths(a.absolutePath, b.absolutePath));
  state.directories.sort((a, b) => comparePaths(a.absolutePath, b.absolutePath));

  logger.info(
    `Scanned ${state.files.length} files in ${state.directories.length} directories`,
    { root, warnings: state.warnings.length },
    'Scanner'
  );

  return {
    root,
    files: state.files,
    directories: state.directories,
    warnings: state.warnings,
  };
}
