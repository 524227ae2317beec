/**
 * Path comparison policy shared by the reconciler and the action engine.
 */

import { basename, isAbsolute, join, normalize, relative, resolve, sep } from 'path';
import { homedir } from 'os';
import type { CaseFolding } from './config.js';

export interface NormalizeOptions {
  caseFolding: CaseFolding;
  platform?: NodeJS.Platform;
}

/**
 * macOS and Windows volumes are case-insensitive by default
 */
export function shouldFoldCase(caseFolding: CaseFolding, platform: NodeJS.Platform = process.platform): boolean {
  if (caseFolding === 'on') return true;
  if (caseFolding === 'off') return false;
  return platform === 'darwin' || platform === 'win32';
}

export function expandHome(value: string): string {
  if (value === '~') return homedir();
  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return join(homedir(), value.slice(2));
  }
  return value;
}

/**
 * Absolute, `.`/`..`-free comparison key for a path
 */
export function normalizePath(value: string, options: NormalizeOptions): string {
  let normalized = normalize(resolve(expandHome(value)));
  if (normalized.length > 1 && normalized.endsWith(sep)) {
    normalized = normalized.slice(0, -1);
  }
  return shouldFoldCase(options.caseFolding, options.platform) ? normalized.toLowerCase() : normalized;
}

export function filenameKey(value: string, foldCase: boolean): string {
  const name = basename(value);
  return foldCase ? name.toLowerCase() : name;
}

export function toPosixPath(value: string): string {
  return value.replace(/\\/g, '/');
}

export function isInside(parentAbs: string, candidateAbs: string): boolean {
  const rel = relative(parentAbs, candidateAbs);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

export function pathDepth(value: string): number {
  return value.split(sep).filter(Boolean).length;
}
