/**
 * Reads the local Zotero profile to discover where attachments live when
 * the configuration does not say so.
 *
 * Lookup order for the attachment root: ZotFile's `dest_dir`, then
 * Zotero's `baseAttachmentPath`.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { isAbsolute, join } from 'path';
import { logger, errorMessage } from './logger.js';
import { parseFileTypes } from './config.js';

export const PREF_ATTACHMENT_DEST = 'extensions.zotfile.dest_dir';
export const PREF_BASE_ATTACHMENT_PATH = 'extensions.zotero.baseAttachmentPath';
export const PREF_DATA_DIR = 'extensions.zotero.dataDir';
export const PREF_FILE_TYPES = 'extensions.zotfile.filetypes';

export interface ZoteroPreferences {
  profilePath: string | null;
  attachmentRoot?: string;
  dataDirectory?: string;
  fileTypes?: string[];
}

interface IniSection {
  name: string;
  values: Record<string, string>;
}

export function defaultProfileDirectory(platform: NodeJS.Platform = process.platform, home: string = homedir()): string {
  switch (platform) {
    case 'darwin':
      return join(home, 'Library', 'Application Support', 'Zotero');
    case 'win32':
      return join(home, 'AppData', 'Roaming', 'Zotero', 'Zotero');
    default:
      return join(home, '.zotero', 'zotero');
  }
}

function parseIni(content: string): IniSection[] {
  const sections: IniSection[] = [];
  let current: IniSection | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith(';') || line.startsWith('#')) continue;

    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      current = { name: header[1], values: {} };
      sections.push(current);
      continue;
    }

    const separator = line.indexOf('=');
    if (current && separator > 0) {
      current.values[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
    }
  }

  return sections;
}

/**
 * The default profile's directory from `profiles.ini`: the profile marked
 * `Default=1`, else the first one.
 */
export function resolveProfilePath(profilesIni: string, profileDirectory: string): string | null {
  const profiles = parseIni(profilesIni).filter(section => /^Profile\d+$/.test(section.name) && section.values.Path);
  const profile = profiles.find(section => section.values.Default === '1') ?? profiles[0];
  if (!profile) return null;

  const path = profile.values.Path;
  return profile.values.IsRelative === '0' || isAbsolute(path) ? path : join(profileDirectory, path);
}

function unquote(raw: string): string {
  try {
    const value: unknown = JSON.parse(`"${raw}"`);
    return typeof value === 'string' ? value : raw;
  } catch {
    return raw;
  }
}

/**
 * String preferences from a `prefs.js` file, `user_pref(...)` and `pref(...)` alike.
 */
export function parsePrefs(content: string): Map<string, string> {
  const prefs = new Map<string, string>();
  const pattern = /^\s*(?:user_)?pref\("([^"]+)",\s*"((?:[^"\\]|\\.)*)"\);/gm;
  for (const match of content.matchAll(pattern)) {
    prefs.set(match[1], unquote(match[2]));
  }
  return prefs;
}

export function readZoteroPreferences(profileDirectory: string = defaultProfileDirectory()): ZoteroPreferences {
  const iniPath = join(profileDirectory, 'profiles.ini');
  if (!existsSync(iniPath)) {
    logger.debug('No Zotero profiles.ini found', { iniPath }, 'ZoteroPreferences');
    return { profilePath: null };
  }

  let prefs: Map<string, string>;
  let profilePath: string | null;
  try {
    profilePath = resolveProfilePath(readFileSync(iniPath, 'utf-8'), profileDirectory);
    const prefsPath = profilePath ? join(profilePath, 'prefs.js') : null;
    if (!prefsPath || !existsSync(prefsPath)) {
      logger.debug('No Zotero prefs.js found', { profilePath }, 'ZoteroPreferences');
      return { profilePath };
    }
    prefs = parsePrefs(readFileSync(prefsPath, 'utf-8'));
  } catch (error) {
    logger.warn('Failed to read Zotero preferences', { profileDirectory, error: errorMessage(error) }, 'ZoteroPreferences');
    return { profilePath: null };
  }

  const fileTypes = prefs.get(PREF_FILE_TYPES);
  const attachmentRoot = prefs.get(PREF_ATTACHMENT_DEST) || prefs.get(PREF_BASE_ATTACHMENT_PATH);
  const dataDirectory = prefs.get(PREF_DATA_DIR);

  return {
    profilePath,
    ...(attachmentRoot ? { attachmentRoot } : {}),
    ...(dataDirectory ? { dataDirectory } : {}),
    ...(fileTypes ? { fileTypes: parseFileTypes(fileTypes) } : {}),
  };
}
