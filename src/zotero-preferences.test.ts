import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  defaultProfileDirectory,
  parsePrefs,
  readZoteroPreferences,
  resolveProfilePath,
} from './zotero-preferences.js';

describe('ZoteroPreferences', () => {
  describe('defaultProfileDirectory', () => {
    it('should follow the platform conventions', () => {
      expect(defaultProfileDirectory('linux', '/home/ada')).toBe(join('/home/ada', '.zotero', 'zotero'));
      expect(defaultProfileDirectory('darwin', '/Users/ada')).toBe(join('/Users/ada', 'Library', 'Application Support', 'Zotero'));
      expect(defaultProfileDirectory('win32', '/Users/ada')).toBe(join('/Users/ada', 'AppData', 'Roaming', 'Zotero', 'Zotero'));
    });
  });

  describe('resolveProfilePath', () => {
    it('should prefer the default profile', () => {
      const ini = [
        '[General]',
        'StartWithLastProfile=1',
        '',
        '[Profile0]',
        'Name=old',
        'IsRelative=1',
        'Path=Profiles/old.default',
        '',
        '[Profile1]',
        'Name=main',
        'IsRelative=1',
        'Path=Profiles/main.default',
        'Default=1',
      ].join('\n');

      expect(resolveProfilePath(ini, '/zotero')).toBe(join('/zotero', 'Profiles', 'main.default'));
    });

    it('should fall back to the first profile and keep absolute paths', () => {
      const ini = '[Profile0]\nIsRelative=0\nPath=/srv/zotero/profile\n';
      expect(resolveProfilePath(ini, '/zotero')).toBe('/srv/zotero/profile');
    });

    it('should return null without profiles', () => {
      expect(resolveProfilePath('[General]\nStartWithLastProfile=1\n', '/zotero')).toBeNull();
    });
  });

  describe('parsePrefs', () => {
    it('should read string preferences and unescape them', () => {
      const prefs = parsePrefs([
        '// Mozilla User Preferences',
        'user_pref("extensions.zotfile.dest_dir", "/home/ada/Papers");',
        'user_pref("extensions.zotero.baseAttachmentPath", "C:\\\\Users\\\\ada\\\\Papers");',
        'user_pref("extensions.zotero.sync.server.username", "ada");',
        'user_pref("extensions.zotero.firstRun2", false);',
        'pref("extensions.zotfile.filetypes", "pdf,djvu");',
      ].join('\n'));

      expect(prefs.get('extensions.zotfile.dest_dir')).toBe('/home/ada/Papers');
      expect(prefs.get('extensions.zotero.baseAttachmentPath')).toBe('C:\\Users\\ada\\Papers');
      expect(prefs.get('extensions.zotfile.filetypes')).toBe('pdf,djvu');
      expect(prefs.has('extensions.zotero.firstRun2')).toBe(false);
      expect(prefs.size).toBe(4);
    });
  });

  describe('readZoteroPreferences', () => {
    const tempDir = join(process.cwd(), '.test-tmp', 'zotero-preferences');
    const profile = join(tempDir, 'Profiles', 'abc.default');

    beforeEach(() => {
      mkdirSync(profile, { recursive: true });
      writeFileSync(join(tempDir, 'profiles.ini'), '[Profile0]\nName=default\nIsRelative=1\nPath=Profiles/abc.default\nDefault=1\n');
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should prefer the ZotFile destination over the base attachment path', () => {
      writeFileSync(join(profile, 'prefs.js'), [
        'user_pref("extensions.zotero.baseAttachmentPath", "/base");',
        'user_pref("extensions.zotfile.dest_dir", "/zotfile");',
        'user_pref("extensions.zotero.dataDir", "/data");',
        'user_pref("extensions.zotfile.filetypes", "PDF, .djvu");',
      ].join('\n'));

      expect(readZoteroPreferences(tempDir)).toEqual({
        profilePath: profile,
        attachmentRoot: '/zotfile',
        dataDirectory: '/data',
        fileTypes: ['pdf', 'djvu'],
      });
    });

    it('should use the base attachment path when ZotFile sets none', () => {
      writeFileSync(join(profile, 'prefs.js'), 'user_pref("extensions.zotero.baseAttachmentPath", "/base");\n');

      expect(readZoteroPreferences(tempDir)).toEqual({ profilePath: profile, attachmentRoot: '/base' });
    });

    it('should return only the profile when prefs.js is missing', () => {
      expect(readZoteroPreferences(tempDir)).toEqual({ profilePath: profile });
    });

    it('should return nothing without a Zotero installation', () => {
      expect(readZoteroPreferences(join(tempDir, 'missing'))).toEqual({ profilePath: null });
    });
  });
});
