/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { homedir } from 'os';
import YAML from 'js-yaml';
import { z } from 'zod';
import { logger, isLogLevel, errorMessage, type LogLevel } from './logger.js';
import { ConfigError } from './errors.js';

export type LibraryType = 'user' | 'group';
export type CaseFolding = 'auto' | 'on' | 'off';

export interface ZoteroConfig {
  apiKey: string;
  libraryId: string;
  libraryType: LibraryType;
  pageSize: number;
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

export interface PathsConfig {
  attachmentRoot: string;     // empty: discovered from the Zotero profile
  dataDirectory: string;      // empty: discovered from the Zotero profile, if any
  profileDirectory: string;   // empty: platform default
  quarantineDir: string;      // empty: <attachmentRoot>/_unlinked_files
  trashDir: string;           // empty: <attachmentRoot>/_unlinked_trash
  undoLogPath: string;
}

export interface MatchingConfig {
  caseFolding: CaseFolding;
  resolveSymlinks: boolean;
  fuzzyFilenameCaseInsensitive: boolean;
}

export interface ScanConfig {
  ignore: string[];
  fileTypes: string[];        // empty: every extension is in scope
  followSymlinks: boolean;
  junkFiles: string[];
}

export interface ActionsConfig {
  concurrency: number;
  timeoutMs: number;
  pruneEmptyDirectories: boolean;
}

export interface AppConfig {
  zotero: ZoteroConfig;
  paths: PathsConfig;
  matching: MatchingConfig;
  scan: ScanConfig;
  actions: ActionsConfig;
  logLevel: LogLevel;
}

export type PartialAppConfig = {
  [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

export const DEFAULT_CONFIG: AppConfig = {
  zotero: {
    apiKey: '',
    libraryId: '',
    libraryType: 'user',
    pageSize: 100,
    maxRetries: 3,
    retryDelayMs: 1000,
    timeoutMs: 30000
  },
  paths: {
    attachmentRoot: '',
    dataDirectory: '',
    profileDirectory: '',
    quarantineDir: '',
    trashDir: '',
    undoLogPath: join(homedir(), '.zotclean', 'undo-log.jsonl')
  },
  matching: {
    caseFolding: 'auto',
    resolveSymlinks: true,
    fuzzyFilenameCaseInsensitive: true
  },
  scan: {
    ignore: [],
    fileTypes: [],
    followSymlinks: true,
    junkFiles: ['.DS_Store', 'desktop.ini', 'Thumbs.db']
  },
  actions: {
    concurrency: 4,
    timeoutMs: 60000,
    pruneEmptyDirectories: true
  },
  logLevel: 'info'
};

const configFileSchema = z.object({
  zotero: z.object({
    apiKey: z.string(),
    libraryId: z.union([z.string(), z.number()]).transform(String),
    libraryType: z.enum(['user', 'group']),
    pageSize: z.number().int(),
    maxRetries: z.number().int(),
    retryDelayMs: z.number(),
    timeoutMs: z.number()
  }).partial(),
  paths: z.object({
    attachmentRoot: z.string(),
    dataDirectory: z.string(),
    profileDirectory: z.string(),
    quarantineDir: z.string(),
    trashDir: z.string(),
    undoLogPath: z.string()
  }).partial(),
  matching: z.object({
    caseFolding: z.enum(['auto', 'on', 'off']),
    resolveSymlinks: z.boolean(),
    fuzzyFilenameCaseInsensitive: z.boolean()
  }).partial(),
  scan: z.object({
    ignore: z.array(z.string()),
    fileTypes: z.array(z.string()),
    followSymlinks: z.boolean(),
    junkFiles: z.array(z.string())
  }).partial(),
  actions: z.object({
    concurrency: z.number().int(),
    timeoutMs: z.number(),
    pruneEmptyDirectories: z.boolean()
  }).partial(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error'])
}).partial();

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

/**
 * Parse a comma separated file type list ("pdf, djvu") into bare extensions
 */
export function parseFileTypes(value: string | string[]): string[] {
  const parts = Array.isArray(value) ? value : value.split(',');
  return parts
    .map(part => part.trim().replace(/^\./, '').toLowerCase())
    .filter(part => part.length > 0);
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = './zotclean.yaml', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = this.applyEnvironment(this.loadConfig(), env);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    let raw: unknown;
    try {
      const content = readFileSync(this.configPath, 'utf-8');

      if (this.configPath.endsWith('.json')) {
        raw = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        raw = YAML.load(content) ?? {};
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }
    } catch (error) {
      throw new ConfigError(`Failed to load config ${this.configPath}: ${errorMessage(error)}`);
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid config ${this.configPath}`, issues);
    }

    logger.debug(`Loaded configuration from ${this.configPath}`, undefined, 'ConfigManager');

    // Merge with defaults
    return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), parsed.data);
  }

  /**
   * Merge user config with defaults (user config takes precedence)
   */
  private mergeConfigs(defaults: AppConfig, user: PartialAppConfig): AppConfig {
    return {
      zotero: { ...defaults.zotero, ...user.zotero },
      paths: { ...defaults.paths, ...user.paths },
      matching: { ...defaults.matching, ...user.matching },
      scan: { ...defaults.scan, ...user.scan },
      actions: { ...defaults.actions, ...user.actions },
      logLevel: user.logLevel ?? defaults.logLevel
    };
  }

  /**
   * Credentials and log level may come from the environment (.env via dotenv)
   */
  private applyEnvironment(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
    if (env.ZOTERO_API_KEY) config.zotero.apiKey = env.ZOTERO_API_KEY;
    if (env.ZOTERO_LIBRARY_ID) config.zotero.libraryId = env.ZOTERO_LIBRARY_ID;
    if (env.ZOTERO_LIBRARY_TYPE === 'user' || env.ZOTERO_LIBRARY_TYPE === 'group') {
      config.zotero.libraryType = env.ZOTERO_LIBRARY_TYPE;
    }
    if (env.ZOTCLEAN_ROOT) config.paths.attachmentRoot = env.ZOTCLEAN_ROOT;
    if (isLogLevel(env.LOG_LEVEL)) config.logLevel = env.LOG_LEVEL;
    return config;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Replace a whole section
   */
  update(partial: PartialAppConfig): void {
    this.config = this.mergeConfigs(this.config, partial);
    this.isDirty = true;
    logger.debug('Config updated', { sections: Object.keys(partial) }, 'ConfigManager');
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    mkdirSync(dirname(this.configPath), { recursive: true });
    const content = this.configPath.endsWith('.json') ? this.toJSON() : this.toYAML();
    writeFileSync(this.configPath, content);
    this.isDirty = false;

    logger.info(`Configuration saved to ${this.configPath}`, undefined, 'ConfigManager');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { zotero, actions, paths } = this.config;

    // Zotero caps a page at 100 items
    if (zotero.pageSize < 1 || zotero.pageSize > 100) {
      errors.push('zotero.pageSize must be between 1 and 100');
    }

    if (zotero.maxRetries < 0) {
      errors.push('zotero.maxRetries must not be negative');
    }

    if (zotero.timeoutMs <= 0 || actions.timeoutMs <= 0) {
      errors.push('Timeouts must be positive');
    }

    if (actions.concurrency < 1) {
      errors.push('actions.concurrency must be at least 1');
    }

    if (paths.quarantineDir && paths.trashDir && resolve(paths.quarantineDir) === resolve(paths.trashDir)) {
      errors.push('paths.quarantineDir and paths.trashDir must differ');
    }

    if (!paths.undoLogPath) {
      errors.push('paths.undoLogPath is required');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Throw a ConfigError unless the configuration validates
   */
  assertValid(): void {
    const { valid, errors } = this.validate();
    if (!valid) {
      throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, errors);
    }
  }

  /**
   * Export configuration as JSON
   */
  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config, { indent: 2 });
  }
}

/**
 * Create example config file
 */
export function createExampleConfig(outputPath: string = './zotclean.example.yaml'): void {
  const exampleConfig: PartialAppConfig = {
    zotero: {
      libraryId: '123456',
      libraryType: 'user',
      pageSize: 100,
      maxRetries: 3
    },
    paths: {
      attachmentRoot: '~/Zotero/attachments',
      undoLogPath: '~/.zotclean/undo-log.jsonl'
    },
    matching: {
      caseFolding: 'auto',
      resolveSymlinks: true
    },
    scan: {
      fileTypes: ['pdf', 'djvu', 'epub']
    },
    actions: {
      concurrency: 4,
      pruneEmptyDirectories: true
    },
    logLevel: 'info'
  };

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, YAML.dump(exampleConfig));
  logger.info(`Example config created at ${outputPath}`, undefined, 'ConfigManager');
}
