#!/usr/bin/env node
/**
 * zotclean - find and clean up attachment files Zotero no longer links to
 *
 * Usage:
 *   zotclean scan                         - Classify files under the attachment root
 *   zotclean relocate [options]           - Move unlinked files into the quarantine folder
 *   zotclean remove [options]             - Move unlinked files into the trash folder
 *   zotclean restore --path <p> | --run <id> | --all
 *   zotclean prune                        - Remove empty directories
 *   zotclean log                          - Show the undo log
 *   zotclean init [--config <file>]       - Write an example configuration
 *
 * Exit codes: 0 success, 1 some items failed or were refused, 2 fatal error.
 */

import { existsSync } from 'fs';
import { config as loadEnv } from 'dotenv';
import { ConfigManager, createExampleConfig } from './config.js';
import { CleanupService, exitCodeFor, type CleanupDependencies, type RunResult } from './cleanup-service.js';
import { ConfigError, isFatalError } from './errors.js';
import { handleError, logger, errorMessage } from './logger.js';
import type { ActionRecord, ActionScope, ActionSummary, ClassificationResult, ItemOutcome, ScanWarning } from './types.js';

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export type CliCommand = 'scan' | 'relocate' | 'remove' | 'restore' | 'prune' | 'log' | 'init' | 'help';

export interface CliArgs {
  command: CliCommand;
  scope?: 'unlinked' | 'paths';
  paths: string[];
  runId?: string;
  all: boolean;
  includeAmbiguous: boolean;
  prune: boolean;
  dryRun: boolean;
  configPath?: string;
  root?: string;
  json: boolean;
  verbose: boolean;
}

const COMMANDS: CliCommand[] = ['scan', 'relocate', 'remove', 'restore', 'prune', 'log', 'init', 'help'];

function isCommand(value: string): value is CliCommand {
  return (COMMANDS as string[]).includes(value);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value === '' || value.startsWith('--')) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * `--flag=value` becomes `--flag value`.
 */
function splitInlineValues(args: string[]): string[] {
  return args.flatMap(arg => {
    const equals = arg.indexOf('=');
    return arg.startsWith('--') && equals > 2 ? [arg.slice(0, equals), arg.slice(equals + 1)] : [arg];
  });
}

export function parseArgs(argv: string[]): CliArgs {
  const args = splitInlineValues(argv);
  const result: CliArgs = {
    command: 'help',
    paths: [],
    all: false,
    includeAmbiguous: false,
    prune: true,
    dryRun: false,
    json: false,
    verbose: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else if (arg === '--scope') {
      const scope = requireValue(args, ++i, arg);
      if (scope !== 'unlinked' && scope !== 'paths') {
        throw new ConfigError(`Unknown scope: ${scope} (expected unlinked or paths)`);
      }
      result.scope = scope;
    } else if (arg === '--path' || arg === '-p') {
      result.paths.push(requireValue(args, ++i, arg));
    } else if (arg === '--run') {
      result.runId = requireValue(args, ++i, arg);
    } else if (arg === '--all') {
      result.all = true;
    } else if (arg === '--include-ambiguous') {
      result.includeAmbiguous = true;
    } else if (arg === '--no-prune') {
      result.prune = false;
    } else if (arg === '--dry-run') {
      result.dryRun = true;
    } else if (arg === '--config' || arg === '-c') {
      result.configPath = requireValue(args, ++i, arg);
    } else if (arg === '--root') {
      result.root = requireValue(args, ++i, arg);
    } else if (arg === '--json') {
      result.json = true;
    } else if (arg === '--verbose' || arg === '-v') {
      result.verbose = true;
    } else if (isCommand(arg)) {
      result.command = arg;
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }

    i++;
  }

  return result;
}

/**
 * Scope for relocate/remove: listed paths imply the `paths` scope.
 */
export function buildScope(args: CliArgs): ActionScope {
  if (args.command === 'restore') {
    if (args.paths.length > 0) return { kind: 'paths', paths: args.paths };
    if (args.runId) return { kind: 'run', runId: args.runId };
    if (args.all) return { kind: 'all' };
    throw new ConfigError('restore needs --path, --run or --all');
  }

  const scope = args.scope ?? (args.paths.length > 0 ? 'paths' : 'unlinked');
  if (scope === 'paths') {
    if (args.paths.length === 0) {
      throw new ConfigError('--scope paths needs at least one --path');
    }
    return { kind: 'paths', paths: args.paths, includeAmbiguous: args.includeAmbiguous };
  }

  if (args.includeAmbiguous) {
    throw new ConfigError('--include-ambiguous only applies to explicitly listed paths');
  }
  return { kind: 'unlinked' };
}

// ============================================================================
// Report Formatting
// ============================================================================

function formatOutcome(item: ItemOutcome): string {
  let line = `  ${item.status.padEnd(16)} ${item.path}`;
  if (item.destinationPath && (item.status === 'committed' || item.status === 'planned')) {
    line += ` -> ${item.destinationPath}`;
  }
  if (item.code) line += ` [${item.code}]`;
  if (item.message && item.status !== 'committed') line += ` ${item.message}`;
  return line;
}

export function formatSummary(summary: ActionSummary): string[] {
  const lines = [`${summary.mode} run ${summary.runId}${summary.dryRun ? ' (dry run)' : ''}`];

  if (summary.recovered.length > 0) {
    lines.push('', 'Recovered from an interrupted run:');
    for (const record of summary.recovered) {
      lines.push(`  #${record.sequenceId} ${record.operation} ${record.state} ${record.originalPath}`);
    }
  }

  if (summary.items.length > 0) {
    lines.push('', 'Files:');
    lines.push(...summary.items.map(formatOutcome));
  }

  if (summary.directories.length > 0) {
    lines.push('', 'Directories:');
    lines.push(...summary.directories.map(formatOutcome));
  }

  lines.push('', `Committed: ${summary.committed}  Failed: ${summary.failed}  Skipped: ${summary.skipped}`);
  return lines;
}

export function formatClassification(classification: ClassificationResult, warnings: readonly ScanWarning[]): string[] {
  const lines = [
    `Attachment root: ${classification.root}`,
    `  Linked:     ${classification.linked.length}`,
    `  Unlinked:   ${classification.unlinked.length}`,
    `  Ambiguous:  ${classification.ambiguous.length}`,
    `  Empty dirs: ${classification.emptyDirectories.length}`,
  ];

  if (classification.unlinked.length > 0) {
    lines.push('', 'Unlinked files:');
    for (const file of classification.files) {
      if (file.status !== 'unlinked') continue;
      lines.push(`  ${file.entry.absolutePath}${file.outOfScope ? ' (file type out of scope)' : ''}`);
    }
  }

  if (classification.ambiguous.length > 0) {
    lines.push('', 'Ambiguous files (never moved unless listed with --include-ambiguous):');
    for (const file of classification.ambiguous) {
      lines.push(`  ${file.entry.absolutePath} [${file.itemIds.join(', ')}] ${file.reason ?? ''}`.trimEnd());
    }
  }

  if (classification.emptyDirectories.length > 0) {
    lines.push('', 'Empty directories:');
    lines.push(...classification.emptyDirectories.map(dir => `  ${dir}`));
  }

  if (classification.missing.length > 0) {
    lines.push('', 'Attachments whose file is missing:');
    for (const record of classification.missing) {
      lines.push(`  ${record.itemId} ${record.absolutePath ?? record.storedOrLinkedPath}`);
    }
  }

  if (warnings.length > 0) {
    lines.push('', 'Warnings:');
    lines.push(...warnings.map(warning => `  [${warning.code}] ${warning.message}`));
  }

  return lines;
}

export function formatRecords(records: readonly ActionRecord[]): string[] {
  if (records.length === 0) return ['Undo log is empty.'];
  return records.map(record => {
    const target = record.destinationPath ? ` -> ${record.destinationPath}` : '';
    const consumed = record.consumed ? ' (restored)' : '';
    return `#${record.sequenceId} ${record.runId} ${record.operation} ${record.state} ${record.originalPath}${target}${consumed}`;
  });
}

// ============================================================================
// Command Handlers
// ============================================================================

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const DEFAULT_CONFIG_PATH = './zotclean.yaml';

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

function printResult(args: CliArgs, result: RunResult, io: CliIO): number {
  if (args.json) {
    io.out(JSON.stringify(result.summary, null, 2));
  } else {
    formatSummary(result.summary).forEach(io.out);
  }
  return exitCodeFor(result.summary);
}

function showHelp(io: CliIO): void {
  io.out(`
zotclean - clean up attachment files that no Zotero item links to

COMMANDS:
  scan        Classify files as linked, unlinked or ambiguous
  relocate    Move unlinked files into <root>/_unlinked_files/<run>/
  remove      Move unlinked files into <root>/_unlinked_trash/<run>/
  restore     Move relocated or removed files back
  prune       Remove empty directories under the attachment root
  log         Print the undo log
  init        Write an example configuration file
  help        Show this help message

OPTIONS:
  --scope <unlinked|paths>  What relocate/remove act on (default: unlinked)
  --path, -p <path>         File to act on or restore (repeatable)
  --include-ambiguous       Allow listed ambiguous files to be moved
  --run <runId>             Restore every file of one run
  --all                     Restore every file not yet restored
  --no-prune                Keep directories emptied by the run
  --dry-run                 Report what would happen, change nothing
  --config, -c <file>       Config file (default: ./zotclean.yaml)
  --root <dir>              Attachment root (overrides config)
  --json                    Print results as JSON
  --verbose, -v             Debug logging

ENVIRONMENT:
  ZOTERO_API_KEY, ZOTERO_LIBRARY_ID, ZOTERO_LIBRARY_TYPE, ZOTCLEAN_ROOT, LOG_LEVEL

EXAMPLES:
  # See what is unlinked
  zotclean scan

  # Preview a relocation
  zotclean relocate --dry-run

  # Move a single ambiguous file to the trash
  zotclean remove --path ~/Zotero/attachments/old.pdf --include-ambiguous

  # Undo a run
  zotclean restore --run 2024-05-01T10-22-03-512Z-3f9a1c
`);
}

/**
 * Run one command and return the process exit code.
 */
export async function run(argv: string[], deps: CleanupDependencies = {}, io: CliIO = consoleIO): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.command === 'help') {
      showHelp(io);
      return 0;
    }

    if (args.command === 'init') {
      const target = args.configPath ?? DEFAULT_CONFIG_PATH;
      if (existsSync(target)) {
        throw new ConfigError(`Config file already exists: ${target}`);
      }
      createExampleConfig(target);
      io.out(`Wrote example configuration to ${target}`);
      return 0;
    }

    if (args.configPath && !existsSync(args.configPath)) {
      throw new ConfigError(`Config file not found: ${args.configPath}`);
    }
    const manager = new ConfigManager(args.configPath ?? DEFAULT_CONFIG_PATH);
    if (args.root) {
      manager.update({ paths: { attachmentRoot: args.root } });
    }
    manager.assertValid();
    const config = manager.getAll();
    logger.setMinLevel(args.verbose ? 'debug' : config.logLevel);

    const service = new CleanupService(config, deps);

    switch (args.command) {
      case 'scan': {
        const { classification, scan } = await service.analyze();
        if (args.json) {
          io.out(JSON.stringify({
            root: classification.root,
            linked: classification.linked.map(entry => entry.absolutePath),
            unlinked: classification.unlinked.map(entry => entry.absolutePath),
            ambiguous: classification.ambiguous.map(file => ({
              path: file.entry.absolutePath,
              itemIds: file.itemIds,
              reason: file.reason,
            })),
            emptyDirectories: classification.emptyDirectories,
            missing: classification.missing.map(record => record.itemId),
            warnings: scan.warnings,
          }, null, 2));
        } else {
          formatClassification(classification, scan.warnings).forEach(io.out);
        }
        return 0;
      }
      case 'relocate':
      case 'remove':
        return printResult(
          args,
          await service.relocateOrRemove(args.command, buildScope(args), { dryRun: args.dryRun, prune: args.prune }),
          io
        );
      case 'restore':
        return printResult(args, await service.restore(buildScope(args), { dryRun: args.dryRun, prune: args.prune }), io);
      case 'prune':
        return printResult(args, await service.prune({ dryRun: args.dryRun }), io);
      case 'log': {
        const records = service.history();
        if (args.json) {
          io.out(JSON.stringify(records, null, 2));
        } else {
          formatRecords(records).forEach(io.out);
        }
        return 0;
      }
    }
  } catch (error) {
    if (isFatalError(error)) {
      io.err(`Error [${error.code}]: ${error.message}`);
      const details = error.context?.errors;
      if (Array.isArray(details)) {
        details.forEach(detail => io.err(`  - ${String(detail)}`));
      }
    } else {
      const appError = handleError(error, 'CLI');
      io.err(`Error [${appError.code}]: ${errorMessage(error)}`);
    }
    return 2;
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

export async function main(): Promise<void> {
  loadEnv();
  process.exitCode = await run(process.argv.slice(2));
}

const isDirectRun =
  process.argv[1] && (process.argv[1].includes('clean-cli') || process.argv[1].endsWith('zotclean'));
if (isDirectRun) {
  main().catch((error: unknown) => {
    console.error('Error:', error);
    process.exit(2);
  });
}
