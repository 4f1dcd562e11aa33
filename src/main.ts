#!/usr/bin/env node
// file: src/main.ts
import * as os from 'os';
import { Command, InvalidOptionArgumentError } from 'commander';
import { DirectiveKind } from './PragmaPrimitives';
import { RewriteConfig, resolveConfig } from './config';
import { findSourceFiles } from './FileScanner';
import { verboseLog } from './logger';
import { REWRITE_MODES, RewriteMode, rewriteFiles } from './RewriteEngine';

const ALL_FAMILIES: DirectiveKind[] = ['DataPresent', 'EnterDataCreate', 'HostTransfer'];

export interface CliOptions {
  showHelp: boolean;
  verbose: boolean;
  dryRun: boolean;
  parallelism: number;
  /** Extensions given with --ext; empty means the configured default. */
  extensions: string[];
  mode: RewriteMode;
  includeLine?: string;
  strictParens: boolean;
  target: string;
  error?: string;
}

function isRewriteMode(value: string): value is RewriteMode {
  return REWRITE_MODES.some(mode => mode === value);
}

/**
 * Parses CLI arguments for the tool.
 * @param rawArgs - Array of arguments (excluding node and script path)
 * @returns Parsed options and any error message.
 */
export function parseCliArgs(rawArgs: string[]): CliOptions {
  const defaults: CliOptions = {
    showHelp: false,
    verbose: false,
    dryRun: false,
    parallelism: -1,
    extensions: [],
    mode: 'pragmas',
    strictParens: false,
    target: './src'
  };

  // Commander would read the next flag as the value, so check for missing values first
  const valueFlags: string[][] = [
    ['--parallelism', '-p'],
    ['--ext', '-e'],
    ['--mode', '-m'],
    ['--include']
  ];
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    const flag = valueFlags.find(names => names.includes(arg));
    if (flag && rawArgs[i + 1] === undefined) {
      return { ...defaults, error: `Missing value for ${flag[0]}` };
    }
  }

  const noExtensions: string[] = [];
  const program = new Command();
  program
    .helpOption(false)
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });

  program
    .option('-h, --help', 'Show this help message and exit')
    .option('-v, --verbose', 'Show verbose logging (files being processed, skipped directives)')
    .option('-n, --dry-run', 'Report files that would change without writing them')
    .option(
      '-p, --parallelism <number>',
      'Number of worker threads (>=0, 0 runs in-process), or -1 to default to CPU cores',
      (val: string) => {
        const num = Number(val);
        if (!Number.isInteger(num) || num < -1) {
          throw new InvalidOptionArgumentError(`Invalid parallelism value: ${val}`);
        }
        return num;
      },
      -1
    )
    .option(
      '-e, --ext <extension>',
      'File extension to process (repeatable, default .f90)',
      (val: string, prev: string[]) => {
        prev.push(val);
        return prev;
      },
      noExtensions
    )
    .option(
      '-m, --mode <mode>',
      `Rewrite to perform: ${REWRITE_MODES.join(', ')}`,
      (val: string) => {
        if (!isRewriteMode(val)) {
          throw new InvalidOptionArgumentError(`Invalid mode: ${val}`);
        }
        return val;
      },
      'pragmas'
    )
    .option('--include <line>', 'Include line added to rewritten files')
    .option('--strict-parens', 'Require "(" directly after clause keywords')
    .argument('[path]', 'Directory or file to process (default ./src)');

  try {
    program.parse(rawArgs, { from: 'user' });
  } catch (err: unknown) {
    return { ...defaults, error: err instanceof Error ? err.message : String(err) };
  }

  const args = program.args;
  if (args.length > 1) {
    return { ...defaults, error: 'Too many arguments' };
  }
  const opts = program.opts<{
    help?: boolean;
    verbose?: boolean;
    dryRun?: boolean;
    parallelism: number;
    ext: string[];
    mode: RewriteMode;
    include?: string;
    strictParens?: boolean;
  }>();

  return {
    showHelp: !!opts.help,
    verbose: !!opts.verbose,
    dryRun: !!opts.dryRun,
    parallelism: opts.parallelism,
    extensions: opts.ext,
    mode: opts.mode,
    includeLine: opts.include,
    strictParens: !!opts.strictParens,
    target: args[0] ?? defaults.target
  };
}

/**
 * Builds the rewrite configuration from parsed CLI options.
 */
export function configFromCli(cli: CliOptions): RewriteConfig {
  const overrides: Partial<RewriteConfig> = {};
  if (cli.extensions.length > 0) overrides.extensions = cli.extensions;
  if (cli.includeLine !== undefined) overrides.includeLine = cli.includeLine;
  if (cli.strictParens) overrides.adjacentParenFamilies = ALL_FAMILIES;
  return resolveConfig(overrides);
}

/**
 * Finds the files under `target` and rewrites them.
 *
 * @param target - Directory or single file to process.
 * @param parallelism - Worker threads, or 0 to run in-process.
 * @returns Promise resolving to exit code: 0 if every file was processed, 1 if any failed.
 */
export async function runRewrite(
  target: string,
  parallelism: number,
  verbose: boolean,
  options: { config: RewriteConfig; mode: RewriteMode; dryRun: boolean }
): Promise<number> {
  const files = await findSourceFiles(target, options.config.extensions);
  if (verbose) {
    verboseLog(`Parallelism: ${parallelism}`);
    verboseLog(`Found ${files.length} file(s) under ${target}`);
  }
  if (files.length === 0) {
    return 0;
  }
  const summary = await rewriteFiles(files, parallelism, verbose, options);
  if (verbose) {
    verboseLog(`Processed ${summary.processed}, changed ${summary.changed}, failed ${summary.failed}`);
  }
  return summary.failed > 0 ? 1 : 0;
}

// Execute when run as a CLI script
if (require.main === module) {
  const cli = parseCliArgs(process.argv.slice(2));
  const usage = [
    'Usage: accmacro [options] [path]',
    '',
    'Rewrites OpenACC directives in Fortran sources into GPU_DATA_* macro calls.',
    '',
    'Options:',
    '  -h, --help              Show this help message and exit',
    '  -v, --verbose           Show verbose logging (files being processed, skipped directives)',
    '  -n, --dry-run           Report files that would change without writing them',
    '  -p, --parallelism <n>   Worker threads (0 runs in-process; default: CPU cores)',
    '  -e, --ext <extension>   File extension to process (repeatable, default .f90)',
    `  -m, --mode <mode>       Rewrite to perform: ${REWRITE_MODES.join(', ')} (default pragmas)`,
    "      --include <line>    Include line added to rewritten files (default include 'macros.h')",
    '      --strict-parens     Require "(" directly after clause keywords',
    '',
    'If path is omitted, ./src is processed'
  ].join('\n');
  if (cli.showHelp) {
    console.log(usage);
    process.exit(0);
  }
  if (cli.error) {
    console.error(cli.error);
    console.log(usage);
    process.exit(2);
  }
  const parallelism = cli.parallelism >= 0 ? cli.parallelism : Math.max(os.cpus().length, 1);
  let config: RewriteConfig;
  try {
    config = configFromCli(cli);
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(2);
  }
  runRewrite(cli.target, parallelism, cli.verbose, { config, mode: cli.mode, dryRun: cli.dryRun })
    .then(code => process.exit(code))
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.stack ?? err.message : String(err));
      process.exit(2);
    });
}
