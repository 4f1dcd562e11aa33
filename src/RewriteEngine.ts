// file: src/RewriteEngine.ts
import * as path from 'path';
import Piscina from 'piscina';
import { rewriteAllocCalls } from './AllocCalls';
import { RewriteConfig, resolveConfig } from './config';
import { classifyDirective, createDefaultClassifiers, DirectiveClassifier } from './DirectiveClassifier';
import { reportDirectiveIssues, resolveDirective } from './DirectiveValidator';
import { assembleLogicalLines } from './LineAssembler';
import { reportLog, verboseLog } from './logger';
import { emitMacro } from './MacroEmitter';
import { DirectiveIssue, FileOutcome, PassResult } from './PragmaPrimitives';
import { rewriteTempDeclarations } from './TempDeclarations';
import { loadText, writeText } from './TextLoader';

/** Which whole-file rewrite to run. */
export type RewriteMode = 'pragmas' | 'temp-decls' | 'alloc-calls';

export const REWRITE_MODES: readonly RewriteMode[] = ['pragmas', 'temp-decls', 'alloc-calls'];

export interface RewriteOptions {
  config?: RewriteConfig;
  /** Classifier registry in priority order; built from the config when omitted. */
  classifiers?: readonly DirectiveClassifier[];
}

export interface RewriteResult extends PassResult {
  /** Whether the include line was added to this file. */
  includeInserted: boolean;
  issues: DirectiveIssue[];
  /** For each output line, the input line whose terminator it keeps when written. */
  origins: number[];
}

/**
 * Options for rewriting files on disk. Plain data, since workers receive it.
 */
export interface FileRewriteOptions {
  config: RewriteConfig;
  mode: RewriteMode;
  /** Report what would change without writing. */
  dryRun: boolean;
}

export interface BatchSummary {
  processed: number;
  changed: number;
  failed: number;
}

/**
 * Task sent to the worker pool.
 */
export interface WorkerTask {
  filePath: string;
  options: FileRewriteOptions;
}

function hasIncludeLine(lines: string[], includeLine: string): boolean {
  const needle = includeLine.trim().toLowerCase();
  return lines.some(line => line.toLowerCase().includes(needle));
}

/**
 * Index of the first line after the leading run of blank and comment-only lines.
 */
function includeLineIndex(lines: string[], commentPrefix: string): number {
  let at = 0;
  while (at < lines.length) {
    const stripped = lines[at].trim();
    if (stripped !== '' && !stripped.startsWith(commentPrefix)) break;
    at++;
  }
  return at;
}

/**
 * Inserts the include line after the leading run of blank and comment-only lines.
 */
export function insertIncludeLine(lines: string[], config: Pick<RewriteConfig, 'includeLine' | 'commentPrefix'>): string[] {
  const at = includeLineIndex(lines, config.commentPrefix);
  return [...lines.slice(0, at), config.includeLine, ...lines.slice(at)];
}

/**
 * Rewrites the recognized directives of one file's physical lines into macro calls.
 *
 * Unrecognized lines, including directives no classifier claims, are copied
 * verbatim. If anything changed and the file lacks the include line, it is
 * added once.
 */
export function rewriteLines(lines: string[], options: RewriteOptions = {}): RewriteResult {
  const config = options.config ?? resolveConfig();
  const registry = options.classifiers ?? createDefaultClassifiers(config);
  const logical = [...assembleLogicalLines(lines, config)];
  const out: string[] = [];
  const origins: number[] = [];
  const issues: DirectiveIssue[] = [];
  let changed = false;
  for (const line of logical) {
    const first = line.lineNumber - 1;
    if (line.isDirective) {
      const { match, issue } = resolveDirective(line, registry);
      if (issue) issues.push(issue);
      if (match) {
        out.push(match.indent + emitMacro(match));
        // The macro call ends the way the last replaced physical line did
        origins.push(first + line.raw.length - 1);
        changed = true;
        continue;
      }
    }
    line.raw.forEach((raw, offset) => {
      out.push(raw);
      origins.push(first + offset);
    });
  }
  let includeInserted = false;
  if (changed && !hasIncludeLine(lines, config.includeLine)) {
    const at = includeLineIndex(out, config.commentPrefix);
    out.splice(at, 0, config.includeLine);
    origins.splice(at, 0, origins[Math.max(at - 1, 0)]);
    includeInserted = true;
  }
  return { lines: out, changed, includeInserted, issues, origins };
}

/**
 * Rewrites a single directive (possibly spanning continuation lines) into its
 * macro call, or returns null if no classifier claims it.
 */
export function rewriteDirective(text: string, options: RewriteOptions = {}): string | null {
  const config = options.config ?? resolveConfig();
  const registry = options.classifiers ?? createDefaultClassifiers(config);
  const logical = [...assembleLogicalLines(text.split(/\r?\n/), config)];
  if (logical.length !== 1 || !logical[0].isDirective) {
    return null;
  }
  const match = classifyDirective(logical[0].body, logical[0].leadingWhitespace, registry);
  return match ? match.indent + emitMacro(match) : null;
}

/**
 * Runs the pass selected by `mode` over one file's lines.
 */
export function applyPass(mode: RewriteMode, lines: string[], options: RewriteOptions = {}): RewriteResult {
  switch (mode) {
    case 'pragmas':
      return rewriteLines(lines, options);
    case 'temp-decls':
      return { ...rewriteTempDeclarations(lines), includeInserted: false, issues: [], origins: lines.map((_, i) => i) };
    case 'alloc-calls':
      return { ...rewriteAllocCalls(lines), includeInserted: false, issues: [], origins: lines.map((_, i) => i) };
    default: {
      const unreachable: never = mode;
      throw new Error(`Unknown rewrite mode: ${String(unreachable)}`);
    }
  }
}

/**
 * Loads, rewrites and, if anything changed, overwrites one file.
 */
export async function rewriteFile(filePath: string, options: FileRewriteOptions): Promise<FileOutcome> {
  const { lines, layout } = await loadText(filePath);
  const result = applyPass(options.mode, lines, { config: options.config });
  let written = false;
  if (result.changed && !options.dryRun) {
    await writeText(filePath, result.lines, layout, result.origins);
    written = true;
  }
  return {
    file: filePath,
    changed: result.changed,
    written,
    encoding: layout.encoding,
    issues: result.issues
  };
}

function isFileOutcome(value: unknown): value is FileOutcome {
  return (
    typeof value === 'object' &&
    value !== null &&
    'file' in value &&
    typeof value.file === 'string' &&
    'changed' in value &&
    typeof value.changed === 'boolean' &&
    'written' in value &&
    typeof value.written === 'boolean' &&
    'issues' in value &&
    Array.isArray(value.issues)
  );
}

/**
 * Rewrites a batch of files and returns counts. Each file succeeds or fails on
 * its own: a failure is reported with its path and cause, and the batch goes on.
 *
 * @param files - Paths to process.
 * @param parallelism - Worker threads to use, or 0 to process files in this thread.
 * @param verbose - Log progress and directive diagnostics to stderr.
 */
export async function rewriteFiles(
  files: string[],
  parallelism: number,
  verbose: boolean,
  options: FileRewriteOptions
): Promise<BatchSummary> {
  const summary: BatchSummary = { processed: 0, changed: 0, failed: 0 };
  const workerScript = path.resolve(__dirname, '../dist/rewriteWorker.js');
  const pool = parallelism > 0
    ? new Piscina({ filename: workerScript, minThreads: 1, maxThreads: parallelism })
    : null;

  const runTask = async (file: string): Promise<FileOutcome> => {
    if (!pool) {
      return rewriteFile(file, options);
    }
    const task: WorkerTask = { filePath: file, options };
    const outcome: unknown = await pool.run(task);
    if (!isFileOutcome(outcome)) {
      throw new Error(`Worker returned an unexpected result for ${file}`);
    }
    return outcome;
  };

  const processOne = async (file: string): Promise<void> => {
    if (verbose) verboseLog(`Processing file: ${file}`);
    try {
      const outcome = await runTask(file);
      summary.processed++;
      if (verbose) {
        reportDirectiveIssues(outcome.issues, file, verboseLog);
      }
      if (outcome.changed) {
        summary.changed++;
        reportLog(options.dryRun ? `Would update: ${file}` : `Updated: ${file}`);
      }
    } catch (err: unknown) {
      summary.failed++;
      console.error(`[accmacro] ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
  };

  try {
    if (pool) {
      await Promise.all(files.map(processOne));
    } else {
      // Keep in-process runs in path order
      for (const file of files) {
        await processOne(file);
      }
    }
  } finally {
    if (pool) await pool.destroy();
  }
  return summary;
}
