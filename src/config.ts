// file: src/config.ts
import { DirectiveKind } from './PragmaPrimitives';

/**
 * Settings shared by the assembler, the classifiers and the file driver.
 * Kept as plain data so it can be handed to worker threads unchanged.
 */
export interface RewriteConfig {
  /** Token that opens a directive line, matched case-insensitively. */
  sentinel: string;
  /** Trailing token that continues a directive on the next physical line. */
  continuationMarker: string;
  /** Line inserted once into every file that had a directive rewritten. */
  includeLine: string;
  /** Prefix of comment-only lines skipped when placing the include line. */
  commentPrefix: string;
  /** File extensions to process, compared case-insensitively. */
  extensions: string[];
  /** Directive families whose clause keywords must be followed directly by `(`. */
  adjacentParenFamilies: DirectiveKind[];
}

export const DEFAULT_CONFIG: Readonly<RewriteConfig> = {
  sentinel: '!$ACC',
  continuationMarker: '&',
  includeLine: "include 'macros.h'",
  commentPrefix: '!',
  extensions: ['.f90'],
  adjacentParenFamilies: []
};

/**
 * Merges user overrides onto the defaults, normalizing extensions to a leading dot.
 */
export function resolveConfig(overrides: Partial<RewriteConfig> = {}): RewriteConfig {
  const merged: RewriteConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    extensions: [...(overrides.extensions ?? DEFAULT_CONFIG.extensions)],
    adjacentParenFamilies: [...(overrides.adjacentParenFamilies ?? DEFAULT_CONFIG.adjacentParenFamilies)]
  };
  merged.extensions = merged.extensions
    .map(ext => ext.trim().toLowerCase())
    .filter(ext => ext.length > 0)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
  if (merged.sentinel.trim().length === 0) {
    throw new Error('Invalid configuration: sentinel must not be empty');
  }
  if (merged.continuationMarker.trim().length === 0) {
    throw new Error('Invalid configuration: continuation marker must not be empty');
  }
  return merged;
}
