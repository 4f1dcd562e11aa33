// file: src/TempDeclarations.ts
import { findClosingParen, splitVariableList } from './ClauseExtractor';
import { PassResult } from './PragmaPrimitives';

/**
 * A `temp(TYPE[(KIND=K)], NAME, (dims))` helper declaration found on a line.
 */
export interface TempDeclaration {
  indent: string;
  /** Upper-cased base type: REAL, INTEGER or LOGICAL. */
  type: string;
  /** Upper-cased kind parameter, if one was given. */
  kind?: string;
  name: string;
  /** Raw text between the dimension parentheses, trimmed. */
  dimsText: string;
  dims: string[];
  /** Whatever followed the declaration on the line, e.g. a trailing comment. */
  trailing: string;
}

// Matches the head of a temp(...) declaration up to the opening parenthesis of its dimensions
const tempHeadRegex = /^(\s*)temp\s*\(\s*(REAL|INTEGER|LOGICAL)\s*(?:\(\s*KIND\s*=\s*(\w+)\s*\)\s*)?,\s*(\w+)\s*,\s*\(/i;

/**
 * Parses a line holding a temp(...) declaration. Returns null for any other line
 * or when the parentheses do not balance.
 */
export function parseTempDeclaration(line: string): TempDeclaration | null {
  const m = tempHeadRegex.exec(line);
  if (!m) {
    return null;
  }
  const dimsOpen = m[0].length - 1;
  const dimsClose = findClosingParen(line, dimsOpen);
  if (dimsClose === -1) {
    return null;
  }
  const tail = /^\s*\)/.exec(line.slice(dimsClose + 1));
  if (!tail) {
    return null;
  }
  const dimsText = line.slice(dimsOpen + 1, dimsClose).trim();
  return {
    indent: m[1],
    type: m[2].toUpperCase(),
    kind: m[3] ? m[3].toUpperCase() : undefined,
    name: m[4],
    dimsText,
    dims: splitVariableList(dimsText),
    trailing: line.slice(dimsClose + 1 + tail[0].length)
  };
}

/**
 * `REAL (KIND=JPRB), pointer :: NAME(:,:)`, one deferred extent per dimension.
 */
export function formatPointerDeclaration(decl: TempDeclaration): string {
  const typeSpec = decl.kind ? `${decl.type} (KIND=${decl.kind})` : decl.type;
  const extents = decl.dims.map(() => ':').join(',');
  return `${decl.indent}${typeSpec}, pointer :: ${decl.name}(${extents})${decl.trailing}`;
}

/**
 * Rewrites every temp(...) helper declaration as a deferred-shape pointer declaration.
 * Declarations without dimensions are left alone.
 */
export function rewriteTempDeclarations(lines: string[]): PassResult {
  let changed = false;
  const out = lines.map(line => {
    const decl = parseTempDeclaration(line);
    if (!decl || decl.dims.length === 0) {
      return line;
    }
    const rewritten = formatPointerDeclaration(decl);
    if (rewritten !== line) {
      changed = true;
    }
    return rewritten;
  });
  return { lines: out, changed };
}
