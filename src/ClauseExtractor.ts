// file: src/ClauseExtractor.ts

export interface ClauseOptions {
  /** Allow whitespace between the keyword and its `(`. Defaults to true. */
  tolerateSpace?: boolean;
}

export interface ExtractedClause {
  /** Outer-trimmed text between the clause's parentheses, or undefined when the clause is absent. */
  argument: string | undefined;
  /** The text left once the clause is removed; the original text when nothing was removed. */
  rest: string;
}

const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;
const WHITESPACE = /\s/;

/**
 * Returns the index of the `)` that closes the `(` at `openIndex`, or -1 if the
 * input ends first.
 */
export function findClosingParen(text: string, openIndex: number): number {
  let depth = 1;
  for (let i = openIndex + 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Pulls `KEYWORD(argument)` out of a directive's clause text.
 *
 * Only occurrences outside any parentheses and on an identifier boundary count,
 * so `COPY` never matches inside `COPYIN(...)` and `PRESENT` never matches inside
 * `IF(PRESENT(X))`. The argument may itself hold nested parentheses.
 */
export function extractClause(
  text: string,
  keyword: string,
  options: ClauseOptions = {}
): ExtractedClause {
  const tolerateSpace = options.tolerateSpace ?? true;
  const lower = text.toLowerCase();
  const kw = keyword.toLowerCase();
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(') {
      depth++;
      continue;
    }
    if (ch === ')') {
      depth = Math.max(depth - 1, 0);
      continue;
    }
    if (depth !== 0 || !lower.startsWith(kw, i)) {
      continue;
    }
    if (i > 0 && IDENTIFIER_CHAR.test(text[i - 1])) {
      continue;
    }
    let open = i + kw.length;
    if (tolerateSpace) {
      while (open < text.length && WHITESPACE.test(text[open])) {
        open++;
      }
    }
    if (text[open] !== '(') {
      continue;
    }
    const close = findClosingParen(text, open);
    if (close === -1) {
      // Every later occurrence sits inside this unclosed parenthesis.
      break;
    }
    const before = text.slice(0, i).trim();
    const after = text.slice(close + 1).trim();
    return {
      argument: text.slice(open + 1, close).trim(),
      rest: [before, after].filter(part => part.length > 0).join(' ')
    };
  }
  return { argument: undefined, rest: text };
}

/** True when a clause was written with a non-empty argument. */
export function hasArgument(argument: string | undefined): argument is string {
  return argument !== undefined && argument.length > 0;
}

/**
 * Splits a variable list on commas outside parentheses, so array sections such as
 * `A(1:N, 2)` stay whole. Empty items are dropped.
 */
export function splitVariableList(text: string): string[] {
  const items: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth = Math.max(depth - 1, 0);
    } else if (ch === ',' && depth === 0) {
      items.push(text.slice(start, i));
      start = i + 1;
    }
  }
  items.push(text.slice(start));
  return items.map(item => item.trim()).filter(item => item.length > 0);
}
