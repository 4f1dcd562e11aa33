// file: src/LineAssembler.ts
import { DEFAULT_CONFIG } from './config';
import { LogicalLine } from './PragmaPrimitives';

export interface AssembleOptions {
  sentinel?: string;
  continuationMarker?: string;
}

interface PendingDirective {
  leadingWhitespace: string;
  lineNumber: number;
  parts: string[];
  raw: string[];
}

function startsWithIgnoreCase(text: string, prefix: string): boolean {
  return text.slice(0, prefix.length).toUpperCase() === prefix.toUpperCase();
}

/**
 * Strips the sentinel, a marker right after it (`!$acc& copyin(b)`) and any trailing
 * markers and whitespace from one trimmed physical directive line.
 */
function directiveContent(trimmed: string, sentinel: string, marker: string): string {
  let content = trimmed.slice(sentinel.length).trimStart();
  if (content.startsWith(marker)) {
    content = content.slice(marker.length);
  }
  content = content.trim();
  while (content.endsWith(marker)) {
    content = content.slice(0, content.length - marker.length).trimEnd();
  }
  return content;
}

/**
 * Groups physical lines into logical lines, joining each maximal run of
 * continuation-marked directive lines into a single directive.
 *
 * Lines are expected without terminators. The first line of a run decides the
 * indentation; an unterminated run at end of input is still emitted.
 */
export function* assembleLogicalLines(
  lines: Iterable<string>,
  options: AssembleOptions = {}
): Generator<LogicalLine> {
  const sentinel = options.sentinel ?? DEFAULT_CONFIG.sentinel;
  const marker = options.continuationMarker ?? DEFAULT_CONFIG.continuationMarker;
  let pending: PendingDirective | null = null;
  let lineNumber = 0;

  const flush = (p: PendingDirective): LogicalLine => ({
    leadingWhitespace: p.leadingWhitespace,
    body: p.parts.join(' '),
    isDirective: true,
    lineNumber: p.lineNumber,
    raw: p.raw
  });

  for (const line of lines) {
    lineNumber++;
    const trimmed = line.trim();
    if (startsWithIgnoreCase(trimmed, sentinel)) {
      if (!pending) {
        pending = {
          leadingWhitespace: line.slice(0, line.length - line.trimStart().length),
          lineNumber,
          parts: [],
          raw: []
        };
      }
      pending.raw.push(line);
      const content = directiveContent(trimmed, sentinel, marker);
      if (content.length > 0) {
        pending.parts.push(content);
      }
      if (trimmed.endsWith(marker)) {
        continue;
      }
      yield flush(pending);
      pending = null;
      continue;
    }
    if (pending) {
      yield flush(pending);
      pending = null;
    }
    yield {
      leadingWhitespace: line.slice(0, line.length - line.trimStart().length),
      body: line,
      isDirective: false,
      lineNumber,
      raw: [line]
    };
  }
  if (pending) {
    yield flush(pending);
  }
}
