// file: src/DirectiveValidator.ts
import { DirectiveClassifier } from './DirectiveClassifier';
import { DirectiveIssue, DirectiveMatch, LogicalLine } from './PragmaPrimitives';

export interface DirectiveResolution {
  /** The decoded directive, or null when the line is left unchanged. */
  match: DirectiveMatch | null;
  issue: DirectiveIssue | null;
}

/**
 * Classifies one directive line and notes anything worth a diagnostic in the
 * same pass: a line several families recognize (the first that decodes wins)
 * or one that a family recognized but could not decode (left unchanged).
 * @param line A directive logical line.
 * @param registry Classifiers in priority order.
 */
export function resolveDirective(
  line: LogicalLine,
  registry: readonly DirectiveClassifier[]
): DirectiveResolution {
  const candidates = registry.filter(c => c.recognize(line.body));
  if (candidates.length === 0) {
    return { match: null, issue: null };
  }
  const kinds = candidates.map(c => c.kind);
  for (const classifier of candidates) {
    const match = classifier.decode(line.body, line.leadingWhitespace);
    if (!match) continue;
    const issue: DirectiveIssue | null = candidates.length > 1
      ? { kind: 'ambiguous', line: line.lineNumber, text: line.body, candidates: kinds, chosen: classifier.kind }
      : null;
    return { match, issue };
  }
  return {
    match: null,
    issue: { kind: 'malformed', line: line.lineNumber, text: line.body, candidates: kinds }
  };
}

/**
 * Formats directive issues for one file.
 * @param report Function to call for each message.
 * @returns Number of issues reported.
 */
export function reportDirectiveIssues(
  issues: DirectiveIssue[],
  filePath: string,
  report: (msg: string) => void
): number {
  for (const issue of issues) {
    if (issue.kind === 'malformed') {
      report(
        `[accmacro] ${filePath}:${issue.line} -> ${issue.candidates[0]} directive left unchanged: '${issue.text}'`
      );
    } else {
      report(
        `[accmacro] ${filePath}:${issue.line} -> directive recognized as ${issue.candidates.join(', ')}; using ${issue.chosen ?? issue.candidates[0]}`
      );
    }
  }
  return issues.length;
}
