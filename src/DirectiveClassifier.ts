// file: src/DirectiveClassifier.ts
import { ClauseOptions, extractClause, hasArgument, splitVariableList } from './ClauseExtractor';
import {
  DataPresentMatch,
  DirectiveKind,
  DirectiveMatch,
  EnterDataCreateMatch,
  HostDirective,
  HostTransferMatch
} from './PragmaPrimitives';

/**
 * Recognizes one directive family and decodes it into a typed match.
 * Both methods take the directive body, i.e. the text after the sentinel.
 */
export interface DirectiveClassifier {
  readonly kind: DirectiveKind;
  /** Cheap anchored test: does the body look like this family at all? */
  recognize(body: string): boolean;
  /**
   * Full decomposition. Returns null when the clauses are malformed, when text is
   * left over that this family does not understand, or when the clause
   * combination has no macro form.
   */
  decode(body: string, indent: string): DirectiveMatch | null;
}

export interface ClassifierOptions {
  /** Families whose clause keywords must be followed directly by `(`. */
  adjacentParenFamilies?: DirectiveKind[];
}

// Matches DATA PRESENT( with any interior whitespace
const dataPresentRegex = /^DATA\s+PRESENT\s*\(/i;
// Matches ENTER DATA CREATE(
const enterDataCreateRegex = /^ENTER\s+DATA\s+CREATE\s*\(/i;
// Matches UPDATE HOST( or DATA HOST(, capturing the directive word
const hostTransferRegex = /^(UPDATE|DATA)\s+HOST\s*\(/i;

/**
 * Extracts each optional keyword in turn from the remaining text.
 */
function probeClauses<K extends string>(
  text: string,
  keywords: readonly K[],
  options: ClauseOptions
): { values: Partial<Record<K, string>>; rest: string } {
  const values: Partial<Record<K, string>> = {};
  let rest = text;
  for (const keyword of keywords) {
    const clause = extractClause(rest, keyword, options);
    if (clause.argument !== undefined) {
      values[keyword] = clause.argument;
      rest = clause.rest;
    }
  }
  return { values, rest };
}

/**
 * Extracts the mandatory variable-list clause. Null if it is missing, unbalanced or empty.
 */
function mandatoryList(
  text: string,
  keyword: string,
  options: ClauseOptions
): { vars: string[]; rest: string } | null {
  const clause = extractClause(text, keyword, options);
  if (clause.argument === undefined) {
    return null;
  }
  const vars = splitVariableList(clause.argument);
  if (vars.length === 0) {
    return null;
  }
  return { vars, rest: clause.rest };
}

export function createDataPresentClassifier(options: ClauseOptions = {}): DirectiveClassifier {
  return {
    kind: 'DataPresent',
    recognize: body => dataPresentRegex.test(body),
    decode(body, indent): DataPresentMatch | null {
      if (!dataPresentRegex.test(body)) {
        return null;
      }
      const clauseText = body.replace(/^DATA\s+/i, '');
      const present = mandatoryList(clauseText, 'PRESENT', options);
      if (!present) {
        return null;
      }
      const { values, rest } = probeClauses(present.rest, ['COPYIN', 'COPY', 'IF'] as const, options);
      if (rest.length > 0) {
        return null;
      }
      return {
        kind: 'DataPresent',
        indent,
        clauses: {
          present: present.vars,
          copyin: values.COPYIN,
          copy: values.COPY,
          condition: values.IF
        }
      };
    }
  };
}

export function createEnterDataCreateClassifier(options: ClauseOptions = {}): DirectiveClassifier {
  return {
    kind: 'EnterDataCreate',
    recognize: body => enterDataCreateRegex.test(body),
    decode(body, indent): EnterDataCreateMatch | null {
      if (!enterDataCreateRegex.test(body)) {
        return null;
      }
      const clauseText = body.replace(/^ENTER\s+DATA\s+/i, '');
      const create = mandatoryList(clauseText, 'CREATE', options);
      if (!create) {
        return null;
      }
      const { values, rest } = probeClauses(create.rest, ['IF', 'ASYNC'] as const, options);
      if (rest.length > 0) {
        return null;
      }
      return {
        kind: 'EnterDataCreate',
        indent,
        clauses: {
          create: create.vars,
          condition: values.IF,
          async: values.ASYNC
        }
      };
    }
  };
}

export function createHostTransferClassifier(options: ClauseOptions = {}): DirectiveClassifier {
  return {
    kind: 'HostTransfer',
    recognize: body => hostTransferRegex.test(body),
    decode(body, indent): HostTransferMatch | null {
      const m = hostTransferRegex.exec(body);
      if (!m) {
        return null;
      }
      const directive: HostDirective = m[1].toUpperCase() === 'UPDATE' ? 'UPDATE' : 'DATA';
      const clauseText = body.slice(m[1].length).trim();
      const host = mandatoryList(clauseText, 'HOST', options);
      if (!host) {
        return null;
      }
      // DATA HOST only has an IF form; WAIT/ASYNC there stay unconsumed and reject the line
      const keywords = directive === 'DATA' ? (['IF'] as const) : (['WAIT', 'ASYNC', 'IF'] as const);
      const { values, rest } = probeClauses<'WAIT' | 'ASYNC' | 'IF'>(host.rest, keywords, options);
      if (rest.length > 0) {
        return null;
      }
      // No UPDATE macro takes WAIT or ASYNC without a condition
      if (!hasArgument(values.IF) && (hasArgument(values.WAIT) || hasArgument(values.ASYNC))) {
        return null;
      }
      return {
        kind: 'HostTransfer',
        indent,
        directive,
        clauses: {
          host: host.vars,
          wait: values.WAIT,
          async: values.ASYNC,
          condition: values.IF
        }
      };
    }
  };
}

/**
 * The registry, in priority order. The first classifier whose anchor matches and
 * whose decode succeeds claims the line.
 */
export function createDefaultClassifiers(options: ClassifierOptions = {}): DirectiveClassifier[] {
  const adjacent = new Set<DirectiveKind>(options.adjacentParenFamilies ?? []);
  const clauseOptions = (kind: DirectiveKind): ClauseOptions => ({ tolerateSpace: !adjacent.has(kind) });
  return [
    createDataPresentClassifier(clauseOptions('DataPresent')),
    createEnterDataCreateClassifier(clauseOptions('EnterDataCreate')),
    createHostTransferClassifier(clauseOptions('HostTransfer'))
  ];
}

export const DEFAULT_CLASSIFIERS: readonly DirectiveClassifier[] = createDefaultClassifiers();

/**
 * Classifies a directive body against the registry. Returns null for lines no
 * classifier claims; those pass through unchanged.
 */
export function classifyDirective(
  body: string,
  indent: string,
  registry: readonly DirectiveClassifier[] = DEFAULT_CLASSIFIERS
): DirectiveMatch | null {
  for (const classifier of registry) {
    if (!classifier.recognize(body)) {
      continue;
    }
    const match = classifier.decode(body, indent);
    if (match) {
      return match;
    }
  }
  return null;
}
