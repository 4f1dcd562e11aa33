// file: src/PragmaPrimitives.ts
/**
 * The directive families the rewriter knows how to turn into macro calls.
 */
export type DirectiveKind = 'DataPresent' | 'EnterDataCreate' | 'HostTransfer';

/**
 * One logical line of source: either an ordinary line or a fully joined directive.
 */
export interface LogicalLine {
  /** Indentation of the first physical line. */
  leadingWhitespace: string;
  /**
   * For directives, the joined clause text with sentinel and continuation markers removed.
   * For ordinary lines, the line itself.
   */
  body: string;
  isDirective: boolean;
  /** The 1-based line number of the first physical line. */
  lineNumber: number;
  /** The physical lines this logical line was assembled from, verbatim. */
  raw: string[];
}

/**
 * Base properties for a recognized directive.
 */
export interface BaseMatch {
  kind: DirectiveKind;
  /** Indentation to put in front of the emitted macro call. */
  indent: string;
}

/**
 * `!$ACC DATA PRESENT(...) [COPYIN(...)] [COPY(...)] [IF(...)]`
 *
 * Optional clauses are `undefined` when absent and `''` when written with an empty argument.
 */
export interface DataPresentMatch extends BaseMatch {
  kind: 'DataPresent';
  clauses: {
    present: string[];
    copyin?: string;
    copy?: string;
    condition?: string;
  };
}

/**
 * `!$ACC ENTER DATA CREATE(...) [IF(...)] [ASYNC(...)]`
 */
export interface EnterDataCreateMatch extends BaseMatch {
  kind: 'EnterDataCreate';
  clauses: {
    create: string[];
    condition?: string;
    async?: string;
  };
}

/** Whether a host transfer came from an `UPDATE` or a `DATA` directive. */
export type HostDirective = 'UPDATE' | 'DATA';

/**
 * `!$ACC UPDATE HOST(...) [WAIT(...)] [ASYNC(...)] [IF(...)]` or `!$ACC DATA HOST(...) [IF(...)]`
 */
export interface HostTransferMatch extends BaseMatch {
  kind: 'HostTransfer';
  directive: HostDirective;
  clauses: {
    host: string[];
    wait?: string;
    async?: string;
    condition?: string;
  };
}

export type DirectiveMatch =
  | DataPresentMatch
  | EnterDataCreateMatch
  | HostTransferMatch;

/**
 * Something worth telling the user about a directive that was left alone or resolved by priority.
 */
export interface DirectiveIssue {
  kind: 'ambiguous' | 'malformed';
  line: number;
  /** Directive body as assembled. */
  text: string;
  /** Classifier kinds whose anchors recognized the line, in registry order. */
  candidates: DirectiveKind[];
  /** For an ambiguous line, the classifier that decoded it. */
  chosen?: DirectiveKind;
}

/**
 * Result of running one whole-file pass over physical lines.
 */
export interface PassResult {
  lines: string[];
  changed: boolean;
}

/**
 * What happened to one file in a batch. Plain data so it can cross a worker boundary.
 */
export interface FileOutcome {
  file: string;
  changed: boolean;
  /** False on a dry run or when nothing changed. */
  written: boolean;
  encoding: string;
  issues: DirectiveIssue[];
}
