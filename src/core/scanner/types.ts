/**
 * Scanner type definitions.
 */

export type BracketKind = 'paren' | 'brace' | 'brack';

/** Net open-minus-close count per bracket kind. Values are signed. */
export type BracketCounts = Record<BracketKind, number>;

/**
 * Counter state after one line has been consumed.
 */
export interface LineSnapshot {
  /** 1-based line number */
  index: number;
  /** Raw line text, without its separator */
  text: string;
  counts: Readonly<BracketCounts>;
}

export interface ScanSummary {
  /** Resolved path, when the text came from a file */
  file?: string;
  lineCount: number;
  counts: Readonly<BracketCounts>;
  balanced: boolean;
}

export type LineCallback = (snapshot: LineSnapshot) => void;

export const ExitCodes = {
  BALANCED: 0,
  IMBALANCED: 2,
} as const;

export type BalanceExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
