import type { BracketCounts, BracketKind } from './types.js';

interface BracketDelta {
  kind: BracketKind;
  delta: 1 | -1;
}

/** The six recognized characters. Everything else is ignored. */
export const BRACKET_DELTAS: ReadonlyMap<string, BracketDelta> = new Map<string, BracketDelta>([
  ['(', { kind: 'paren', delta: 1 }],
  [')', { kind: 'paren', delta: -1 }],
  ['{', { kind: 'brace', delta: 1 }],
  ['}', { kind: 'brace', delta: -1 }],
  ['[', { kind: 'brack', delta: 1 }],
  [']', { kind: 'brack', delta: -1 }],
]);

export function zeroCounts(): BracketCounts {
  return { paren: 0, brace: 0, brack: 0 };
}

/**
 * Running bracket balance over a character stream.
 * Counters are never reset; negative values are allowed.
 */
export class BracketCounter {
  private readonly counts: BracketCounts = zeroCounts();

  consume(text: string): void {
    for (const char of text) {
      const entry = BRACKET_DELTAS.get(char);
      if (entry) {
        this.counts[entry.kind] += entry.delta;
      }
    }
  }

  snapshot(): Readonly<BracketCounts> {
    return Object.freeze({ ...this.counts });
  }
}

export function isBalanced(counts: Readonly<BracketCounts>): boolean {
  return counts.paren === 0 && counts.brace === 0 && counts.brack === 0;
}
