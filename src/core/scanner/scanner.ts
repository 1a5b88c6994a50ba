/**
 * Bracket balance scanning over lines, text, and files.
 */
import { readTextFileSync } from '../../utils/file-system.js';
import { BracketCounter, isBalanced } from './counter.js';
import { splitLines } from './lines.js';
import {
  ExitCodes,
  type BalanceExitCode,
  type LineCallback,
  type ScanSummary,
} from './types.js';

/**
 * Scan lines in order, reporting the cumulative counts after each one.
 */
export function scanLines(lines: readonly string[], onLine?: LineCallback): ScanSummary {
  const counter = new BracketCounter();

  lines.forEach((text, i) => {
    counter.consume(text);
    onLine?.({ index: i + 1, text, counts: counter.snapshot() });
  });

  const counts = counter.snapshot();
  return {
    lineCount: lines.length,
    counts,
    balanced: isBalanced(counts),
  };
}

export function scanText(text: string, onLine?: LineCallback): ScanSummary {
  return scanLines(splitLines(text), onLine);
}

/**
 * Read a file fully, then scan it.
 * Throws FileAccessError before any line is reported if the read fails.
 */
export function scanFile(filePath: string, onLine?: LineCallback): ScanSummary {
  const text = readTextFileSync(filePath);
  return { file: filePath, ...scanText(text, onLine) };
}

export function exitCodeFor(summary: ScanSummary): BalanceExitCode {
  return summary.balanced ? ExitCodes.BALANCED : ExitCodes.IMBALANCED;
}
