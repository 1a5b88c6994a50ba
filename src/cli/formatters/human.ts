import { Chalk, type ChalkInstance } from 'chalk';
import type { BracketCounts, LineSnapshot, ScanSummary } from '../../core/scanner/types.js';
import type { IFormatter, FormatOptions } from './types.js';

function pad(value: number, width: number): string {
  return String(value).padStart(width);
}

/**
 * Per-line trace for reading in a terminal.
 *
 *    12: paren=  1 brace=  2 brack=  0 | fun main() {
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;
  private chalk: ChalkInstance;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? false,
    };
    // Fixed level: colors follow the option, not TTY detection
    this.chalk = new Chalk({ level: this.options.colors ? 1 : 0 });
  }

  formatLine(snapshot: LineSnapshot): string {
    const { paren, brace, brack } = snapshot.counts;
    return `${pad(snapshot.index, 4)}: paren=${pad(paren, 3)} brace=${pad(brace, 3)} brack=${pad(brack, 3)} | ${snapshot.text}`;
  }

  formatSummary(summary: ScanSummary): string {
    const line = `FINAL COUNTS: ${formatCounts(summary.counts)}`;
    return `\n${this.colorize(line, summary.balanced ? 'green' : 'red')}`;
  }

  private colorize(text: string, color: 'red' | 'green'): string {
    if (!this.options.colors) {
      return text;
    }
    return color === 'red' ? this.chalk.red(text) : this.chalk.green(text);
  }
}

export function formatCounts(counts: Readonly<BracketCounts>): string {
  return `paren=${counts.paren} brace=${counts.brace} brack=${counts.brack}`;
}
