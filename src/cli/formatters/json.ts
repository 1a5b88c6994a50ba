import type { LineSnapshot, ScanSummary } from '../../core/scanner/types.js';
import { exitCodeFor } from '../../core/scanner/scanner.js';
import type { IFormatter } from './types.js';

interface JsonLineRecord {
  line: number;
  paren: number;
  brace: number;
  brack: number;
  text: string;
}

/**
 * JSON output formatter for machine consumption.
 * Lines are buffered and written as one document with the summary.
 */
export class JsonFormatter implements IFormatter {
  private lines: JsonLineRecord[] = [];

  formatLine(snapshot: LineSnapshot): null {
    this.lines.push({
      line: snapshot.index,
      paren: snapshot.counts.paren,
      brace: snapshot.counts.brace,
      brack: snapshot.counts.brack,
      text: snapshot.text,
    });
    return null;
  }

  formatSummary(summary: ScanSummary): string {
    const output = {
      file: summary.file ?? null,
      balanced: summary.balanced,
      exit_code: exitCodeFor(summary),
      final: {
        paren: summary.counts.paren,
        brace: summary.counts.brace,
        brack: summary.counts.brack,
      },
      lines: this.lines,
    };
    this.lines = [];
    return JSON.stringify(output, null, 2);
  }
}
