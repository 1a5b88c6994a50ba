/**
 * Formatter type definitions.
 */
import type { LineSnapshot, ScanSummary } from '../../core/scanner/types.js';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in the summary */
  colors: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format the record for one scanned line.
   * Returns null when the formatter emits nothing until the summary.
   */
  formatLine(snapshot: LineSnapshot): string | null;

  /**
   * Format the closing summary.
   */
  formatSummary(summary: ScanSummary): string;
}
