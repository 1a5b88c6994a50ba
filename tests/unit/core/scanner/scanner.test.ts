/**
 * Tests for bracket scanning over lines, text and files.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  scanLines,
  scanText,
  scanFile,
  exitCodeFor,
} from '../../../../src/core/scanner/scanner.js';
import { ExitCodes, type LineSnapshot } from '../../../../src/core/scanner/types.js';
import { FileAccessError, ErrorCodes } from '../../../../src/utils/errors.js';

function collect(text: string): { snapshots: LineSnapshot[]; summary: ReturnType<typeof scanText> } {
  const snapshots: LineSnapshot[] = [];
  const summary = scanText(text, (s) => snapshots.push(s));
  return { snapshots, summary };
}

describe('scanText', () => {
  it('should report a balanced single line', () => {
    const { snapshots, summary } = collect('()');

    expect(snapshots).toEqual([
      { index: 1, text: '()', counts: { paren: 0, brace: 0, brack: 0 } },
    ]);
    expect(summary).toEqual({
      lineCount: 1,
      counts: { paren: 0, brace: 0, brack: 0 },
      balanced: true,
    });
    expect(exitCodeFor(summary)).toBe(0);
  });

  it('should report an unclosed paren as imbalanced', () => {
    const { snapshots, summary } = collect('(');

    expect(snapshots[0].counts).toEqual({ paren: 1, brace: 0, brack: 0 });
    expect(summary.counts.paren).toBe(1);
    expect(summary.balanced).toBe(false);
    expect(exitCodeFor(summary)).toBe(2);
  });

  it('should carry counts across lines without resetting', () => {
    const { snapshots, summary } = collect('{[\n]}');

    expect(snapshots.map((s) => s.counts)).toEqual([
      { paren: 0, brace: 1, brack: 1 },
      { paren: 0, brace: 0, brack: 0 },
    ]);
    expect(snapshots.map((s) => s.index)).toEqual([1, 2]);
    expect(summary.balanced).toBe(true);
  });

  it('should produce no records for empty input', () => {
    const { snapshots, summary } = collect('');

    expect(snapshots).toEqual([]);
    expect(summary).toEqual({
      lineCount: 0,
      counts: { paren: 0, brace: 0, brack: 0 },
      balanced: true,
    });
    expect(exitCodeFor(summary)).toBe(0);
  });

  it('should accept intermediate negative counts when the total balances', () => {
    const { snapshots, summary } = collect(')(');

    expect(snapshots[0].counts.paren).toBe(0);
    expect(summary.balanced).toBe(true);
    expect(exitCodeFor(summary)).toBe(0);
  });

  it('should end negative when closers outnumber openers', () => {
    const { summary } = collect('}\n');

    expect(summary.counts.brace).toBe(-1);
    expect(exitCodeFor(summary)).toBe(2);
  });

  it('should still report lines with no brackets', () => {
    const { snapshots } = collect('fun main() {\n  val x = 1\n}\n');

    expect(snapshots).toHaveLength(3);
    expect(snapshots[1]).toEqual({
      index: 2,
      text: '  val x = 1',
      counts: { paren: 0, brace: 1, brack: 0 },
    });
  });

  it('should match net open-minus-close counts at every line', () => {
    const lines = ['a(b[c', 'd]e)f{', '}}{(', ')', '[[]'];
    const { snapshots } = collect(lines.join('\n'));

    lines.forEach((_, i) => {
      const prefix = lines.slice(0, i + 1).join('');
      const net = (open: string, close: string): number =>
        [...prefix].filter((c) => c === open).length - [...prefix].filter((c) => c === close).length;
      expect(snapshots[i].counts).toEqual({
        paren: net('(', ')'),
        brace: net('{', '}'),
        brack: net('[', ']'),
      });
    });
  });

  it('should be unaffected by non-bracket characters', () => {
    const plain = collect('({[\n]})\n(');
    const noisy = collect('x = ({ arr[\n  i ] }) ;\n  call(');

    expect(noisy.snapshots.map((s) => s.counts)).toEqual(plain.snapshots.map((s) => s.counts));
    expect(exitCodeFor(noisy.summary)).toBe(exitCodeFor(plain.summary));
  });

  it('should be deterministic across runs', () => {
    const text = 'if (a[0]) {\n  b(\n}\n';
    expect(collect(text)).toEqual(collect(text));
  });
});

describe('scanLines', () => {
  it('should number snapshots from 1 in input order', () => {
    const indexes: number[] = [];
    scanLines(['x', 'y', 'z'], (s) => indexes.push(s.index));
    expect(indexes).toEqual([1, 2, 3]);
  });

  it('should work without a callback', () => {
    expect(scanLines(['[']).counts.brack).toBe(1);
  });
});

describe('exitCodeFor', () => {
  it('should map balance to the two exit codes', () => {
    const counts = { paren: 0, brace: 0, brack: 0 };
    expect(exitCodeFor({ lineCount: 0, counts, balanced: true })).toBe(ExitCodes.BALANCED);
    expect(exitCodeFor({ lineCount: 0, counts, balanced: false })).toBe(ExitCodes.IMBALANCED);
  });
});

describe('scanFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `bracecheck-scan-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should scan a file and include its path in the summary', () => {
    const filePath = join(tempDir, 'Screen.kt');
    writeFileSync(filePath, 'Column {\n  Text("hi")\n}\n');

    const snapshots: LineSnapshot[] = [];
    const summary = scanFile(filePath, (s) => snapshots.push(s));

    expect(snapshots).toHaveLength(3);
    expect(summary).toEqual({
      file: filePath,
      lineCount: 3,
      counts: { paren: 0, brace: 0, brack: 0 },
      balanced: true,
    });
  });

  it('should throw FileAccessError before reporting any line for a missing file', () => {
    const snapshots: LineSnapshot[] = [];

    expect(() => scanFile(join(tempDir, 'missing.kt'), (s) => snapshots.push(s))).toThrow(FileAccessError);
    expect(snapshots).toEqual([]);
  });

  it('should report the not-found error code', () => {
    try {
      scanFile(join(tempDir, 'missing.kt'));
      expect.fail('expected scanFile to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(FileAccessError);
      if (error instanceof FileAccessError) {
        expect(error.code).toBe(ErrorCodes.FILE_NOT_FOUND);
      }
    }
  });

  it('should produce identical results on repeated scans of the same file', () => {
    const filePath = join(tempDir, 'a.txt');
    writeFileSync(filePath, '((\n)');

    expect(scanFile(filePath)).toEqual(scanFile(filePath));
  });
});
