/**
 * Line splitting on universal line boundaries.
 */

// \r\n first so it is consumed as one boundary
const LINE_BOUNDARY = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;
const TRAILING_BOUNDARY = /(?:\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029])$/;

/**
 * Split text into lines.
 *
 * A terminating separator does not yield an empty last line, so `"a\n"` is
 * one line and `""` is none.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(LINE_BOUNDARY);
  if (TRAILING_BOUNDARY.test(text)) {
    lines.pop();
  }
  return lines;
}
