/**
 * Helpers for pointing at a position inside a migration script.
 */

export interface SourcePosition {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

/**
 * Line and column of a 0-based character offset.
 */
export function lineColumnFromOffset(content: string, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, content.length));
  const before = content.slice(0, clamped);
  return {
    line: before.split('\n').length,
    column: clamped - before.lastIndexOf('\n'),
  };
}

/**
 * The lines `before` and `after` around the 1-based `line`, optionally
 * prefixed with right-aligned line numbers.
 */
export function linesBeforeAndAfter(
  content: string,
  line: number,
  before: number,
  after: number,
  lineNumbers = true,
): string {
  const lines = content.split('\n');
  const start = Math.max(1, line - before);
  const end = Math.min(lines.length, line + after);
  const width = String(end).length;

  return lines
    .slice(start - 1, end)
    .map((text, index) => (lineNumbers ? `${String(start + index).padStart(width)}: ${text}` : text))
    .join('\n');
}
