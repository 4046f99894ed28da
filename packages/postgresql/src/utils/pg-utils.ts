import { lineColumnFromOffset, linesBeforeAndAfter } from '@tidemark/core';

/** Lines of script shown around a failing position */
const EXCERPT_CONTEXT = 5;

export interface PgErrorDetails {
  code?: string;
  message: string;
  detail?: string;
  hint?: string;
  position?: string;
  severity?: string;
}

function stringField(error: Error, field: keyof PgErrorDetails): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * The diagnostic fields the server attached to an error, where there are any.
 */
export function parsePgError(error: Error): PgErrorDetails {
  return {
    code: stringField(error, 'code'),
    message: error.message,
    detail: stringField(error, 'detail'),
    hint: stringField(error, 'hint'),
    position: stringField(error, 'position'),
    severity: stringField(error, 'severity'),
  };
}

/**
 * Quote an identifier (table name), doubling embedded quotes.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

/**
 * Render a script failure. Errors carrying a 1-based `position` get the
 * line, column and surrounding lines of the script.
 *
 * @example
 * ```
 * ERROR 42601: syntax error at or near "TABL" in line 1, column 8:
 *
 * 1: CREATE TABL users (id int);
 * ```
 */
export function formatScriptError(error: Error, content: string): string | undefined {
  const { severity, code, message, position } = parsePgError(error);
  if (!severity || !code) {
    return undefined;
  }

  const offset = position === undefined ? Number.NaN : Number.parseInt(position, 10);
  if (Number.isNaN(offset) || offset < 1) {
    return `${severity} ${code}: ${message}`;
  }

  const { line, column } = lineColumnFromOffset(content, offset - 1);
  const excerpt = linesBeforeAndAfter(content, line, EXCERPT_CONTEXT, EXCERPT_CONTEXT, true);
  return `${severity} ${code}: ${message} in line ${line}, column ${column}:\n\n${excerpt}`;
}
