import { linesBeforeAndAfter } from '@tidemark/core';

import type { Pool } from 'mysql2/promise';

/** Lines of script shown around a failing line */
const EXCERPT_CONTEXT = 5;

export interface MySQLErrorDetails {
  code?: string;
  errno?: number;
  sqlState?: string;
  message: string;
}

export function parseMySQLError(error: Error): MySQLErrorDetails {
  const code: unknown = Reflect.get(error, 'code');
  const errno: unknown = Reflect.get(error, 'errno');
  const sqlState: unknown = Reflect.get(error, 'sqlState');
  return {
    code: typeof code === 'string' ? code : undefined,
    errno: typeof errno === 'number' ? errno : undefined,
    sqlState: typeof sqlState === 'string' ? sqlState : undefined,
    message: error.message,
  };
}

/**
 * Render a server error raised by a script. Messages that name a line
 * (`... at line 3`) get the surrounding lines of the script.
 */
export function formatScriptError(error: Error, content: string): string | undefined {
  const { code, message } = parseMySQLError(error);
  if (!code?.startsWith('ER_')) {
    return undefined;
  }

  const match = /at line (\d+)$/.exec(message);
  const line = match?.[1] === undefined ? Number.NaN : Number.parseInt(match[1], 10);
  if (Number.isNaN(line)) {
    return `${code}: ${message}`;
  }

  const excerpt = linesBeforeAndAfter(content, line, EXCERPT_CONTEXT, EXCERPT_CONTEXT, true);
  return `${code}: ${message}:\n\n${excerpt}`;
}

/**
 * Whether `instance` looks like a mysql2 promise pool.
 */
export function isMySQLPool(instance: unknown): instance is Pool {
  return (
    typeof instance === 'object' &&
    instance !== null &&
    'getConnection' in instance &&
    typeof instance.getConnection === 'function' &&
    'escapeId' in instance &&
    typeof instance.escapeId === 'function'
  );
}
