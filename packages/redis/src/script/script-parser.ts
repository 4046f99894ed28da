/**
 * Redis script parser
 *
 * A script holds one command per line, arguments separated by whitespace.
 * Arguments may be quoted: double quotes understand `\n`, `\r`, `\t`, `\\`
 * and `\"`; single quotes only `\'`. Blank lines and lines starting with `#`
 * are skipped.
 *
 * ```
 * # seed the feature flags
 * HSET flags:beta enabled 1
 * SET greeting "hello\nworld"
 * ```
 */

import { TidemarkError } from '@tidemark/core';

export interface RedisCommand {
  /** 1-based line in the script */
  line: number;
  name: string;
  args: string[];
}

export class ScriptParseError extends TidemarkError {
  constructor(
    message: string,
    public line: number,
  ) {
    super(message, 'SCRIPT_PARSE_ERROR');
    this.name = 'ScriptParseError';
  }
}

const DOUBLE_QUOTE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  '"': '"',
};

function isSpace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\r';
}

export function tokenize(text: string, line: number): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < text.length) {
    while (i < text.length && isSpace(text.charAt(i))) {
      i += 1;
    }
    if (i >= text.length) {
      break;
    }

    const quote = text.charAt(i);
    if (quote !== '"' && quote !== "'") {
      let token = '';
      while (i < text.length && !isSpace(text.charAt(i))) {
        token += text.charAt(i);
        i += 1;
      }
      tokens.push(token);
      continue;
    }

    i += 1;
    let token = '';
    let closed = false;
    while (i < text.length) {
      const char = text.charAt(i);
      if (char === quote) {
        closed = true;
        i += 1;
        break;
      }
      if (char === '\\' && i + 1 < text.length) {
        const next = text.charAt(i + 1);
        const escaped = quote === '"' ? DOUBLE_QUOTE_ESCAPES[next] : next === "'" ? "'" : undefined;
        if (escaped !== undefined) {
          token += escaped;
          i += 2;
          continue;
        }
      }
      token += char;
      i += 1;
    }

    if (!closed) {
      throw new ScriptParseError('Unbalanced quotes', line);
    }
    if (i < text.length && !isSpace(text.charAt(i))) {
      throw new ScriptParseError('Closing quote must be followed by a space', line);
    }
    tokens.push(token);
  }

  return tokens;
}

export function parseScript(content: string): RedisCommand[] {
  const commands: RedisCommand[] = [];

  content.split('\n').forEach((raw, index) => {
    const text = raw.trim();
    if (!text || text.startsWith('#')) {
      return;
    }

    const line = index + 1;
    const [name, ...args] = tokenize(text, line);
    if (name === undefined || name === '') {
      throw new ScriptParseError('Missing command name', line);
    }
    commands.push({ line, name, args });
  });

  return commands;
}
