/**
 * Key/value parser for shell-sourceable metadata files.
 *
 * Reads `KEY=value` assignments as data. Supported: blank lines, `#`
 * comments, an optional `export ` prefix, single- and double-quoted values,
 * and `$NAME` / `${NAME}` references to keys defined earlier in the file.
 * Anything that would need a shell to evaluate (command substitution, bare
 * words after a value) is rejected as malformed.
 */

export type KeyValueParseResult =
  | { success: true; values: Record<string, string> }
  | { success: false; line: number; message: string };

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const REFERENCE_PATTERN = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

class ParseFailure extends Error {}

export function parseKeyValue(text: string): KeyValueParseResult {
  const values = new Map<string, string>();
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    let line = lines[i].replace(/\r$/, '').trim();
    if (line === '' || line.startsWith('#')) continue;

    if (line.startsWith('export ')) line = line.slice('export '.length).trimStart();

    const eq = line.indexOf('=');
    if (eq <= 0) {
      return { success: false, line: lineNo, message: 'expected KEY=value' };
    }
    const key = line.slice(0, eq);
    if (!KEY_PATTERN.test(key)) {
      return { success: false, line: lineNo, message: `invalid key "${key}"` };
    }

    try {
      values.set(key, parseValue(line.slice(eq + 1), values));
    } catch (err) {
      if (err instanceof ParseFailure) {
        return { success: false, line: lineNo, message: err.message };
      }
      throw err;
    }
  }

  return { success: true, values: Object.fromEntries(values) };
}

function parseValue(raw: string, defined: ReadonlyMap<string, string>): string {
  if (raw.startsWith("'")) {
    const close = raw.indexOf("'", 1);
    if (close === -1) throw new ParseFailure('unterminated single quote');
    assertTrailingComment(raw.slice(close + 1));
    return raw.slice(1, close);
  }

  if (raw.startsWith('"')) {
    let out = '';
    let i = 1;
    for (; i < raw.length; i++) {
      const ch = raw[i];
      if (ch === '\\' && i + 1 < raw.length && '"\\$`'.includes(raw[i + 1])) {
        out += raw[i + 1];
        i++;
        continue;
      }
      if (ch === '"') break;
      if (ch === '`' || (ch === '$' && raw[i + 1] === '(')) {
        throw new ParseFailure('command substitution is not supported');
      }
      out += ch;
    }
    if (i >= raw.length) throw new ParseFailure('unterminated double quote');
    assertTrailingComment(raw.slice(i + 1));
    return expandReferences(out, defined);
  }

  const commentAt = raw.search(/\s#/);
  const word = (commentAt === -1 ? raw : raw.slice(0, commentAt)).trimEnd();
  if (/\s/.test(word)) throw new ParseFailure('unquoted value contains whitespace');
  if (word.includes('`') || word.includes('$(')) {
    throw new ParseFailure('command substitution is not supported');
  }
  if (/["']/.test(word)) throw new ParseFailure('unexpected quote in unquoted value');
  return expandReferences(word, defined);
}

function assertTrailingComment(rest: string): void {
  const trimmed = rest.trim();
  if (trimmed !== '' && !trimmed.startsWith('#')) {
    throw new ParseFailure(`unexpected text after quoted value: "${trimmed}"`);
  }
}

/** Substitute references to earlier keys; unknown names expand to empty, as in a shell. */
function expandReferences(value: string, defined: ReadonlyMap<string, string>): string {
  return value.replace(REFERENCE_PATTERN, (_match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    return defined.get(name) ?? '';
  });
}
