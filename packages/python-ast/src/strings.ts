/**
 * String literal decoding.
 *
 * f-strings are kept as their raw template text: replacement fields are
 * never parsed, the literal only ever counts as a `str` constant.
 */
import { PythonSyntaxError } from './errors.js';
import type { Token } from './tokenizer.js';

export interface DecodedString {
  type: 'str' | 'bytes';
  value: string;
  formatted: boolean;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  '\n': '',
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

export function decodeString(token: Token): DecodedString {
  const literal = token.value;
  const quoteIndex = literal.search(/['"]/);
  const prefix = literal.slice(0, quoteIndex).toLowerCase();
  const quote = literal[quoteIndex];
  const delimiter = literal.startsWith(quote.repeat(3), quoteIndex) ? quote.repeat(3) : quote;
  const body = literal.slice(quoteIndex + delimiter.length, literal.length - delimiter.length);

  const raw = prefix.includes('r');
  const formatted = prefix.includes('f');
  return {
    type: prefix.includes('b') ? 'bytes' : 'str',
    value: raw || formatted ? body : unescape(body, token),
    formatted,
  };
}

function unescape(body: string, token: Token): string {
  let out = '';
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch !== '\\' || i + 1 >= body.length) {
      out += ch;
      i++;
      continue;
    }
    const next = body[i + 1];
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }
    if (next === 'x' || next === 'u' || next === 'U') {
      const width = next === 'x' ? 2 : next === 'u' ? 4 : 8;
      const hex = body.slice(i + 2, i + 2 + width);
      if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length !== width) {
        throw new PythonSyntaxError(`truncated \\${next} escape`, token.line, token.column);
      }
      out += String.fromCodePoint(parseInt(hex, 16));
      i += 2 + width;
      continue;
    }
    if (next >= '0' && next <= '7') {
      const octal = /^[0-7]{1,3}/.exec(body.slice(i + 1));
      const digits = octal ? octal[0] : next;
      out += String.fromCodePoint(parseInt(digits, 8));
      i += 1 + digits.length;
      continue;
    }
    // Unknown escapes (and \N{...}) stay as written
    out += ch;
    i++;
  }
  return out;
}
