/**
 * Tokenizer - Python source text to a flat token stream.
 *
 * Emits the logical-line structure the parser relies on:
 *   NEWLINE at the end of each logical line (never inside brackets or
 *   after a backslash continuation), INDENT/DEDENT around blocks,
 *   ENDMARKER once at the end. Blank and comment-only lines produce nothing.
 */
import { PythonSyntaxError } from './errors.js';

export type TokenType = 'NAME' | 'NUMBER' | 'STRING' | 'OP' | 'NEWLINE' | 'INDENT' | 'DEDENT' | 'ENDMARKER';

export interface Token {
  readonly type: TokenType;
  /** Source text; for STRING the literal including prefix and quotes */
  readonly value: string;
  readonly line: number;
  readonly column: number;
}

// ─── Lexical tables ──────────────────────────────────────────────────

const OPERATORS = [
  '**=', '//=', '>>=', '<<=', '...',
  '->', ':=', '**', '//', '>>', '<<', '<=', '>=', '==', '!=',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '@=',
  '+', '-', '*', '/', '%', '@', '&', '|', '^', '~', '<', '>',
  '(', ')', '[', ']', '{', '}', ',', ':', ';', '.', '=',
];

const OPENING = new Set(['(', '[', '{']);
const CLOSING = new Set([')', ']', '}']);

const STRING_PREFIXES = new Set(['r', 'u', 'b', 'f', 'br', 'rb', 'fr', 'rf']);

const NAME_START = /[\p{L}\p{Nl}_]/u;
const NAME_PART = /[\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]/u;
const NUMBER = /0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?/y;

const TAB_SIZE = 8;

// ─── Tokenizer ───────────────────────────────────────────────────────

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const indents: number[] = [0];
  const text = source.replace(/\r\n?/g, '\n');

  let pos = 0;
  let line = 1;
  let lineStart = 0;
  let depth = 0;
  let atLineStart = true;

  const column = (): number => pos - lineStart;
  const push = (type: TokenType, value: string, tokLine: number, tokColumn: number): void => {
    tokens.push({ type, value, line: tokLine, column: tokColumn });
  };

  while (pos < text.length) {
    if (atLineStart && depth === 0) {
      // Measure indentation of the next physical line
      let width = 0;
      let scan = pos;
      while (scan < text.length && (text[scan] === ' ' || text[scan] === '\t' || text[scan] === '\f')) {
        width = text[scan] === '\t' ? (Math.floor(width / TAB_SIZE) + 1) * TAB_SIZE : width + 1;
        scan++;
      }
      const next = text[scan];
      if (next === '\n' || next === '#' || scan >= text.length) {
        // Blank or comment-only line
        const eol = text.indexOf('\n', scan);
        if (eol === -1) {
          pos = text.length;
          break;
        }
        pos = eol + 1;
        line++;
        lineStart = pos;
        continue;
      }
      pos = scan;
      atLineStart = false;

      const current = indents[indents.length - 1];
      if (width > current) {
        indents.push(width);
        push('INDENT', '', line, 0);
      } else if (width < current) {
        while (indents.length > 1 && width < indents[indents.length - 1]) {
          indents.pop();
          push('DEDENT', '', line, column());
        }
        if (width !== indents[indents.length - 1]) {
          throw new PythonSyntaxError('unindent does not match any outer indentation level', line, column());
        }
      }
      continue;
    }

    const ch = text[pos];

    if (ch === ' ' || ch === '\t' || ch === '\f') {
      pos++;
      continue;
    }

    if (ch === '#') {
      const eol = text.indexOf('\n', pos);
      pos = eol === -1 ? text.length : eol;
      continue;
    }

    if (ch === '\\' && text[pos + 1] === '\n') {
      pos += 2;
      line++;
      lineStart = pos;
      continue;
    }

    if (ch === '\n') {
      if (depth === 0) {
        push('NEWLINE', '\n', line, column());
        atLineStart = true;
      }
      pos++;
      line++;
      lineStart = pos;
      continue;
    }

    const startLine = line;
    const startColumn = column();

    if (NAME_START.test(ch)) {
      let end = pos + 1;
      while (end < text.length && NAME_PART.test(text[end])) end++;
      const word = text.slice(pos, end);
      const quote = text[end];
      if ((quote === '"' || quote === "'") && STRING_PREFIXES.has(word.toLowerCase())) {
        const scanned = scanString(text, end, startLine, startColumn);
        push('STRING', text.slice(pos, scanned.end), startLine, startColumn);
        line += scanned.newlines;
        if (scanned.newlines > 0) lineStart = scanned.lastLineStart;
        pos = scanned.end;
        continue;
      }
      push('NAME', word, startLine, startColumn);
      pos = end;
      continue;
    }

    if (isDigit(ch) || (ch === '.' && isDigit(text[pos + 1]))) {
      NUMBER.lastIndex = pos;
      const match = NUMBER.exec(text);
      if (!match) {
        throw new PythonSyntaxError('invalid number literal', startLine, startColumn);
      }
      push('NUMBER', match[0], startLine, startColumn);
      pos += match[0].length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const scanned = scanString(text, pos, startLine, startColumn);
      push('STRING', text.slice(pos, scanned.end), startLine, startColumn);
      line += scanned.newlines;
      if (scanned.newlines > 0) lineStart = scanned.lastLineStart;
      pos = scanned.end;
      continue;
    }

    const op = OPERATORS.find(candidate => text.startsWith(candidate, pos));
    if (!op) {
      throw new PythonSyntaxError(`invalid character '${ch}'`, startLine, startColumn);
    }
    if (OPENING.has(op)) depth++;
    if (CLOSING.has(op)) {
      if (depth === 0) {
        throw new PythonSyntaxError(`unmatched '${op}'`, startLine, startColumn);
      }
      depth--;
    }
    push('OP', op, startLine, startColumn);
    pos += op.length;
  }

  if (depth > 0) {
    throw new PythonSyntaxError('unexpected EOF: unclosed bracket', line, column());
  }

  const last = tokens[tokens.length - 1];
  if (last && last.type !== 'NEWLINE' && last.type !== 'DEDENT') {
    push('NEWLINE', '', line, column());
  }
  while (indents.length > 1) {
    indents.pop();
    push('DEDENT', '', line, 0);
  }
  push('ENDMARKER', '', line, 0);
  return tokens;
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

interface ScannedString {
  end: number;
  newlines: number;
  lastLineStart: number;
}

function scanString(text: string, start: number, line: number, column: number): ScannedString {
  const quote = text[start];
  const triple = text.startsWith(quote.repeat(3), start);
  const delimiter = triple ? quote.repeat(3) : quote;
  let pos = start + delimiter.length;
  let newlines = 0;
  let lastLineStart = 0;

  while (pos < text.length) {
    const ch = text[pos];
    if (ch === '\\') {
      // Even raw strings cannot end on an escaped quote
      if (text[pos + 1] === '\n') {
        newlines++;
        lastLineStart = pos + 2;
      }
      pos += 2;
      continue;
    }
    if (ch === '\n') {
      if (!triple) {
        throw new PythonSyntaxError('unterminated string literal', line, column);
      }
      newlines++;
      lastLineStart = pos + 1;
      pos++;
      continue;
    }
    if (text.startsWith(delimiter, pos)) {
      return { end: pos + delimiter.length, newlines, lastLineStart };
    }
    pos++;
  }
  throw new PythonSyntaxError(
    triple ? 'unterminated triple-quoted string literal' : 'unterminated string literal',
    line,
    column,
  );
}
