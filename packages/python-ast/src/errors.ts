/**
 * Raised by the tokenizer and parser. Positions follow the tree's
 * convention: 1-based line, 0-based column.
 */
export class PythonSyntaxError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = 'PythonSyntaxError';
    this.line = line;
    this.column = column;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
