import type { Position } from '../types.js';
import type { Token } from './types.js';

const EOF = '';

export const NUMBER_OUT_OF_RANGE = 'Number literal is out of range';

const isSpace = (c: string) => /^[ \t\n\v\f\r]$/.test(c);
const isAlpha = (c: string) => /^[A-Za-z]$/.test(c);
const isAlnum = (c: string) => /^[A-Za-z0-9]$/.test(c);
const isNumChar = (c: string) => /^[0-9.]$/.test(c);

// Longest leading decimal prefix; a run with none ("." or "..") reads as 0.
// A run too long for a double reads as Infinity; the parser rejects it.
export const toNumber = (s: string): number => {
  const v = parseFloat(s);
  return Number.isNaN(v) ? 0 : v;
};

/**
 * Pull-based tokenizer. Holds one look-ahead character between calls, so each
 * instance belongs to a single parse.
 */
export class Lexer {
  private readonly chars: string[];
  private cursor = 0;
  private offset = 0;
  private line = 1;
  private column = 1;
  private last = ' ';
  private lastPos: Position = { offset: 0, line: 1, column: 1 };

  constructor(source: string) {
    this.chars = Array.from(source);
  }

  private read(): void {
    const c = this.chars[this.cursor] ?? EOF;
    this.lastPos = { offset: this.offset, line: this.line, column: this.column };
    this.last = c;
    if (c === EOF) return;
    this.cursor++;
    this.offset += c.length;
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
  }

  nextToken(): Token {
    for (;;) {
      while (isSpace(this.last)) this.read();
      const pos = this.lastPos;

      if (isAlpha(this.last)) {
        let s = '';
        do {
          s += this.last;
          this.read();
        } while (isAlnum(this.last));
        if (s === 'func') return { k: 'func', pos };
        if (s === 'import') return { k: 'import', pos };
        return { k: 'id', v: s, pos };
      }

      if (isNumChar(this.last)) {
        let s = '';
        do {
          s += this.last;
          this.read();
        } while (isNumChar(this.last));
        return { k: 'num', v: toNumber(s), pos };
      }

      if (this.last === '#') {
        // line comment
        do this.read();
        while (this.last !== '\n' && this.last !== '\r' && this.last !== EOF);
        continue;
      }

      if (this.last === EOF) return { k: 'eof', pos };

      const c = this.last;
      this.read();
      return { k: 'char', v: c, pos };
    }
  }
}

export function tokenize(source: string): Token[] {
  const lexer = new Lexer(source);
  const tks: Token[] = [];
  for (;;) {
    const t = lexer.nextToken();
    tks.push(t);
    if (t.k === 'eof') return tks;
  }
}

export function describeToken(t: Token): string {
  switch (t.k) {
    case 'eof':
      return 'end of input';
    case 'func':
    case 'import':
      return `'${t.k}'`;
    case 'id':
      return `identifier '${t.v}'`;
    case 'num':
      return `number ${t.v}`;
    case 'char':
      return `'${t.v}'`;
  }
}
