import { err, ok, type Result } from '../result.js';
import type { Token } from './types.js';

/** Binding power of anything that is not a binary operator. */
export const NO_PRECEDENCE = -1;

// Characters the parser gives structural meaning to.
const RESERVED = new Set(['(', ')', ',', ';', '#']);

/**
 * Operator character to binding power. Only `createPrecedenceTable` and
 * `DEFAULT_PRECEDENCE` produce one, so a parser never sees an unchecked table.
 */
export class PrecedenceTable {
  private constructor(private readonly ops: ReadonlyMap<string, number>) {}

  static readonly DEFAULT = new PrecedenceTable(
    new Map([
      ['<', 10],
      ['>', 10],
      ['+', 20],
      ['-', 20],
      ['*', 40],
      ['/', 40],
    ]),
  );

  static from(entries: Record<string, number>): Result<PrecedenceTable> {
    const pairs = Object.entries(entries);
    if (pairs.length === 0) return err('invalid_precedence', 'Precedence table must define at least one operator');

    const ops = new Map<string, number>();
    for (const [op, prec] of pairs) {
      if (Array.from(op).length !== 1)
        return err('invalid_precedence', `Operator '${op}' must be a single character`);
      if (RESERVED.has(op) || /^[A-Za-z0-9.\s]$/.test(op))
        return err('invalid_precedence', `Character '${op}' cannot be used as an operator`);
      if (!Number.isInteger(prec) || prec < 0)
        return err('invalid_precedence', `Precedence of '${op}' must be a non-negative integer`);
      ops.set(op, prec);
    }
    return ok(new PrecedenceTable(ops));
  }

  get(op: string): number | undefined {
    return this.ops.get(op);
  }

  get size(): number {
    return this.ops.size;
  }

  entries(): Iterable<[string, number]> {
    return this.ops.entries();
  }
}

export const DEFAULT_PRECEDENCE = PrecedenceTable.DEFAULT;

export const precedenceOf = (table: PrecedenceTable, t: Token): number =>
  t.k === 'char' ? table.get(t.v) ?? NO_PRECEDENCE : NO_PRECEDENCE;

export const createPrecedenceTable = (entries: Record<string, number>): Result<PrecedenceTable> =>
  PrecedenceTable.from(entries);

export const tableToRecord = (table: PrecedenceTable): Record<string, number> =>
  Object.fromEntries(table.entries());
