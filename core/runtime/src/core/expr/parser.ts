import { err, isErr, ok, type Err, type Result } from '../result.js';
import { ANON_FUNCTION_NAME, binary, call, func, num, proto, variable } from './ast.js';
import { describeToken, Lexer, NUMBER_OUT_OF_RANGE } from './lexer.js';
import { DEFAULT_PRECEDENCE, precedenceOf, type PrecedenceTable } from './precedence.js';
import type { Expr, FunctionDef, Prototype, Token } from './types.js';

export interface ParserOptions {
  precedence?: PrecedenceTable;
  /** Accept prototypes such as `func f(a, a)`. Default: false */
  allowDuplicateParams?: boolean;
  /** Deepest expression nesting accepted, counting parentheses, call arguments and operator chains. Default: 512 */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 512;

/**
 * Recursive-descent parser with precedence climbing for binary operators.
 * Every operation returns a Result; a failure leaves the current token where
 * parsing stopped.
 */
export class Parser {
  private cur: Token;
  private readonly table: PrecedenceTable;
  private readonly allowDuplicateParams: boolean;
  private readonly maxDepth: number;
  private depth = 0;
  // tree height of every node built by this parser; leaves are 1
  private readonly heights = new WeakMap<Expr, number>();

  constructor(private readonly lexer: Lexer, opts: ParserOptions = {}) {
    this.table = opts.precedence ?? DEFAULT_PRECEDENCE;
    this.allowDuplicateParams = opts.allowDuplicateParams ?? false;
    this.maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.cur = lexer.nextToken();
  }

  get current(): Token {
    return this.cur;
  }

  advance(): Token {
    this.cur = this.lexer.nextToken();
    return this.cur;
  }

  private isChar(c: string): boolean {
    return this.cur.k === 'char' && this.cur.v === c;
  }

  private expected(what: string): Err {
    return err('syntax_error', `Expected ${what} but found ${describeToken(this.cur)}`, this.cur.pos);
  }

  private tooDeep(): Err {
    return err('syntax_error', 'Expression nested too deeply', this.cur.pos);
  }

  private withHeight(node: Expr, children: readonly Expr[]): Result<Expr> {
    const h = 1 + children.reduce((max, c) => Math.max(max, this.heights.get(c) ?? 1), 0);
    if (h > this.maxDepth) return this.tooDeep();
    this.heights.set(node, h);
    return ok(node);
  }

  parseExpression(): Result<Expr> {
    if (this.depth >= this.maxDepth) return this.tooDeep();
    this.depth++;
    const lhs = this.parsePrimary();
    const r = isErr(lhs) ? lhs : this.parseBinOpRhs(0, lhs.v);
    this.depth--;
    return r;
  }

  parsePrimary(): Result<Expr> {
    const t = this.cur;
    if (t.k === 'num') {
      if (!Number.isFinite(t.v)) return err('syntax_error', NUMBER_OUT_OF_RANGE, t.pos);
      this.advance();
      return ok(num(t.v));
    }
    if (t.k === 'id') return this.parseIdentifier(t.v);
    if (t.k === 'char' && t.v === '(') return this.parseParen();
    return this.expected('an expression');
  }

  private parseIdentifier(name: string): Result<Expr> {
    this.advance(); // identifier
    if (!this.isChar('(')) return ok(variable(name));
    this.advance(); // (

    const args: Expr[] = [];
    if (!this.isChar(')')) {
      for (;;) {
        const arg = this.parseExpression();
        if (isErr(arg)) return arg;
        args.push(arg.v);
        if (this.isChar(')')) break;
        if (!this.isChar(',')) return this.expected("')' or ',' in argument list");
        this.advance(); // ,
      }
    }
    this.advance(); // )
    return this.withHeight(call(name, args), args);
  }

  private parseParen(): Result<Expr> {
    this.advance(); // (
    const inner = this.parseExpression();
    if (isErr(inner)) return inner;
    if (!this.isChar(')')) return this.expected("')'");
    this.advance();
    return inner;
  }

  parseBinOpRhs(minPrec: number, left: Expr): Result<Expr> {
    let lhs = left;
    for (;;) {
      const t = this.cur;
      const tokPrec = precedenceOf(this.table, t);
      if (tokPrec < minPrec || t.k !== 'char') return ok(lhs);
      this.advance(); // operator

      let rhs = this.parsePrimary();
      if (isErr(rhs)) return rhs;

      // the next operator binds tighter: it takes rhs as its left operand
      const nextPrec = precedenceOf(this.table, this.cur);
      if (tokPrec < nextPrec) {
        rhs = this.parseBinOpRhs(tokPrec + 1, rhs.v);
        if (isErr(rhs)) return rhs;
      }

      const node = this.withHeight(binary(t.v, lhs, rhs.v), [lhs, rhs.v]);
      if (isErr(node)) return node;
      lhs = node.v;
    }
  }

  /** Expects `func` to have been consumed already. */
  parsePrototype(): Result<Prototype> {
    const nameTok = this.cur;
    if (nameTok.k !== 'id') return this.expected('function name in prototype');
    const name = nameTok.v;
    this.advance();

    if (!this.isChar('(')) return this.expected("'(' in prototype");
    this.advance();

    const params: string[] = [];
    for (;;) {
      const t = this.cur;
      if (t.k !== 'id') return this.expected('parameter name in prototype');
      if (!this.allowDuplicateParams && params.includes(t.v))
        return err('duplicate_param', `Duplicate parameter '${t.v}' in prototype '${name}'`, t.pos);
      params.push(t.v);
      this.advance();
      if (!this.isChar(',')) break;
      this.advance(); // ,
    }

    if (!this.isChar(')')) return this.expected("')' in prototype");
    this.advance();
    return ok(proto(name, params));
  }

  parseDefinition(): Result<FunctionDef> {
    if (this.cur.k !== 'func') return this.expected("'func'");
    this.advance();
    const p = this.parsePrototype();
    if (isErr(p)) return p;
    const body = this.parseExpression();
    if (isErr(body)) return body;
    return ok(func(p.v, body.v));
  }

  parseTopLevelExpression(): Result<FunctionDef> {
    const body = this.parseExpression();
    if (isErr(body)) return body;
    return ok(func(proto(ANON_FUNCTION_NAME, []), body.v));
  }

  // TODO: hand off to a module resolver once the language defines import syntax
  parseImport(): Result<never> {
    return err('unimplemented', 'Import not implemented', this.cur.pos);
  }
}

/**
 * Parse a single expression that must span the whole input.
 */
export function parseExpr(input: string, opts?: ParserOptions): Result<Expr> {
  const parser = new Parser(new Lexer(input), opts);
  const expr = parser.parseExpression();
  if (isErr(expr)) return expr;
  const t = parser.current;
  if (t.k !== 'eof') return err('syntax_error', `Expected end of input but found ${describeToken(t)}`, t.pos);
  return expr;
}
