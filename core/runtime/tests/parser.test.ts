import { describe, it, expect } from 'vitest';
import {
  Lexer,
  Parser,
  parseExpr,
  createPrecedenceTable,
  show,
  num,
  variable,
  binary,
  call,
  proto,
  func,
  ANON_FUNCTION_NAME,
  isOk,
} from '../src/index.js';
import type { Expr, ParserOptions, Result } from '../src/index.js';

const parser = (src: string, opts?: ParserOptions) => new Parser(new Lexer(src), opts);

const shown = (r: Result<Expr>) => (isOk(r) ? show(r.v) : r);

describe('Parser: expressions', () => {
  it('binds multiplication tighter than addition', () => {
    expect(parseExpr('a + b * c')).toEqual({
      t: 'ok',
      v: binary('+', variable('a'), binary('*', variable('b'), variable('c'))),
    });
  });

  it('lets parentheses override precedence', () => {
    expect(parseExpr('(a + b) * c')).toEqual({
      t: 'ok',
      v: binary('*', binary('+', variable('a'), variable('b')), variable('c')),
    });
  });

  it('groups equal precedence to the left', () => {
    expect(parseExpr('a - b - c')).toEqual({
      t: 'ok',
      v: binary('-', binary('-', variable('a'), variable('b')), variable('c')),
    });
  });

  it('climbs back down after a tighter operator', () => {
    expect(shown(parseExpr('1 + 2 * 3 - 4'))).toBe('(- (+ 1 (* 2 3)) 4)');
    expect(shown(parseExpr('a < b + c'))).toBe('(< a (+ b c))');
    expect(shown(parseExpr('a * b + c * d'))).toBe('(+ (* a b) (* c d))');
  });

  it('unwraps redundant parentheses', () => {
    expect(parseExpr('((a))')).toEqual({ t: 'ok', v: variable('a') });
  });

  it('parses calls with ordered arguments', () => {
    expect(parseExpr('f(a, 1 + 2, g(x))')).toEqual({
      t: 'ok',
      v: call('f', [variable('a'), binary('+', num(1), num(2)), call('g', [variable('x')])]),
    });
    expect(shown(parseExpr('f()'))).toBe('(call f)');
  });

  it('stops at a character missing from the precedence table', () => {
    const p = parser('% b');
    expect(p.parseBinOpRhs(0, num(1))).toEqual({ t: 'ok', v: num(1) });
    expect(p.current).toMatchObject({ k: 'char', v: '%' });
  });

  it('leaves a trailing non-operator for the caller', () => {
    const p = parser('a ; b');
    expect(p.parseExpression()).toEqual({ t: 'ok', v: variable('a') });
    expect(p.current).toMatchObject({ k: 'char', v: ';' });
  });

  it('follows a custom precedence table', () => {
    const table = createPrecedenceTable({ '+': 50, '*': 10, '%': 30 });
    if (!isOk(table)) throw new Error(table.msg);
    expect(shown(parseExpr('a + b * c', { precedence: table.v }))).toBe('(* (+ a b) c)');
    expect(shown(parseExpr('a * b % c', { precedence: table.v }))).toBe('(* a (% b c))');
  });
});

describe('Parser: expression errors', () => {
  it('reports an unterminated parenthesis at end of input', () => {
    expect(parseExpr('(a + b')).toEqual({
      t: 'err',
      code: 'syntax_error',
      msg: "Expected ')' but found end of input",
      pos: { offset: 6, line: 1, column: 7 },
    });
  });

  it('reports a token that cannot start an expression', () => {
    expect(parseExpr('+')).toMatchObject({ t: 'err', msg: "Expected an expression but found '+'" });
    expect(parseExpr('1 +')).toMatchObject({ t: 'err', msg: 'Expected an expression but found end of input' });
  });

  it('reports a malformed argument list', () => {
    expect(parseExpr('f(a b)')).toMatchObject({
      t: 'err',
      msg: "Expected ')' or ',' in argument list but found identifier 'b'",
    });
  });

  it('stops at the nesting limit instead of exhausting the stack', () => {
    const deep = '('.repeat(20000) + '1' + ')'.repeat(20000);
    expect(parseExpr(deep)).toEqual({
      t: 'err',
      code: 'syntax_error',
      msg: 'Expression nested too deeply',
      pos: { offset: 512, line: 1, column: 513 },
    });
  });

  it('counts operator chains and call arguments toward the nesting limit', () => {
    expect(shown(parseExpr('(1 + 2)', { maxDepth: 2 }))).toBe('(+ 1 2)');
    expect(parseExpr('1 + 2 + 3', { maxDepth: 2 })).toEqual({
      t: 'err',
      code: 'syntax_error',
      msg: 'Expression nested too deeply',
      pos: { offset: 9, line: 1, column: 10 },
    });
    expect(parseExpr('f(g(x))', { maxDepth: 2 })).toMatchObject({ t: 'err', msg: 'Expression nested too deeply' });
  });

  it('rejects a number too large for a double', () => {
    expect(parseExpr('9'.repeat(400))).toEqual({
      t: 'err',
      code: 'syntax_error',
      msg: 'Number literal is out of range',
      pos: { offset: 0, line: 1, column: 1 },
    });
  });

  it('rejects trailing tokens in a standalone expression', () => {
    expect(parseExpr('a b')).toEqual({
      t: 'err',
      code: 'syntax_error',
      msg: "Expected end of input but found identifier 'b'",
      pos: { offset: 2, line: 1, column: 3 },
    });
  });
});

describe('Parser: functions', () => {
  it('parses a definition', () => {
    expect(parser('func add(a, b) a + b').parseDefinition()).toEqual({
      t: 'ok',
      v: func(proto('add', ['a', 'b']), binary('+', variable('a'), variable('b'))),
    });
  });

  it('parses a prototype after the keyword', () => {
    const p = parser('func one(x) x');
    p.advance();
    expect(p.parsePrototype()).toEqual({ t: 'ok', v: proto('one', ['x']) });
    expect(p.current).toMatchObject({ k: 'id', v: 'x' });
  });

  it.each([
    ['func f() 1', "Expected parameter name in prototype but found ')'"],
    ['func (a) 1', "Expected function name in prototype but found '('"],
    ['func f a) 1', "Expected '(' in prototype but found identifier 'a'"],
    ['func f(a b) 1', "Expected ')' in prototype but found identifier 'b'"],
    ['func f(a,) 1', "Expected parameter name in prototype but found ')'"],
    ['func f(a)', 'Expected an expression but found end of input'],
  ])('rejects %s', (src, msg) => {
    expect(parser(src).parseDefinition()).toMatchObject({ t: 'err', code: 'syntax_error', msg });
  });

  it('rejects duplicate parameter names', () => {
    expect(parser('func f(a, a) a').parseDefinition()).toEqual({
      t: 'err',
      code: 'duplicate_param',
      msg: "Duplicate parameter 'a' in prototype 'f'",
      pos: { offset: 10, line: 1, column: 11 },
    });
  });

  it('keeps duplicate parameter names when allowed', () => {
    const r = parser('func f(a, a) a', { allowDuplicateParams: true }).parseDefinition();
    expect(r).toEqual({ t: 'ok', v: func(proto('f', ['a', 'a']), variable('a')) });
  });

  it('wraps a top-level expression in an anonymous nullary function', () => {
    expect(parser('1 + 2').parseTopLevelExpression()).toEqual({
      t: 'ok',
      v: func(proto(ANON_FUNCTION_NAME, []), binary('+', num(1), num(2))),
    });
  });

  it('fails every import without consuming it', () => {
    const p = parser('import lib');
    expect(p.parseImport()).toEqual({
      t: 'err',
      code: 'unimplemented',
      msg: 'Import not implemented',
      pos: { offset: 0, line: 1, column: 1 },
    });
    expect(p.current.k).toBe('import');
  });
});
