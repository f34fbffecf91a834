/**
 * @pebble/runtime - Pebble language front end
 *
 * This package consolidates:
 * - Lexer, precedence table, parser (core/expr)
 * - Top-level driver with one-token resynchronization (core/driver)
 * - Result and diagnostic contracts shared with the service and CLI
 */

export { Lexer, tokenize, describeToken, toNumber, NUMBER_OUT_OF_RANGE } from './core/expr/lexer.js';
export { Parser, parseExpr, DEFAULT_MAX_DEPTH } from './core/expr/parser.js';
export type { ParserOptions } from './core/expr/parser.js';
export {
  DEFAULT_PRECEDENCE,
  NO_PRECEDENCE,
  precedenceOf,
  createPrecedenceTable,
  tableToRecord,
  PrecedenceTable,
} from './core/expr/precedence.js';
export { ANON_FUNCTION_NAME, num, variable, binary, call, proto, func, isAnonymous } from './core/expr/ast.js';
export { show } from './core/expr/print.js';
export type { Token, TokenKind, Expr, Prototype, FunctionDef, Node } from './core/expr/types.js';
export { Driver, parseProgram } from './core/driver.js';
export type { DriverOptions, Program } from './core/driver.js';
export { ok, err, isOk, isErr, map, andThen, unwrapOr, match, toDiagnostic } from './core/result.js';
export type { Ok, Err, Result } from './core/result.js';
export { consoleSink, silentSink, formatDiagnostic } from './core/types.js';
export type { Position, Diagnostic, DiagnosticCode, DiagnosticSink } from './core/types.js';
