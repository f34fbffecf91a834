import type { Expr, FunctionDef, Prototype } from './types.js';

/** Name given to the prototype synthesized around a top-level expression. */
export const ANON_FUNCTION_NAME = '__anon_func__';

export const num = (v: number): Expr => ({ t: 'num', v });
export const variable = (name: string): Expr => ({ t: 'var', name });
export const binary = (op: string, left: Expr, right: Expr): Expr => ({ t: 'binary', op, left, right });
export const call = (callee: string, args: readonly Expr[]): Expr => ({ t: 'call', callee, args });
export const proto = (name: string, params: readonly string[]): Prototype => ({ t: 'proto', name, params });
export const func = (p: Prototype, body: Expr): FunctionDef => ({ t: 'func', proto: p, body });

export const isAnonymous = (f: FunctionDef): boolean => f.proto.name === ANON_FUNCTION_NAME;
