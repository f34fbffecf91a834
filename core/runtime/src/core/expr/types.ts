import type { Position } from '../types.js';

export type Token =
  | { k: 'eof'; pos: Position }
  | { k: 'func'; pos: Position }
  | { k: 'import'; pos: Position }
  | { k: 'id'; v: string; pos: Position }
  | { k: 'num'; v: number; pos: Position }
  | { k: 'char'; v: string; pos: Position };

export type TokenKind = Token['k'];

export type Expr =
  | { readonly t: 'num'; readonly v: number }
  | { readonly t: 'binary'; readonly op: string; readonly left: Expr; readonly right: Expr }
  | { readonly t: 'var'; readonly name: string }
  | { readonly t: 'call'; readonly callee: string; readonly args: readonly Expr[] };

export interface Prototype {
  readonly t: 'proto';
  readonly name: string;
  readonly params: readonly string[];
}

export interface FunctionDef {
  readonly t: 'func';
  readonly proto: Prototype;
  readonly body: Expr;
}

export type Node = Expr | Prototype | FunctionDef;
