// Result runtime used by every parse operation

import type { Diagnostic, DiagnosticCode, Position } from "./types.js";

export type Ok<T> = { t: "ok"; v: T };
export type Err = { t: "err"; code: DiagnosticCode; msg: string; pos?: Position };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(v: T): Ok<T> => ({ t: "ok", v });
export const err = (code: DiagnosticCode, msg: string, pos?: Position): Err => ({ t: "err", code, msg, pos });

export const isOk = <T>(r: Result<T>): r is Ok<T> => r.t === "ok";
export const isErr = <T>(r: Result<T>): r is Err => r.t === "err";

export const map = <A, B>(r: Result<A>, f: (a: A) => B): Result<B> =>
  isOk(r) ? ok(f(r.v)) : r;

export const andThen = <A, B>(r: Result<A>, f: (a: A) => Result<B>): Result<B> =>
  isOk(r) ? f(r.v) : r;

export const unwrapOr = <T>(r: Result<T>, dflt: T): T => (isOk(r) ? r.v : dflt);

export const match = <T, R>(r: Result<T>, arms: { ok: (v: T) => R; err: (e: Err) => R }): R =>
  isOk(r) ? arms.ok(r.v) : arms.err(r);

export const toDiagnostic = (e: Err): Diagnostic => ({
  code: e.code,
  msg: e.msg,
  pos: e.pos,
  level: "error",
});
