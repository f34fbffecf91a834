// Core contracts shared by the lexer, parser and driver

export interface Position {
  offset: number;
  line: number;
  column: number;
}

export type DiagnosticCode =
  | "syntax_error"
  | "duplicate_param"
  | "unimplemented"
  | "invalid_precedence";

export interface Diagnostic {
  code: DiagnosticCode;
  msg: string;
  pos?: Position;
  level: "info" | "warn" | "error";
}

export type DiagnosticSink = (d: Diagnostic) => void;

export const formatDiagnostic = (d: Diagnostic): string =>
  d.pos ? `Error: ${d.msg} (line ${d.pos.line}, column ${d.pos.column})` : `Error: ${d.msg}`;

/**
 * Default sink: one line per diagnostic on stderr
 */
export const consoleSink: DiagnosticSink = (d) => {
  console.error(formatDiagnostic(d));
};

export const silentSink: DiagnosticSink = () => {};
