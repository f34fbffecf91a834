import type { ZodIssue } from "zod";
import { randomUUID } from "crypto";
import {
  DEFAULT_PRECEDENCE,
  NUMBER_OUT_OF_RANGE,
  createPrecedenceTable,
  isErr,
  parseProgram,
  show,
  silentSink,
  toDiagnostic,
  tokenize as lex,
  type Diagnostic
} from "@pebble/runtime";
import {
  DEFAULT_MAX_SOURCE_LENGTH,
  HandlerOutput,
  ParseInput,
  TokenizeInput,
  sourceOf,
  type DiagnosticT,
  type HandlerOutputT
} from "./schema.js";

/**
 * Options for handler execution
 */
export interface HandlerOptions {
  reqId?: string;
  maxSourceLength?: number;
}

/**
 * Runtime diagnostic → wire diagnostic
 */
export function toWireDiagnostic(d: Diagnostic): DiagnosticT {
  return {
    code: d.code,
    message: d.msg,
    line: d.pos?.line,
    column: d.pos?.column,
    severity: d.level === "warn" ? "warning" : d.level
  };
}

const formatIssues = (issues: ZodIssue[]): string =>
  issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "input"}: ${i.message}`).join("; ");

const failure = (code: string, message: string, started: number): HandlerOutputT => ({
  value: null,
  diagnostics: [{ code, message, severity: "error" }],
  perf: { durationMs: Date.now() - started }
});

/**
 * Core tokenize handler - transport-agnostic
 *
 * Rules:
 * - Never throws; always returns diagnostics
 * - Logs audit trail
 */
export function tokenize(input: unknown, opts?: HandlerOptions): HandlerOutputT {
  const reqId = opts?.reqId ?? randomUUID();
  const started = Date.now();

  const parsed = TokenizeInput.extend({
    source: sourceOf(opts?.maxSourceLength ?? DEFAULT_MAX_SOURCE_LENGTH)
  }).safeParse(input);
  if (!parsed.success) {
    return audited(reqId, "tokenize", failure("schema_error", formatIssues(parsed.error.issues), started));
  }

  try {
    const tokens = lex(parsed.data.source);
    // JSON carries a non-finite value as null
    const diagnostics = tokens.flatMap((t): DiagnosticT[] =>
      t.k === "num" && !Number.isFinite(t.v)
        ? [{ code: "syntax_error", message: NUMBER_OUT_OF_RANGE, line: t.pos.line, column: t.pos.column, severity: "warning" }]
        : []
    );
    const output = HandlerOutput.parse({
      value: tokens,
      diagnostics,
      perf: { durationMs: Date.now() - started }
    });
    return audited(reqId, "tokenize", output);
  } catch (error) {
    return audited(reqId, "tokenize", failure("internal", error instanceof Error ? error.message : String(error), started));
  }
}

/**
 * Core parse handler - transport-agnostic
 *
 * Rules:
 * - Never throws; always returns diagnostics
 * - Syntax errors do not stop the parse: every unit that parses is returned
 * - Logs audit trail
 */
export function parse(input: unknown, opts?: HandlerOptions): HandlerOutputT {
  const reqId = opts?.reqId ?? randomUUID();
  const started = Date.now();

  const parsed = ParseInput.extend({
    source: sourceOf(opts?.maxSourceLength ?? DEFAULT_MAX_SOURCE_LENGTH)
  }).safeParse(input);
  if (!parsed.success) {
    return audited(reqId, "parse", failure("schema_error", formatIssues(parsed.error.issues), started));
  }

  const { source, options } = parsed.data;

  let precedence = DEFAULT_PRECEDENCE;
  if (options?.precedence) {
    const table = createPrecedenceTable(options.precedence);
    if (isErr(table)) {
      return audited(reqId, "parse", {
        value: null,
        diagnostics: [toWireDiagnostic(toDiagnostic(table))],
        perf: { durationMs: Date.now() - started }
      });
    }
    precedence = table.v;
  }

  try {
    const program = parseProgram(source, {
      precedence,
      allowDuplicateParams: options?.allowDuplicateParams,
      sink: silentSink
    });

    const output = HandlerOutput.parse({
      value: options?.format === "sexpr" ? program.items.map(show) : program.items,
      diagnostics: program.diagnostics.map(toWireDiagnostic),
      perf: { durationMs: Date.now() - started }
    });
    return audited(reqId, "parse", output);
  } catch (error) {
    return audited(reqId, "parse", failure("internal", error instanceof Error ? error.message : String(error), started));
  }
}

/**
 * Count diagnostics by severity
 */
export function countDiagnostics(diagnostics: DiagnosticT[]): Record<string, number> {
  const counts: Record<string, number> = { error: 0, warning: 0, info: 0 };
  for (const diag of diagnostics) {
    counts[diag.severity] = (counts[diag.severity] ?? 0) + 1;
  }
  return counts;
}

// Every return path goes through here
function audited(reqId: string, tool: string, out: HandlerOutputT): HandlerOutputT {
  logAudit({ reqId, tool, durationMs: out.perf?.durationMs ?? 0, diagCounts: countDiagnostics(out.diagnostics) });
  return out;
}

/**
 * Audit log (stderr, one JSON line per call)
 */
function logAudit(entry: {
  reqId: string;
  tool: string;
  durationMs: number;
  diagCounts: Record<string, number>;
}) {
  const log = {
    ts: new Date().toISOString(),
    ...entry
  };
  console.error(`[AUDIT] ${JSON.stringify(log)}`);
}
