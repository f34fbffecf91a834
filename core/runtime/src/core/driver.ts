import { Lexer } from "./expr/lexer.js";
import { Parser, type ParserOptions } from "./expr/parser.js";
import type { FunctionDef } from "./expr/types.js";
import { isErr, isOk, toDiagnostic, type Result } from "./result.js";
import { consoleSink, type Diagnostic, type DiagnosticSink } from "./types.js";

export interface DriverOptions extends ParserOptions {
  /** Receives one diagnostic per failed unit. Default: consoleSink */
  sink?: DiagnosticSink;
}

export interface Program {
  items: FunctionDef[];
  diagnostics: Diagnostic[];
}

/**
 * Top-level loop: definitions, imports, `;` separators and bare expressions.
 * A failed unit is reported, then exactly one token is skipped before the
 * next attempt, so the loop always reaches end of input.
 */
export class Driver {
  private readonly parser: Parser;
  private readonly sink: DiagnosticSink;

  constructor(source: string, opts: DriverOptions = {}) {
    this.parser = new Parser(new Lexer(source), opts);
    this.sink = opts.sink ?? consoleSink;
  }

  *units(): Generator<Result<FunctionDef>, void, undefined> {
    for (;;) {
      const t = this.parser.current;
      if (t.k === "eof") return;
      if (t.k === "char" && t.v === ";") {
        this.parser.advance();
        continue;
      }

      const r: Result<FunctionDef> =
        t.k === "func"
          ? this.parser.parseDefinition()
          : t.k === "import"
            ? this.parser.parseImport()
            : this.parser.parseTopLevelExpression();

      if (isErr(r)) {
        this.sink(toDiagnostic(r));
        this.parser.advance();
      }
      yield r;
    }
  }
}

export function parseProgram(source: string, opts: DriverOptions = {}): Program {
  const diagnostics: Diagnostic[] = [];
  const sink = opts.sink ?? consoleSink;
  const driver = new Driver(source, {
    ...opts,
    sink: (d) => {
      diagnostics.push(d);
      sink(d);
    },
  });

  const items: FunctionDef[] = [];
  for (const r of driver.units()) {
    if (isOk(r)) items.push(r.v);
  }
  return { items, diagnostics };
}
