import {
  describeToken,
  parseProgram,
  show,
  tokenize,
  type Diagnostic,
  type Token
} from "@pebble/runtime";

export interface CliIO {
  /** Reads a path; "-" means stdin */
  readFile: (path: string) => string;
  out: (line: string) => void;
  err: (line: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_DIAGNOSTICS = 1;
export const EXIT_USAGE = 2;

const COMMANDS = new Set(["tokens", "parse", "check"]);

function usage(print: (line: string) => void) {
  print("pebble <command> <file|-> [--format json|sexpr]");
  print("commands: tokens | parse | check");
}

export function formatToken(t: Token): string {
  return `${t.pos.line}:${t.pos.column}\t${describeToken(t)}`;
}

export function formatCliDiagnostic(d: Diagnostic): string {
  return d.pos ? `error[${d.code}] ${d.pos.line}:${d.pos.column}: ${d.msg}` : `error[${d.code}]: ${d.msg}`;
}

export function run(argv: string[], io: CliIO): number {
  const [cmd, file, ...rest] = argv;
  if (!cmd || !file || !COMMANDS.has(cmd)) {
    usage(io.err);
    return EXIT_USAGE;
  }
  const args = new Map<string, string>();
  for (let i = 0; i < rest.length; i += 2) args.set(rest[i], rest[i + 1] ?? "");

  const format = args.get("--format") ?? "json";
  if (format !== "json" && format !== "sexpr") {
    io.err(`unknown format: ${format}`);
    return EXIT_USAGE;
  }

  let source: string;
  try {
    source = io.readFile(file);
  } catch (e) {
    io.err(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
    return EXIT_USAGE;
  }

  if (cmd === "tokens") {
    for (const t of tokenize(source)) io.out(formatToken(t));
    return EXIT_OK;
  }

  // parse | check
  const { items, diagnostics } = parseProgram(source, {
    sink: (d) => io.err(formatCliDiagnostic(d))
  });
  if (cmd === "parse") {
    if (format === "sexpr") {
      for (const f of items) io.out(show(f));
    } else {
      io.out(JSON.stringify(items, null, 2));
    }
  }
  return diagnostics.length > 0 ? EXIT_DIAGNOSTICS : EXIT_OK;
}
