import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { run } from "./run.js";

process.exitCode = run(process.argv.slice(2), {
  readFile: (path) => readFileSync(path === "-" ? 0 : resolve(process.cwd(), path), "utf8"),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
});
