import { z } from "zod";

export const DEFAULT_MAX_SOURCE_LENGTH = 100_000;

/**
 * Source text accepted by every handler
 */
export const sourceOf = (maxLength: number) =>
  z.string().max(maxLength, `Source exceeds ${maxLength} characters`);

export const Source = sourceOf(DEFAULT_MAX_SOURCE_LENGTH);

/**
 * Parse options
 */
export const ParseOptions = z.object({
  precedence: z.record(z.number().int().nonnegative()).optional(),
  allowDuplicateParams: z.boolean().optional(),
  format: z.enum(["json", "sexpr"]).optional()
});

/**
 * Input for tokenize requests
 */
export const TokenizeInput = z.object({
  source: Source
});

/**
 * Input for parse requests
 */
export const ParseInput = z.object({
  source: Source,
  options: ParseOptions.optional()
});

/**
 * Diagnostic information for tokenize/parse
 */
export const Diagnostic = z.object({
  code: z.string(),
  message: z.string(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  severity: z.enum(["error", "warning", "info"])
});

/**
 * Output from tokenize/parse
 */
export const HandlerOutput = z.object({
  value: z.unknown(),
  diagnostics: z.array(Diagnostic),
  perf: z.object({ durationMs: z.number() }).optional()
});

// Type exports
export type TokenizeInputT = z.infer<typeof TokenizeInput>;
export type ParseInputT = z.infer<typeof ParseInput>;
export type ParseOptionsT = z.infer<typeof ParseOptions>;
export type DiagnosticT = z.infer<typeof Diagnostic>;
export type HandlerOutputT = z.infer<typeof HandlerOutput>;
