import { z } from "zod";

export const DEFAULT_AMBIENT_NAMES = [
  "In",
  "Out",
  "get_ipython",
  "display",
  "exit",
  "quit",
  "_",
  "__",
  "___",
];

export const DEFAULT_AMBIENT_PATTERNS = ["_i*", "_[0-9]*", "_oh", "_dh"];

export const DEFAULT_DIRECTIVE_PREFIXES = ["%", "!", "?"];

const ExecutionSchema = z
  .object({
    python: z.string().min(1).default("python3"),
    timeout_seconds: z.number().positive().default(300),
  })
  .strict();

const LockSchema = z
  .object({
    retries: z.number().int().nonnegative().default(400),
    retry_delay_ms: z.number().int().positive().default(25),
    stale_after_ms: z.number().int().positive().default(30_000),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    ambient_names: z.array(z.string().min(1)).default(DEFAULT_AMBIENT_NAMES),
    ambient_patterns: z.array(z.string().min(1)).default(DEFAULT_AMBIENT_PATTERNS),
    extra_builtins: z.array(z.string().min(1)).default([]),
    directive_prefixes: z.array(z.string().min(1)).default(DEFAULT_DIRECTIVE_PREFIXES),
    ledger_path: z.string().min(1).optional(),
    execution: ExecutionSchema.default({}),
    lock: LockSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}
