import fs from "node:fs";

import { z } from "zod";

import { packageAssetPath } from "../core/package-root.js";

const BuiltinsFileSchema = z.object({
  names: z.array(z.string().min(1)),
});

let cachedBuiltins: ReadonlySet<string> | null = null;

// Names of Python's `builtins` module, read once from data/python-builtins.json.
export function defaultBuiltins(): ReadonlySet<string> {
  if (cachedBuiltins) return cachedBuiltins;

  const filePath = packageAssetPath("data", "python-builtins.json");
  const parsed = BuiltinsFileSchema.parse(JSON.parse(fs.readFileSync(filePath, "utf8")));
  cachedBuiltins = new Set(parsed.names);
  return cachedBuiltins;
}

export function buildBuiltinSet(extra: readonly string[] = []): ReadonlySet<string> {
  if (extra.length === 0) return defaultBuiltins();
  return new Set([...defaultBuiltins(), ...extra]);
}
