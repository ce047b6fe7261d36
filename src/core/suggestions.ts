/*
Purpose: "did you mean" candidates for names the executor could not resolve.
Assumptions: candidate lists are small (a session's bound names).
Usage: findSimilarNames("pirnt", ["print", "point"]) -> ["print", "point"].
*/

export type FindSimilarOptions = {
  maxDistance?: number;
  limit?: number;
};

const DEFAULT_LIMIT = 3;

export function levenshteinDistance(a: string, b: string): number {
  if (a.length > b.length) [a, b] = [b, a];
  if (a.length === 0) return b.length;

  let prev = Array.from({ length: a.length + 1 }, (_, j) => j);
  let curr = new Array<number>(a.length + 1).fill(0);

  for (let i = 1; i <= b.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= a.length; j++) {
      const cost = a[j - 1] === b[i - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[a.length];
}

export function findSimilarNames(
  target: string,
  candidates: Iterable<string>,
  options: FindSimilarOptions = {},
): string[] {
  const maxDistance = options.maxDistance ?? Math.max(1, Math.floor(target.length / 3));
  const limit = options.limit ?? DEFAULT_LIMIT;

  const scored: Array<{ name: string; distance: number }> = [];
  for (const name of new Set(candidates)) {
    if (name === target) continue;
    const distance = levenshteinDistance(target, name);
    if (distance <= maxDistance) {
      scored.push({ name, distance });
    }
  }

  scored.sort((x, y) => x.distance - y.distance || x.name.localeCompare(y.name));
  return scored.slice(0, limit).map((entry) => entry.name);
}

// Matches `name 'foo' is not defined` and `free variable 'foo' referenced ...`.
const UNDEFINED_NAME_PATTERN = /(?:name|variable) '([A-Za-z_][A-Za-z0-9_]*)'/;

export function extractUndefinedName(errorKind: string, errorDetail: string): string | null {
  if (errorKind !== "NameError" && errorKind !== "UnboundLocalError") {
    return null;
  }
  const match = UNDEFINED_NAME_PATTERN.exec(errorDetail);
  return match ? match[1] : null;
}
