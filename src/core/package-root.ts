import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

// Walk upward until we find the package root so compiled builds resolve assets correctly.
export function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new Error(`package.json not found above ${startDir}`);
}

export function packageAssetPath(...segments: string[]): string {
  const packageRoot = findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
  return path.join(packageRoot, ...segments);
}
