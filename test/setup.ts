import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach } from "vitest";

import { HOME_ENV_VAR } from "../src/core/paths.js";

// =============================================================================
// CELLSYNC_HOME ISOLATION
// =============================================================================

let originalEnv: NodeJS.ProcessEnv = {};
let tempHome: string | null = null;

beforeEach(() => {
  originalEnv = { ...process.env };
  tempHome = fs.mkdtempSync(path.join(os.tmpdir(), "cellsync-home-"));
  process.env[HOME_ENV_VAR] = tempHome;
  delete process.env.NO_COLOR;
});

afterEach(() => {
  process.env = originalEnv;
  if (tempHome) {
    fs.rmSync(tempHome, { recursive: true, force: true });
    tempHome = null;
  }
});
