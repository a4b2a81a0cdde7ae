#!/usr/bin/env node
// Frame Pipeline - Entry point
// Loads .env, then hands argv to the CLI runner and exits with its code.

import "dotenv/config";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { runCli } from "./cli.js";
import { errorMessage } from "./logger.js";

export const APP_NAME = "Frame Pipeline";
export const APP_VERSION = "0.1.0";

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(`[FATAL] [${new Date().toISOString()}] ${errorMessage(err)}`);
      process.exit(1);
    },
  );
}
