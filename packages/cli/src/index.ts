#!/usr/bin/env -S node --import tsx
/**
 * deepcopy-gen CLI - generates deep-copy methods for Go types
 */

import { runCli } from "./cli/index.js";

// Run CLI with arguments (skip node and script name)
const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
