/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import {
  diagnosticCategory,
  formatDiagnostic,
  type Diagnostic,
  type ErrorCategory,
} from "@deepcopy-gen/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import type { DeepCopyConfig } from "../types.js";
import { PROGRAM_NAME, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const EXIT_CODES: Readonly<Record<ErrorCategory, number>> = {
  ConfigError: 2,
  LoadError: 3,
  ResolutionError: 4,
  FormattingError: 5,
  OutputError: 6,
};

/**
 * Exit code for a failed run: the category of its first error
 */
export const exitCodeFor = (diagnostics: readonly Diagnostic[]): number => {
  const first = diagnostics.find((d) => d.severity === "error") ?? diagnostics[0];
  return first ? EXIT_CODES[diagnosticCategory(first.code)] : 1;
};

const fail = (diagnostics: readonly Diagnostic[]): number => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
  return exitCodeFor(diagnostics);
};

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`${PROGRAM_NAME} v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help") {
    showHelp();
    return 0;
  }

  if (parsed.errors.length > 0) {
    return fail(parsed.errors);
  }

  if (!parsed.packageDir) {
    return fail([
      {
        code: "DCG1002",
        severity: "error",
        message: "No package path given",
        hint: `usage: ${PROGRAM_NAME} [options] <package-dir>`,
      },
    ]);
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(process.cwd(), parsed.options.config)
    : findConfig(parsed.packageDir);

  let fileConfig: DeepCopyConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      return fail([configResult.error]);
    }
    fileConfig = configResult.value;
    if (parsed.options.verbose) {
      console.error(`Using config ${configPath}`);
    }
  }

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    parsed.packageDir,
    configPath ? dirname(configPath) : undefined,
    [PROGRAM_NAME, ...args].join(" ")
  );
  if (!config.ok) {
    return fail([config.error]);
  }

  const result = generateCommand(config.value);
  if (!result.ok) {
    return fail(result.error.diagnostics);
  }
  return 0;
};
