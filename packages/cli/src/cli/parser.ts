/**
 * CLI argument parser
 */

import { createDiagnostic, type Diagnostic } from "@deepcopy-gen/frontend";
import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: "generate" | "help" | "version";
  packageDir?: string;
  options: CliOptions;
  errors: Diagnostic[];
};

const usageError = (message: string): Diagnostic =>
  createDiagnostic(
    "DCG1005",
    "error",
    message,
    undefined,
    "run 'deepcopy-gen --help' for usage information"
  );

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const errors: Diagnostic[] = [];
  let packageDir: string | undefined;

  const value = (i: number, flag: string): string => {
    const next = args[i];
    if (next === undefined || (next.startsWith("-") && next !== "-")) {
      errors.push(usageError(`Option ${flag} needs a value`));
      return "";
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Positional: the package directory
    if (!arg.startsWith("-") || arg === "-") {
      if (packageDir === undefined) {
        packageDir = arg;
      } else {
        errors.push(usageError(`Unexpected argument: ${arg}`));
      }
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, errors: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, errors: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = value(++i, arg);
        break;
      case "-t":
      case "--type":
        options.types = [...(options.types ?? []), value(++i, arg)];
        break;
      case "-s":
      case "--skip":
        options.skips = [...(options.skips ?? []), value(++i, arg)];
        break;
      case "-p":
      case "--pointer-receiver":
        options.pointerReceiver = true;
        break;
      case "-o":
      case "--output":
        options.output = value(++i, arg);
        break;
      case "-m":
      case "--method":
        options.methodName = value(++i, arg);
        break;
      case "--gofmt":
        options.gofmt = true;
        break;
      default:
        errors.push(usageError(`Unknown option: ${arg}`));
    }
  }

  return { command: "generate", packageDir, options, errors };
};
