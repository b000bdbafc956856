/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@deepcopy-gen/frontend";
import {
  parseSkipSelectors,
  skipSetFor,
  type CopyRequest,
} from "@deepcopy-gen/emitter";
import { CONFIG_FILE, DEFAULT_METHOD_NAME } from "./cli/constants.js";
import type {
  CliOptions,
  DeepCopyConfig,
  ResolvedConfig,
  TypeEntry,
} from "./types.js";

const GO_IDENTIFIER = /^[\p{L}_][\p{L}\p{Nd}_]*$/u;

const invalidConfig = (configPath: string, message: string): Diagnostic =>
  createDiagnostic("DCG1004", "error", `${CONFIG_FILE}: ${message}`, {
    file: configPath,
    line: 1,
    column: 1,
  });

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string");

const parseTypeEntry = (value: unknown): TypeEntry | undefined => {
  if (typeof value === "string") return value;
  if (!isRecord(value) || typeof value.name !== "string") return undefined;
  if (value.skip === undefined) return { name: value.name };
  return isStringArray(value.skip)
    ? { name: value.name, skip: value.skip }
    : undefined;
};

/**
 * Check the shape of a parsed deepcopy.json
 */
export const validateConfig = (
  value: unknown,
  configPath: string
): Result<DeepCopyConfig, Diagnostic> => {
  if (!isRecord(value)) {
    return error(invalidConfig(configPath, "expected an object"));
  }

  const types: TypeEntry[] = [];
  if (value.types !== undefined) {
    if (!Array.isArray(value.types)) {
      return error(invalidConfig(configPath, "'types' must be an array"));
    }
    for (const item of value.types) {
      const entry = parseTypeEntry(item);
      if (entry === undefined) {
        return error(
          invalidConfig(
            configPath,
            `invalid type entry ${JSON.stringify(item)}; expected a name or { "name": ..., "skip": [...] }`
          )
        );
      }
      types.push(entry);
    }
  }

  for (const key of ["pointerReceiver", "gofmt"] as const) {
    if (value[key] !== undefined && typeof value[key] !== "boolean") {
      return error(invalidConfig(configPath, `'${key}' must be a boolean`));
    }
  }
  for (const key of ["output", "methodName", "$schema"] as const) {
    if (value[key] !== undefined && typeof value[key] !== "string") {
      return error(invalidConfig(configPath, `'${key}' must be a string`));
    }
  }

  const { pointerReceiver, gofmt, output, methodName } = value;
  return ok({
    types: value.types === undefined ? undefined : types,
    pointerReceiver: typeof pointerReceiver === "boolean" ? pointerReceiver : undefined,
    gofmt: typeof gofmt === "boolean" ? gofmt : undefined,
    output: typeof output === "string" ? output : undefined,
    methodName: typeof methodName === "string" ? methodName : undefined,
  });
};

/**
 * Load deepcopy.json
 */
export const loadConfig = (
  configPath: string
): Result<DeepCopyConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic(
        "DCG1003",
        "error",
        `Config file not found: ${configPath}`
      )
    );
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed, configPath);
  } catch (err) {
    return error(
      invalidConfig(
        configPath,
        `failed to parse: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }
};

/**
 * Find deepcopy.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find deepcopy.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Hit root
      return null;
    }
    currentDir = parentDir;
  }
};

const requestsFromConfig = (
  types: readonly TypeEntry[]
): readonly CopyRequest[] =>
  types.map((entry) =>
    typeof entry === "string"
      ? { typeName: entry, skips: parseSkipSelectors("") }
      : {
          typeName: entry.name,
          skips: parseSkipSelectors((entry.skip ?? []).join(",")),
        }
  );

/**
 * Resolve final configuration from file + CLI args. `--type` occurrences
 * replace the file's type list.
 * @param configDir - Directory containing deepcopy.json, for relative paths
 */
export const resolveConfig = (
  config: DeepCopyConfig,
  cliOptions: CliOptions,
  packageDir: string,
  configDir: string | undefined,
  invocation: string
): Result<ResolvedConfig, Diagnostic> => {
  const cliTypes = cliOptions.types ?? [];
  const skips = cliOptions.skips ?? [];
  const requests =
    cliTypes.length > 0
      ? cliTypes.map((typeName, i) => ({
          typeName,
          skips: skipSetFor(skips, i),
        }))
      : requestsFromConfig(config.types ?? []);

  if (requests.length === 0) {
    return error(
      createDiagnostic(
        "DCG1001",
        "error",
        "No type requested",
        undefined,
        `pass --type <name> or list types in ${CONFIG_FILE}`
      )
    );
  }

  if (cliTypes.length === 0 && skips.length > 0) {
    return error(
      createDiagnostic(
        "DCG1005",
        "error",
        "--skip pairs with --type; give the types on the command line"
      )
    );
  }

  const methodName =
    cliOptions.methodName ?? config.methodName ?? DEFAULT_METHOD_NAME;
  if (!GO_IDENTIFIER.test(methodName)) {
    return error(
      createDiagnostic(
        "DCG1005",
        "error",
        `Method name is not a Go identifier: ${JSON.stringify(methodName)}`
      )
    );
  }

  const fileOutput =
    config.output === undefined || config.output === "-"
      ? config.output
      : resolve(configDir ?? ".", config.output);
  const output = cliOptions.output ?? fileOutput;

  return ok({
    packageDir: resolve(packageDir),
    requests,
    pointerReceiver: cliOptions.pointerReceiver ?? config.pointerReceiver ?? false,
    output: output === "-" ? undefined : output,
    methodName,
    gofmt: cliOptions.gofmt ?? config.gofmt ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
    invocation,
  });
};
