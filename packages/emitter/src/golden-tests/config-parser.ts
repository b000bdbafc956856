/**
 * Config.yaml parser for golden tests
 */

import YAML from "yaml";
import { DiagnosticsMode, TestEntry } from "./types.js";

/**
 * Normalize and deduplicate diagnostic codes.
 * - Trims whitespace
 * - Filters empty strings
 * - Removes duplicates
 * - Sorts for deterministic ordering
 */
const normalizeDiagnosticCodes = (
  codes: readonly string[]
): readonly string[] => {
  const normalized = codes.map((c) => c.trim()).filter((c) => c.length > 0);
  return [...new Set(normalized)].sort();
};

const parseStringList = (
  value: unknown,
  field: string
): readonly string[] | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value)) {
    throw new Error(`${field} must be an array of strings`);
  }

  const strings: string[] = [];
  for (const v of value) {
    if (typeof v !== "string") {
      throw new Error(`${field} must contain strings. Got: ${JSON.stringify(v)}`);
    }
    strings.push(v);
  }
  return strings;
};

/**
 * Parse and validate a list of diagnostic codes.
 * - Each code must match DCG#### format
 * - Returns undefined if empty or not present
 */
const parseDiagnosticCodes = (
  value: unknown,
  field: string
): readonly string[] | undefined => {
  const list = parseStringList(value, field);
  if (!list) return undefined;

  const codes = normalizeDiagnosticCodes(list);

  for (const c of codes) {
    if (!/^DCG\d{4}$/.test(c)) {
      throw new Error(
        `Invalid diagnostic code "${c}". Expected format DCG####.`
      );
    }
  }

  return codes.length > 0 ? codes : undefined;
};

/**
 * Validate and parse diagnostics mode.
 */
const parseDiagnosticsMode = (value: unknown): DiagnosticsMode | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (value === "contains" || value === "exact") {
    return value;
  }
  throw new Error(
    `Invalid expectDiagnosticsMode: "${String(value)}". Must be "contains" or "exact".`
  );
};

const optionalString = (value: unknown, field: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  return value;
};

const parseEntry = (item: Readonly<Record<string, unknown>>): TestEntry => {
  const title = item.title;
  if (typeof title !== "string" || title.length === 0) {
    throw new Error(`Each test entry needs a title: ${JSON.stringify(item)}`);
  }

  const types = parseStringList(item.types, "types") ?? [];
  if (types.length === 0) {
    throw new Error(`types must name at least one type (test: "${title}")`);
  }

  const pointerReceiver = item.pointerReceiver ?? false;
  if (typeof pointerReceiver !== "boolean") {
    throw new Error(`pointerReceiver must be a boolean (test: "${title}")`);
  }

  const expected = optionalString(item.expected, "expected");
  if (expected !== undefined && !expected.endsWith(".go")) {
    throw new Error(`expected must end with .go: ${expected}`);
  }

  const expectDiagnostics = parseDiagnosticCodes(
    item.expectDiagnostics,
    "expectDiagnostics"
  );
  const expectDiagnosticsMode = parseDiagnosticsMode(item.expectDiagnosticsMode);

  // Validate that mode is only set when diagnostics are expected
  if (expectDiagnosticsMode && !expectDiagnostics) {
    throw new Error(
      `expectDiagnosticsMode is set for "${title}" but expectDiagnostics is missing.`
    );
  }
  if (!expectDiagnostics && expected === undefined) {
    throw new Error(`"${title}" needs expected or expectDiagnostics`);
  }

  return {
    title,
    types,
    skips: parseStringList(item.skips, "skips") ?? [],
    pointerReceiver,
    methodName: optionalString(item.methodName, "methodName"),
    expected,
    expectDiagnostics,
    expectDiagnosticsMode,
    expectWarnings: parseDiagnosticCodes(item.expectWarnings, "expectWarnings"),
  };
};

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parse config.yaml and extract test entries
 */
export const parseConfigYaml = (yamlContent: string): readonly TestEntry[] => {
  const parsed: unknown = YAML.parse(yamlContent);

  if (!Array.isArray(parsed)) {
    throw new Error("config.yaml must be an array of test entries");
  }

  return parsed.map((item: unknown) => {
    if (!isRecord(item)) {
      throw new Error(`Invalid test entry: ${JSON.stringify(item)}`);
    }
    return parseEntry(item);
  });
};
