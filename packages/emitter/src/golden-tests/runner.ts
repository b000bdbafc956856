/**
 * Test scenario runner
 */

import { expect } from "chai";
import * as fs from "fs";
import {
  error,
  loadPackage,
  ok,
  type Diagnostic,
  type DiagnosticsCollector,
  type Result,
} from "@deepcopy-gen/frontend";
import { generateDeepCopy } from "../emitter.js";
import { builtinFormatter } from "../core/format/formatter.js";
import { skipSetFor } from "../core/skip-set.js";
import type { GeneratedSource } from "../types.js";
import { DiagnosticsMode, Scenario } from "./types.js";

/**
 * Normalize Go output for comparison
 */
export const normalizeGo = (code: string): string => {
  return (
    code
      .trim()
      // Normalize line endings
      .replace(/\r\n/g, "\n")
      // Remove trailing whitespace
      .replace(/[ \t]+$/gm, "")
  );
};

/**
 * Load the scenario's package and generate its copy methods. Load
 * warnings are reported with the generator's.
 */
export const generateScenario = (
  scenario: Scenario
): Result<GeneratedSource, DiagnosticsCollector> => {
  const { entry } = scenario;
  // Packages outside the test tree stay unresolved on every machine
  const loaded = loadPackage(scenario.packageDir, { toolchain: {} });
  if (!loaded.ok) {
    return loaded;
  }

  const generated = generateDeepCopy(
    loaded.value,
    entry.types.map((typeName, i) => ({
      typeName,
      skips: skipSetFor(entry.skips, i),
    })),
    {
      pointerReceiver: entry.pointerReceiver,
      methodName: entry.methodName ?? "DeepCopy",
      invocation: "deepcopy-gen",
      formatter: builtinFormatter,
    }
  );
  if (!generated.ok) {
    return error(generated.error);
  }

  return ok({
    source: generated.value.source,
    warnings: [...loaded.value.warnings, ...generated.value.warnings],
  });
};

const describeDiagnostics = (diagnostics: readonly Diagnostic[]): string =>
  diagnostics.map((d) => `  ${d.code}: ${d.message}`).join("\n");

const checkExpectedDiagnostics = (
  scenario: Scenario,
  expected: readonly string[],
  result: Result<GeneratedSource, DiagnosticsCollector>
): void => {
  if (result.ok) {
    throw new Error(
      `Expected diagnostics ${expected.join(", ")} but generation succeeded for ${scenario.packageDir}`
    );
  }

  const actualDiagnostics = result.error.diagnostics;
  const actualCodes = new Set<string>(actualDiagnostics.map((d) => d.code));
  const expectedSet = new Set(expected);
  const mode: DiagnosticsMode = scenario.entry.expectDiagnosticsMode ?? "contains";

  // Check for missing expected diagnostics (both modes)
  const missing = expected.filter((c) => !actualCodes.has(c));
  if (missing.length) {
    throw new Error(
      `Missing expected diagnostics (${mode}): ${missing.join(", ")}\n` +
        `Expected: ${expected.join(", ")}\n` +
        `Actual diagnostics:\n${describeDiagnostics(actualDiagnostics)}`
    );
  }

  // In "exact" mode, also check for unexpected diagnostics
  if (mode === "exact") {
    const unexpected = actualDiagnostics.filter((d) => !expectedSet.has(d.code));
    if (unexpected.length) {
      throw new Error(
        `Unexpected diagnostics in exact mode:\n${describeDiagnostics(unexpected)}`
      );
    }
  }
};

/**
 * Run a single test scenario
 */
export const runScenario = (scenario: Scenario): void => {
  const result = generateScenario(scenario);

  // Handle expected diagnostics tests
  const expectDiagnostics = scenario.entry.expectDiagnostics;
  if (expectDiagnostics?.length) {
    checkExpectedDiagnostics(scenario, expectDiagnostics, result);
    return;
  }

  if (!result.ok) {
    throw new Error(
      `Generation failed:\n${describeDiagnostics(result.error.diagnostics)}`
    );
  }

  const warningCodes = [...new Set(result.value.warnings.map((w) => w.code))].sort();
  expect(warningCodes).to.deep.equal(
    scenario.entry.expectWarnings ?? [],
    `Warnings for ${scenario.pathParts.join("/")}`
  );

  if (!scenario.expectedPath) {
    throw new Error(
      `Expected path missing for successful test: ${scenario.packageDir}`
    );
  }
  const expectedGo = fs.readFileSync(scenario.expectedPath, "utf-8");

  expect(normalizeGo(result.value.source)).to.equal(
    normalizeGo(expectedGo),
    `Go output mismatch for ${scenario.pathParts.join("/")}`
  );
};
