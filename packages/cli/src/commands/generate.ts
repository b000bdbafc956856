/**
 * deepcopy-gen generate - load, generate, write
 */

import {
  createDiagnosticsCollector,
  detectGoToolchain,
  error,
  formatDiagnostic,
  loadPackage,
  ok,
  type Diagnostic,
  type DiagnosticsCollector,
  type Result,
} from "@deepcopy-gen/frontend";
import {
  builtinFormatter,
  createGofmtFormatter,
  generateDeepCopy,
} from "@deepcopy-gen/emitter";
import { writeOutput } from "../output.js";
import type { ResolvedConfig } from "../types.js";

export type GenerateSummary = {
  readonly packagePath: string;
  readonly types: readonly string[];
  readonly destination: string | undefined;
  readonly warnings: readonly Diagnostic[];
};

const printWarnings = (
  config: ResolvedConfig,
  warnings: readonly Diagnostic[]
): void => {
  if (config.quiet) return;
  for (const warning of warnings) {
    console.error(formatDiagnostic(warning));
  }
};

/**
 * Generate copy methods for the configured types and write them to the
 * destination
 */
export const generateCommand = (
  config: ResolvedConfig
): Result<GenerateSummary, DiagnosticsCollector> => {
  const toolchain = detectGoToolchain();
  if (config.verbose) {
    console.error(
      `GOROOT: ${toolchain.goRoot ?? "(unknown)"}, module cache: ${toolchain.moduleCache ?? "(unknown)"}`
    );
  }
  const loaded = loadPackage(config.packageDir, {
    verbose: config.verbose,
    toolchain,
  });
  if (!loaded.ok) {
    return loaded;
  }
  const env = loaded.value;
  printWarnings(config, env.warnings);

  const types = config.requests.map((r) => r.typeName);
  if (config.verbose) {
    console.error(
      `Generating ${config.methodName} for ${types.join(", ")} in ${env.target.identity.path}`
    );
  }

  const generated = generateDeepCopy(env, config.requests, {
    pointerReceiver: config.pointerReceiver,
    methodName: config.methodName,
    invocation: config.invocation,
    formatter: config.gofmt ? createGofmtFormatter() : builtinFormatter,
  });

  if (!generated.ok) {
    const failure = generated.error;
    if (config.verbose && failure.unformatted !== undefined) {
      console.error("Unformatted source:");
      console.error(failure.unformatted);
    }
    return error(createDiagnosticsCollector(failure.diagnostics));
  }
  printWarnings(config, generated.value.warnings);

  const written = writeOutput(config.output, generated.value.source);
  if (!written.ok) {
    return error(createDiagnosticsCollector([written.error]));
  }

  if (config.verbose) {
    console.error(`Wrote ${config.output ?? "stdout"}`);
  }

  return ok({
    packagePath: env.target.identity.path,
    types,
    destination: config.output,
    warnings: [...env.warnings, ...generated.value.warnings],
  });
};
