/**
 * Generation driver - Public API
 * Runs resolution, traversal, assembly and formatting for one run
 */

import {
  all,
  createDiagnosticsCollector,
  error,
  locateType,
  ok,
  type Diagnostic,
  type Result,
  type TypeEnvironment,
  type TypeName,
} from "@deepcopy-gen/frontend";
import { assembleFile } from "./core/assembly.js";
import { emitCopyMethod } from "./core/function-emitter.js";
import { ImportTable } from "./core/imports.js";
import type {
  CopyRequest,
  EmitterOptions,
  GeneratedSource,
  GenerationFailure,
} from "./types.js";

/**
 * Generate copy methods for the requested types of the target package.
 * A type requested more than once is generated once, with the skip set
 * of its first request.
 */
export const generateDeepCopy = (
  env: TypeEnvironment,
  requests: readonly CopyRequest[],
  options: EmitterOptions
): Result<GeneratedSource, GenerationFailure> => {
  const target = env.target.identity;

  const located = all(
    requests.map((request) => locateType(env, target.name, request.typeName))
  );
  if (!located.ok) {
    return error(createDiagnosticsCollector([located.error]));
  }

  const jobs: { readonly obj: TypeName; readonly request: CopyRequest }[] = [];
  located.value.forEach((obj, i) => {
    const request = requests[i];
    if (request && !jobs.some((job) => job.obj === obj)) {
      jobs.push({ obj, request });
    }
  });

  const imports = new ImportTable(target, new Set(env.target.declaredNames));
  const requested = new Set(jobs.map((job) => job.obj));
  const warnings: Diagnostic[] = [];

  const declarations = jobs.map(({ obj, request }) =>
    emitCopyMethod(obj, {
      target,
      imports,
      skips: request.skips,
      methodName: options.methodName,
      pointerReceiver: options.pointerReceiver,
      requested,
      warn: (diagnostic) => warnings.push(diagnostic),
    })
  );

  const { text, formatted } = assembleFile(
    {
      invocation: options.invocation,
      packageName: target.name,
      imports: imports.entries(),
      declarations,
    },
    options.formatter
  );

  if (!formatted.ok) {
    return error({
      ...createDiagnosticsCollector([formatted.error]),
      unformatted: text,
    });
  }

  return ok({ source: formatted.value, warnings });
};
