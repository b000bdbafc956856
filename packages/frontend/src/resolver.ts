/**
 * Type Resolver - finds a requested type in the analyzed package
 */

import type { TypeEnvironment } from "./program/types.js";
import { Diagnostic, createDiagnostic } from "./types/diagnostic.js";
import { Result, ok, error } from "./types/result.js";
import type { TypeName } from "./types/type-description.js";

export const locateType = (
  env: TypeEnvironment,
  packageName: string,
  typeName: string
): Result<TypeName, Diagnostic> => {
  const target = env.target;
  const found =
    target.identity.name === packageName
      ? target.types.find((t) => t.name === typeName)
      : undefined;

  if (!found) {
    return error(
      createDiagnostic(
        "DCG3001",
        "error",
        `Type not found: ${typeName} in package ${packageName}`,
        undefined,
        target.identity.name === packageName
          ? undefined
          : `the loaded package is ${target.identity.name}`
      )
    );
  }

  const kind = found.underlying.kind;
  if (kind === "pointer" || kind === "interface") {
    return error(
      createDiagnostic(
        "DCG3002",
        "error",
        `Cannot declare methods on ${typeName}: its underlying type is ${kind === "pointer" ? "a pointer" : "an interface"}`,
        found.position
      )
    );
  }

  return ok(found);
};
