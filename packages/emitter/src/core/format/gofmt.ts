/**
 * gofmt wrapper
 */

import { spawnSync } from "node:child_process";
import {
  createDiagnostic,
  error,
  ok,
} from "@deepcopy-gen/frontend";
import type { SourceFormatter } from "./formatter.js";

/**
 * Formatter that pipes the source through the `gofmt` binary.
 */
export const createGofmtFormatter = (binary = "gofmt"): SourceFormatter => ({
  name: "gofmt",
  format: (source) => {
    const result = spawnSync(binary, [], {
      input: source,
      encoding: "utf-8",
    });

    if (result.error) {
      return error(
        createDiagnostic(
          "DCG4002",
          "error",
          `${binary} is not available: ${result.error.message}`,
          undefined,
          "install the Go toolchain or drop --gofmt"
        )
      );
    }

    if (result.status !== 0) {
      return error(
        createDiagnostic(
          "DCG4001",
          "error",
          `${binary} rejected the generated source: ${result.stderr.trim()}`
        )
      );
    }

    return ok(result.stdout);
  },
});
