/**
 * Output destination handling
 *
 * The destination is opened only once the source is complete, so a
 * failed run leaves an existing file untouched.
 */

import { closeSync, openSync, writeSync } from "node:fs";
import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@deepcopy-gen/frontend";

const reason = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/**
 * Write the generated source to `destination`, or to stdout when it is
 * undefined.
 */
export const writeOutput = (
  destination: string | undefined,
  text: string
): Result<void, Diagnostic> => {
  if (destination === undefined) {
    process.stdout.write(text);
    return ok(undefined);
  }

  let fd: number;
  try {
    fd = openSync(destination, "w");
  } catch (err) {
    return error(
      createDiagnostic(
        "DCG5001",
        "error",
        `Cannot open ${destination}: ${reason(err)}`
      )
    );
  }

  try {
    writeSync(fd, text);
    return ok(undefined);
  } catch (err) {
    return error(
      createDiagnostic(
        "DCG5002",
        "error",
        `Cannot write ${destination}: ${reason(err)}`
      )
    );
  } finally {
    closeSync(fd);
  }
};
