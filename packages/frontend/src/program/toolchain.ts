/**
 * Go toolchain directories used to find imported packages outside the
 * main module
 */

import { spawnSync } from "node:child_process";
import * as os from "node:os";
import * as path from "node:path";

export type GoToolchain = {
  /** `$GOROOT`; standard library sources live under `src/` */
  readonly goRoot?: string;
  /** `$GOMODCACHE`; holds `<module>@<version>` directories */
  readonly moduleCache?: string;
};

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim().length > 0 ? value.trim() : undefined;

/**
 * Toolchain directories from the environment. The module cache defaults
 * to `$GOPATH/pkg/mod`, with GOPATH defaulting to `~/go`.
 */
export const toolchainFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): GoToolchain => {
  const goPath =
    nonEmpty(env["GOPATH"])?.split(path.delimiter)[0] ?? path.join(home, "go");
  return {
    goRoot: nonEmpty(env["GOROOT"]),
    moduleCache: nonEmpty(env["GOMODCACHE"]) ?? path.join(goPath, "pkg", "mod"),
  };
};

/**
 * Toolchain directories as the `go` command reports them. Falls back to
 * the environment when GOROOT is already set or the binary cannot run.
 */
export const detectGoToolchain = (
  binary = "go",
  env: NodeJS.ProcessEnv = process.env
): GoToolchain => {
  const fallback = toolchainFromEnv(env);
  if (fallback.goRoot !== undefined) {
    return fallback;
  }

  const result = spawnSync(binary, ["env", "GOROOT", "GOMODCACHE"], {
    encoding: "utf-8",
    env,
  });
  if (result.error || result.status !== 0) {
    return fallback;
  }

  const [goRoot, moduleCache] = result.stdout.split("\n");
  return {
    goRoot: nonEmpty(goRoot),
    moduleCache: nonEmpty(moduleCache) ?? fallback.moduleCache,
  };
};
