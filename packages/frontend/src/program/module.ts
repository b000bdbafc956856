/**
 * go.mod discovery and import path → directory mapping
 */

import * as path from "node:path";
import type { FileSystem } from "./file-system.js";
import type { GoToolchain } from "./toolchain.js";

/** A `replace` directive, to a local directory or to another module version */
export type Replacement =
  | { readonly from: string; readonly dir: string }
  | { readonly from: string; readonly module: string; readonly version: string };

/** A `require` directive */
export type Requirement = {
  readonly path: string;
  readonly version: string;
};

export type GoModule = {
  readonly path: string;
  readonly root: string;
  readonly requirements: readonly Requirement[];
  readonly replacements: readonly Replacement[];
};

const stripComment = (line: string): string => {
  const idx = line.indexOf("//");
  return (idx === -1 ? line : line.slice(0, idx)).trim();
};

const unquoteModulePath = (value: string): string =>
  value.replace(/^["`](.*)["`]$/, "$1");

const words = (text: string): string[] =>
  text.split(/\s+/).filter((w) => w.length > 0).map(unquoteModulePath);

const isLocalPath = (target: string): boolean =>
  target.startsWith("./") || target.startsWith("../") || path.isAbsolute(target);

/**
 * Parse the directives the loader cares about: `module`, `require` and
 * `replace`.
 */
export const parseGoMod = (text: string, root: string): GoModule => {
  let modulePath = "";
  const requirements: Requirement[] = [];
  const replacements: Replacement[] = [];
  let block: "require" | "replace" | undefined;

  const addRequire = (spec: string): void => {
    const [required, version] = words(spec);
    if (required && version) {
      requirements.push({ path: required, version });
    }
  };

  const addReplace = (spec: string): void => {
    const [lhs, rhs] = spec.split("=>");
    const from = words(lhs ?? "")[0];
    const [target, version] = words(rhs ?? "");
    if (!from || !target) return;
    if (isLocalPath(target)) {
      replacements.push({ from, dir: path.resolve(root, target) });
    } else if (version) {
      replacements.push({ from, module: target, version });
    }
  };

  const add = (directive: "require" | "replace", spec: string): void =>
    directive === "require" ? addRequire(spec) : addReplace(spec);

  for (const raw of text.split("\n")) {
    const line = stripComment(raw);
    if (!line) continue;

    if (block) {
      if (line === ")") {
        block = undefined;
      } else {
        add(block, line);
      }
      continue;
    }

    const [keyword] = words(line);
    const rest = line.slice(keyword?.length ?? 0).trim();
    if (keyword === "module") {
      modulePath = unquoteModulePath(rest);
    } else if (keyword === "require" || keyword === "replace") {
      if (rest === "(") {
        block = keyword;
      } else {
        add(keyword, rest);
      }
    }
  }

  return { path: modulePath, root, requirements, replacements };
};

/**
 * Find the go.mod governing `startDir` by walking up the directory tree.
 */
export const findModule = (
  fileSystem: FileSystem,
  startDir: string
): GoModule | undefined => {
  let currentDir = path.resolve(startDir);

  while (true) {
    const modPath = path.join(currentDir, "go.mod");
    if (fileSystem.exists(modPath) && !fileSystem.isDirectory(modPath)) {
      return parseGoMod(fileSystem.readFile(modPath), currentDir);
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
};

const within = (importPath: string, prefix: string): string | undefined => {
  if (importPath === prefix) return "";
  if (importPath.startsWith(prefix + "/")) {
    return importPath.slice(prefix.length + 1);
  }
  return undefined;
};

/**
 * Import path of the package in `dir`.
 */
export const importPathOf = (
  module: GoModule | undefined,
  dir: string,
  packageName: string
): string => {
  if (!module) return packageName;
  const rel = path.relative(module.root, path.resolve(dir));
  if (!rel) return module.path;
  return `${module.path}/${rel.split(path.sep).join("/")}`;
};

/**
 * Module cache directory name of a module path or version: upper-case
 * letters become `!` followed by the lower-case letter.
 */
export const escapeModulePath = (value: string): string =>
  value.replace(/[A-Z]/g, (c) => `!${c.toLowerCase()}`);

const cacheDir = (
  toolchain: GoToolchain,
  modulePath: string,
  version: string,
  rest: string
): string | undefined =>
  toolchain.moduleCache === undefined
    ? undefined
    : path.join(
        toolchain.moduleCache,
        `${escapeModulePath(modulePath)}@${escapeModulePath(version)}`,
        rest
      );

/** Standard library import paths have no dot in their first element. */
export const isStandardLibrary = (importPath: string): boolean =>
  !(importPath.split("/")[0] ?? "").includes(".");

/**
 * Candidate directories for an import path, most specific first: local
 * replacements, the main module, vendor/, required modules in the module
 * cache (longest module path first), then the standard library.
 */
export const candidateDirs = (
  module: GoModule | undefined,
  importPath: string,
  toolchain: GoToolchain = {}
): readonly string[] => {
  const dirs: string[] = [];
  const push = (dir: string | undefined): void => {
    if (dir !== undefined) dirs.push(dir);
  };

  if (module) {
    for (const replacement of module.replacements) {
      const rest = within(importPath, replacement.from);
      if (rest === undefined) continue;
      push(
        "dir" in replacement
          ? path.join(replacement.dir, rest)
          : cacheDir(toolchain, replacement.module, replacement.version, rest)
      );
    }

    const rest = within(importPath, module.path);
    if (rest !== undefined) {
      push(path.join(module.root, rest));
    }

    push(path.join(module.root, "vendor", importPath));

    const required = module.requirements
      .filter((req) => within(importPath, req.path) !== undefined)
      .sort((a, b) => b.path.length - a.path.length);
    for (const req of required) {
      push(cacheDir(toolchain, req.path, req.version, within(importPath, req.path) ?? ""));
    }
  }

  if (toolchain.goRoot !== undefined && isStandardLibrary(importPath)) {
    push(path.join(toolchain.goRoot, "src", importPath));
  }
  return dirs;
};
