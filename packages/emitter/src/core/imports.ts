/**
 * Import Resolver
 *
 * Assigns every foreign package referenced by the generated code a
 * unique local alias. One table is shared by all functions of a run, so
 * a package keeps the same alias throughout the file.
 */

import type { PackageIdentity } from "@deepcopy-gen/frontend";
import type { GoImportAst } from "./format/go-ast/index.js";

/**
 * Identifiers the generated functions declare or call. An import alias
 * must not shadow them.
 */
const LOCAL_NAME = /^(?:o|cp|retV|nil|make|len|cap|copy|new|(?:i|k|v|cpk|cpv)\d*)$/;

export const isLocalName = (name: string): boolean => LOCAL_NAME.test(name);

const lastSegment = (importPath: string): string =>
  importPath.slice(importPath.lastIndexOf("/") + 1);

/**
 * Alias derived from a full import path: `example.com/a/util` →
 * `example_com_a_util`.
 */
export const derivedAlias = (importPath: string): string => {
  const sanitized = importPath.replace(/[^A-Za-z0-9_]/g, "_");
  return /^[0-9]/.test(sanitized) ? `_${sanitized}` : sanitized;
};

export class ImportTable {
  private readonly aliasByPath = new Map<string, string>();
  private readonly pathByAlias = new Map<string, string>();

  /**
   * @param reserved Package-scope names of the target package; a file of
   * that package cannot import under any of them.
   */
  constructor(
    private readonly target: PackageIdentity,
    private readonly reserved: ReadonlySet<string> = new Set()
  ) {}

  /**
   * Local qualifier for a type declared in `pkg`, registering the import
   * on first use. Undefined for the target package and predeclared types.
   */
  qualify(pkg: PackageIdentity | undefined): string | undefined {
    if (!pkg || pkg.path === this.target.path) {
      return undefined;
    }

    const existing = this.aliasByPath.get(pkg.path);
    if (existing !== undefined) {
      return existing;
    }

    let alias = pkg.name;
    if (this.isTaken(alias)) {
      const base = derivedAlias(pkg.path);
      alias = base;
      for (let n = 2; this.isTaken(alias); n++) {
        alias = `${base}_${n}`;
      }
    }

    this.aliasByPath.set(pkg.path, alias);
    this.pathByAlias.set(alias, pkg.path);
    return alias;
  }

  private isTaken(alias: string): boolean {
    return (
      this.pathByAlias.has(alias) ||
      this.reserved.has(alias) ||
      isLocalName(alias)
    );
  }

  /**
   * Registered imports sorted by path.
   */
  entries(): readonly GoImportAst[] {
    return [...this.aliasByPath.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([path, alias]) =>
        alias === lastSegment(path) ? { path } : { path, alias }
      );
  }
}
