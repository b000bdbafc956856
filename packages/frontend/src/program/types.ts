/**
 * Loaded package and environment types
 */

import type { Diagnostic } from "../types/diagnostic.js";
import type {
  PackageIdentity,
  TypeDescription,
  TypeName,
} from "../types/type-description.js";
import type { FileSystem } from "./file-system.js";
import type { GoToolchain } from "./toolchain.js";

export type LoadOptions = {
  readonly fileSystem?: FileSystem;
  /** Where the standard library and the module cache live; defaults to the environment */
  readonly toolchain?: GoToolchain;
  readonly verbose?: boolean;
};

export type GoPackage = {
  readonly identity: PackageIdentity;
  /** Directory the declarations were read from; undefined when unresolved */
  readonly dir: string | undefined;
  readonly files: readonly string[];
  /** Import paths used by the package's files, sorted */
  readonly imports: readonly string[];
  /** Top-level type definitions in file and declaration order */
  readonly types: readonly TypeName[];
  readonly aliases: ReadonlyMap<string, TypeDescription>;
  /** Package-scope identifiers: types, functions, vars and consts, sorted */
  readonly declaredNames: readonly string[];
  readonly resolved: boolean;
};

export type TypeEnvironment = {
  /** The analyzed package; always the first of `packages` */
  readonly target: GoPackage;
  readonly packages: readonly GoPackage[];
  /** Non-fatal findings, such as imports that could not be read */
  readonly warnings: readonly Diagnostic[];
};
