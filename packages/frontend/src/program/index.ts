/**
 * Program - Public API
 */

export type { LoadOptions, GoPackage, TypeEnvironment } from "./types.js";
export {
  type FileSystem,
  nodeFileSystem,
  createMemoryFileSystem,
} from "./file-system.js";
export {
  type GoModule,
  type Replacement,
  type Requirement,
  parseGoMod,
  findModule,
  importPathOf,
  candidateDirs,
  escapeModulePath,
  isStandardLibrary,
} from "./module.js";
export {
  type GoToolchain,
  toolchainFromEnv,
  detectGoToolchain,
} from "./toolchain.js";
export { loadPackage, readPackageFiles, guessPackageName } from "./loader.js";
