/**
 * deepcopy-gen emitter - Go copy method generator
 */

export * from "./types.js";
export { generateDeepCopy } from "./emitter.js";
export {
  type SkipSet,
  emptySkipSet,
  parseSkipSelectors,
  skipSetFor,
} from "./core/skip-set.js";
export { ImportTable } from "./core/imports.js";
export { findCopyMethod, type CopyMethod } from "./core/method-reuse.js";
export {
  builtinFormatter,
  formatSource,
  type SourceFormatter,
} from "./core/format/formatter.js";
export { createGofmtFormatter } from "./core/format/gofmt.js";
export { headerComment } from "./core/assembly.js";
