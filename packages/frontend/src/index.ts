/**
 * deepcopy-gen frontend - Go declaration parser and type environment
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type ErrorCategory,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  diagnosticCategory,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/type-description.js";
export * from "./types/predicates.js";
export { lookupUniverse, unsafePointer } from "./types/universe.js";

export { TokenKind, type Token } from "./lexer/token.js";
export { lex, type LexResult } from "./lexer/lexer.js";
export type * from "./parser/syntax.js";
export { parseFile, unquote } from "./parser/parser.js";

export * from "./program/index.js";
export * from "./resolver.js";
