export type * from "./types.js";
export * from "./builders.js";
export {
  printType,
  printExpression,
  printStatement,
  printMethodDeclaration,
  printFile,
} from "./printer.js";
