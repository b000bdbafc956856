/**
 * Emission Assembler
 */

import type { Diagnostic, Result } from "@deepcopy-gen/frontend";
import type { SourceFormatter } from "./format/formatter.js";
import {
  printFile,
  type GoImportAst,
  type GoMethodDeclarationAst,
} from "./format/go-ast/index.js";

export type AssemblyInput = {
  readonly invocation: string;
  readonly packageName: string;
  readonly imports: readonly GoImportAst[];
  readonly declarations: readonly GoMethodDeclarationAst[];
};

export const headerComment = (invocation: string): string =>
  `// Code generated by ${invocation}; DO NOT EDIT.`;

/**
 * Print the generated file without formatting it.
 */
export const printAssembly = (input: AssemblyInput): string =>
  printFile({
    headerComment: headerComment(input.invocation),
    packageName: input.packageName,
    imports: input.imports,
    declarations: input.declarations,
  });

export const assembleFile = (
  input: AssemblyInput,
  formatter: SourceFormatter
): { readonly text: string; readonly formatted: Result<string, Diagnostic> } => {
  const text = printAssembly(input);
  return { text, formatted: formatter.format(text) };
};
