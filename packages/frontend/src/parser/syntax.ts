/**
 * Declaration-level syntax tree for Go source files.
 *
 * Only what the type environment needs is kept: imports, type
 * declarations and function signatures. Bodies are not represented.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { ChannelDirection } from "../types/type-description.js";

export type TypeExpr =
  | NameTypeExpr
  | { readonly kind: "pointer"; readonly elem: TypeExpr }
  | { readonly kind: "slice"; readonly elem: TypeExpr }
  | { readonly kind: "array"; readonly length: string; readonly elem: TypeExpr }
  | { readonly kind: "map"; readonly key: TypeExpr; readonly value: TypeExpr }
  | {
      readonly kind: "chan";
      readonly dir: ChannelDirection;
      readonly elem: TypeExpr;
    }
  | { readonly kind: "struct"; readonly fields: readonly FieldSyntax[] }
  | {
      readonly kind: "interface";
      readonly methods: readonly InterfaceMethodSyntax[];
      readonly embeddeds: readonly TypeExpr[];
    }
  | { readonly kind: "func"; readonly signature: SignatureSyntax };

export type NameTypeExpr = {
  readonly kind: "name";
  /** Package name for qualified references (`pkg.T`) */
  readonly qualifier?: string;
  readonly name: string;
  readonly typeArgs: readonly TypeExpr[];
  readonly location: SourceLocation;
};

export type FieldSyntax = {
  readonly name: string;
  readonly type: TypeExpr;
  readonly embedded: boolean;
  readonly tag?: string;
  readonly location: SourceLocation;
};

export type InterfaceMethodSyntax = {
  readonly name: string;
  readonly signature: SignatureSyntax;
};

export type ParamSyntax = {
  readonly name?: string;
  readonly type: TypeExpr;
};

export type SignatureSyntax = {
  readonly params: readonly ParamSyntax[];
  readonly results: readonly ParamSyntax[];
  readonly variadic: boolean;
};

export type ImportSyntax = {
  /** Explicit import name, including `_` and `.` */
  readonly name?: string;
  readonly path: string;
  readonly location: SourceLocation;
};

export type TypeSpecSyntax = {
  readonly name: string;
  readonly typeParams: readonly string[];
  readonly alias: boolean;
  readonly type: TypeExpr;
  readonly location: SourceLocation;
};

export type ReceiverSyntax = {
  readonly name?: string;
  readonly pointer: boolean;
  readonly typeName: string;
  readonly typeArgs: readonly string[];
};

export type FuncDeclSyntax = {
  readonly name: string;
  readonly receiver?: ReceiverSyntax;
  readonly typeParams: readonly string[];
  readonly signature: SignatureSyntax;
  readonly location: SourceLocation;
};

export type FileSyntax = {
  readonly fileName: string;
  readonly packageName: string;
  readonly imports: readonly ImportSyntax[];
  readonly types: readonly TypeSpecSyntax[];
  readonly funcs: readonly FuncDeclSyntax[];
  /** Names declared by top-level `var` and `const` declarations */
  readonly values: readonly string[];
};
