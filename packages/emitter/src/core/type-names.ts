/**
 * TypeDescription → Go type AST, qualifying foreign names through the
 * run's import table.
 */

import type {
  Parameter,
  SignatureType,
  TypeDescription,
} from "@deepcopy-gen/frontend";
import type {
  GoFuncTypeAst,
  GoParameterAst,
  GoTypeAst,
} from "./format/go-ast/index.js";
import type { ImportTable } from "./imports.js";

const toParameters = (
  params: readonly Parameter[],
  imports: ImportTable
): readonly GoParameterAst[] =>
  params.map((p) => ({ name: p.name, type: toGoType(p.type, imports) }));

const toFuncType = (
  signature: SignatureType,
  imports: ImportTable
): GoFuncTypeAst => ({
  kind: "funcType",
  parameters: toParameters(signature.params, imports),
  results: toParameters(signature.results, imports),
  variadic: signature.variadic,
});

export const toGoType = (
  type: TypeDescription,
  imports: ImportTable
): GoTypeAst => {
  switch (type.kind) {
    case "named":
      return {
        kind: "namedType",
        qualifier: imports.qualify(type.obj.pkg),
        name: type.obj.name,
        typeArguments: type.typeArgs.map((arg) => toGoType(arg, imports)),
      };

    case "basic":
    case "typeParam":
      return { kind: "namedType", name: type.name, typeArguments: [] };

    case "pointer":
      return { kind: "pointerType", elementType: toGoType(type.elem, imports) };

    case "slice":
      return { kind: "sliceType", elementType: toGoType(type.elem, imports) };

    case "array":
      return {
        kind: "arrayType",
        length: type.length,
        elementType: toGoType(type.elem, imports),
      };

    case "map":
      return {
        kind: "mapType",
        keyType: toGoType(type.key, imports),
        valueType: toGoType(type.elem, imports),
      };

    case "chan":
      return {
        kind: "channelType",
        direction: type.dir,
        elementType: toGoType(type.elem, imports),
      };

    case "struct":
      return {
        kind: "structType",
        fields: type.fields.map((field) => ({
          name: field.embedded ? undefined : field.name,
          type: toGoType(field.type, imports),
          tag: field.tag,
        })),
      };

    case "interface":
      return {
        kind: "interfaceType",
        elements: [
          ...type.methods.map((m) => ({
            kind: "method" as const,
            name: m.name,
            signature: toFuncType(m.signature, imports),
          })),
          ...type.embeddeds.map((e) => ({
            kind: "embedded" as const,
            type: toGoType(e, imports),
          })),
        ],
      };

    case "signature":
      return toFuncType(type, imports);
  }
};
