/**
 * Copy method declarations for requested types
 */

import type { NamedType, TypeName } from "@deepcopy-gen/frontend";
import {
  addressOf,
  define,
  dereference,
  identifier,
  returnStatement,
  type GoMethodDeclarationAst,
  type GoNamedTypeAst,
} from "./format/go-ast/index.js";
import { walkType, type WalkContext } from "./walker.js";

const RECEIVER = "o";
const COPY = "cp";

/**
 * `func (o *T) DeepCopy() *T` (or the value form): shallow-copy the
 * receiver, then deepen the copy.
 */
export const emitCopyMethod = (
  obj: TypeName,
  ctx: WalkContext
): GoMethodDeclarationAst => {
  const named: NamedType = {
    kind: "named",
    obj,
    typeArgs: obj.typeParams.map((name) => ({ kind: "typeParam", name })),
  };
  const selfType: GoNamedTypeAst = {
    kind: "namedType",
    name: obj.name,
    typeArguments: obj.typeParams.map((name) => ({
      kind: "namedType",
      name,
      typeArguments: [],
    })),
  };
  const receiverType = ctx.pointerReceiver
    ? { kind: "pointerType" as const, elementType: selfType }
    : selfType;

  const receiver = identifier(RECEIVER);
  const copy = identifier(COPY);
  // Struct fields are reachable through the pointer; other kinds need `*o`
  const source =
    ctx.pointerReceiver && obj.underlying.kind !== "struct"
      ? dereference(receiver)
      : receiver;

  const body = [
    define(COPY, ctx.pointerReceiver ? dereference(receiver) : receiver),
    ...walkType({ source, sink: copy, path: "" }, named, ctx, undefined, true),
    returnStatement(ctx.pointerReceiver ? addressOf(copy) : copy),
  ];

  const typeText = obj.typeParams.length
    ? `${obj.name}[${obj.typeParams.join(", ")}]`
    : obj.name;

  return {
    kind: "methodDeclaration",
    docComment: [
      `${ctx.methodName} generates a deep copy of ${ctx.pointerReceiver ? "*" : ""}${typeText}`,
    ],
    receiverName: RECEIVER,
    receiverType,
    name: ctx.methodName,
    resultType: receiverType,
    body,
  };
};
