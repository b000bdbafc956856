/**
 * Method-Reuse Detector
 *
 * A named type that already declares a conforming copy method is copied
 * by calling it instead of walking its structure.
 */

import {
  identical,
  stripPointer,
  underlyingOf,
  type InterfaceMethod,
  type NamedType,
  type SignatureType,
  type TypeDescription,
} from "@deepcopy-gen/frontend";
import {
  addressOf,
  assign,
  block,
  define,
  dereference,
  identifier,
  ifStatement,
  methodCall,
  notNil,
  type GoExpressionAst,
  type GoStatementAst,
} from "./format/go-ast/index.js";

export type CopyMethod = {
  readonly name: string;
  /** The method returns `*T` rather than `T` */
  readonly returnsPointer: boolean;
  /** Declared by an interface; the receiver may be nil */
  readonly onInterface: boolean;
};

/**
 * `M() T` or `M() *T` where T is the stripped receiver type.
 */
const conforms = (
  signature: SignatureType,
  receiver: TypeDescription
): boolean | undefined => {
  const result = signature.results[0];
  if (signature.params.length !== 0 || signature.results.length !== 1 || !result) {
    return undefined;
  }
  const [resultElem, returnsPointer] = stripPointer(result.type);
  const [receiverElem] = stripPointer(receiver);
  return identical(resultElem, receiverElem) ? returnsPointer : undefined;
};

const interfaceMethods = (
  type: TypeDescription,
  seen: ReadonlySet<TypeDescription> = new Set()
): readonly InterfaceMethod[] => {
  const underlying = underlyingOf(type);
  if (underlying.kind !== "interface" || seen.has(underlying)) return [];
  const nextSeen = new Set([...seen, underlying]);
  return [
    ...underlying.methods,
    ...underlying.embeddeds.flatMap((e) => interfaceMethods(e, nextSeen)),
  ];
};

export const findCopyMethod = (
  named: NamedType,
  methodName: string
): CopyMethod | undefined => {
  if (named.obj.opaque) return undefined;

  if (underlyingOf(named).kind === "interface") {
    const matches = interfaceMethods(named).filter((m) => m.name === methodName);
    const method = matches[0];
    if (matches.length !== 1 || !method) return undefined;
    const returnsPointer = conforms(method.signature, named);
    return returnsPointer === undefined
      ? undefined
      : { name: methodName, returnsPointer, onInterface: true };
  }

  const matches = named.obj.methods.filter((m) => m.name === methodName);
  const method = matches[0];
  if (matches.length !== 1 || !method) return undefined;
  const returnsPointer = conforms(method.signature, method.receiver);
  return returnsPointer === undefined
    ? undefined
    : { name: methodName, returnsPointer, onInterface: false };
};

/**
 * `sink = source.M()`, adjusted when the method's result shape differs
 * from the sink's: `&retV` for a pointer sink, `*retV` for a value sink.
 */
export const emitCopyMethodCall = (
  source: GoExpressionAst,
  sink: GoExpressionAst,
  sinkIsPointer: boolean,
  method: CopyMethod
): readonly GoStatementAst[] => {
  const callExpr = methodCall(source, method.name);
  const retV = identifier("retV");

  const statements: readonly GoStatementAst[] =
    method.returnsPointer === sinkIsPointer
      ? [assign(sink, callExpr)]
      : [
          define("retV", callExpr),
          assign(sink, sinkIsPointer ? addressOf(retV) : dereference(retV)),
        ];

  if (method.onInterface) {
    return [ifStatement(notNil(source), statements)];
  }
  return statements.length === 1 ? statements : [block(statements)];
};
