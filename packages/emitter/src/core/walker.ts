/**
 * Traversal Engine
 *
 * Walks a type description alongside a pair of access expressions, the
 * source value and its shallow copy, and returns the statements that
 * replace every shared reference inside the copy with a fresh one.
 */

import {
  createDiagnostic,
  underlyingOf,
  type ArrayType,
  type ChannelType,
  type Diagnostic,
  type MapType,
  type NamedType,
  type PackageIdentity,
  type PointerType,
  type SliceType,
  type StructType,
  type TypeDescription,
  type TypeName,
} from "@deepcopy-gen/frontend";
import {
  assign,
  call,
  define,
  dereference,
  expressionStatement,
  identifier,
  ifStatement,
  index,
  notNil,
  rangeLoop,
  selector,
  varDeclaration,
  type GoExpressionAst,
  type GoStatementAst,
} from "./format/go-ast/index.js";
import type { ImportTable } from "./imports.js";
import { emitCopyMethodCall, findCopyMethod } from "./method-reuse.js";
import {
  type SkipSet,
  elementPath,
  entryPath,
  fieldPath,
  keyPath,
} from "./skip-set.js";
import { toGoType } from "./type-names.js";

export type WalkContext = {
  readonly target: PackageIdentity;
  readonly imports: ImportTable;
  readonly skips: SkipSet;
  readonly methodName: string;
  /** Generated methods use pointer receivers and return `*T` */
  readonly pointerReceiver: boolean;
  /** Types that get a generated method in this run */
  readonly requested: ReadonlySet<TypeName>;
  readonly warn: (diagnostic: Diagnostic) => void;
};

export type Access = {
  readonly source: GoExpressionAst;
  readonly sink: GoExpressionAst;
  /** Selector path of this place, matched against the skip set */
  readonly path: string;
};

type WalkState = {
  /** Loop nesting; names loop variables and temporaries */
  readonly depth: number;
  /** Named types entered on the way here */
  readonly stack: readonly TypeName[];
  /** Inside a struct declared outside the target package */
  readonly foreign: boolean;
};

export const initialState: WalkState = { depth: 0, stack: [], foreign: false };

const indexed = (base: string, depth: number): string =>
  depth === 0 ? base : `${base}${depth}`;

/** A lone block is redundant as the body of an `if` or `for`. */
const unwrapBlock = (
  statements: readonly GoStatementAst[]
): readonly GoStatementAst[] => {
  const only = statements[0];
  return statements.length === 1 && only?.kind === "block"
    ? only.body
    : statements;
};

const displayName = (obj: TypeName): string =>
  obj.pkg ? `${obj.pkg.path}.${obj.name}` : obj.name;

/**
 * Call the copy method of a named type instead of walking it: its own
 * conforming method, or the one generated in this run when the type
 * recurs on its own path.
 */
const reuseCopyMethod = (
  access: Access,
  named: NamedType,
  sinkIsPointer: boolean,
  ctx: WalkContext,
  state: WalkState
): readonly GoStatementAst[] | undefined => {
  if (named.obj.opaque) return undefined;

  if (state.stack.includes(named.obj) && ctx.requested.has(named.obj)) {
    return emitCopyMethodCall(access.source, access.sink, sinkIsPointer, {
      name: ctx.methodName,
      returnsPointer: ctx.pointerReceiver,
      onInterface: false,
    });
  }

  const method = findCopyMethod(named, ctx.methodName);
  return method
    ? emitCopyMethodCall(access.source, access.sink, sinkIsPointer, method)
    : undefined;
};

const walkNamed = (
  access: Access,
  named: NamedType,
  ctx: WalkContext,
  state: WalkState,
  initial: boolean
): readonly GoStatementAst[] => {
  const obj = named.obj;
  if (obj.opaque) return [];

  if (!initial) {
    const reused = reuseCopyMethod(access, named, false, ctx, state);
    if (reused) return reused;

    if (state.stack.includes(obj)) {
      ctx.warn(
        createDiagnostic(
          "DCG3101",
          "warning",
          `${displayName(obj)} refers to itself through ${access.path || "its root"} and has no ${ctx.methodName} method; the value is copied shallowly`,
          obj.position,
          `request ${obj.name} as well to copy it deeply`
        )
      );
      return [];
    }
  }

  return walkType(access, underlyingOf(named), ctx, {
    ...state,
    stack: [...state.stack, obj],
    foreign: obj.pkg !== undefined && obj.pkg.path !== ctx.target.path,
  });
};

const walkStruct = (
  access: Access,
  type: StructType,
  ctx: WalkContext,
  state: WalkState
): readonly GoStatementAst[] =>
  type.fields.flatMap((field) => {
    if (field.name === "_" || (state.foreign && !field.exported)) return [];
    const path = fieldPath(access.path, field.name);
    if (ctx.skips.has(path)) return [];
    return walkType(
      {
        source: selector(access.source, field.name),
        sink: selector(access.sink, field.name),
        path,
      },
      field.type,
      ctx,
      state
    );
  });

/** Statements that deepen one element of a slice or array. */
const walkElement = (
  access: Access,
  elem: TypeDescription,
  loopVar: string,
  ctx: WalkContext,
  state: WalkState
): readonly GoStatementAst[] => {
  const path = elementPath(access.path);
  if (ctx.skips.has(path)) return [];
  const i = identifier(loopVar);
  return walkType(
    { source: index(access.source, i), sink: index(access.sink, i), path },
    elem,
    ctx,
    { ...state, depth: state.depth + 1 }
  );
};

const walkSlice = (
  access: Access,
  type: SliceType,
  ctx: WalkContext,
  state: WalkState
): readonly GoStatementAst[] => {
  const loopVar = indexed("i", state.depth);
  const inner = walkElement(access, type.elem, loopVar, ctx, state);

  const body: GoStatementAst[] = [
    assign(
      access.sink,
      call("make", toGoType(type, ctx.imports), call("len", access.source))
    ),
    expressionStatement(call("copy", access.sink, access.source)),
  ];
  if (inner.length > 0) {
    body.push(rangeLoop(loopVar, undefined, access.source, unwrapBlock(inner)));
  }
  return [ifStatement(notNil(access.source), body)];
};

/** Arrays are values; the enclosing shallow copy already duplicated them. */
const walkArray = (
  access: Access,
  type: ArrayType,
  ctx: WalkContext,
  state: WalkState
): readonly GoStatementAst[] => {
  const loopVar = indexed("i", state.depth);
  const inner = walkElement(access, type.elem, loopVar, ctx, state);
  return inner.length === 0
    ? []
    : [rangeLoop(loopVar, undefined, access.source, unwrapBlock(inner))];
};

const walkPointer = (
  access: Access,
  type: PointerType,
  ctx: WalkContext,
  state: WalkState
): readonly GoStatementAst[] => {
  const elem = type.elem;
  // A pointer to an interface has no methods; its pointee is walked below
  const reused =
    elem.kind === "named" && underlyingOf(elem).kind !== "interface"
      ? reuseCopyMethod(access, elem, true, ctx, state)
      : undefined;
  if (reused) {
    return [ifStatement(notNil(access.source), unwrapBlock(reused))];
  }

  // Selectors dereference struct pointers implicitly
  const structPointee =
    elem.kind !== "typeParam" && underlyingOf(elem).kind === "struct";
  const pointee: Access = structPointee
    ? access
    : {
        source: dereference(access.source),
        sink: dereference(access.sink),
        path: access.path,
      };

  return [
    ifStatement(notNil(access.source), [
      assign(access.sink, call("new", toGoType(elem, ctx.imports))),
      assign(dereference(access.sink), dereference(access.source)),
      ...walkType(pointee, elem, ctx, state),
    ]),
  ];
};

const walkChannel = (
  access: Access,
  type: ChannelType,
  ctx: WalkContext
): readonly GoStatementAst[] => [
  ifStatement(notNil(access.source), [
    assign(
      access.sink,
      call("make", toGoType(type, ctx.imports), call("cap", access.source))
    ),
  ]),
];

type Component = {
  readonly value: GoExpressionAst;
  readonly statements: readonly GoStatementAst[];
};

/**
 * Copy of a map key or value through a temporary. Components whose walk
 * emits nothing are used as they are.
 */
const copyComponent = (
  type: TypeDescription,
  name: string,
  temp: string,
  path: string,
  ctx: WalkContext,
  state: WalkState
): Component => {
  const source = identifier(name);
  const sink = identifier(temp);
  const inner = walkType({ source, sink, path }, type, ctx, {
    ...state,
    depth: state.depth + 1,
  });
  if (inner.length === 0) {
    return { value: source, statements: [] };
  }

  const first = inner[0];
  const overwritten =
    first?.kind === "assignment" &&
    !first.define &&
    first.left.kind === "identifier" &&
    first.left.name === temp;
  const seed = overwritten
    ? varDeclaration(temp, toGoType(type, ctx.imports))
    : define(temp, source);

  return { value: sink, statements: [seed, ...inner] };
};

const walkMap = (
  access: Access,
  type: MapType,
  ctx: WalkContext,
  state: WalkState
): readonly GoStatementAst[] => {
  const k = indexed("k", state.depth);
  const v = indexed("v", state.depth);
  const path = entryPath(access.path);

  let body: readonly GoStatementAst[];
  if (ctx.skips.has(path)) {
    body = [assign(index(access.sink, identifier(k)), identifier(v))];
  } else {
    const key = copyComponent(
      type.key,
      k,
      indexed("cpk", state.depth),
      keyPath(access.path),
      ctx,
      state
    );
    const value = copyComponent(type.elem, v, indexed("cpv", state.depth), path, ctx, state);
    body = [
      ...key.statements,
      ...value.statements,
      assign(index(access.sink, key.value), value.value),
    ];
  }

  return [
    ifStatement(notNil(access.source), [
      assign(
        access.sink,
        call("make", toGoType(type, ctx.imports), call("len", access.source))
      ),
      rangeLoop(k, v, access.source, body),
    ]),
  ];
};

/**
 * Statements that deep-copy `access.source` into `access.sink`, which
 * already holds a shallow copy. `initial` marks the root of a request,
 * where method reuse does not apply.
 */
export const walkType = (
  access: Access,
  type: TypeDescription,
  ctx: WalkContext,
  state: WalkState = initialState,
  initial = false
): readonly GoStatementAst[] => {
  switch (type.kind) {
    case "named":
      return walkNamed(access, type, ctx, state, initial);
    case "struct":
      return walkStruct(access, type, ctx, state);
    case "slice":
      return walkSlice(access, type, ctx, state);
    case "array":
      return walkArray(access, type, ctx, state);
    case "pointer":
      return walkPointer(access, type, ctx, state);
    case "chan":
      return walkChannel(access, type, ctx);
    case "map":
      return walkMap(access, type, ctx, state);
    case "interface":
    case "signature":
    case "typeParam":
    case "basic":
      return [];
  }
};
