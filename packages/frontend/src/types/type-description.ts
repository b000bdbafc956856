/**
 * Type descriptions for a loaded Go package.
 *
 * A TypeDescription is read-only once the loader hands it out. Named types
 * point at a shared TypeName, so the graph may contain cycles
 * (`type Node struct { Next *Node }`).
 */

import type { SourceLocation } from "./diagnostic.js";

export type PackageIdentity = {
  readonly path: string;
  readonly name: string;
};

export type TypeDescription =
  | NamedType
  | StructType
  | SliceType
  | ArrayType
  | PointerType
  | MapType
  | ChannelType
  | InterfaceType
  | SignatureType
  | TypeParamType
  | BasicType;

export type TypeKind = TypeDescription["kind"];

export type TypeName = {
  readonly name: string;
  /** Undefined for predeclared names (`error`, `any`) */
  readonly pkg: PackageIdentity | undefined;
  readonly typeParams: readonly string[];
  readonly underlying: TypeDescription;
  readonly methods: readonly MethodDescription[];
  /** Declared in a package the loader could not read */
  readonly opaque: boolean;
  readonly position?: SourceLocation;
};

export type MethodDescription = {
  readonly name: string;
  readonly pointerReceiver: boolean;
  /** Receiver as written: `T` or `*T` */
  readonly receiver: TypeDescription;
  readonly signature: SignatureType;
};

export type NamedType = {
  readonly kind: "named";
  readonly obj: TypeName;
  readonly typeArgs: readonly TypeDescription[];
};

export type Field = {
  readonly name: string;
  readonly type: TypeDescription;
  readonly exported: boolean;
  readonly embedded: boolean;
  readonly tag?: string;
  readonly position?: SourceLocation;
};

export type StructType = {
  readonly kind: "struct";
  readonly fields: readonly Field[];
};

export type SliceType = {
  readonly kind: "slice";
  readonly elem: TypeDescription;
};

export type ArrayType = {
  readonly kind: "array";
  /** Length expression as written, e.g. `4` or `maxItems` */
  readonly length: string;
  readonly elem: TypeDescription;
};

export type PointerType = {
  readonly kind: "pointer";
  readonly elem: TypeDescription;
};

export type MapType = {
  readonly kind: "map";
  readonly key: TypeDescription;
  readonly elem: TypeDescription;
};

export type ChannelDirection = "both" | "send" | "recv";

export type ChannelType = {
  readonly kind: "chan";
  readonly dir: ChannelDirection;
  readonly elem: TypeDescription;
};

export type InterfaceMethod = {
  readonly name: string;
  readonly signature: SignatureType;
};

export type InterfaceType = {
  readonly kind: "interface";
  readonly methods: readonly InterfaceMethod[];
  readonly embeddeds: readonly TypeDescription[];
};

export type Parameter = {
  readonly name?: string;
  readonly type: TypeDescription;
};

export type SignatureType = {
  readonly kind: "signature";
  readonly params: readonly Parameter[];
  readonly results: readonly Parameter[];
  readonly variadic: boolean;
};

export type TypeParamType = {
  readonly kind: "typeParam";
  readonly name: string;
};

export type BasicType = {
  readonly kind: "basic";
  readonly name: string;
};
