/**
 * Predeclared Go types
 */

import type {
  BasicType,
  InterfaceType,
  NamedType,
  TypeDescription,
  TypeName,
} from "./type-description.js";

const BASIC_NAMES = [
  "bool",
  "string",
  "int",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "uintptr",
  "float32",
  "float64",
  "complex64",
  "complex128",
  "byte",
  "rune",
] as const;

const basicTypes: ReadonlyMap<string, BasicType> = new Map(
  BASIC_NAMES.map((name) => [name, { kind: "basic", name }] as const)
);

const emptyInterface: InterfaceType = {
  kind: "interface",
  methods: [],
  embeddeds: [],
};

const errorTypeName: TypeName = {
  name: "error",
  pkg: undefined,
  typeParams: [],
  underlying: {
    kind: "interface",
    methods: [
      {
        name: "Error",
        signature: {
          kind: "signature",
          params: [],
          results: [{ type: { kind: "basic", name: "string" } }],
          variadic: false,
        },
      },
    ],
    embeddeds: [],
  },
  methods: [],
  opaque: false,
};

const errorType: NamedType = {
  kind: "named",
  obj: errorTypeName,
  typeArgs: [],
};

/**
 * Look up a predeclared type name. `any` is an alias of `interface{}`.
 */
export const lookupUniverse = (name: string): TypeDescription | undefined => {
  if (name === "any") return emptyInterface;
  if (name === "error") return errorType;
  if (name === "comparable") return emptyInterface;
  return basicTypes.get(name);
};

/**
 * `unsafe.Pointer` has no package on disk to read.
 */
export const unsafePointer: NamedType = {
  kind: "named",
  obj: {
    name: "Pointer",
    pkg: { path: "unsafe", name: "unsafe" },
    typeParams: [],
    underlying: { kind: "basic", name: "unsafe.Pointer" },
    methods: [],
    opaque: false,
  },
  typeArgs: [],
};
