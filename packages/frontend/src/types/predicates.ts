/**
 * Queries over type descriptions
 */

import type {
  NamedType,
  Parameter,
  SignatureType,
  TypeDescription,
} from "./type-description.js";

export const isExported = (name: string): boolean => /^\p{Lu}/u.test(name);

/**
 * Strip one level of pointer: `*T` → [T, true], `T` → [T, false].
 */
export const stripPointer = (
  type: TypeDescription
): readonly [TypeDescription, boolean] =>
  type.kind === "pointer" ? [type.elem, true] : [type, false];

/**
 * Replace type parameters by name.
 */
export const substitute = (
  type: TypeDescription,
  mapping: ReadonlyMap<string, TypeDescription>
): TypeDescription => {
  if (mapping.size === 0) return type;

  const sub = (t: TypeDescription): TypeDescription => substitute(t, mapping);
  const subParams = (params: readonly Parameter[]): readonly Parameter[] =>
    params.map((p) => ({ ...p, type: sub(p.type) }));

  switch (type.kind) {
    case "typeParam":
      return mapping.get(type.name) ?? type;
    case "named":
      return type.typeArgs.length === 0
        ? type
        : { ...type, typeArgs: type.typeArgs.map(sub) };
    case "struct":
      return {
        ...type,
        fields: type.fields.map((f) => ({ ...f, type: sub(f.type) })),
      };
    case "slice":
    case "pointer":
    case "chan":
    case "array":
      return { ...type, elem: sub(type.elem) };
    case "map":
      return { ...type, key: sub(type.key), elem: sub(type.elem) };
    case "signature":
      return {
        ...type,
        params: subParams(type.params),
        results: subParams(type.results),
      };
    case "interface":
      return {
        ...type,
        methods: type.methods.map((m) => ({
          ...m,
          signature: substituteSignature(m.signature, mapping),
        })),
        embeddeds: type.embeddeds.map(sub),
      };
    case "basic":
      return type;
  }
};

const substituteSignature = (
  signature: SignatureType,
  mapping: ReadonlyMap<string, TypeDescription>
): SignatureType => {
  const result = substitute(signature, mapping);
  return result.kind === "signature" ? result : signature;
};

/**
 * Underlying type of a named type with its type arguments applied.
 * Other descriptions are their own underlying type.
 */
export const underlyingOf = (type: TypeDescription): TypeDescription => {
  let current = type;
  // `type A B` chains are resolved by the loader, but guard against
  // invalid recursive definitions anyway.
  for (let depth = 0; current.kind === "named" && depth < 32; depth++) {
    const { obj, typeArgs } = current;
    const mapping = new Map<string, TypeDescription>();
    obj.typeParams.forEach((param, i) => {
      const arg = typeArgs[i];
      if (arg) mapping.set(param, arg);
    });
    current = substitute(obj.underlying, mapping);
  }
  return current;
};

const identicalParams = (
  a: readonly Parameter[],
  b: readonly Parameter[]
): boolean =>
  a.length === b.length &&
  a.every((p, i) => {
    const q = b[i];
    return q !== undefined && identical(p.type, q.type);
  });

/**
 * Go type identity: named types are identical when they share a
 * declaration and type arguments; other types compare structurally.
 */
export const identical = (a: TypeDescription, b: TypeDescription): boolean => {
  if (a === b) return true;

  switch (a.kind) {
    case "named":
      return (
        b.kind === "named" &&
        sameTypeName(a, b) &&
        a.typeArgs.length === b.typeArgs.length &&
        a.typeArgs.every((arg, i) => {
          const other = b.typeArgs[i];
          return other !== undefined && identical(arg, other);
        })
      );
    case "basic":
      return b.kind === "basic" && aliasBasic(a.name) === aliasBasic(b.name);
    case "typeParam":
      return b.kind === "typeParam" && a.name === b.name;
    case "slice":
    case "pointer":
      return b.kind === a.kind && identical(a.elem, b.elem);
    case "array":
      return (
        b.kind === "array" && a.length === b.length && identical(a.elem, b.elem)
      );
    case "chan":
      return b.kind === "chan" && a.dir === b.dir && identical(a.elem, b.elem);
    case "map":
      return (
        b.kind === "map" && identical(a.key, b.key) && identical(a.elem, b.elem)
      );
    case "struct":
      return (
        b.kind === "struct" &&
        a.fields.length === b.fields.length &&
        a.fields.every((f, i) => {
          const g = b.fields[i];
          return (
            g !== undefined &&
            f.name === g.name &&
            f.embedded === g.embedded &&
            f.tag === g.tag &&
            identical(f.type, g.type)
          );
        })
      );
    case "signature":
      return (
        b.kind === "signature" &&
        a.variadic === b.variadic &&
        identicalParams(a.params, b.params) &&
        identicalParams(a.results, b.results)
      );
    case "interface":
      return (
        b.kind === "interface" &&
        a.methods.length === b.methods.length &&
        a.embeddeds.length === b.embeddeds.length &&
        a.methods.every((m) => {
          const n = b.methods.find((x) => x.name === m.name);
          return n !== undefined && identical(m.signature, n.signature);
        }) &&
        a.embeddeds.every((e, i) => {
          const f = b.embeddeds[i];
          return f !== undefined && identical(e, f);
        })
      );
  }
};

const sameTypeName = (a: NamedType, b: NamedType): boolean =>
  a.obj === b.obj ||
  (a.obj.name === b.obj.name && a.obj.pkg?.path === b.obj.pkg?.path);

const aliasBasic = (name: string): string => {
  if (name === "byte") return "uint8";
  if (name === "rune") return "int32";
  return name;
};
