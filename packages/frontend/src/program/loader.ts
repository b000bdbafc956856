/**
 * Type environment loading
 *
 * Reads a package directory, parses its declarations and turns them into
 * TypeNames in two phases: every top-level type is declared first, then
 * resolved, so self-referential and mutually recursive types work.
 * Imported packages are read on demand when a type refers to them.
 */

import * as path from "node:path";
import { parseFile } from "../parser/parser.js";
import type {
  FileSyntax,
  ImportSyntax,
  NameTypeExpr,
  ParamSyntax,
  SignatureSyntax,
  TypeExpr,
  TypeSpecSyntax,
} from "../parser/syntax.js";
import {
  Diagnostic,
  DiagnosticsCollector,
  SourceLocation,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";
import { isExported, underlyingOf } from "../types/predicates.js";
import { lookupUniverse, unsafePointer } from "../types/universe.js";
import type {
  MethodDescription,
  PackageIdentity,
  Parameter,
  SignatureType,
  TypeDescription,
  TypeName,
} from "../types/type-description.js";
import { FileSystem, nodeFileSystem } from "./file-system.js";
import {
  GoModule,
  candidateDirs,
  findModule,
  importPathOf,
} from "./module.js";
import { toolchainFromEnv } from "./toolchain.js";
import type { GoPackage, LoadOptions, TypeEnvironment } from "./types.js";

type TypeNameBuilder = {
  name: string;
  pkg: PackageIdentity | undefined;
  typeParams: readonly string[];
  underlying: TypeDescription;
  methods: MethodDescription[];
  opaque: boolean;
  position?: SourceLocation;
};

type FileScope = {
  readonly syntax: FileSyntax;
  /** Local package name → import path, filled on first qualified lookup */
  names: Map<string, string> | undefined;
  dotImports: readonly string[];
};

type PackageState = {
  readonly identity: PackageIdentity;
  readonly dir: string | undefined;
  readonly files: readonly FileScope[];
  readonly scope: Map<string, TypeNameBuilder>;
  readonly order: TypeNameBuilder[];
  readonly aliasSpecs: Map<string, { spec: TypeSpecSyntax; file: FileScope }>;
  readonly aliases: Map<string, TypeDescription>;
  readonly opaqueNames: Map<string, TypeNameBuilder>;
  readonly resolved: boolean;
};

type Declaration = {
  readonly builder: TypeNameBuilder;
  readonly pkg: PackageState;
  readonly spec: TypeSpecSyntax;
  readonly file: FileScope;
};

type ResolveContext = {
  readonly pkg: PackageState;
  readonly file: FileScope;
  readonly typeParams: ReadonlySet<string>;
};

const placeholder: TypeDescription = { kind: "struct", fields: [] };

const isIgnored = (text: string): boolean =>
  /^\/\/go:build\s+ignore\s*$/m.test(text) ||
  /^\/\/ \+build\s+ignore\s*$/m.test(text);

/**
 * Best guess of a package name from its import path, for packages that
 * cannot be read.
 */
export const guessPackageName = (importPath: string): string => {
  const segments = importPath.split("/").filter((s) => s.length > 0);
  let last = segments[segments.length - 1] ?? importPath;
  if (/^v\d+$/.test(last) && segments.length > 1) {
    last = segments[segments.length - 2] ?? last;
  }
  return last
    .replace(/^go-/, "")
    .replace(/[.-]go$/, "")
    .replace(/\.v\d+$/, "")
    .replace(/[^\p{L}\p{Nd}_]/gu, "_");
};

/**
 * Read and parse the Go files of one directory.
 */
export const readPackageFiles = (
  fileSystem: FileSystem,
  dir: string
): Result<readonly FileSyntax[], readonly Diagnostic[]> => {
  const files: FileSyntax[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const entry of fileSystem.readDir(dir)) {
    if (!entry.endsWith(".go") || entry.endsWith("_test.go")) continue;
    const filePath = path.join(dir, entry);
    if (fileSystem.isDirectory(filePath)) continue;

    let text: string;
    try {
      text = fileSystem.readFile(filePath);
    } catch (e) {
      diagnostics.push(
        createDiagnostic(
          "DCG2008",
          "error",
          `Failed to read ${filePath}: ${e instanceof Error ? e.message : String(e)}`
        )
      );
      continue;
    }
    if (isIgnored(text)) continue;

    const parsed = parseFile(text, filePath);
    if (parsed.ok) {
      files.push(parsed.value);
    } else {
      diagnostics.push(...parsed.error);
    }
  }

  return diagnostics.length > 0 ? error(diagnostics) : ok(files);
};

const createLoader = (
  fileSystem: FileSystem,
  module: GoModule | undefined,
  options: LoadOptions
) => {
  const toolchain = options.toolchain ?? toolchainFromEnv();
  const packages = new Map<string, PackageState>();
  const declarations = new Map<TypeName, Declaration>();
  const states = new Map<TypeName, "resolving" | "done">();
  const resolvingAliases = new Set<string>();
  const warnings: Diagnostic[] = [];
  const warned = new Set<string>();

  const warn = (
    key: string,
    code: "DCG2006" | "DCG2007",
    message: string,
    location?: SourceLocation
  ): void => {
    if (warned.has(key)) return;
    warned.add(key);
    warnings.push(createDiagnostic(code, "warning", message, location));
  };

  const addPackage = (
    identity: PackageIdentity,
    dir: string | undefined,
    syntaxes: readonly FileSyntax[]
  ): PackageState => {
    const state: PackageState = {
      identity,
      dir,
      files: syntaxes.map((syntax) => ({
        syntax,
        names: undefined,
        dotImports: [],
      })),
      scope: new Map(),
      order: [],
      aliasSpecs: new Map(),
      aliases: new Map(),
      opaqueNames: new Map(),
      resolved: dir !== undefined,
    };
    packages.set(identity.path, state);

    for (const file of state.files) {
      for (const spec of file.syntax.types) {
        if (state.scope.has(spec.name) || state.aliasSpecs.has(spec.name)) {
          continue;
        }
        if (spec.alias) {
          state.aliasSpecs.set(spec.name, { spec, file });
          continue;
        }
        const builder: TypeNameBuilder = {
          name: spec.name,
          pkg: identity,
          typeParams: spec.typeParams,
          underlying: placeholder,
          methods: [],
          opaque: false,
          position: spec.location,
        };
        state.scope.set(spec.name, builder);
        state.order.push(builder);
        declarations.set(builder, { builder, pkg: state, spec, file });
      }
    }

    if (options.verbose) {
      console.error(
        `Loaded package ${identity.path} (${syntaxes.length} files, ${state.order.length} types)`
      );
    }
    return state;
  };

  const importPackage = (importPath: string): PackageState => {
    const cached = packages.get(importPath);
    if (cached) return cached;

    for (const dir of candidateDirs(module, importPath, toolchain)) {
      if (!fileSystem.isDirectory(dir)) continue;
      const read = readPackageFiles(fileSystem, dir);
      const first = read.ok ? read.value[0] : undefined;
      if (!read.ok) {
        const reason = read.error[0]?.message ?? "unreadable";
        warn(
          `pkg:${importPath}`,
          "DCG2006",
          `Package ${importPath} could not be parsed (${reason}); its types are copied shallowly`
        );
        break;
      }
      if (!first) continue;

      const state = addPackage(
        { path: importPath, name: first.packageName },
        dir,
        read.value
      );
      resolvePackage(state);
      return state;
    }

    return addPackage(
      { path: importPath, name: guessPackageName(importPath) },
      undefined,
      []
    );
  };

  const opaqueName = (
    pkg: PackageState,
    name: string,
    location: SourceLocation | undefined
  ): TypeNameBuilder => {
    const cached = pkg.opaqueNames.get(name);
    if (cached) return cached;

    if (pkg.resolved) {
      warn(
        `name:${pkg.identity.path}.${name}`,
        "DCG2007",
        `Undefined type ${name} in package ${pkg.identity.path}`,
        location
      );
    } else {
      warn(
        `pkg:${pkg.identity.path}`,
        "DCG2006",
        `Cannot find package ${pkg.identity.path}; its types are copied shallowly`,
        location
      );
    }

    const builder: TypeNameBuilder = {
      name,
      pkg: pkg.identity,
      typeParams: [],
      underlying: placeholder,
      methods: [],
      opaque: true,
      position: location,
    };
    pkg.opaqueNames.set(name, builder);
    return builder;
  };

  /** Local package name → import path for one file. */
  const importNames = (file: FileScope): Map<string, string> => {
    if (file.names) return file.names;

    const names = new Map<string, string>();
    const dots: string[] = [];
    const implicit: ImportSyntax[] = [];
    for (const spec of file.syntax.imports) {
      if (spec.name === "_") continue;
      if (spec.name === ".") {
        dots.push(spec.path);
      } else if (spec.name) {
        names.set(spec.name, spec.path);
      } else if (spec.path === "unsafe") {
        names.set("unsafe", "unsafe");
      } else {
        implicit.push(spec);
      }
    }
    for (const spec of implicit) {
      const name = importPackage(spec.path).identity.name;
      if (!names.has(name)) names.set(name, spec.path);
    }

    file.names = names;
    file.dotImports = dots;
    return names;
  };

  const lookupIn = (
    pkg: PackageState,
    expr: NameTypeExpr,
    typeArgs: readonly TypeDescription[]
  ): TypeDescription => {
    const builder = pkg.scope.get(expr.name);
    if (builder) return { kind: "named", obj: builder, typeArgs };
    if (pkg.aliasSpecs.has(expr.name)) return resolveAlias(pkg, expr.name);
    return {
      kind: "named",
      obj: opaqueName(pkg, expr.name, expr.location),
      typeArgs,
    };
  };

  const resolveName = (
    expr: NameTypeExpr,
    ctx: ResolveContext
  ): TypeDescription => {
    const typeArgs = expr.typeArgs.map((arg) => resolveType(arg, ctx));

    if (expr.qualifier !== undefined) {
      const importPath = importNames(ctx.file).get(expr.qualifier);
      if (importPath === "unsafe" && expr.name === "Pointer") {
        return unsafePointer;
      }
      if (importPath === undefined) {
        const pseudo = importPackage(expr.qualifier);
        return lookupIn(pseudo, expr, typeArgs);
      }
      return lookupIn(importPackage(importPath), expr, typeArgs);
    }

    if (ctx.typeParams.has(expr.name)) {
      return { kind: "typeParam", name: expr.name };
    }

    if (ctx.pkg.scope.has(expr.name) || ctx.pkg.aliasSpecs.has(expr.name)) {
      return lookupIn(ctx.pkg, expr, typeArgs);
    }

    const hasDotImports = ctx.file.syntax.imports.some((i) => i.name === ".");
    if (hasDotImports) importNames(ctx.file);
    for (const dotPath of ctx.file.dotImports) {
      const dotPkg = importPackage(dotPath);
      if (dotPkg.scope.has(expr.name) || dotPkg.aliasSpecs.has(expr.name)) {
        return lookupIn(dotPkg, expr, typeArgs);
      }
    }

    const predeclared = lookupUniverse(expr.name);
    if (predeclared) return predeclared;

    return lookupIn(ctx.pkg, expr, typeArgs);
  };

  const resolveParams = (
    params: readonly ParamSyntax[],
    ctx: ResolveContext
  ): readonly Parameter[] =>
    params.map((p) => ({ name: p.name, type: resolveType(p.type, ctx) }));

  const resolveSignature = (
    signature: SignatureSyntax,
    ctx: ResolveContext
  ): SignatureType => ({
    kind: "signature",
    params: resolveParams(signature.params, ctx),
    results: resolveParams(signature.results, ctx),
    variadic: signature.variadic,
  });

  const resolveType = (expr: TypeExpr, ctx: ResolveContext): TypeDescription => {
    switch (expr.kind) {
      case "name":
        return resolveName(expr, ctx);
      case "pointer":
        return { kind: "pointer", elem: resolveType(expr.elem, ctx) };
      case "slice":
        return { kind: "slice", elem: resolveType(expr.elem, ctx) };
      case "array":
        return {
          kind: "array",
          length: expr.length,
          elem: resolveType(expr.elem, ctx),
        };
      case "map":
        return {
          kind: "map",
          key: resolveType(expr.key, ctx),
          elem: resolveType(expr.value, ctx),
        };
      case "chan":
        return {
          kind: "chan",
          dir: expr.dir,
          elem: resolveType(expr.elem, ctx),
        };
      case "struct":
        return {
          kind: "struct",
          fields: expr.fields.map((field) => ({
            name: field.name,
            type: resolveType(field.type, ctx),
            exported: isExported(field.name),
            embedded: field.embedded,
            tag: field.tag,
            position: field.location,
          })),
        };
      case "interface":
        return {
          kind: "interface",
          methods: expr.methods.map((m) => ({
            name: m.name,
            signature: resolveSignature(m.signature, ctx),
          })),
          embeddeds: expr.embeddeds.map((e) => resolveType(e, ctx)),
        };
      case "func":
        return resolveSignature(expr.signature, ctx);
    }
  };

  const resolveAlias = (pkg: PackageState, name: string): TypeDescription => {
    const cached = pkg.aliases.get(name);
    if (cached) return cached;

    const entry = pkg.aliasSpecs.get(name);
    const key = `${pkg.identity.path}.${name}`;
    if (!entry || resolvingAliases.has(key)) return placeholder;

    resolvingAliases.add(key);
    const target = resolveType(entry.spec.type, {
      pkg,
      file: entry.file,
      typeParams: new Set(entry.spec.typeParams),
    });
    resolvingAliases.delete(key);
    pkg.aliases.set(name, target);
    return target;
  };

  const ensureResolved = (obj: TypeName): void => {
    if (states.has(obj)) return;
    const decl = declarations.get(obj);
    if (!decl) return;

    states.set(obj, "resolving");
    const rhs = resolveType(decl.spec.type, {
      pkg: decl.pkg,
      file: decl.file,
      typeParams: new Set(decl.spec.typeParams),
    });
    if (rhs.kind === "named") {
      // `type A B` takes B's underlying type, not its methods
      ensureResolved(rhs.obj);
      decl.builder.underlying = underlyingOf(rhs);
    } else {
      decl.builder.underlying = rhs;
    }
    states.set(obj, "done");
  };

  const resolveMethods = (pkg: PackageState): void => {
    for (const file of pkg.files) {
      for (const fn of file.syntax.funcs) {
        const receiver = fn.receiver;
        if (!receiver) continue;
        const builder = pkg.scope.get(receiver.typeName);
        if (!builder) continue;

        const ctx: ResolveContext = {
          pkg,
          file,
          typeParams: new Set([...receiver.typeArgs, ...fn.typeParams]),
        };
        const named: TypeDescription = {
          kind: "named",
          obj: builder,
          typeArgs: receiver.typeArgs.map((name) => ({
            kind: "typeParam",
            name,
          })),
        };
        builder.methods.push({
          name: fn.name,
          pointerReceiver: receiver.pointer,
          receiver: receiver.pointer ? { kind: "pointer", elem: named } : named,
          signature: resolveSignature(fn.signature, ctx),
        });
      }
    }
  };

  const resolvePackage = (pkg: PackageState): void => {
    for (const builder of pkg.order) {
      ensureResolved(builder);
    }
    for (const name of pkg.aliasSpecs.keys()) {
      resolveAlias(pkg, name);
    }
    resolveMethods(pkg);
  };

  const declaredNames = (pkg: PackageState): readonly string[] => {
    const names = pkg.files.flatMap(({ syntax }) => [
      ...syntax.types.map((t) => t.name),
      ...syntax.funcs
        .filter((fn) => !fn.receiver && fn.name !== "init")
        .map((fn) => fn.name),
      ...syntax.values,
    ]);
    return [...new Set(names)].filter((name) => name !== "_").sort();
  };

  const toGoPackage = (pkg: PackageState): GoPackage => ({
    identity: pkg.identity,
    dir: pkg.dir,
    files: pkg.files.map((f) => f.syntax.fileName),
    imports: [
      ...new Set(pkg.files.flatMap((f) => f.syntax.imports.map((i) => i.path))),
    ].sort(),
    types: pkg.order,
    aliases: pkg.aliases,
    declaredNames: declaredNames(pkg),
    resolved: pkg.resolved,
  });

  return {
    addPackage,
    resolvePackage,
    packages: (): readonly GoPackage[] =>
      [...packages.values()].map(toGoPackage),
    warnings: (): readonly Diagnostic[] => warnings,
  };
};

/**
 * Load the package in `dir` and every package its types refer to.
 */
export const loadPackage = (
  dir: string,
  options: LoadOptions = {}
): Result<TypeEnvironment, DiagnosticsCollector> => {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const absoluteDir = path.resolve(dir);

  if (!fileSystem.isDirectory(absoluteDir)) {
    return error(
      createDiagnosticsCollector([
        createDiagnostic(
          "DCG2001",
          "error",
          `Package directory not found: ${absoluteDir}`
        ),
      ])
    );
  }

  const read = readPackageFiles(fileSystem, absoluteDir);
  if (!read.ok) {
    return error(createDiagnosticsCollector(read.error));
  }

  const files = read.value;
  const first = files[0];
  if (!first) {
    return error(
      createDiagnosticsCollector([
        createDiagnostic(
          "DCG2002",
          "error",
          `No Go source files in ${absoluteDir}`
        ),
      ])
    );
  }

  const mismatched = files.find((f) => f.packageName !== first.packageName);
  if (mismatched) {
    return error(
      createDiagnosticsCollector([
        createDiagnostic(
          "DCG2005",
          "error",
          `Found packages ${first.packageName} (${path.basename(first.fileName)}) and ${mismatched.packageName} (${path.basename(mismatched.fileName)}) in ${absoluteDir}`
        ),
      ])
    );
  }

  const module = findModule(fileSystem, absoluteDir);
  const loader = createLoader(fileSystem, module, options);
  const target = loader.addPackage(
    {
      path: importPathOf(module, absoluteDir, first.packageName),
      name: first.packageName,
    },
    absoluteDir,
    files
  );
  loader.resolvePackage(target);

  const packages = loader.packages();
  const targetPackage = packages.find(
    (p) => p.identity.path === target.identity.path
  );
  if (!targetPackage) {
    return error(
      createDiagnosticsCollector([
        createDiagnostic("DCG2002", "error", `Package ${absoluteDir} was not loaded`),
      ])
    );
  }

  return ok({
    target: targetPackage,
    packages: [
      targetPackage,
      ...packages.filter((p) => p !== targetPackage),
    ],
    warnings: loader.warnings(),
  });
};
