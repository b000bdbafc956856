import { describe, it } from "mocha";
import { expect } from "chai";
import { createMemoryFileSystem } from "./file-system.js";
import { guessPackageName, loadPackage } from "./loader.js";
import type { TypeEnvironment } from "./types.js";
import type { TypeName } from "../types/type-description.js";

const workspace = createMemoryFileSystem({
  "/work/go.mod":
    "module example.com/app\n\ngo 1.22\n\nreplace example.com/lib => ./third_party/lib\n",
  "/work/models/models.go": `package models

import (
	"time"

	"example.com/app/shared"
	"example.com/lib"
)

type Node struct {
	Next *Node
	Meta shared.Meta
	Ext  lib.Thing
	When time.Time
}

type Alias = Node

type Named Node

func (n *Node) DeepCopy() *Node { return nil }
`,
  "/work/models/models_test.go": "package models_test\n",
  "/work/models/tool.go": "//go:build ignore\n\npackage main\n",
  "/work/shared/shared.go":
    "package shared\n\ntype Meta struct {\n\tLabels map[string]string\n}\n",
  "/work/third_party/lib/lib.go":
    "package lib\n\ntype Thing struct{ hidden []int }\n",
});

const load = (): TypeEnvironment => {
  const result = loadPackage("/work/models", { fileSystem: workspace });
  if (!result.ok) {
    throw new Error(result.error.diagnostics.map((d) => d.message).join("; "));
  }
  return result.value;
};

const typeNamed = (env: TypeEnvironment, name: string): TypeName => {
  const found = env.target.types.find((t) => t.name === name);
  if (!found) throw new Error(`missing ${name}`);
  return found;
};

describe("Package loader", () => {
  it("should derive the import path from go.mod", () => {
    const env = load();
    expect(env.target.identity).to.deep.equal({
      path: "example.com/app/models",
      name: "models",
    });
    expect(env.target.files).to.deep.equal(["/work/models/models.go"]);
  });

  it("should list the target first and then the packages reached", () => {
    const env = load();
    expect(env.packages.map((p) => p.identity.path)).to.deep.equal([
      "example.com/app/models",
      "time",
      "example.com/app/shared",
      "example.com/lib",
    ]);
    expect(env.target.imports).to.deep.equal([
      "example.com/app/shared",
      "example.com/lib",
      "time",
    ]);
  });

  it("should keep type definitions in declaration order without aliases", () => {
    const env = load();
    expect(env.target.types.map((t) => t.name)).to.deep.equal([
      "Node",
      "Named",
    ]);
  });

  it("should resolve self references and foreign types", () => {
    const env = load();
    const node = typeNamed(env, "Node");
    if (node.underlying.kind !== "struct") throw new Error("expected struct");
    const [next, meta, ext, when] = node.underlying.fields;

    expect(next?.type.kind).to.equal("pointer");
    if (next?.type.kind === "pointer" && next.type.elem.kind === "named") {
      expect(next.type.elem.obj).to.equal(node);
    }

    expect(meta?.type.kind === "named" ? meta.type.obj.pkg : undefined).to.deep.equal({
      path: "example.com/app/shared",
      name: "shared",
    });
    expect(ext?.type.kind === "named" ? ext.type.obj.opaque : undefined).to.equal(
      false
    );
    expect(when?.type.kind === "named" ? when.type.obj.opaque : undefined).to.equal(
      true
    );
  });

  it("should warn once about a package that cannot be found", () => {
    const env = load();
    expect(env.warnings.map((w) => [w.code, w.message])).to.deep.equal([
      ["DCG2006", "Cannot find package time; its types are copied shallowly"],
    ]);
  });

  it("should attach methods to their receiver type", () => {
    const env = load();
    const node = typeNamed(env, "Node");
    expect(node.methods.map((m) => [m.name, m.pointerReceiver])).to.deep.equal([
      ["DeepCopy", true],
    ]);
  });

  it("should give a defined type the underlying type but not the methods", () => {
    const env = load();
    const named = typeNamed(env, "Named");
    expect(named.underlying).to.equal(typeNamed(env, "Node").underlying);
    expect(named.methods).to.deep.equal([]);
  });

  it("should resolve aliases to their target", () => {
    const env = load();
    const alias = env.target.aliases.get("Alias");
    expect(alias?.kind === "named" ? alias.obj : undefined).to.equal(
      typeNamed(env, "Node")
    );
  });

  it("should substitute type arguments of generic instantiations", () => {
    const fileSystem = createMemoryFileSystem({
      "/gen/list.go":
        "package gen\n\ntype List[T any] struct {\n\tItems []T\n}\n\ntype Ints List[int]\n",
    });
    const result = loadPackage("/gen", { fileSystem });
    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    expect(result.value.target.identity.path).to.equal("gen");
    const ints = result.value.target.types.find((t) => t.name === "Ints");
    if (ints?.underlying.kind !== "struct") throw new Error("expected struct");
    expect(ints.underlying.fields[0]?.type).to.deep.equal({
      kind: "slice",
      elem: { kind: "basic", name: "int" },
    });
  });

  it("should warn about undefined names and keep them opaque", () => {
    const fileSystem = createMemoryFileSystem({
      "/p/p.go": "package p\n\ntype T struct {\n\tX Missing\n}\n",
    });
    const result = loadPackage("/p", { fileSystem });
    if (!result.ok) throw new Error("expected success");
    expect(result.value.warnings.map((w) => w.code)).to.deep.equal(["DCG2007"]);
    expect(result.value.warnings[0]?.message).to.equal(
      "Undefined type Missing in package p"
    );
  });

  it("should read the standard library and required modules from the toolchain", () => {
    const fileSystem = createMemoryFileSystem({
      "/work/go.mod":
        "module example.com/app\n\ngo 1.22\n\nrequire github.com/Acme/labels v1.2.0\n",
      "/work/models/query.go": `package models

import (
	"net/url"

	"github.com/Acme/labels"
)

type Query struct {
	L labels.Set
	V url.Values
}
`,
      "/cache/github.com/!acme/labels@v1.2.0/labels.go":
        "package labels\n\ntype Set map[string]string\n",
      "/goroot/src/net/url/url.go":
        "package url\n\ntype Values map[string][]string\n",
    });
    const result = loadPackage("/work/models", {
      fileSystem,
      toolchain: { goRoot: "/goroot", moduleCache: "/cache" },
    });
    if (!result.ok) throw new Error("expected success");
    const env = result.value;

    expect(env.warnings).to.deep.equal([]);
    expect(
      env.packages.map((p) => [p.identity.path, p.identity.name, p.dir])
    ).to.deep.equal([
      ["example.com/app/models", "models", "/work/models"],
      ["net/url", "url", "/goroot/src/net/url"],
      ["github.com/Acme/labels", "labels", "/cache/github.com/!acme/labels@v1.2.0"],
    ]);

    const query = typeNamed(env, "Query");
    if (query.underlying.kind !== "struct") throw new Error("expected struct");
    const kinds = query.underlying.fields.map((f) =>
      f.type.kind === "named" ? [f.type.obj.opaque, f.type.obj.underlying.kind] : []
    );
    expect(kinds).to.deep.equal([
      [false, "map"],
      [false, "map"],
    ]);
  });

  it("should list package-scope names", () => {
    const fileSystem = createMemoryFileSystem({
      "/p/a.go": "package p\n\ntype T struct{}\n\nfunc (T) M() {}\n\nfunc init() {}\n",
      "/p/b.go": "package p\n\nconst (\n\tutil = 1\n\t_ = 2\n)\n\nvar cache map[string]int\n\nfunc Helper() {}\n",
    });
    const result = loadPackage("/p", { fileSystem, toolchain: {} });
    if (!result.ok) throw new Error("expected success");
    expect(result.value.target.declaredNames).to.deep.equal([
      "Helper",
      "T",
      "cache",
      "util",
    ]);
  });

  describe("failures", () => {
    const fileSystem = createMemoryFileSystem({
      "/empty/README.md": "nothing here\n",
      "/mix/a.go": "package a\n",
      "/mix/b.go": "package b\n",
      "/broken/x.go": "package broken\n\ntype T struct {\n",
    });

    const codesOf = (dir: string): readonly string[] => {
      const result = loadPackage(dir, { fileSystem });
      return result.ok ? [] : result.error.diagnostics.map((d) => d.code);
    };

    it("should report a missing directory", () => {
      expect(codesOf("/missing")).to.deep.equal(["DCG2001"]);
    });

    it("should report a directory without Go files", () => {
      expect(codesOf("/empty")).to.deep.equal(["DCG2002"]);
    });

    it("should report files that disagree on the package name", () => {
      expect(codesOf("/mix")).to.deep.equal(["DCG2005"]);
    });

    it("should report syntax errors", () => {
      expect(codesOf("/broken")).to.deep.equal(["DCG2004"]);
    });
  });
});

describe("guessPackageName", () => {
  it("should use the last path segment", () => {
    expect(guessPackageName("example.com/app/shared")).to.equal("shared");
  });

  it("should skip a major version suffix", () => {
    expect(guessPackageName("example.com/lib/v2")).to.equal("lib");
  });

  it("should strip common repository decorations", () => {
    expect(guessPackageName("github.com/acme/go-widgets")).to.equal("widgets");
    expect(guessPackageName("gopkg.in/yaml.v3")).to.equal("yaml");
  });
});
