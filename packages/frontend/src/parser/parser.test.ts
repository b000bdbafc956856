import { describe, it } from "mocha";
import { expect } from "chai";
import { parseFile } from "./parser.js";
import type { FileSyntax, TypeExpr } from "./syntax.js";

const source = `package shapes

import (
	"fmt"
	geo "example.com/geo"
	_ "example.com/side"
)

type Point struct {
	X, Y int \`json:"x"\`
	geo.Origin
	*Label
	Tags []string
}

type Pair[K comparable, V any] struct {
	Key K
	Val V
}

type ID = string

type Grid [4][4]int

func (p *Point) DeepCopy() *Point { return nil }

func helper(a, b int, rest ...string) (int, error) {
	return 0, nil
}

var lookup = map[string]int{"a": 1}
`;

const parse = (text: string): FileSyntax => {
  const result = parseFile(text, "test.go");
  if (!result.ok) {
    throw new Error(result.error.map((d) => d.message).join("; "));
  }
  return result.value;
};

const nameOf = (type: TypeExpr | undefined): string | undefined =>
  type?.kind === "name" ? type.name : undefined;

describe("Parser", () => {
  const file = parse(source);

  it("should read the package clause and imports", () => {
    expect(file.packageName).to.equal("shapes");
    expect(file.imports.map((i) => [i.name, i.path])).to.deep.equal([
      [undefined, "fmt"],
      ["geo", "example.com/geo"],
      ["_", "example.com/side"],
    ]);
  });

  it("should collect type declarations in order", () => {
    expect(file.types.map((t) => t.name)).to.deep.equal([
      "Point",
      "Pair",
      "ID",
      "Grid",
    ]);
  });

  it("should parse struct fields with tags and embedded fields", () => {
    const point = file.types[0];
    if (point?.type.kind !== "struct") {
      throw new Error("expected struct");
    }
    const fields = point.type.fields;
    expect(fields.map((f) => [f.name, f.embedded])).to.deep.equal([
      ["X", false],
      ["Y", false],
      ["Origin", true],
      ["Label", true],
      ["Tags", false],
    ]);
    expect(fields[0]?.tag).to.equal('json:"x"');
    expect(fields[1]?.tag).to.equal('json:"x"');
    const origin = fields[2]?.type;
    expect(origin?.kind === "name" ? origin.qualifier : undefined).to.equal(
      "geo"
    );
    expect(fields[3]?.type.kind).to.equal("pointer");
    expect(fields[4]?.type.kind).to.equal("slice");
  });

  it("should parse type parameters", () => {
    expect(file.types[1]?.typeParams).to.deep.equal(["K", "V"]);
  });

  it("should parse alias declarations", () => {
    const id = file.types[2];
    expect(id?.alias).to.equal(true);
    expect(nameOf(id?.type)).to.equal("string");
  });

  it("should tell array types from type parameters", () => {
    const grid = file.types[3];
    expect(grid?.typeParams).to.deep.equal([]);
    const type = grid?.type;
    if (type?.kind !== "array" || type.elem.kind !== "array") {
      throw new Error("expected nested array");
    }
    expect(type.length).to.equal("4");
    expect(nameOf(type.elem.elem)).to.equal("int");
  });

  it("should parse method receivers and results", () => {
    const method = file.funcs[0];
    expect(method?.name).to.equal("DeepCopy");
    expect(method?.receiver).to.deep.equal({
      name: "p",
      pointer: true,
      typeName: "Point",
      typeArgs: [],
    });
    expect(method?.signature.params).to.deep.equal([]);
    const result = method?.signature.results[0]?.type;
    expect(result?.kind).to.equal("pointer");
  });

  it("should group parameter names with the following type", () => {
    const helper = file.funcs[1];
    expect(helper?.signature.params.map((p) => [p.name, nameOf(p.type)])).to.deep.equal([
      ["a", "int"],
      ["b", "int"],
      ["rest", "string"],
    ]);
    expect(helper?.signature.variadic).to.equal(true);
    expect(
      helper?.signature.results.map((r) => nameOf(r.type))
    ).to.deep.equal(["int", "error"]);
  });

  it("should record the names of top-level vars and consts", () => {
    expect(file.values).to.deep.equal(["lookup"]);

    const parsed = parse(`package p

const (
	First = iota
	Second
)

var a, b = f(1, 2), []int{3}

var (
	table map[string]int
	_     = 1
)
`);
    expect(parsed.values).to.deep.equal(["First", "Second", "a", "b", "table", "_"]);
  });

  it("should parse generic receivers", () => {
    const parsed = parse(
      "package p\n\nfunc (l *List[T]) Len() int { return 0 }\n"
    );
    expect(parsed.funcs[0]?.receiver?.typeName).to.equal("List");
    expect(parsed.funcs[0]?.receiver?.typeArgs).to.deep.equal(["T"]);
  });

  it("should treat an instantiated name as an embedded field", () => {
    const parsed = parse("package p\n\ntype Box struct {\n\tList[int]\n}\n");
    const box = parsed.types[0]?.type;
    if (box?.kind !== "struct") throw new Error("expected struct");
    const field = box.fields[0];
    expect(field?.name).to.equal("List");
    expect(field?.embedded).to.equal(true);
    const type = field?.type;
    expect(type?.kind === "name" ? type.typeArgs.map(nameOf) : []).to.deep.equal([
      "int",
    ]);
  });

  it("should parse array fields that are not instantiations", () => {
    const parsed = parse("package p\n\ntype T struct {\n\tItems [4]int\n}\n");
    const t = parsed.types[0]?.type;
    if (t?.kind !== "struct") throw new Error("expected struct");
    expect(t.fields[0]?.name).to.equal("Items");
    expect(t.fields[0]?.type.kind).to.equal("array");
  });

  it("should keep interface methods and embedded interfaces", () => {
    const parsed = parse(
      "package p\n\ntype Shape interface {\n\tArea() float64\n\tfmt.Stringer\n\t~int | string\n}\n"
    );
    const shape = parsed.types[0]?.type;
    if (shape?.kind !== "interface") throw new Error("expected interface");
    expect(shape.methods.map((m) => m.name)).to.deep.equal(["Area"]);
    expect(shape.embeddeds.map(nameOf)).to.deep.equal(["Stringer"]);
  });

  it("should parse channel directions", () => {
    const parsed = parse(
      "package p\n\ntype C struct {\n\tIn <-chan int\n\tOut chan<- int\n\tBoth chan int\n}\n"
    );
    const c = parsed.types[0]?.type;
    if (c?.kind !== "struct") throw new Error("expected struct");
    expect(
      c.fields.map((f) => (f.type.kind === "chan" ? f.type.dir : ""))
    ).to.deep.equal(["recv", "send", "both"]);
  });

  it("should report syntax errors with a location", () => {
    const result = parseFile("package p\ntype T struct {\n X int\n", "bad.go");
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.code).to.equal("DCG2004");
      expect(result.error[0]?.message).to.equal(
        "expected field, found end of file"
      );
      expect(result.error[0]?.location).to.deep.equal({
        file: "bad.go",
        line: 4,
        column: 1,
      });
    }
  });

  it("should return lexical errors unchanged", () => {
    const result = parseFile('package p\nimport "fmt', "bad.go");
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error[0]?.code).to.equal("DCG2003");
    }
  });
});
