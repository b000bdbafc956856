/**
 * Tests for the Go AST printer
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  addressOf,
  assign,
  block,
  call,
  define,
  dereference,
  expressionStatement,
  identifier,
  ifStatement,
  index,
  methodCall,
  notNil,
  rangeLoop,
  returnStatement,
  selector,
} from "./builders.js";
import {
  printExpression,
  printFile,
  printStatement,
  printType,
} from "./printer.js";
import type { GoTypeAst } from "./types.js";

const named = (name: string, qualifier?: string): GoTypeAst => ({
  kind: "namedType",
  qualifier,
  name,
  typeArguments: [],
});

describe("Go AST printer", () => {
  describe("types", () => {
    it("should print qualified and generic names", () => {
      expect(printType(named("Value", "util"))).to.equal("util.Value");
      expect(
        printType({
          kind: "namedType",
          name: "Pair",
          typeArguments: [named("string"), { kind: "sliceType", elementType: named("int") }],
        })
      ).to.equal("Pair[string, []int]");
    });

    it("should print composite types", () => {
      expect(
        printType({
          kind: "mapType",
          keyType: named("string"),
          valueType: {
            kind: "arrayType",
            length: "4",
            elementType: { kind: "pointerType", elementType: named("Node") },
          },
        })
      ).to.equal("map[string][4]*Node");
    });

    it("should parenthesize a receive-only channel inside a channel", () => {
      expect(
        printType({
          kind: "channelType",
          direction: "both",
          elementType: {
            kind: "channelType",
            direction: "recv",
            elementType: named("int"),
          },
        })
      ).to.equal("chan (<-chan int)");
      expect(
        printType({ kind: "channelType", direction: "send", elementType: named("int") })
      ).to.equal("chan<- int");
    });

    it("should print struct literals with tags and embedded fields", () => {
      expect(
        printType({
          kind: "structType",
          fields: [
            { type: named("Base") },
            { name: "Name", type: named("string"), tag: 'json:"name"' },
          ],
        })
      ).to.equal('struct{ Base; Name string `json:"name"` }');
      expect(printType({ kind: "structType", fields: [] })).to.equal("struct{}");
    });

    it("should quote a tag that contains a backquote", () => {
      expect(
        printType({
          kind: "structType",
          fields: [{ name: "A", type: named("int"), tag: "x`y" }],
        })
      ).to.equal('struct{ A int "x`y" }');
    });

    it("should print function signatures", () => {
      expect(
        printType({
          kind: "funcType",
          parameters: [
            { name: "format", type: named("string") },
            { name: "args", type: { kind: "sliceType", elementType: named("any") } },
          ],
          results: [{ type: named("error") }],
          variadic: true,
        })
      ).to.equal("func(format string, args ...any) error");
      expect(
        printType({
          kind: "funcType",
          parameters: [],
          results: [{ type: named("int") }, { type: named("bool") }],
          variadic: false,
        })
      ).to.equal("func() (int, bool)");
    });

    it("should print interface literals", () => {
      expect(printType({ kind: "interfaceType", elements: [] })).to.equal("interface{}");
      expect(
        printType({
          kind: "interfaceType",
          elements: [
            {
              kind: "method",
              name: "Len",
              signature: {
                kind: "funcType",
                parameters: [],
                results: [{ type: named("int") }],
                variadic: false,
              },
            },
            { kind: "embedded", type: named("Stringer", "fmt") },
          ],
        })
      ).to.equal("interface{ Len() int; fmt.Stringer }");
    });
  });

  describe("expressions", () => {
    const o = identifier("o");

    it("should print selectors and index expressions", () => {
      expect(printExpression(index(selector(o, "Items"), identifier("i")))).to.equal(
        "o.Items[i]"
      );
    });

    it("should parenthesize unary operands of selectors", () => {
      expect(printExpression(selector(dereference(o), "Name"))).to.equal("(*o).Name");
      expect(printExpression(dereference(selector(o, "Name")))).to.equal("*o.Name");
      expect(printExpression(index(dereference(o), identifier("k")))).to.equal("(*o)[k]");
    });

    it("should print calls with type arguments", () => {
      expect(
        printExpression(
          call("make", { kind: "sliceType", elementType: named("int") }, call("len", o))
        )
      ).to.equal("make([]int, len(o))");
      expect(printExpression(methodCall(selector(o, "At"), "DeepCopy"))).to.equal(
        "o.At.DeepCopy()"
      );
    });

    it("should print comparisons and address-of", () => {
      expect(printExpression(notNil(o))).to.equal("o != nil");
      expect(printExpression(addressOf(identifier("cp")))).to.equal("&cp");
    });
  });

  describe("statements", () => {
    it("should indent nested bodies with tabs", () => {
      const source = selector(identifier("o"), "Tags");
      const sink = selector(identifier("cp"), "Tags");
      expect(
        printStatement(
          ifStatement(notNil(source), [
            assign(sink, call("make", { kind: "sliceType", elementType: named("string") }, call("len", source))),
            expressionStatement(call("copy", sink, source)),
          ]),
          1
        )
      ).to.deep.equal([
        "\tif o.Tags != nil {",
        "\t\tcp.Tags = make([]string, len(o.Tags))",
        "\t\tcopy(cp.Tags, o.Tags)",
        "\t}",
      ]);
    });

    it("should print range loops with and without a value", () => {
      expect(printStatement(rangeLoop("i", undefined, identifier("xs"), []), 0)).to.deep.equal([
        "for i := range xs {",
        "}",
      ]);
      expect(
        printStatement(
          rangeLoop("k", "v", identifier("m"), [
            assign(index(identifier("cp"), identifier("k")), identifier("v")),
          ]),
          0
        )
      ).to.deep.equal(["for k, v := range m {", "\tcp[k] = v", "}"]);
    });

    it("should print blocks, definitions and returns", () => {
      expect(
        printStatement(
          block([
            define("retV", methodCall(identifier("o"), "DeepCopy")),
            returnStatement(addressOf(identifier("retV"))),
          ]),
          0
        )
      ).to.deep.equal(["{", "\tretV := o.DeepCopy()", "\treturn &retV", "}"]);
    });
  });

  describe("files", () => {
    it("should print a single import on one line", () => {
      expect(
        printFile({
          headerComment: "// header",
          packageName: "models",
          imports: [{ path: "time" }],
          declarations: [],
        })
      ).to.equal('// header\n\npackage models\n\nimport "time"\n');
    });

    it("should group several imports and separate declarations", () => {
      const method = {
        kind: "methodDeclaration" as const,
        docComment: ["DeepCopy copies"],
        receiverName: "o",
        receiverType: named("A"),
        name: "DeepCopy",
        resultType: named("A"),
        body: [returnStatement(identifier("o"))],
      };
      expect(
        printFile({
          headerComment: "// header",
          packageName: "models",
          imports: [{ path: "example.com/a/util" }, { path: "example.com/b/util", alias: "butil" }],
          declarations: [method, { ...method, receiverType: named("B"), resultType: named("B") }],
        })
      ).to.equal(
        [
          "// header",
          "",
          "package models",
          "",
          "import (",
          '\t"example.com/a/util"',
          '\tbutil "example.com/b/util"',
          ")",
          "",
          "// DeepCopy copies",
          "func (o A) DeepCopy() A {",
          "\treturn o",
          "}",
          "",
          "// DeepCopy copies",
          "func (o B) DeepCopy() B {",
          "\treturn o",
          "}",
          "",
        ].join("\n")
      );
    });
  });
});
