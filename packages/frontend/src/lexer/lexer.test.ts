import { describe, it } from "mocha";
import { expect } from "chai";
import { lex } from "./lexer.js";
import { TokenKind } from "./token.js";

const kinds = (text: string): TokenKind[] =>
  lex(text).tokens.map((t) => t.kind);

describe("Lexer", () => {
  it("should insert a semicolon after an identifier at a line end", () => {
    expect(kinds("type A int\n")).to.deep.equal([
      TokenKind.Keyword,
      TokenKind.Identifier,
      TokenKind.Identifier,
      TokenKind.Semicolon,
      TokenKind.EOF,
    ]);
  });

  it("should not insert a semicolon after an opening brace", () => {
    expect(kinds("struct {\n")).to.deep.equal([
      TokenKind.Keyword,
      TokenKind.Operator,
      TokenKind.EOF,
    ]);
  });

  it("should insert a semicolon at end of input", () => {
    const { tokens } = lex("x");
    expect(tokens.map((t) => t.value)).to.deep.equal(["x", "\n", ""]);
  });

  it("should keep comments as tokens without inserting semicolons", () => {
    expect(kinds("// hi\nx")).to.deep.equal([
      TokenKind.Comment,
      TokenKind.Identifier,
      TokenKind.Semicolon,
      TokenKind.EOF,
    ]);
  });

  it("should track lines and columns", () => {
    const { tokens } = lex("package p\n\ntype T int");
    const typeTok = tokens.find((t) => t.value === "type");
    expect(typeTok?.line).to.equal(3);
    expect(typeTok?.column).to.equal(1);
  });

  it("should count lines inside raw strings", () => {
    const { tokens } = lex("`a\nb` x");
    const x = tokens.find((t) => t.value === "x");
    expect(x?.line).to.equal(2);
    expect(x?.column).to.equal(4);
  });

  it("should take the longest operator", () => {
    const { tokens } = lex("a <<= b");
    expect(tokens[1]?.value).to.equal("<<=");
  });

  it("should lex hexadecimal floats with signed exponents as one number", () => {
    const { tokens } = lex("0x1p-2");
    expect(tokens[0]?.kind).to.equal(TokenKind.Number);
    expect(tokens[0]?.value).to.equal("0x1p-2");
  });

  it("should lex keywords", () => {
    const { tokens } = lex("map chan func");
    expect(tokens.slice(0, 3).every((t) => t.kind === TokenKind.Keyword)).to.equal(
      true
    );
  });

  it("should report an unterminated string", () => {
    const { diagnostics } = lex('x := "abc');
    expect(diagnostics).to.have.length(1);
    expect(diagnostics[0]?.code).to.equal("DCG2003");
    expect(diagnostics[0]?.message).to.equal("string literal not terminated");
    expect(diagnostics[0]?.location?.line).to.equal(1);
    expect(diagnostics[0]?.location?.column).to.equal(6);
  });

  it("should report an unterminated comment", () => {
    const { diagnostics } = lex("x /* open");
    expect(diagnostics[0]?.message).to.equal("comment not terminated");
  });

  it("should report unexpected characters", () => {
    const { diagnostics } = lex("a # b");
    expect(diagnostics[0]?.message).to.equal('unexpected character "#"');
    expect(diagnostics[0]?.location?.column).to.equal(3);
  });
});
