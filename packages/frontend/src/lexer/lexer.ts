/**
 * Go lexer
 *
 * Produces the token stream the declaration parser and the source
 * formatter work on, including the semicolons Go inserts at line ends.
 */

import { Token, TokenKind, keywords, operators } from "./token.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";

export type LexResult = {
  readonly tokens: readonly Token[];
  readonly diagnostics: readonly Diagnostic[];
};

const identStart = /[\p{L}_]/u;
const identPart = /[\p{L}\p{Nd}_]/u;
const digit = /[0-9]/;

const endsStatement = (tok: Token | undefined): boolean => {
  if (!tok) return false;
  switch (tok.kind) {
    case TokenKind.Identifier:
    case TokenKind.Number:
    case TokenKind.Rune:
    case TokenKind.String:
      return true;
    case TokenKind.Keyword:
      return (
        tok.value === "break" ||
        tok.value === "continue" ||
        tok.value === "fallthrough" ||
        tok.value === "return"
      );
    case TokenKind.Operator:
      return (
        tok.value === ")" ||
        tok.value === "]" ||
        tok.value === "}" ||
        tok.value === "++" ||
        tok.value === "--"
      );
    default:
      return false;
  }
};

export function lex(text: string, file = "<input>"): LexResult {
  const toks: Token[] = [];
  const diagnostics: Diagnostic[] = [];
  let i = 0;
  let line = 1;
  let lineStart = 0;
  // Last token that is not a comment, for semicolon insertion
  let last: Token | undefined;

  const push = (
    kind: TokenKind,
    value: string,
    start: number,
    startLine: number,
    startColumn: number
  ): void => {
    const tok: Token = {
      kind,
      value,
      start,
      end: i,
      line: startLine,
      column: startColumn,
    };
    toks.push(tok);
    if (kind !== TokenKind.Comment) last = tok;
  };

  const report = (message: string, atLine: number, atColumn: number): void => {
    diagnostics.push(
      createDiagnostic("DCG2003", "error", message, {
        file,
        line: atLine,
        column: atColumn,
      })
    );
  };

  const newline = (): void => {
    if (endsStatement(last)) {
      push(TokenKind.Semicolon, "\n", i, line, i - lineStart + 1);
    }
    line++;
    lineStart = i + 1;
  };

  while (i < text.length) {
    const ch = text.charAt(i);
    const start = i;
    const startLine = line;
    const startColumn = i - lineStart + 1;

    if (ch === "\n") {
      newline();
      i++;
      continue;
    }

    // whitespace
    if (ch === " " || ch === "\t" || ch === "\r") {
      i++;
      continue;
    }

    // line comment
    if (ch === "/" && text.charAt(i + 1) === "/") {
      while (i < text.length && text.charAt(i) !== "\n") i++;
      push(TokenKind.Comment, text.slice(start, i), start, startLine, startColumn);
      continue;
    }

    // general comment; one spanning lines acts like a newline
    if (ch === "/" && text.charAt(i + 1) === "*") {
      const close = text.indexOf("*/", i + 2);
      if (close === -1) {
        report("comment not terminated", startLine, startColumn);
        i = text.length;
        break;
      }
      const body = text.slice(start, close + 2);
      const breaks = body.split("\n").length - 1;
      i = close + 2;
      push(TokenKind.Comment, body, start, startLine, startColumn);
      if (breaks > 0) {
        if (endsStatement(last)) {
          push(TokenKind.Semicolon, "\n", i, line, startColumn);
        }
        line += breaks;
        lineStart = start + body.lastIndexOf("\n") + 1;
      }
      continue;
    }

    // interpreted string literal
    if (ch === '"') {
      i++;
      while (i < text.length && text.charAt(i) !== '"' && text.charAt(i) !== "\n") {
        i += text.charAt(i) === "\\" ? 2 : 1;
      }
      if (text.charAt(i) !== '"') {
        report("string literal not terminated", startLine, startColumn);
        push(TokenKind.String, text.slice(start, i), start, startLine, startColumn);
        continue;
      }
      i++;
      push(TokenKind.String, text.slice(start, i), start, startLine, startColumn);
      continue;
    }

    // raw string literal
    if (ch === "`") {
      const close = text.indexOf("`", i + 1);
      if (close === -1) {
        report("raw string literal not terminated", startLine, startColumn);
        i = text.length;
        break;
      }
      const body = text.slice(start, close + 1);
      i = close + 1;
      push(TokenKind.String, body, start, startLine, startColumn);
      const breaks = body.split("\n").length - 1;
      if (breaks > 0) {
        line += breaks;
        lineStart = start + body.lastIndexOf("\n") + 1;
      }
      continue;
    }

    // rune literal
    if (ch === "'") {
      i++;
      while (i < text.length && text.charAt(i) !== "'" && text.charAt(i) !== "\n") {
        i += text.charAt(i) === "\\" ? 2 : 1;
      }
      if (text.charAt(i) !== "'") {
        report("rune literal not terminated", startLine, startColumn);
        push(TokenKind.Rune, text.slice(start, i), start, startLine, startColumn);
        continue;
      }
      i++;
      push(TokenKind.Rune, text.slice(start, i), start, startLine, startColumn);
      continue;
    }

    // number literal
    if (digit.test(ch) || (ch === "." && digit.test(text.charAt(i + 1)))) {
      const hex = ch === "0" && /[xX]/.test(text.charAt(i + 1));
      i++;
      while (i < text.length) {
        const c = text.charAt(i);
        const prev = text.charAt(i - 1);
        const exponentSign =
          (c === "+" || c === "-") &&
          (hex ? /[pP]/.test(prev) : /[eE]/.test(prev));
        if (/[0-9A-Za-z_.]/.test(c) || exponentSign) {
          i++;
        } else {
          break;
        }
      }
      push(TokenKind.Number, text.slice(start, i), start, startLine, startColumn);
      continue;
    }

    // identifier / keyword
    if (identStart.test(ch)) {
      while (i < text.length && identPart.test(text.charAt(i))) i++;
      const value = text.slice(start, i);
      const kind = keywords.has(value)
        ? TokenKind.Keyword
        : TokenKind.Identifier;
      push(kind, value, start, startLine, startColumn);
      continue;
    }

    if (ch === ";") {
      i++;
      push(TokenKind.Semicolon, ";", start, startLine, startColumn);
      continue;
    }

    const op = operators.find((o) => text.startsWith(o, i));
    if (op) {
      i += op.length;
      push(TokenKind.Operator, op, start, startLine, startColumn);
      continue;
    }

    report(`unexpected character ${JSON.stringify(ch)}`, startLine, startColumn);
    i++;
  }

  if (endsStatement(last)) {
    push(TokenKind.Semicolon, "\n", i, line, i - lineStart + 1);
  }
  push(TokenKind.EOF, "", i, line, i - lineStart + 1);
  return { tokens: toks, diagnostics };
}
