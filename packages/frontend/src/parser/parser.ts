/**
 * Go declaration parser
 *
 * Walks the token stream once and collects the package clause, imports,
 * type declarations and function signatures. Function bodies and
 * var/const declarations are skipped by matching delimiters.
 */

import { Token, TokenKind } from "../lexer/token.js";
import { lex } from "../lexer/lexer.js";
import {
  Diagnostic,
  SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";
import type {
  FieldSyntax,
  FileSyntax,
  FuncDeclSyntax,
  ImportSyntax,
  InterfaceMethodSyntax,
  NameTypeExpr,
  ParamSyntax,
  ReceiverSyntax,
  SignatureSyntax,
  TypeExpr,
  TypeSpecSyntax,
} from "./syntax.js";

export class ParseError extends Error {
  constructor(
    public readonly location: SourceLocation,
    message: string
  ) {
    super(message);
    this.name = "ParseError";
  }
}

const closers: Readonly<Record<string, string>> = {
  "(": ")",
  "[": "]",
  "{": "}",
};

/**
 * Remove the quotes of a Go string literal. Escapes in import paths and
 * struct tags are kept as written.
 */
export const unquote = (literal: string): string => literal.slice(1, -1);

export const parseFile = (
  text: string,
  fileName: string
): Result<FileSyntax, readonly Diagnostic[]> => {
  const lexed = lex(text, fileName);
  if (lexed.diagnostics.length > 0) {
    return error(lexed.diagnostics);
  }

  const toks = lexed.tokens.filter((t) => t.kind !== TokenKind.Comment);
  const eof = toks[toks.length - 1];
  if (!eof) {
    return error([
      createDiagnostic("DCG2004", "error", "empty token stream", {
        file: fileName,
        line: 1,
        column: 1,
      }),
    ]);
  }
  let pos = 0;

  const peek = (offset = 0): Token => toks[pos + offset] ?? eof;
  const next = (): Token => {
    const tok = peek();
    if (pos < toks.length - 1) pos++;
    return tok;
  };
  const locationOf = (tok: Token): SourceLocation => ({
    file: fileName,
    line: tok.line,
    column: tok.column,
  });
  const describe = (tok: Token): string =>
    tok.kind === TokenKind.EOF
      ? "end of file"
      : tok.kind === TokenKind.Semicolon && tok.value === "\n"
        ? "newline"
        : JSON.stringify(tok.value);
  const fail = (tok: Token, message: string): never => {
    throw new ParseError(locationOf(tok), message);
  };

  const isOp = (tok: Token, value: string): boolean =>
    tok.kind === TokenKind.Operator && tok.value === value;
  const isKeyword = (tok: Token, value: string): boolean =>
    tok.kind === TokenKind.Keyword && tok.value === value;
  const isSemi = (tok: Token): boolean => tok.kind === TokenKind.Semicolon;

  const expectOp = (value: string): Token => {
    const tok = next();
    if (!isOp(tok, value)) {
      fail(tok, `expected ${JSON.stringify(value)}, found ${describe(tok)}`);
    }
    return tok;
  };
  const expectKeyword = (value: string): Token => {
    const tok = next();
    if (!isKeyword(tok, value)) {
      fail(tok, `expected ${value}, found ${describe(tok)}`);
    }
    return tok;
  };
  const expectIdent = (): Token => {
    const tok = next();
    if (tok.kind !== TokenKind.Identifier) {
      fail(tok, `expected identifier, found ${describe(tok)}`);
    }
    return tok;
  };
  const expectSemi = (): void => {
    const tok = peek();
    if (isSemi(tok)) {
      next();
      return;
    }
    // `)` and `}` may close a list without a separator
    if (tok.kind === TokenKind.EOF || isOp(tok, ")") || isOp(tok, "}")) {
      return;
    }
    fail(tok, `expected ";" or newline, found ${describe(tok)}`);
  };

  /** Index of the token matching the opener at `index`. */
  const matching = (index: number): number => {
    const depth: string[] = [];
    for (let i = index; i < toks.length; i++) {
      const tok = toks[i];
      if (!tok || tok.kind !== TokenKind.Operator) continue;
      const closer = closers[tok.value];
      if (closer) {
        depth.push(closer);
      } else if (tok.value === depth[depth.length - 1]) {
        depth.pop();
        if (depth.length === 0) return i;
      }
    }
    return fail(toks[index] ?? eof, "unbalanced delimiter");
  };

  const skipBalanced = (): void => {
    pos = matching(pos) + 1;
  };

  const canStartType = (tok: Token): boolean => {
    if (tok.kind === TokenKind.Identifier) return true;
    if (tok.kind === TokenKind.Keyword) {
      return ["map", "chan", "struct", "interface", "func"].includes(tok.value);
    }
    return (
      tok.kind === TokenKind.Operator &&
      ["*", "[", "(", "<-"].includes(tok.value)
    );
  };

  /**
   * `Name[...]` at the cursor is a generic instantiation when the token
   * after the closing bracket ends the element; otherwise the identifier
   * names a field or parameter whose type is an array.
   */
  const isInstanceAhead = (): boolean => {
    if (!isOp(peek(1), "[")) return false;
    if (isOp(peek(2), "]")) return false;
    const after = toks[matching(pos + 1) + 1] ?? eof;
    return (
      after.kind === TokenKind.EOF ||
      after.kind === TokenKind.String ||
      isSemi(after) ||
      isOp(after, ",") ||
      isOp(after, ")") ||
      isOp(after, "}") ||
      isOp(after, "{")
    );
  };

  // ------------------------------------------------------------------
  // Types
  // ------------------------------------------------------------------

  const parseTypeName = (): NameTypeExpr => {
    const first = expectIdent();
    let qualifier: string | undefined;
    let name = first.value;
    if (isOp(peek(), ".")) {
      next();
      qualifier = name;
      name = expectIdent().value;
    }
    const typeArgs: TypeExpr[] = [];
    if (isOp(peek(), "[") && !isOp(peek(1), "]")) {
      next();
      typeArgs.push(parseType());
      while (isOp(peek(), ",")) {
        next();
        if (isOp(peek(), "]")) break;
        typeArgs.push(parseType());
      }
      expectOp("]");
    }
    return { kind: "name", qualifier, name, typeArgs, location: locationOf(first) };
  };

  const parseArrayLength = (): string => {
    const open = pos;
    const close = matching(open);
    const text = toks
      .slice(open + 1, close)
      .map((t) => t.value)
      .join("");
    pos = close + 1;
    return text;
  };

  const parseType = (): TypeExpr => {
    const tok = peek();

    if (tok.kind === TokenKind.Identifier) {
      return parseTypeName();
    }

    if (isOp(tok, "*")) {
      next();
      return { kind: "pointer", elem: parseType() };
    }

    if (isOp(tok, "(")) {
      next();
      const inner = parseType();
      expectOp(")");
      return inner;
    }

    if (isOp(tok, "[")) {
      if (isOp(peek(1), "]")) {
        next();
        next();
        return { kind: "slice", elem: parseType() };
      }
      const length = parseArrayLength();
      return { kind: "array", length, elem: parseType() };
    }

    if (isOp(tok, "<-")) {
      next();
      expectKeyword("chan");
      return { kind: "chan", dir: "recv", elem: parseType() };
    }

    if (isKeyword(tok, "chan")) {
      next();
      if (isOp(peek(), "<-")) {
        next();
        return { kind: "chan", dir: "send", elem: parseType() };
      }
      return { kind: "chan", dir: "both", elem: parseType() };
    }

    if (isKeyword(tok, "map")) {
      next();
      expectOp("[");
      const key = parseType();
      expectOp("]");
      return { kind: "map", key, value: parseType() };
    }

    if (isKeyword(tok, "struct")) {
      return parseStructType();
    }

    if (isKeyword(tok, "interface")) {
      return parseInterfaceType();
    }

    if (isKeyword(tok, "func")) {
      next();
      return { kind: "func", signature: parseSignature() };
    }

    return fail(tok, `expected type, found ${describe(tok)}`);
  };

  const parseTag = (): string | undefined =>
    peek().kind === TokenKind.String ? unquote(next().value) : undefined;

  const parseStructType = (): TypeExpr => {
    expectKeyword("struct");
    expectOp("{");
    const fields: FieldSyntax[] = [];

    while (!isOp(peek(), "}")) {
      const tok = peek();

      if (isOp(tok, "*")) {
        next();
        const type = parseTypeName();
        fields.push({
          name: type.name,
          type: { kind: "pointer", elem: type },
          embedded: true,
          tag: parseTag(),
          location: locationOf(tok),
        });
        expectSemi();
        continue;
      }

      if (tok.kind !== TokenKind.Identifier) {
        fail(tok, `expected field, found ${describe(tok)}`);
      }

      const after = peek(1);
      const embedded =
        isOp(after, ".") ||
        isSemi(after) ||
        isOp(after, "}") ||
        after.kind === TokenKind.String ||
        isInstanceAhead();

      if (embedded) {
        const type = parseTypeName();
        fields.push({
          name: type.name,
          type,
          embedded: true,
          tag: parseTag(),
          location: locationOf(tok),
        });
        expectSemi();
        continue;
      }

      const names: Token[] = [expectIdent()];
      while (isOp(peek(), ",")) {
        next();
        names.push(expectIdent());
      }
      const type = parseType();
      const tag = parseTag();
      for (const name of names) {
        fields.push({
          name: name.value,
          type,
          embedded: false,
          tag,
          location: locationOf(name),
        });
      }
      expectSemi();
    }

    expectOp("}");
    return { kind: "struct", fields };
  };

  const parseInterfaceType = (): TypeExpr => {
    expectKeyword("interface");
    expectOp("{");
    const methods: InterfaceMethodSyntax[] = [];
    const embeddeds: TypeExpr[] = [];

    while (!isOp(peek(), "}")) {
      const tok = peek();
      if (tok.kind === TokenKind.Identifier && isOp(peek(1), "(")) {
        next();
        methods.push({ name: tok.value, signature: parseSignature() });
        expectSemi();
        continue;
      }

      // Embedded interface or type-set element: `~int | string`
      const terms: TypeExpr[] = [];
      let approximate = false;
      do {
        if (isOp(peek(), "|")) next();
        if (isOp(peek(), "~")) {
          next();
          approximate = true;
        }
        terms.push(parseType());
      } while (isOp(peek(), "|"));

      const only = terms[0];
      if (terms.length === 1 && !approximate && only) {
        embeddeds.push(only);
      }
      expectSemi();
    }

    expectOp("}");
    return { kind: "interface", methods, embeddeds };
  };

  // ------------------------------------------------------------------
  // Signatures
  // ------------------------------------------------------------------

  type ParamItem = {
    readonly name?: string;
    readonly type: TypeExpr;
    readonly variadic: boolean;
  };

  const parseParamItem = (): ParamItem => {
    if (isOp(peek(), "...")) {
      next();
      return { type: parseType(), variadic: true };
    }

    const tok = peek();
    if (tok.kind === TokenKind.Identifier) {
      const after = peek(1);
      const typeOnly =
        isOp(after, ".") ||
        isOp(after, ",") ||
        isOp(after, ")") ||
        isInstanceAhead();
      if (!typeOnly) {
        next();
        if (isOp(peek(), "...")) {
          next();
          return { name: tok.value, type: parseType(), variadic: true };
        }
        return { name: tok.value, type: parseType(), variadic: false };
      }
    }

    return { type: parseType(), variadic: false };
  };

  const parseParameters = (): {
    readonly params: readonly ParamSyntax[];
    readonly variadic: boolean;
  } => {
    expectOp("(");
    const items: ParamItem[] = [];
    while (!isOp(peek(), ")")) {
      items.push(parseParamItem());
      if (!isOp(peek(), ",")) break;
      next();
    }
    expectOp(")");

    const variadic = items.some((item) => item.variadic);
    if (!items.some((item) => item.name !== undefined)) {
      return { params: items.map((item) => ({ type: item.type })), variadic };
    }

    // `(a, b int, c string)`: bare names take the type of the next group
    const params: ParamSyntax[] = [];
    let pending: string[] = [];
    for (const item of items) {
      if (item.name === undefined) {
        if (item.type.kind !== "name" || item.type.qualifier) {
          throw new ParseError(
            locationOf(peek()),
            "mixed named and unnamed parameters"
          );
        }
        pending.push(item.type.name);
        continue;
      }
      for (const name of pending) {
        params.push({ name, type: item.type });
      }
      pending = [];
      params.push({ name: item.name, type: item.type });
    }
    if (pending.length > 0) {
      throw new ParseError(locationOf(peek()), "missing parameter type");
    }
    return { params, variadic };
  };

  const parseSignature = (): SignatureSyntax => {
    const { params, variadic } = parseParameters();
    let results: readonly ParamSyntax[] = [];
    if (isOp(peek(), "(")) {
      results = parseParameters().params;
    } else if (canStartType(peek())) {
      results = [{ type: parseType() }];
    }
    return { params, results, variadic };
  };

  // ------------------------------------------------------------------
  // Declarations
  // ------------------------------------------------------------------

  const parseImportSpec = (): ImportSyntax => {
    const tok = peek();
    let name: string | undefined;
    if (tok.kind === TokenKind.Identifier) {
      name = next().value;
    } else if (isOp(tok, ".")) {
      next();
      name = ".";
    }
    const pathTok = next();
    if (pathTok.kind !== TokenKind.String) {
      fail(pathTok, `expected import path, found ${describe(pathTok)}`);
    }
    return { name, path: unquote(pathTok.value), location: locationOf(tok) };
  };

  const parseImportDecl = (): ImportSyntax[] => {
    expectKeyword("import");
    if (!isOp(peek(), "(")) {
      return [parseImportSpec()];
    }
    next();
    const specs: ImportSyntax[] = [];
    while (!isOp(peek(), ")")) {
      specs.push(parseImportSpec());
      expectSemi();
    }
    expectOp(")");
    return specs;
  };

  const parseTypeParams = (): string[] => {
    expectOp("[");
    const names: string[] = [];
    while (!isOp(peek(), "]")) {
      names.push(expectIdent().value);
      if (isOp(peek(), ",")) {
        next();
        continue;
      }
      // Skip the constraint up to the next group
      while (!isOp(peek(), ",") && !isOp(peek(), "]")) {
        const tok = peek();
        if (tok.kind === TokenKind.EOF) fail(tok, "unterminated type parameters");
        if (tok.kind === TokenKind.Operator && closers[tok.value]) {
          skipBalanced();
        } else {
          next();
        }
      }
      if (isOp(peek(), ",")) next();
    }
    expectOp("]");
    return names;
  };

  const parseTypeSpec = (): TypeSpecSyntax => {
    const nameTok = expectIdent();
    let typeParams: string[] = [];
    // `type A[T any] ...` versus the array type in `type A [N]int`
    if (
      isOp(peek(), "[") &&
      peek(1).kind === TokenKind.Identifier &&
      !isOp(peek(2), "]")
    ) {
      typeParams = parseTypeParams();
    }
    let alias = false;
    if (isOp(peek(), "=")) {
      next();
      alias = true;
    }
    return {
      name: nameTok.value,
      typeParams,
      alias,
      type: parseType(),
      location: locationOf(nameTok),
    };
  };

  const parseTypeDecl = (): TypeSpecSyntax[] => {
    expectKeyword("type");
    if (!isOp(peek(), "(")) {
      return [parseTypeSpec()];
    }
    next();
    const specs: TypeSpecSyntax[] = [];
    while (!isOp(peek(), ")")) {
      specs.push(parseTypeSpec());
      expectSemi();
    }
    expectOp(")");
    return specs;
  };

  const parseReceiver = (): ReceiverSyntax => {
    expectOp("(");
    let name: string | undefined;
    if (
      peek().kind === TokenKind.Identifier &&
      (peek(1).kind === TokenKind.Identifier || isOp(peek(1), "*"))
    ) {
      name = next().value;
    }
    let pointer = false;
    if (isOp(peek(), "*")) {
      next();
      pointer = true;
    }
    const typeName = expectIdent().value;
    const typeArgs: string[] = [];
    if (isOp(peek(), "[")) {
      next();
      while (!isOp(peek(), "]")) {
        typeArgs.push(expectIdent().value);
        if (isOp(peek(), ",")) next();
      }
      expectOp("]");
    }
    expectOp(")");
    return { name, pointer, typeName, typeArgs };
  };

  const parseFuncDecl = (): FuncDeclSyntax => {
    expectKeyword("func");
    const receiver = isOp(peek(), "(") ? parseReceiver() : undefined;
    const nameTok = expectIdent();
    const typeParams = isOp(peek(), "[") ? parseTypeParams() : [];
    const signature = parseSignature();
    if (isOp(peek(), "{")) {
      skipBalanced();
    }
    return {
      name: nameTok.value,
      receiver,
      typeParams,
      signature,
      location: locationOf(nameTok),
    };
  };

  /** Names of one `var` or `const` spec; the type and values are skipped. */
  const parseValueSpec = (): string[] => {
    const names = [expectIdent().value];
    while (isOp(peek(), ",")) {
      next();
      names.push(expectIdent().value);
    }
    while (
      !isSemi(peek()) &&
      !isOp(peek(), ")") &&
      peek().kind !== TokenKind.EOF
    ) {
      const tok = peek();
      if (tok.kind === TokenKind.Operator && closers[tok.value]) {
        skipBalanced();
      } else {
        next();
      }
    }
    return names;
  };

  const parseValueDecl = (): string[] => {
    next();
    if (!isOp(peek(), "(")) {
      return parseValueSpec();
    }
    next();
    const names: string[] = [];
    while (!isOp(peek(), ")")) {
      if (isSemi(peek())) {
        next();
        continue;
      }
      names.push(...parseValueSpec());
    }
    expectOp(")");
    return names;
  };

  const parseSourceFile = (): FileSyntax => {
    while (isSemi(peek())) next();
    expectKeyword("package");
    const packageName = expectIdent().value;
    expectSemi();

    const imports: ImportSyntax[] = [];
    while (isKeyword(peek(), "import")) {
      imports.push(...parseImportDecl());
      expectSemi();
    }

    const types: TypeSpecSyntax[] = [];
    const funcs: FuncDeclSyntax[] = [];
    const values: string[] = [];
    while (peek().kind !== TokenKind.EOF) {
      const tok = peek();
      if (isSemi(tok)) {
        next();
        continue;
      }
      if (isKeyword(tok, "type")) {
        types.push(...parseTypeDecl());
      } else if (isKeyword(tok, "func")) {
        funcs.push(parseFuncDecl());
      } else if (isKeyword(tok, "var") || isKeyword(tok, "const")) {
        values.push(...parseValueDecl());
      } else {
        fail(tok, `non-declaration statement outside function body: ${describe(tok)}`);
      }
      expectSemi();
    }

    return { fileName, packageName, imports, types, funcs, values };
  };

  try {
    return ok(parseSourceFile());
  } catch (e) {
    if (e instanceof ParseError) {
      return error([
        createDiagnostic("DCG2004", "error", e.message, e.location),
      ]);
    }
    throw e;
  }
};
