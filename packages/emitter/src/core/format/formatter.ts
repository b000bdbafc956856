/**
 * Source formatting for the assembled file
 *
 * The built-in formatter checks that the text lexes as Go and that its
 * delimiters balance, then re-indents it with tabs by nesting depth.
 */

import {
  TokenKind,
  createDiagnostic,
  error,
  lex,
  ok,
  type Diagnostic,
  type Result,
  type Token,
} from "@deepcopy-gen/frontend";

export type SourceFormatter = {
  readonly name: string;
  readonly format: (source: string) => Result<string, Diagnostic>;
};

const GENERATED_FILE = "<generated>";

const closers: Readonly<Record<string, string>> = {
  "(": ")",
  "[": "]",
  "{": "}",
};

const isCloser = (tok: Token): boolean =>
  tok.kind === TokenKind.Operator &&
  (tok.value === ")" || tok.value === "]" || tok.value === "}");

const invalid = (message: string, tok?: Token): Result<string, Diagnostic> =>
  error(
    createDiagnostic(
      "DCG4001",
      "error",
      `Generated source is not valid Go: ${message}`,
      tok ? { file: GENERATED_FILE, line: tok.line, column: tok.column } : undefined
    )
  );

export const formatSource = (source: string): Result<string, Diagnostic> => {
  const text = source.replace(/\r\n/g, "\n");
  const lexed = lex(text, GENERATED_FILE);
  const lexError = lexed.diagnostics[0];
  if (lexError) {
    return error(
      createDiagnostic(
        "DCG4001",
        "error",
        `Generated source is not valid Go: ${lexError.message}`,
        lexError.location
      )
    );
  }

  const indentByLine = new Map<number, number>();
  // Continuation lines of raw strings and block comments stay as written
  const verbatim = new Set<number>();
  const open: Token[] = [];

  for (const tok of lexed.tokens) {
    if (tok.kind === TokenKind.EOF) break;
    if (tok.kind === TokenKind.Semicolon && tok.value === "\n") continue;

    if (!indentByLine.has(tok.line) && !verbatim.has(tok.line)) {
      const depth = open.length - (isCloser(tok) ? 1 : 0);
      indentByLine.set(tok.line, Math.max(0, depth));
    }
    const breaks = tok.value.split("\n").length - 1;
    for (let n = 1; n <= breaks; n++) {
      verbatim.add(tok.line + n);
    }

    if (tok.kind !== TokenKind.Operator) continue;
    if (closers[tok.value]) {
      open.push(tok);
    } else if (isCloser(tok)) {
      const top = open.pop();
      if (!top || closers[top.value] !== tok.value) {
        return invalid(`unexpected ${tok.value}`, tok);
      }
    }
  }

  const unclosed = open[open.length - 1];
  if (unclosed) {
    return invalid(`unclosed ${unclosed.value}`, unclosed);
  }

  const lines: string[] = [];
  text.split("\n").forEach((line, i) => {
    const lineNumber = i + 1;
    if (verbatim.has(lineNumber)) {
      lines.push(line);
      return;
    }
    const trimmed = line.trim();
    if (trimmed === "") {
      if (lines.length > 0 && lines[lines.length - 1] !== "") lines.push("");
      return;
    }
    lines.push("\t".repeat(indentByLine.get(lineNumber) ?? 0) + trimmed);
  });

  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return ok(`${lines.join("\n")}\n`);
};

export const builtinFormatter: SourceFormatter = {
  name: "builtin",
  format: formatSource,
};
