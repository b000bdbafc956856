/**
 * Go AST printer
 *
 * Prints Go AST nodes as gofmt-shaped text: tab indentation, one
 * statement per line, a blank line between declarations.
 */

import type {
  GoChannelTypeAst,
  GoExpressionAst,
  GoFieldAst,
  GoFileAst,
  GoFuncTypeAst,
  GoImportAst,
  GoInterfaceElementAst,
  GoMethodDeclarationAst,
  GoParameterAst,
  GoStatementAst,
  GoTypeAst,
} from "./types.js";

const indentOf = (level: number): string => "\t".repeat(level);

// ============================================================
// Type Printer
// ============================================================

const printTag = (tag: string): string =>
  tag.includes("`") ? JSON.stringify(tag) : `\`${tag}\``;

const printField = (field: GoFieldAst): string => {
  const type = printType(field.type);
  const head = field.name === undefined ? type : `${field.name} ${type}`;
  return field.tag === undefined ? head : `${head} ${printTag(field.tag)}`;
};

const printParameter = (param: GoParameterAst, variadic: boolean): string => {
  const elem =
    variadic && param.type.kind === "sliceType" ? param.type.elementType : param.type;
  const type = variadic ? `...${printType(elem)}` : printType(elem);
  return param.name === undefined ? type : `${param.name} ${type}`;
};

const printSignature = (signature: GoFuncTypeAst): string => {
  const last = signature.parameters.length - 1;
  const params = signature.parameters
    .map((p, i) => printParameter(p, signature.variadic && i === last))
    .join(", ");
  const results = signature.results;
  const only = results[0];
  if (results.length === 0 || !only) {
    return `(${params})`;
  }
  if (results.length === 1 && only.name === undefined) {
    return `(${params}) ${printType(only.type)}`;
  }
  return `(${params}) (${results.map((r) => printParameter(r, false)).join(", ")})`;
};

const printInterfaceElement = (element: GoInterfaceElementAst): string =>
  element.kind === "method"
    ? `${element.name}${printSignature(element.signature)}`
    : printType(element.type);

const printChannelType = (type: GoChannelTypeAst): string => {
  const elem = printType(type.elementType);
  if (type.direction === "send") return `chan<- ${elem}`;
  if (type.direction === "recv") return `<-chan ${elem}`;
  // `chan <-chan T` would parse as `chan<- chan T`
  const nested =
    type.elementType.kind === "channelType" &&
    type.elementType.direction === "recv";
  return nested ? `chan (${elem})` : `chan ${elem}`;
};

export const printType = (type: GoTypeAst): string => {
  switch (type.kind) {
    case "namedType": {
      const name =
        type.qualifier === undefined ? type.name : `${type.qualifier}.${type.name}`;
      return type.typeArguments.length === 0
        ? name
        : `${name}[${type.typeArguments.map(printType).join(", ")}]`;
    }

    case "pointerType":
      return `*${printType(type.elementType)}`;

    case "sliceType":
      return `[]${printType(type.elementType)}`;

    case "arrayType":
      return `[${type.length}]${printType(type.elementType)}`;

    case "mapType":
      return `map[${printType(type.keyType)}]${printType(type.valueType)}`;

    case "channelType":
      return printChannelType(type);

    case "structType":
      return type.fields.length === 0
        ? "struct{}"
        : `struct{ ${type.fields.map(printField).join("; ")} }`;

    case "interfaceType":
      return type.elements.length === 0
        ? "interface{}"
        : `interface{ ${type.elements.map(printInterfaceElement).join("; ")} }`;

    case "funcType":
      return `func${printSignature(type)}`;
  }
};

// ============================================================
// Expression Printer
// ============================================================

/** Operand of a selector, index or call */
const printPrimaryExpression = (expr: GoExpressionAst): string => {
  const text = printExpression(expr);
  return expr.kind === "unary" || expr.kind === "binary" ? `(${text})` : text;
};

export const printExpression = (expr: GoExpressionAst): string => {
  switch (expr.kind) {
    case "identifier":
      return expr.name;

    case "selector":
      return `${printPrimaryExpression(expr.operand)}.${expr.name}`;

    case "index":
      return `${printPrimaryExpression(expr.operand)}[${printExpression(expr.index)}]`;

    case "unary": {
      const operand = printExpression(expr.operand);
      return expr.operand.kind === "binary"
        ? `${expr.operator}(${operand})`
        : `${expr.operator}${operand}`;
    }

    case "binary":
      return `${printExpression(expr.left)} ${expr.operator} ${printExpression(expr.right)}`;

    case "call":
      return `${printPrimaryExpression(expr.callee)}(${expr.arguments.map(printExpression).join(", ")})`;

    case "typeExpression":
      return printType(expr.type);
  }
};

// ============================================================
// Statement Printer
// ============================================================

const printBody = (
  opener: string,
  body: readonly GoStatementAst[],
  level: number
): string[] => [
  `${indentOf(level)}${opener} {`,
  ...body.flatMap((stmt) => printStatement(stmt, level + 1)),
  `${indentOf(level)}}`,
];

export const printStatement = (
  stmt: GoStatementAst,
  level: number
): string[] => {
  const ind = indentOf(level);

  switch (stmt.kind) {
    case "assignment":
      return [
        `${ind}${printExpression(stmt.left)} ${stmt.define ? ":=" : "="} ${printExpression(stmt.right)}`,
      ];

    case "varDeclaration":
      return [`${ind}var ${stmt.name} ${printType(stmt.type)}`];

    case "if":
      return printBody(`if ${printExpression(stmt.condition)}`, stmt.body, level);

    case "rangeLoop": {
      const vars =
        stmt.value === undefined ? stmt.key : `${stmt.key}, ${stmt.value}`;
      return printBody(
        `for ${vars} := range ${printExpression(stmt.range)}`,
        stmt.body,
        level
      );
    }

    case "block":
      return [
        `${ind}{`,
        ...stmt.body.flatMap((s) => printStatement(s, level + 1)),
        `${ind}}`,
      ];

    case "expressionStatement":
      return [`${ind}${printExpression(stmt.expression)}`];

    case "return":
      return [`${ind}return ${printExpression(stmt.expression)}`];
  }
};

// ============================================================
// Declaration Printer
// ============================================================

export const printMethodDeclaration = (
  decl: GoMethodDeclarationAst
): string => {
  const lines = [
    ...decl.docComment.map((line) => `// ${line}`),
    ...printBody(
      `func (${decl.receiverName} ${printType(decl.receiverType)}) ${decl.name}() ${printType(decl.resultType)}`,
      decl.body,
      0
    ),
  ];
  return lines.join("\n");
};

const printImport = (imp: GoImportAst): string =>
  imp.alias === undefined
    ? JSON.stringify(imp.path)
    : `${imp.alias} ${JSON.stringify(imp.path)}`;

const printImports = (imports: readonly GoImportAst[]): string | undefined => {
  const only = imports[0];
  if (!only) return undefined;
  if (imports.length === 1) return `import ${printImport(only)}`;
  return [
    "import (",
    ...imports.map((imp) => `\t${printImport(imp)}`),
    ")",
  ].join("\n");
};

export const printFile = (file: GoFileAst): string => {
  const sections = [`${file.headerComment}`, `package ${file.packageName}`];
  const imports = printImports(file.imports);
  if (imports) sections.push(imports);
  sections.push(...file.declarations.map(printMethodDeclaration));
  return `${sections.join("\n\n")}\n`;
};
