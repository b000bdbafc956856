/**
 * Go AST type definitions
 *
 * Structured nodes for the generated copy functions.
 * Pipeline: TypeDescription walk -> typed Go AST -> deterministic printer -> Go text
 */

// ============================================================
// Type AST
// ============================================================

export type GoNamedTypeAst = {
  readonly kind: "namedType";
  /** Import alias for names from another package */
  readonly qualifier?: string;
  readonly name: string;
  readonly typeArguments: readonly GoTypeAst[];
};

export type GoPointerTypeAst = {
  readonly kind: "pointerType";
  readonly elementType: GoTypeAst;
};

export type GoSliceTypeAst = {
  readonly kind: "sliceType";
  readonly elementType: GoTypeAst;
};

export type GoArrayTypeAst = {
  readonly kind: "arrayType";
  readonly length: string;
  readonly elementType: GoTypeAst;
};

export type GoMapTypeAst = {
  readonly kind: "mapType";
  readonly keyType: GoTypeAst;
  readonly valueType: GoTypeAst;
};

export type GoChannelTypeAst = {
  readonly kind: "channelType";
  readonly direction: "both" | "send" | "recv";
  readonly elementType: GoTypeAst;
};

export type GoFieldAst = {
  /** Undefined for embedded fields */
  readonly name?: string;
  readonly type: GoTypeAst;
  readonly tag?: string;
};

export type GoStructTypeAst = {
  readonly kind: "structType";
  readonly fields: readonly GoFieldAst[];
};

export type GoInterfaceElementAst =
  | {
      readonly kind: "method";
      readonly name: string;
      readonly signature: GoFuncTypeAst;
    }
  | { readonly kind: "embedded"; readonly type: GoTypeAst };

export type GoInterfaceTypeAst = {
  readonly kind: "interfaceType";
  readonly elements: readonly GoInterfaceElementAst[];
};

export type GoParameterAst = {
  readonly name?: string;
  readonly type: GoTypeAst;
};

export type GoFuncTypeAst = {
  readonly kind: "funcType";
  readonly parameters: readonly GoParameterAst[];
  readonly results: readonly GoParameterAst[];
  /** The last parameter is `...T`; its type is the element type */
  readonly variadic: boolean;
};

export type GoTypeAst =
  | GoNamedTypeAst
  | GoPointerTypeAst
  | GoSliceTypeAst
  | GoArrayTypeAst
  | GoMapTypeAst
  | GoChannelTypeAst
  | GoStructTypeAst
  | GoInterfaceTypeAst
  | GoFuncTypeAst;

// ============================================================
// Expression AST
// ============================================================

export type GoIdentifierAst = {
  readonly kind: "identifier";
  readonly name: string;
};

export type GoSelectorAst = {
  readonly kind: "selector";
  readonly operand: GoExpressionAst;
  readonly name: string;
};

export type GoIndexAst = {
  readonly kind: "index";
  readonly operand: GoExpressionAst;
  readonly index: GoExpressionAst;
};

export type GoUnaryAst = {
  readonly kind: "unary";
  readonly operator: "*" | "&";
  readonly operand: GoExpressionAst;
};

export type GoBinaryAst = {
  readonly kind: "binary";
  readonly operator: "!=" | "==";
  readonly left: GoExpressionAst;
  readonly right: GoExpressionAst;
};

export type GoCallAst = {
  readonly kind: "call";
  readonly callee: GoExpressionAst;
  readonly arguments: readonly GoExpressionAst[];
};

/** A type used as an operand, as in `make([]T, n)` */
export type GoTypeExpressionAst = {
  readonly kind: "typeExpression";
  readonly type: GoTypeAst;
};

export type GoExpressionAst =
  | GoIdentifierAst
  | GoSelectorAst
  | GoIndexAst
  | GoUnaryAst
  | GoBinaryAst
  | GoCallAst
  | GoTypeExpressionAst;

// ============================================================
// Statement AST
// ============================================================

export type GoAssignmentAst = {
  readonly kind: "assignment";
  readonly left: GoExpressionAst;
  readonly right: GoExpressionAst;
  /** `:=` instead of `=` */
  readonly define: boolean;
};

export type GoVarDeclarationAst = {
  readonly kind: "varDeclaration";
  readonly name: string;
  readonly type: GoTypeAst;
};

export type GoIfAst = {
  readonly kind: "if";
  readonly condition: GoExpressionAst;
  readonly body: readonly GoStatementAst[];
};

export type GoRangeLoopAst = {
  readonly kind: "rangeLoop";
  readonly key: string;
  readonly value?: string;
  readonly range: GoExpressionAst;
  readonly body: readonly GoStatementAst[];
};

export type GoBlockAst = {
  readonly kind: "block";
  readonly body: readonly GoStatementAst[];
};

export type GoExpressionStatementAst = {
  readonly kind: "expressionStatement";
  readonly expression: GoExpressionAst;
};

export type GoReturnAst = {
  readonly kind: "return";
  readonly expression: GoExpressionAst;
};

export type GoStatementAst =
  | GoAssignmentAst
  | GoVarDeclarationAst
  | GoIfAst
  | GoRangeLoopAst
  | GoBlockAst
  | GoExpressionStatementAst
  | GoReturnAst;

// ============================================================
// Declarations
// ============================================================

export type GoMethodDeclarationAst = {
  readonly kind: "methodDeclaration";
  readonly docComment: readonly string[];
  readonly receiverName: string;
  readonly receiverType: GoTypeAst;
  readonly name: string;
  readonly resultType: GoTypeAst;
  readonly body: readonly GoStatementAst[];
};

export type GoImportAst = {
  readonly path: string;
  /** Omitted when the package name matches the last path segment */
  readonly alias?: string;
};

export type GoFileAst = {
  readonly headerComment: string;
  readonly packageName: string;
  readonly imports: readonly GoImportAst[];
  readonly declarations: readonly GoMethodDeclarationAst[];
};
