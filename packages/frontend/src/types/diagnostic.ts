/**
 * Diagnostic types for deepcopy-gen
 *
 * Code ranges map onto the error taxonomy of a run:
 *   DCG1xxx  configuration
 *   DCG2xxx  loading the type environment
 *   DCG3xxx  resolving and traversing requested types
 *   DCG4xxx  formatting the assembled source
 *   DCG5xxx  writing the output destination
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "DCG1001" // No type requested
  | "DCG1002" // No package path given
  | "DCG1003" // Config file not found
  | "DCG1004" // Config file is invalid
  | "DCG1005" // Unknown or malformed command-line option
  | "DCG2001" // Package directory not found
  | "DCG2002" // No Go source files in package
  | "DCG2003" // Lexical error
  | "DCG2004" // Syntax error
  | "DCG2005" // Files disagree on package name
  | "DCG2006" // Import could not be resolved (warning)
  | "DCG2007" // Undefined type name (warning)
  | "DCG2008" // Failed to read a source file
  | "DCG3001" // Type not found
  | "DCG3002" // Type cannot declare methods
  | "DCG3101" // Cycle without copy method, left shallow (warning)
  | "DCG4001" // Generated source is not valid
  | "DCG4002" // External formatter unavailable
  | "DCG5001" // Output destination cannot be opened
  | "DCG5002"; // Output destination cannot be written

export type ErrorCategory =
  | "ConfigError"
  | "LoadError"
  | "ResolutionError"
  | "FormattingError"
  | "OutputError";

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const diagnosticCategory = (code: DiagnosticCode): ErrorCategory => {
  switch (code[3]) {
    case "1":
      return "ConfigError";
    case "2":
      return "LoadError";
    case "3":
      return "ResolutionError";
    case "4":
      return "FormattingError";
    default:
      return "OutputError";
  }
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}:`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`(hint: ${diagnostic.hint})`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (
  diagnostics: readonly Diagnostic[] = []
): DiagnosticsCollector => ({
  diagnostics,
  hasErrors: diagnostics.some(isError),
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});
