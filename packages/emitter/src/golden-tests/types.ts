/**
 * Golden test types
 */

/**
 * Diagnostics matching mode:
 * - "contains": expected codes must be present, extra codes allowed (default)
 * - "exact": actual codes must exactly match expected codes
 */
export type DiagnosticsMode = "contains" | "exact";

export type TestEntry = {
  readonly title: string;
  /** Type names requested, in order */
  readonly types: readonly string[];
  /** Skip selector lists, paired with `types` by position */
  readonly skips: readonly string[];
  readonly pointerReceiver: boolean;
  readonly methodName?: string;
  /** File under expected/<category>/<test>/ */
  readonly expected?: string;
  readonly expectDiagnostics?: readonly string[];
  readonly expectDiagnosticsMode?: DiagnosticsMode;
  /** Warning codes the run must report, compared exactly */
  readonly expectWarnings?: readonly string[];
};

export type Scenario = {
  readonly pathParts: readonly string[];
  readonly title: string;
  /** Directory of the Go package under test */
  readonly packageDir: string;
  readonly entry: TestEntry;
  readonly expectedPath?: string; // Optional when expectDiagnostics is set
};

export type DescribeNode = {
  readonly name: string;
  readonly children: Map<string, DescribeNode>;
  tests: Scenario[];
};
