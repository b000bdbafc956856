/**
 * Emitter types
 */

import type { DiagnosticsCollector, Diagnostic } from "@deepcopy-gen/frontend";
import type { SourceFormatter } from "./core/format/formatter.js";
import type { SkipSet } from "./core/skip-set.js";

export type CopyRequest = {
  readonly typeName: string;
  readonly skips: SkipSet;
};

export type EmitterOptions = {
  /** Generate `func (o *T) M() *T` instead of `func (o T) M() T` */
  readonly pointerReceiver: boolean;
  readonly methodName: string;
  /** Command line quoted in the generated-file header */
  readonly invocation: string;
  readonly formatter: SourceFormatter;
};

export type GeneratedSource = {
  readonly source: string;
  readonly warnings: readonly Diagnostic[];
};

export type GenerationFailure = DiagnosticsCollector & {
  /** Assembled text when formatting rejected it */
  readonly unformatted?: string;
};
