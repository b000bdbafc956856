/**
 * Type definitions for CLI
 */

import type { CopyRequest } from "@deepcopy-gen/emitter";

/**
 * A requested type in deepcopy.json: its name, or its name with the
 * selectors to leave shallow
 */
export type TypeEntry =
  | string
  | {
      readonly name: string;
      readonly skip?: readonly string[];
    };

/**
 * Configuration file (deepcopy.json)
 */
export type DeepCopyConfig = {
  readonly $schema?: string;
  readonly types?: readonly TypeEntry[];
  readonly pointerReceiver?: boolean;
  /** Destination file; relative to the config file's directory */
  readonly output?: string;
  readonly methodName?: string;
  readonly gofmt?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  types?: string[];
  /** Paired with `types` by position */
  skips?: string[];
  pointerReceiver?: boolean;
  output?: string;
  methodName?: string;
  gofmt?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly packageDir: string;
  readonly requests: readonly CopyRequest[];
  readonly pointerReceiver: boolean;
  /** Undefined writes to stdout */
  readonly output: string | undefined;
  readonly methodName: string;
  readonly gofmt: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
  /** Command line quoted in the generated header */
  readonly invocation: string;
};
