/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
deepcopy-gen - Go deep-copy method generator v${VERSION}

USAGE:
  deepcopy-gen [options] <package-dir>

OPTIONS:
  -t, --type <name>         Type to generate a copy method for (repeatable)
  -s, --skip <selectors>    Comma-separated selectors to leave shallow,
                            paired with --type by position (repeatable)
  -p, --pointer-receiver    Generate func (o *T) DeepCopy() *T
  -o, --output <file>       Destination file (default: stdout, or "-")
  -m, --method <name>       Copy method name (default: DeepCopy)
  --gofmt                   Format the output with gofmt
  -c, --config <file>       Config file path (default: nearest deepcopy.json)
  -V, --verbose             Verbose output
  -q, --quiet               Suppress warnings
  -h, --help                Show help
  -v, --version             Show version

SELECTORS:
  Field                     A field of the type
  Outer.Inner               A field of a nested struct
  Items[i]                  Every element of a slice or array
  Table[k]                  Every entry of a map; Table[k].Field in its values
  Table[key].Field          A field of every map key

EXIT CODES:
  0 success, 2 configuration, 3 loading, 4 resolution,
  5 formatting, 6 output, 1 unexpected failure

EXAMPLES:
  deepcopy-gen -t Config ./pkg/config
  deepcopy-gen -t Tree -s Parent,Cache[k] -p -o zz_deepcopy.go ./pkg/tree
  deepcopy-gen -t A -t B -s "" -s Owner ./models
`);
};
