/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const VERSION =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

export const PROGRAM_NAME = "deepcopy-gen";

export const CONFIG_FILE = "deepcopy.json";

export const DEFAULT_METHOD_NAME = "DeepCopy";
