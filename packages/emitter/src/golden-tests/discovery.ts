/**
 * Test scenario discovery
 *
 * Directory structure:
 *   testcases/
 *   └── common/                          # All tests
 *       ├── <category>/<test>/           # Go package + config.yaml
 *       └── expected/<category>/<test>/  # Expected generated Go
 */

import * as fs from "fs";
import * as path from "path";
import { Scenario } from "./types.js";
import { parseConfigYaml } from "./config-parser.js";

/**
 * Discover all test scenarios
 */
export const discoverScenarios = (baseDir: string): readonly Scenario[] => {
  const commonDir = path.join(baseDir, "common");
  return discoverCommonScenarios(commonDir);
};

/**
 * Discover scenarios from common/ directory
 * Packages are in common/<category>/<test>/
 * Expected files are in common/expected/<category>/<test>/
 */
const discoverCommonScenarios = (commonDir: string): readonly Scenario[] => {
  const scenarios: Scenario[] = [];
  const expectedBaseDir = path.join(commonDir, "expected");

  const walk = (dir: string, pathParts: string[]): void => {
    // Skip expected/ subdirectory (it contains expected output, not sources)
    const dirName = path.basename(dir);
    if (dirName === "expected") {
      return;
    }

    const entries = fs.readdirSync(dir, { withFileTypes: true });
    const hasConfig = entries.some((e) => e.name === "config.yaml");

    if (hasConfig) {
      const configPath = path.join(dir, "config.yaml");
      const configContent = fs.readFileSync(configPath, "utf-8");
      const testEntries = parseConfigYaml(configContent);

      for (const entry of testEntries) {
        const expectedPath =
          entry.expected === undefined
            ? undefined
            : path.join(expectedBaseDir, ...pathParts, entry.expected);

        if (expectedPath && !fs.existsSync(expectedPath)) {
          throw new Error(
            `Expected file not found: ${expectedPath} (title: "${entry.title}", config: ${configPath})`
          );
        }

        scenarios.push({
          pathParts: ["common", ...pathParts],
          title: entry.title,
          packageDir: dir,
          entry,
          expectedPath,
        });
      }
      // A test directory's subdirectories belong to its module
      return;
    }

    // Recurse into subdirectories (except expected/)
    for (const entry of entries) {
      if (entry.isDirectory() && entry.name !== "expected") {
        walk(path.join(dir, entry.name), [...pathParts, entry.name]);
      }
    }
  };

  if (fs.existsSync(commonDir)) {
    walk(commonDir, []);
  }
  return scenarios;
};
