/**
 * Update golden test expected files
 * Run with: npx tsx scripts/update-golden-tests.ts [category]
 *
 * Directory structure:
 *   testcases/
 *   └── common/
 *       ├── <category>/<test>/           # Go package + config.yaml
 *       └── expected/<category>/<test>/  # Expected generated Go
 *
 * If no category is given, updates every test.
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { parseConfigYaml } from "../src/golden-tests/config-parser.js";
import { generateScenario } from "../src/golden-tests/runner.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const commonDir = path.join(__dirname, "../testcases/common");
const expectedBaseDir = path.join(commonDir, "expected");

/**
 * Walk common/ directory - packages in common/<path>/, expected in common/expected/<path>/
 */
const walkCommonDir = (currentDir: string, pathParts: string[] = []): number => {
  if (path.basename(currentDir) === "expected") {
    return 0;
  }

  const entries = fs.readdirSync(currentDir, { withFileTypes: true });
  if (!entries.some((e) => e.name === "config.yaml")) {
    return entries
      .filter((entry) => entry.isDirectory())
      .reduce(
        (failures, entry) =>
          failures +
          walkCommonDir(path.join(currentDir, entry.name), [...pathParts, entry.name]),
        0
      );
  }

  const configPath = path.join(currentDir, "config.yaml");
  const testEntries = parseConfigYaml(fs.readFileSync(configPath, "utf-8"));
  let failures = 0;

  for (const entry of testEntries) {
    if (entry.expected === undefined) {
      console.log(`Skipping (expects diagnostics): ${pathParts.join("/")}: ${entry.title}`);
      continue;
    }

    const expectedPath = path.join(expectedBaseDir, ...pathParts, entry.expected);
    console.log(`Updating: ${pathParts.join("/")}/${entry.expected}`);

    const result = generateScenario({
      pathParts: ["common", ...pathParts],
      title: entry.title,
      packageDir: currentDir,
      entry,
      expectedPath,
    });

    if (!result.ok) {
      console.error(`  ERROR: Generation failed`);
      for (const d of result.error.diagnostics) {
        console.error(`    ${d.code}: ${d.message}`);
      }
      failures++;
      continue;
    }

    fs.mkdirSync(path.dirname(expectedPath), { recursive: true });
    fs.writeFileSync(expectedPath, result.value.source);
    console.log(`  OK: ${expectedPath}`);
  }

  return failures;
};

const category = process.argv[2];
const startDir = category ? path.join(commonDir, category) : commonDir;

if (!fs.existsSync(startDir)) {
  console.error(`No such test category: ${category ?? "common"}`);
  process.exit(1);
}

console.log("Updating golden test expected files...");
const failures = walkCommonDir(startDir, category ? [category] : []);
console.log(failures === 0 ? "\nDone!" : `\n${failures} test(s) failed`);
process.exit(failures === 0 ? 0 : 1);
