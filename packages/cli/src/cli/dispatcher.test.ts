/**
 * End-to-end tests for the command line
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { exitCodeFor, runCli } from "./dispatcher.js";

const PLAIN = `package models

type Plain struct {
	Tags []string
}
`;

describe("runCli", () => {
  let tempDir: string;
  let packageDir: string;
  let output: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "deepcopy-cli-"));
    packageDir = path.join(tempDir, "models");
    output = path.join(tempDir, "zz_deepcopy.go");
    fs.mkdirSync(packageDir);
    fs.writeFileSync(path.join(packageDir, "plain.go"), PLAIN);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should write the generated file", async () => {
    const args = ["-t", "Plain", "-p", "-o", output, packageDir];
    expect(await runCli(args)).to.equal(0);
    expect(fs.readFileSync(output, "utf-8")).to.equal(
      [
        `// Code generated by deepcopy-gen ${args.join(" ")}; DO NOT EDIT.`,
        "",
        "package models",
        "",
        "// DeepCopy generates a deep copy of *Plain",
        "func (o *Plain) DeepCopy() *Plain {",
        "\tcp := *o",
        "\tif o.Tags != nil {",
        "\t\tcp.Tags = make([]string, len(o.Tags))",
        "\t\tcopy(cp.Tags, o.Tags)",
        "\t}",
        "\treturn &cp",
        "}",
        "",
      ].join("\n")
    );
  });

  it("should take types and options from deepcopy.json", async () => {
    fs.writeFileSync(
      path.join(tempDir, "deepcopy.json"),
      JSON.stringify({ types: ["Plain"], methodName: "Clone", output: "out.go" })
    );
    expect(await runCli([packageDir])).to.equal(0);
    const text = fs.readFileSync(path.join(tempDir, "out.go"), "utf-8");
    expect(text).to.contain("func (o Plain) Clone() Plain {\n");
  });

  it("should exit 2 without a type", async () => {
    expect(await runCli(["-o", output, packageDir])).to.equal(2);
    expect(fs.existsSync(output)).to.equal(false);
  });

  it("should exit 2 without a package directory", async () => {
    expect(await runCli(["-t", "Plain"])).to.equal(2);
  });

  it("should exit 2 on an invalid config file", async () => {
    fs.writeFileSync(path.join(tempDir, "deepcopy.json"), "[");
    expect(await runCli(["-t", "Plain", "-o", output, packageDir])).to.equal(2);
  });

  it("should exit 3 when the package cannot be loaded", async () => {
    const missing = path.join(tempDir, "missing");
    expect(await runCli(["-t", "Plain", "-o", output, missing])).to.equal(3);
  });

  it("should exit 4 for an unknown type and leave the destination alone", async () => {
    fs.writeFileSync(output, "keep\n");
    expect(await runCli(["-t", "Missing", "-o", output, packageDir])).to.equal(4);
    expect(fs.readFileSync(output, "utf-8")).to.equal("keep\n");
  });

  it("should exit 6 when the destination cannot be opened", async () => {
    const destination = path.join(tempDir, "no-such-dir", "out.go");
    expect(await runCli(["-t", "Plain", "-o", destination, packageDir])).to.equal(6);
  });

  it("should print the version", async () => {
    expect(await runCli(["--version"])).to.equal(0);
  });
});

describe("exitCodeFor", () => {
  it("should map the first error to its category", () => {
    expect(
      exitCodeFor([
        { code: "DCG2006", severity: "warning", message: "w" },
        { code: "DCG4001", severity: "error", message: "e" },
      ])
    ).to.equal(5);
  });

  it("should return 1 without diagnostics", () => {
    expect(exitCodeFor([])).to.equal(1);
  });
});
