/**
 * Tests for the import table
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ImportTable, derivedAlias, isLocalName } from "./imports.js";

const target = { path: "example.com/app/models", name: "models" };

describe("ImportTable", () => {
  it("should not qualify names from the target package", () => {
    const table = new ImportTable(target);
    expect(table.qualify(target)).to.equal(undefined);
    expect(table.qualify(undefined)).to.equal(undefined);
    expect(table.entries()).to.deep.equal([]);
  });

  it("should use the package name as alias", () => {
    const table = new ImportTable(target);
    expect(table.qualify({ path: "example.com/geo", name: "geo" })).to.equal(
      "geo"
    );
    expect(table.entries()).to.deep.equal([{ path: "example.com/geo" }]);
  });

  it("should reuse the alias of a path seen before", () => {
    const table = new ImportTable(target);
    const pkg = { path: "example.com/geo", name: "geo" };
    table.qualify(pkg);
    expect(table.qualify({ ...pkg })).to.equal("geo");
    expect(table.entries()).to.have.length(1);
  });

  it("should derive an alias when two paths share a package name", () => {
    const table = new ImportTable(target);
    expect(table.qualify({ path: "example.com/a/util", name: "util" })).to.equal(
      "util"
    );
    expect(table.qualify({ path: "example.com/b/util", name: "util" })).to.equal(
      "example_com_b_util"
    );
    expect(table.entries()).to.deep.equal([
      { path: "example.com/a/util" },
      { path: "example.com/b/util", alias: "example_com_b_util" },
    ]);
  });

  it("should add a numeric suffix when the derived alias is taken", () => {
    const table = new ImportTable(target);
    table.qualify({ path: "x/y", name: "x_y" });
    table.qualify({ path: "a/x_y", name: "x_y" });
    expect(table.qualify({ path: "x.y", name: "x_y" })).to.equal("x_y_2");
  });

  it("should not let an alias shadow a local identifier", () => {
    const table = new ImportTable(target);
    expect(table.qualify({ path: "example.com/cp", name: "cp" })).to.equal(
      "example_com_cp"
    );
  });

  it("should not import under a name the target package declares", () => {
    const table = new ImportTable(target, new Set(["util", "Record"]));
    expect(table.qualify({ path: "example.com/a/util", name: "util" })).to.equal(
      "example_com_a_util"
    );
    expect(table.qualify({ path: "example.com/geo", name: "geo" })).to.equal("geo");
  });

  it("should keep an alias that differs from the last path segment", () => {
    const table = new ImportTable(target);
    table.qualify({ path: "example.com/lib/v2", name: "lib" });
    expect(table.entries()).to.deep.equal([
      { path: "example.com/lib/v2", alias: "lib" },
    ]);
  });

  it("should sort entries by path regardless of registration order", () => {
    const table = new ImportTable(target);
    table.qualify({ path: "time", name: "time" });
    table.qualify({ path: "example.com/geo", name: "geo" });
    expect(table.entries().map((e) => e.path)).to.deep.equal([
      "example.com/geo",
      "time",
    ]);
  });
});

describe("derivedAlias", () => {
  it("should replace characters that cannot appear in identifiers", () => {
    expect(derivedAlias("github.com/acme/go-kit")).to.equal(
      "github_com_acme_go_kit"
    );
  });

  it("should prefix a leading digit", () => {
    expect(derivedAlias("9fans.net/go")).to.equal("_9fans_net_go");
  });
});

describe("isLocalName", () => {
  it("should cover depth-indexed loop variables", () => {
    expect(isLocalName("i3")).to.equal(true);
    expect(isLocalName("cpv12")).to.equal(true);
    expect(isLocalName("util")).to.equal(false);
  });
});
