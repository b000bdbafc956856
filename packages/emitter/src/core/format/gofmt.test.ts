import { describe, it } from "mocha";
import { expect } from "chai";
import { createGofmtFormatter } from "./gofmt.js";

describe("gofmt formatter", () => {
  it("should report a missing binary", () => {
    const formatter = createGofmtFormatter("deepcopy-gen-no-such-gofmt");
    const result = formatter.format("package a\n");
    expect(formatter.name).to.equal("gofmt");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.code).to.equal("DCG4002");
    expect(result.error.hint).to.equal("install the Go toolchain or drop --gofmt");
  });
});
