import { describe, it } from "mocha";
import { expect } from "chai";
import {
  elementPath,
  entryPath,
  keyPath,
  fieldPath,
  parseSkipSelectors,
  skipSetFor,
} from "./skip-set.js";

describe("Skip sets", () => {
  it("should split and trim selectors", () => {
    expect([...parseSkipSelectors(" A , B.C,D[i] ")]).to.deep.equal([
      "A",
      "B.C",
      "D[i]",
    ]);
  });

  it("should return an empty set for an empty string", () => {
    expect(parseSkipSelectors("").size).to.equal(0);
    expect(parseSkipSelectors(" , ").size).to.equal(0);
  });

  it("should pair skip lists with types by position", () => {
    const lists = ["A", "B,C"];
    expect([...skipSetFor(lists, 1)]).to.deep.equal(["B", "C"]);
    expect(skipSetFor(lists, 2).size).to.equal(0);
  });

  it("should build selector paths", () => {
    expect(fieldPath("", "Items")).to.equal("Items");
    expect(fieldPath(elementPath("Items"), "Name")).to.equal("Items[i].Name");
    expect(fieldPath(entryPath("Index"), "Next")).to.equal("Index[k].Next");
    expect(fieldPath(keyPath("Index"), "Next")).to.equal("Index[key].Next");
  });
});
