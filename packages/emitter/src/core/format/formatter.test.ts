import { describe, it } from "mocha";
import { expect } from "chai";
import { builtinFormatter, formatSource } from "./formatter.js";

describe("Built-in formatter", () => {
  it("should re-indent with tabs and collapse blank lines", () => {
    const result = formatSource(
      "package a\n\nfunc (o A) F() A {\n    cp := o\n\n\n    return cp\n}\n\n"
    );
    expect(result).to.deep.equal({
      ok: true,
      value: "package a\n\nfunc (o A) F() A {\n\tcp := o\n\n\treturn cp\n}\n",
    });
  });

  it("should indent by nesting depth", () => {
    const result = formatSource(
      "package a\nfunc f() {\nif x != nil {\nfor i := range x {\ny[i] = x[i]\n}\n}\n}\n"
    );
    expect(result.ok && result.value).to.equal(
      "package a\nfunc f() {\n\tif x != nil {\n\t\tfor i := range x {\n\t\t\ty[i] = x[i]\n\t\t}\n\t}\n}\n"
    );
  });

  it("should reject an unclosed brace", () => {
    const result = formatSource("package a\n\nfunc f() {\n");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.code).to.equal("DCG4001");
    expect(result.error.message).to.equal(
      "Generated source is not valid Go: unclosed {"
    );
    expect(result.error.location?.line).to.equal(3);
  });

  it("should reject a mismatched closer", () => {
    const result = formatSource("package a\n\nvar x = (1]\n");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.message).to.equal(
      "Generated source is not valid Go: unexpected ]"
    );
  });

  it("should be exposed under its name", () => {
    expect(builtinFormatter.name).to.equal("builtin");
    expect(builtinFormatter.format("package a\n")).to.deep.equal({
      ok: true,
      value: "package a\n",
    });
  });
});
