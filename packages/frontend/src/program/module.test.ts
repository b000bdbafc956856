import { describe, it } from "mocha";
import { expect } from "chai";
import {
  candidateDirs,
  escapeModulePath,
  isStandardLibrary,
  parseGoMod,
} from "./module.js";

const goMod = `module example.com/app

go 1.22

require github.com/Acme/labels v1.2.0

require (
	golang.org/x/text v0.14.0 // indirect
	example.com/kit v0.3.0
	example.com/kit/extra v0.1.0
)

replace example.com/local => ./third_party/local

replace (
	example.com/kit v0.3.0 => example.com/kit-fork v0.3.1
	example.com/dropped => example.com/elsewhere
)
`;

describe("go.mod", () => {
  const module = parseGoMod(goMod, "/work");

  it("should read the module path and requirements", () => {
    expect(module.path).to.equal("example.com/app");
    expect(module.requirements).to.deep.equal([
      { path: "github.com/Acme/labels", version: "v1.2.0" },
      { path: "golang.org/x/text", version: "v0.14.0" },
      { path: "example.com/kit", version: "v0.3.0" },
      { path: "example.com/kit/extra", version: "v0.1.0" },
    ]);
  });

  it("should keep local and versioned replacements", () => {
    expect(module.replacements).to.deep.equal([
      { from: "example.com/local", dir: "/work/third_party/local" },
      { from: "example.com/kit", module: "example.com/kit-fork", version: "v0.3.1" },
    ]);
  });

  describe("candidateDirs", () => {
    const toolchain = { goRoot: "/goroot", moduleCache: "/cache" };

    it("should look in the module cache for required modules", () => {
      expect(candidateDirs(module, "github.com/Acme/labels/sets", toolchain)).to.deep.equal([
        "/work/vendor/github.com/Acme/labels/sets",
        "/cache/github.com/!acme/labels@v1.2.0/sets",
      ]);
    });

    it("should put replacements first and prefer the longest module path", () => {
      expect(candidateDirs(module, "example.com/kit/extra/x", toolchain)).to.deep.equal([
        "/cache/example.com/kit-fork@v0.3.1/extra/x",
        "/work/vendor/example.com/kit/extra/x",
        "/cache/example.com/kit/extra@v0.1.0/x",
        "/cache/example.com/kit@v0.3.0/extra/x",
      ]);
    });

    it("should resolve standard library paths under GOROOT", () => {
      expect(candidateDirs(module, "net/url", toolchain)).to.deep.equal([
        "/work/vendor/net/url",
        "/goroot/src/net/url",
      ]);
      expect(candidateDirs(undefined, "net/url", toolchain)).to.deep.equal([
        "/goroot/src/net/url",
      ]);
    });

    it("should skip the toolchain directories it does not know", () => {
      expect(candidateDirs(module, "net/url")).to.deep.equal(["/work/vendor/net/url"]);
      expect(candidateDirs(module, "golang.org/x/text/language")).to.deep.equal([
        "/work/vendor/golang.org/x/text/language",
      ]);
    });
  });
});

describe("escapeModulePath", () => {
  it("should mark upper-case letters", () => {
    expect(escapeModulePath("github.com/BurntSushi/toml")).to.equal(
      "github.com/!burnt!sushi/toml"
    );
  });
});

describe("isStandardLibrary", () => {
  it("should tell standard library paths by their first element", () => {
    expect(isStandardLibrary("encoding/json")).to.equal(true);
    expect(isStandardLibrary("example.com/app")).to.equal(false);
  });
});
