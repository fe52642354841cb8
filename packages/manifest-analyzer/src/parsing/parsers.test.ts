import { describe, expect, it } from "vitest";
import { parseGoMod, parseRequirementsTxt } from "./line-manifest-parsers.js";
import { parsePackageJson } from "./package-json-parser.js";
import { parsePyprojectToml } from "./pyproject-parser.js";

describe("parsePackageJson", () => {
  it("counts runtime and development dependencies", () => {
    const parsed = parsePackageJson(
      JSON.stringify({
        dependencies: { express: "^4.19.0", zod: "^3.23.0" },
        devDependencies: { vitest: "^2.1.0" },
        peerDependencies: { react: "^18.0.0" },
      }),
    );

    expect(parsed).toEqual({ ecosystem: "npm", count: 3, detail: "npm: 2 deps, 1 dev deps" });
  });

  it("records a manifest without dependency blocks as zero", () => {
    expect(parsePackageJson('{"name":"empty"}')).toEqual({
      ecosystem: "npm",
      count: 0,
      detail: "npm: 0 deps, 0 dev deps",
    });
  });

  it("rejects documents whose root is not an object", () => {
    expect(() => parsePackageJson("[]")).toThrow("package.json root is not an object");
  });
});

describe("parseRequirementsTxt", () => {
  it("skips blank and comment lines", () => {
    const raw = "requests==2.31.0\n# pinned for CI\n\nflask\n   # indented comment\n";

    expect(parseRequirementsTxt(raw)).toEqual({
      ecosystem: "pip",
      count: 2,
      detail: "pip: 2 requirements",
    });
  });
});

describe("parseGoMod", () => {
  it("ignores the module and go directives", () => {
    const raw = [
      "module example.com/demo",
      "",
      "go 1.22",
      "",
      "require (",
      "\tgithub.com/spf13/cobra v1.8.0",
      "\tgolang.org/x/sync v0.7.0",
      ")",
      "",
    ].join("\n");

    expect(parseGoMod(raw)).toEqual({ ecosystem: "go", count: 4, detail: "go: 4 modules" });
  });
});

describe("parsePyprojectToml", () => {
  it("counts poetry dependency and group sections without the python pin", () => {
    const raw = [
      "[tool.poetry]",
      'name = "demo"',
      "",
      "[tool.poetry.dependencies]",
      'python = "^3.11"',
      'requests = "^2.31"',
      "# commented = true",
      'rich = "^13.0"',
      "",
      "[tool.poetry.group.dev.dependencies]",
      'pytest = "^8.0"',
      "",
      "[build-system]",
      'requires = ["poetry-core"]',
    ].join("\n");

    expect(parsePyprojectToml(raw)).toEqual({
      ecosystem: "poetry",
      count: 3,
      detail: "poetry: 2 deps, 1 dev deps",
    });
  });

  it("estimates an inline dependencies array from its quoted strings", () => {
    const raw = [
      "[project]",
      'name = "demo"',
      "dependencies = [",
      '  "httpx>=0.27",',
      '  "pydantic>=2",',
      "]",
    ].join("\n");

    expect(parsePyprojectToml(raw)).toEqual({
      ecosystem: "poetry",
      count: 2,
      detail: "poetry: 2 deps",
    });
  });

  it("returns null when no dependencies are declared", () => {
    expect(parsePyprojectToml("[tool.black]\nline-length = 100\n")).toBeNull();
  });
});
