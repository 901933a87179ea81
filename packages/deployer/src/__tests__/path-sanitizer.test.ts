import { describe, it, expect } from "vitest";
import { join, relative, resolve, isAbsolute } from "node:path";
import { normalizeSubPath, sanitizeSubPath } from "../deploy/path-sanitizer.js";

describe("sanitizeSubPath", () => {
  it("maps empty and separator-only input to the root", () => {
    expect(sanitizeSubPath("")).toBe("");
    expect(sanitizeSubPath("/")).toBe("");
    expect(sanitizeSubPath("\\\\//")).toBe("");
    expect(sanitizeSubPath(".")).toBe("");
  });

  it("strips leading and trailing separators", () => {
    expect(sanitizeSubPath("/src/utils/")).toBe("src/utils");
    expect(sanitizeSubPath("\\src\\utils\\")).toBe("src/utils");
    expect(sanitizeSubPath("///lib")).toBe("lib");
  });

  it("collapses dot segments and repeated separators", () => {
    expect(sanitizeSubPath("a/./b//c")).toBe("a/b/c");
    expect(sanitizeSubPath("a/b/../c")).toBe("a/c");
    expect(sanitizeSubPath("a/b/..")).toBe("a");
  });

  it("neutralizes parent traversal to the root", () => {
    expect(normalizeSubPath("../../etc")).toEqual({ path: "", escaped: true });
    expect(normalizeSubPath("a/../../etc")).toEqual({ path: "", escaped: true });
    expect(normalizeSubPath("/../x")).toEqual({ path: "", escaped: true });
    expect(normalizeSubPath("..\\..\\windows")).toEqual({ path: "", escaped: true });
    expect(normalizeSubPath("..")).toEqual({ path: "", escaped: true });
  });

  it("keeps names that merely start with dots", () => {
    expect(normalizeSubPath("..config/x")).toEqual({ path: "..config/x", escaped: false });
    expect(normalizeSubPath(".github/workflows")).toEqual({ path: ".github/workflows", escaped: false });
  });

  it("never leaves the base directory when joined", () => {
    const base = resolve("/workspace/app");
    const inputs = [
      "/etc/passwd",
      "//../../root",
      "\\..\\..\\",
      "src/../../..",
      "a/b/c/../../../../d",
      "./../x",
      "/////",
      "x/./y/../../../z",
    ];
    for (const input of inputs) {
      const result = sanitizeSubPath(input);
      expect(result.startsWith("..")).toBe(false);
      expect(isAbsolute(result)).toBe(false);
      const rel = relative(base, join(base, result));
      expect(rel.startsWith("..")).toBe(false);
    }
  });
});
