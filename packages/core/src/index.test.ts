import { describe, expect, it } from "vitest";
import { resolveTargetPath } from "./index.js";

describe("resolveTargetPath", () => {
  it("resolves provided path against cwd", () => {
    const target = resolveTargetPath("src", "/repo");
    expect(target.absolutePath).toBe("/repo/src");
    expect(target.inputPath).toBe("src");
  });

  it("defaults to current directory when no input path is given", () => {
    const target = resolveTargetPath(undefined, "/repo");
    expect(target.absolutePath).toBe("/repo");
  });

  it("keeps absolute input paths", () => {
    const target = resolveTargetPath("/work/project", "/repo");
    expect(target.absolutePath).toBe("/work/project");
  });
});
