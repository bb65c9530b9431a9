import { describe, expect, it } from "vitest";
import { parseConfig } from "../config/arg-parser.js";

describe("parseConfig", () => {
  it("reads the merge command with its defaults", () => {
    expect(parseConfig(["merge", "main.py"])).toMatchObject({
      command: "merge",
      entry: "main.py",
      projectRoot: undefined,
      out: undefined,
      verify: true,
    });
  });

  it("reads merge options", () => {
    expect(
      parseConfig(["merge", "src/main.py", "src", "-o", "out.py", "--no-verify", "--no-color"]),
    ).toEqual({
      command: "merge",
      entry: "src/main.py",
      projectRoot: "src",
      out: "out.py",
      verify: false,
      color: false,
    });
  });

  it("collects every file for an audit", () => {
    expect(parseConfig(["audit", "a.py", "b.py", "--json"])).toEqual({
      command: "audit",
      files: ["a.py", "b.py"],
      json: true,
    });
    expect(parseConfig(["audit", "a.py"])).toEqual({
      command: "audit",
      files: ["a.py"],
      json: false,
    });
  });
});
