import { describe, expect, it } from "vitest";
import { stringifyOutput } from "../output.js";

describe("stringifyOutput", () => {
  it("turns maps into objects and sets into arrays", () => {
    const value = {
      modules: new Map([["app.models", new Set(["User", "load"])]]),
      order: ["a", "b"],
    };

    expect(JSON.parse(stringifyOutput(value))).toEqual({
      modules: { "app.models": ["User", "load"] },
      order: ["a", "b"],
    });
  });

  it("indents with two spaces", () => {
    expect(stringifyOutput(new Set([1]))).toBe("[\n  1\n]");
  });
});
