import { describe, expect, it } from "vitest";
import { detectTags } from "../src/services/auto-tag";

describe("detectTags", () => {
  it("returns matching tags in table order", () => {
    expect(detectTags("Fixed the login bug in the REST endpoint")).toEqual(["api", "auth", "error"]);
    expect(detectTags("Rotate the postgres credential")).toEqual(["database", "security"]);
  });

  it("ignores case", () => {
    expect(detectTags("SQLITE WAL mode")).toEqual(["database"]);
  });

  it("matches whole words only", () => {
    expect(detectTags("rapid keyboard shortcuts")).toEqual([]);
  });

  it("returns nothing for unrelated text", () => {
    expect(detectTags("grocery list for sunday")).toEqual([]);
  });
});
