import { resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { readShapeFiles, readSingleShape } from "./shapeFiles";

const fixtures = resolve(__dirname, "../fixtures");

describe("readShapeFiles", () => {
  it("reads single shapes and arrays in argument order", () => {
    const shapes = readShapeFiles(["account.json", "catalog.json"], fixtures);

    expect(shapes.map((s) => s.typeIdentifier)).toEqual(["Account", "Tag", "Status"]);
  });

  it("fills in document defaults", () => {
    const [account] = readShapeFiles(["account.json"], fixtures);

    expect(account.kind).toBe("record");
    expect(account.layout).toBeNull();
    expect(account.def).toEqual({ type: "scalar" });
  });

  it("names the file that could not be read", () => {
    expect(() => readShapeFiles(["nope.json"], fixtures)).toThrow(
      /^Failed to read shapes from .*nope\.json: /,
    );
  });
});

describe("readSingleShape", () => {
  it("returns the only shape of a document", () => {
    expect(readSingleShape("account-v2.json", fixtures).typeIdentifier).toBe("Account");
  });

  it("rejects documents holding several shapes", () => {
    expect(() => readSingleShape("catalog.json", fixtures)).toThrow(
      "Expected exactly one shape in catalog.json, found 2",
    );
  });
});
