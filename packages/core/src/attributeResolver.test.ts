import { describe, expect, it } from "vitest";
import { isPrimaryKeyField } from "./attributeResolver";
import type { Attribute } from "./model";
import { field, primaryKey, u64 } from "./shapes";

const withAttributes = (...attributes: Attribute[]) => field("id", u64, attributes);

describe("isPrimaryKeyField", () => {
  it("matches the psql primary_key attribute", () => {
    expect(isPrimaryKeyField(withAttributes(primaryKey))).toBe(true);
  });

  it("returns false for a field without attributes", () => {
    expect(isPrimaryKeyField(withAttributes())).toBe(false);
  });

  it("scans every attribute of the field", () => {
    const renamed = withAttributes({ namespace: "serde", key: "rename", value: "ID" }, primaryKey);

    expect(isPrimaryKeyField(renamed)).toBe(true);
  });

  it("matches namespace and key case-sensitively", () => {
    expect(isPrimaryKeyField(withAttributes({ namespace: "PSQL", key: "primary_key" }))).toBe(false);
    expect(isPrimaryKeyField(withAttributes({ namespace: "psql", key: "Primary_Key" }))).toBe(false);
  });

  it("does not match partial names", () => {
    expect(isPrimaryKeyField(withAttributes({ namespace: "psql", key: "primary" }))).toBe(false);
    expect(isPrimaryKeyField(withAttributes({ namespace: "psql_ext", key: "primary_key" }))).toBe(
      false,
    );
  });

  it("ignores a matching key without a namespace", () => {
    expect(isPrimaryKeyField(withAttributes({ key: "primary_key" }))).toBe(false);
  });

  it("ignores the attribute value", () => {
    expect(isPrimaryKeyField(withAttributes({ ...primaryKey, value: false }))).toBe(true);
  });

  it("accepts a custom marker", () => {
    const marker = { namespace: "db", key: "id" };

    expect(isPrimaryKeyField(withAttributes({ namespace: "db", key: "id" }), marker)).toBe(true);
    expect(isPrimaryKeyField(withAttributes(primaryKey), marker)).toBe(false);
  });
});
