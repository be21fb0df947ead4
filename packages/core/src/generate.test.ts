import { describe, expect, it } from "vitest";
import { generateSchema } from "./generate";
import { array, field, list, primaryKey, record, string, u32, u64, u8 } from "./shapes";

describe("generateSchema", () => {
  it("converts every shape and keeps failures apart", () => {
    const Tag = record("Tag", [field("id", u32, [primaryKey]), field("label", string())]);
    const Blob = record("Blob", [field("bytes", array(u8, 8))]);

    const result = generateSchema([Tag, Blob], { schema: "app" });

    expect(result.tables.map((t) => t.name)).toEqual(["tag"]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].typeIdentifier).toBe("Blob");
    expect(result.failures[0].error.kind).toBe("UnsupportedType");
    expect(result.ddl).toBe(
      [
        "CREATE SCHEMA IF NOT EXISTS app;",
        "",
        "CREATE TABLE app.tag (",
        "  id integer NOT NULL,",
        "  label text NOT NULL,",
        "  PRIMARY KEY (id)",
        ");",
        "",
      ].join("\n"),
    );
  });

  it("keeps the first shape when two map to the same table", () => {
    const PageOfIds = record("Page", [field("items", list(u32))]);
    const PageTotals = record("Page", [field("total", u64)]);
    const Shouting = record("PAGE", [field("title", string())]);

    const result = generateSchema([PageOfIds, PageTotals, Shouting]);

    expect(result.tables).toHaveLength(1);
    expect(result.tables[0].columns.map((c) => c.name)).toEqual(["items"]);
    expect(
      result.failures.map((f) => [f.typeIdentifier, f.error.kind, f.error.message]),
    ).toEqual([
      ["Page", "DuplicateTable", "Duplicate table name: 'page' is already used by Page"],
      ["PAGE", "DuplicateTable", "Duplicate table name: 'page' is already used by Page"],
    ]);
    expect(result.ddl.match(/CREATE TABLE/g)).toHaveLength(1);
  });

  it("passes the primary-key marker through", () => {
    const Tag = record("Tag", [field("slug", string(), [{ namespace: "db", key: "pk" }])]);

    const result = generateSchema([Tag], { primaryKeyAttribute: { namespace: "db", key: "pk" } });

    expect(result.tables[0].primaryKey?.name).toBe("slug");
  });
});
