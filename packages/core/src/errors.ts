export type ConversionErrorKind =
  | "NotAStruct"
  | "MultiplePrimaryKeys"
  | "UnsupportedType"
  | "DuplicateTable";

const CONVERSION_PREFIX: Record<ConversionErrorKind, string> = {
  NotAStruct: "Expected struct, got",
  MultiplePrimaryKeys: "Multiple primary keys defined",
  UnsupportedType: "Unsupported type",
  DuplicateTable: "Duplicate table name",
};

/**
 * Terminal failure of a shape → table conversion. No partial table is ever
 * returned alongside one.
 */
export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;
  readonly detail: string;

  constructor(kind: ConversionErrorKind, detail: string) {
    super(`${CONVERSION_PREFIX[kind]}: ${detail}`);
    this.name = "ConversionError";
    this.kind = kind;
    this.detail = detail;
  }
}

export type MigrationErrorKind =
  | "NoChanges"
  | "IncompatibleShapes"
  | "IncompatibleTypeChange";

export class MigrationError extends Error {
  readonly kind: MigrationErrorKind;

  constructor(kind: MigrationErrorKind, message: string) {
    super(message);
    this.name = "MigrationError";
    this.kind = kind;
  }
}

export class ShapeDocumentError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid shape document:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ShapeDocumentError";
    this.issues = issues;
  }
}
