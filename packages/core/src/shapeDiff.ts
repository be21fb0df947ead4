import type { Field, RecordShape, Shape, ShapeDef, ShapeLayout, Variant } from "./model";

export type ShapeDiff =
  | { type: "equal" }
  | { type: "different"; from: Shape; to: Shape }
  | {
      type: "record";
      from: RecordShape;
      to: RecordShape;
      /** Fields present in both with different shapes. */
      updates: Map<string, ShapeDiff>;
      /** Fields only in `from`, in `from` order. */
      deletions: string[];
      /** Fields only in `to`, in `to` order. */
      insertions: string[];
      unchanged: string[];
    }
  | { type: "sequence"; from: Shape; to: Shape };

/**
 * Compare two shapes structurally. Only the structure and metadata of the
 * shapes take part (never runtime values); field attributes are ignored.
 */
export function diffShapes(from: Shape, to: Shape): ShapeDiff {
  if (shapesEqual(from, to)) {
    return { type: "equal" };
  }

  if (from.kind === "record" && to.kind === "record") {
    return diffRecords(from, to);
  }

  if (isSequenceDef(from.def) && isSequenceDef(to.def)) {
    return { type: "sequence", from, to };
  }

  return { type: "different", from, to };
}

function diffRecords(from: RecordShape, to: RecordShape): ShapeDiff {
  const updates = new Map<string, ShapeDiff>();
  const deletions: string[] = [];
  const unchanged: string[] = [];

  const toFields = new Map(to.fields.map((f) => [f.name, f]));
  for (const fromField of from.fields) {
    const toField = toFields.get(fromField.name);
    if (!toField) {
      deletions.push(fromField.name);
      continue;
    }
    const diff = diffShapes(fromField.shape, toField.shape);
    if (diff.type === "equal") {
      unchanged.push(fromField.name);
    } else {
      updates.set(fromField.name, diff);
    }
  }

  const fromNames = new Set(from.fields.map((f) => f.name));
  const insertions = to.fields.filter((f) => !fromNames.has(f.name)).map((f) => f.name);

  return { type: "record", from, to, updates, deletions, insertions, unchanged };
}

function isSequenceDef(def: ShapeDef): boolean {
  return def.type === "list" || def.type === "set";
}

export function shapesEqual(a: Shape, b: Shape): boolean {
  if (a.typeIdentifier !== b.typeIdentifier || a.kind !== b.kind) return false;
  if (!layoutsEqual(a.layout, b.layout) || !defsEqual(a.def, b.def)) return false;

  switch (a.kind) {
    case "record":
      return b.kind === "record" && fieldsEqual(a.fields, b.fields);
    case "tagged":
      return b.kind === "tagged" && variantsEqual(a.variants, b.variants);
    case "reference":
      return b.kind === "reference" && shapesEqual(a.pointee, b.pointee);
    case "primitive":
      return b.kind === "primitive" && a.primitive === b.primitive;
    case "opaque":
      return b.kind === "opaque";
  }
}

function layoutsEqual(a: ShapeLayout | null, b: ShapeLayout | null): boolean {
  if (a === null || b === null) return a === b;
  return a.sizeBytes === b.sizeBytes && a.signed === b.signed && a.isFloat === b.isFloat;
}

function defsEqual(a: ShapeDef, b: ShapeDef): boolean {
  switch (a.type) {
    case "scalar":
    case "text":
      return b.type === a.type;
    case "option":
      return b.type === "option" && shapesEqual(a.inner, b.inner);
    case "list":
      return b.type === "list" && shapesEqual(a.item, b.item);
    case "set":
      return b.type === "set" && shapesEqual(a.item, b.item);
    case "map":
      return b.type === "map" && shapesEqual(a.key, b.key) && shapesEqual(a.value, b.value);
    case "array":
      return b.type === "array" && a.length === b.length && shapesEqual(a.item, b.item);
  }
}

function fieldsEqual(a: readonly Field[], b: readonly Field[]): boolean {
  return (
    a.length === b.length &&
    a.every((field, i) => field.name === b[i].name && shapesEqual(field.shape, b[i].shape))
  );
}

function variantsEqual(a: readonly Variant[], b: readonly Variant[]): boolean {
  return (
    a.length === b.length &&
    a.every((variant, i) => variant.name === b[i].name && fieldsEqual(variant.fields, b[i].fields))
  );
}
