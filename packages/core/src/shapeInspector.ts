import type { Field, Shape, ShapeKind } from "./model";

// Structural queries over shapes. Every function here is total: it answers
// for any shape and never throws.

export function shapeKind(shape: Shape): ShapeKind {
  return shape.kind;
}

export function recordFields(shape: Shape): readonly Field[] {
  return shape.kind === "record" ? shape.fields : [];
}

export function pointeeOf(shape: Shape): Shape | null {
  return shape.kind === "reference" ? shape.pointee : null;
}

/** The shape behind any chain of references (the shape itself if it is none). */
export function dereference(shape: Shape): Shape {
  const pointee = pointeeOf(shape);
  return pointee === null ? shape : dereference(pointee);
}

export function isOptional(shape: Shape): boolean {
  return shape.def.type === "option";
}

export function optionInner(shape: Shape): Shape | null {
  return shape.def.type === "option" ? shape.def.inner : null;
}

/** Owned text containers and borrowed string slices alike. */
export function isText(shape: Shape): boolean {
  if (shape.def.type === "text") return true;
  return shape.kind === "primitive" && shape.primitive === "str";
}

export function isSequence(shape: Shape): boolean {
  return shape.def.type === "list" || shape.def.type === "set";
}

export function isAssociative(shape: Shape): boolean {
  return shape.def.type === "map";
}

export function isFixedArray(shape: Shape): boolean {
  return shape.def.type === "array";
}

export function unwrapOptional(shape: Shape): Shape {
  const inner = optionInner(shape);
  return inner === null ? shape : unwrapOptional(inner);
}

/** Short human-readable description used in error messages. */
export function describeShape(shape: Shape): string {
  const base = `${shape.kind} ${shape.typeIdentifier}`;
  return shape.def.type === "scalar" ? base : `${base} (${shape.def.type})`;
}
