import { z } from "zod";
import { ShapeDocumentError } from "./errors";
import type { Shape } from "./model";

// JSON form of shapes, as written by an external reflection pass or by hand.
// `layout` may be omitted (unknown) and `def` defaults to a plain scalar.

const layoutSchema = z.object({
  sizeBytes: z.number().int().nonnegative(),
  signed: z.boolean().default(false),
  isFloat: z.boolean().default(false),
});

const defSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("scalar") }),
  z.object({ type: z.literal("text") }),
  z.object({ type: z.literal("option"), inner: z.lazy(() => shapeSchema) }),
  z.object({ type: z.literal("list"), item: z.lazy(() => shapeSchema) }),
  z.object({ type: z.literal("set"), item: z.lazy(() => shapeSchema) }),
  z.object({
    type: z.literal("map"),
    key: z.lazy(() => shapeSchema),
    value: z.lazy(() => shapeSchema),
  }),
  z.object({
    type: z.literal("array"),
    item: z.lazy(() => shapeSchema),
    length: z.number().int().nonnegative(),
  }),
]);

const attributeSchema = z.object({
  namespace: z.string().optional(),
  key: z.string().min(1),
  value: z.unknown(),
});

const fieldSchema = z.object({
  name: z.string().min(1),
  shape: z.lazy(() => shapeSchema),
  attributes: z.array(attributeSchema).default([]),
});

const base = {
  typeIdentifier: z.string().min(1),
  layout: layoutSchema.nullable().default(null),
  def: defSchema.default({ type: "scalar" }),
};

export const shapeSchema: z.ZodType<Shape, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ ...base, kind: z.literal("record"), fields: z.array(fieldSchema) }),
    z.object({
      ...base,
      kind: z.literal("tagged"),
      variants: z.array(
        z.object({ name: z.string().min(1), fields: z.array(fieldSchema).default([]) }),
      ),
    }),
    z.object({ ...base, kind: z.literal("reference"), pointee: z.lazy(() => shapeSchema) }),
    z.object({
      ...base,
      kind: z.literal("primitive"),
      primitive: z.enum(["boolean", "numeric", "char", "str", "never"]),
    }),
    z.object({ ...base, kind: z.literal("opaque") }),
  ]),
);

/**
 * Validate a parsed JSON value holding one shape or an array of shapes.
 *
 * @throws {ShapeDocumentError} listing every invalid path
 */
export function parseShapeDocument(input: unknown): Shape[] {
  if (Array.isArray(input)) {
    return unwrap(z.array(shapeSchema).safeParse(input));
  }
  return [unwrap(shapeSchema.safeParse(input))];
}

function unwrap<I, T>(result: z.SafeParseReturnType<I, T>): T {
  if (result.success) {
    return result.data;
  }
  throw new ShapeDocumentError(
    result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    }),
  );
}
