import type { Field, PrimaryKeyMarker } from "./model";

export const DEFAULT_PRIMARY_KEY_MARKER: PrimaryKeyMarker = {
  namespace: "psql",
  key: "primary_key",
};

/**
 * True iff the field carries an attribute whose namespace and key both equal
 * the marker exactly (case-sensitive). Attributes without a namespace never
 * match.
 */
export function isPrimaryKeyField(
  field: Field,
  marker: PrimaryKeyMarker = DEFAULT_PRIMARY_KEY_MARKER,
): boolean {
  return field.attributes.some(
    (attr) =>
      attr.namespace !== undefined &&
      attr.namespace === marker.namespace &&
      attr.key === marker.key,
  );
}
