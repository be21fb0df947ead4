export type * from "./model";
export * from "./errors";
export * as shapes from "./shapes";
export * from "./shapeInspector";
export { mapShape, unwrapSqlType } from "./typeMapper";
export { DEFAULT_PRIMARY_KEY_MARKER, isPrimaryKeyField } from "./attributeResolver";
export { convertShape, tryConvertShape, fieldToColumn, type ConversionResult } from "./tableBuilder";
export { parseShapeDocument, shapeSchema } from "./shapeDocument";
export {
  DEFAULT_SCHEMA,
  qualifiedTableName,
  quoteIdentifier,
  renderColumn,
  renderCreateTable,
  renderSchemaDdl,
  renderSqlType,
} from "./ddl";
export { diffShapes, shapesEqual, type ShapeDiff } from "./shapeDiff";
export { buildAlterStatements } from "./migration";
export { generateSchema, type GeneratedSchema, type ShapeFailure } from "./generate";
