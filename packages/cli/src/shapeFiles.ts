import { readFileSync } from "node:fs";
import { resolve as resolvePath } from "node:path";
import { parseShapeDocument, type Shape } from "@s2t/core";

/** Read shape documents (one shape or an array per file), in argument order. */
export function readShapeFiles(paths: readonly string[], cwd: string = process.cwd()): Shape[] {
  return paths.flatMap((path) => readShapeFile(resolvePath(cwd, path)));
}

export function readShapeFile(path: string): Shape[] {
  try {
    return parseShapeDocument(JSON.parse(readFileSync(path, "utf8")));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read shapes from ${path}: ${reason}`, { cause: error });
  }
}

export function readSingleShape(path: string, cwd: string = process.cwd()): Shape {
  const shapes = readShapeFile(resolvePath(cwd, path));
  if (shapes.length !== 1) {
    throw new Error(`Expected exactly one shape in ${path}, found ${shapes.length}`);
  }
  return shapes[0];
}
