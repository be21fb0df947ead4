/**
 * Shared utilities for CLI output (files and view).
 */

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** File-system safe stem for per-table output files. */
export function tableFileStem(tableName: string): string {
  return `table-${tableName.replace(/[^a-z0-9_-]/gi, "_")}`;
}
