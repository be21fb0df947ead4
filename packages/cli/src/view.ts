/**
 * HTML view of generated tables (Tailwind, hacker theme: black + green, red accents).
 */

import type { ShapeFailure, SqlTable } from "@s2t/core";
import { escapeHtml, tableFileStem } from "./utils";

const TAILWIND_CDN =
  '<script src="https://cdn.tailwindcss.com"></script>';

function layout(title: string, bodyContent: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  ${TAILWIND_CDN}
</head>
<body class="bg-black text-green-400 font-mono min-h-screen antialiased">
  <div class="max-w-6xl mx-auto px-4 py-8">
    ${bodyContent}
  </div>
</body>
</html>`;
}

export function generateIndexHTML(
  tables: readonly SqlTable[],
  failures: readonly ShapeFailure[],
  schema: string,
): string {
  const tableRows = tables
    .map(
      (table) => `
    <tr class="border-b border-green-800 hover:bg-green-950/30">
      <td class="px-4 py-3"><a href="${tableFileStem(table.name)}.html" class="text-green-400 hover:text-green-300 underline">${escapeHtml(table.name)}</a></td>
      <td class="px-4 py-3">${table.columns.length}</td>
      <td class="px-4 py-3 text-green-300">${table.primaryKey ? escapeHtml(table.primaryKey.name) : "—"}</td>
      <td class="px-4 py-3">${table.columns.filter((c) => c.nullable).length}</td>
    </tr>
  `,
    )
    .join("");

  const failureItems = failures
    .map(
      (failure) => `
      <li class="mt-2"><strong class="text-red-400">${escapeHtml(failure.typeIdentifier)}</strong>
        <span class="text-green-300 text-sm">${escapeHtml(failure.error.message)}</span></li>`,
    )
    .join("");

  const body = `
    <h1 class="text-2xl font-bold text-green-400 mb-2">Shape → Table Schema</h1>
    <p class="text-green-600 mb-6">Tables generated into schema <code>${escapeHtml(schema)}</code></p>

    <div class="grid grid-cols-2 md:grid-cols-3 gap-4 mb-6">
      <div class="bg-black border border-green-800 rounded p-4">
        <div class="text-2xl font-bold text-green-400">${tables.length}</div>
        <div class="text-green-600 text-sm mt-1">Tables</div>
      </div>
      <div class="bg-black border border-green-800 rounded p-4">
        <div class="text-2xl font-bold text-green-400">${tables.reduce((sum, t) => sum + t.columns.length, 0)}</div>
        <div class="text-green-600 text-sm mt-1">Total Columns</div>
      </div>
      <div class="bg-black border ${failures.length > 0 ? "border-red-600" : "border-green-800"} rounded p-4">
        <div class="text-2xl font-bold ${failures.length > 0 ? "text-red-400" : "text-green-400"}">${failures.length}</div>
        <div class="text-green-600 text-sm mt-1">Failed Shapes</div>
      </div>
    </div>

    <div class="border border-green-800 rounded overflow-hidden">
      <table class="w-full">
        <thead>
          <tr class="bg-green-950 border-b border-green-800">
            <th class="px-4 py-3 text-left text-green-400 font-semibold">Table Name</th>
            <th class="px-4 py-3 text-left text-green-400 font-semibold">Columns</th>
            <th class="px-4 py-3 text-left text-green-400 font-semibold">Primary Key</th>
            <th class="px-4 py-3 text-left text-green-400 font-semibold">Nullable</th>
          </tr>
        </thead>
        <tbody>
          ${tableRows}
        </tbody>
      </table>
    </div>

    ${failures.length > 0 ? `
    <div class="border border-red-600 rounded p-5 bg-black mt-6">
      <h2 class="text-lg font-semibold text-red-400 mb-2">Conversion Failures</h2>
      <ul class="list-none pl-0">${failureItems}</ul>
    </div>
    ` : ""}

    <div class="mt-6">
      <a href="schema.sql" class="text-green-600 hover:text-green-400 text-sm" download>📥 Download schema.sql</a>
    </div>
  `;

  return layout("Shape → Table Schema", body);
}

export function generateTableHTML(table: SqlTable, ddl: string): string {
  const columnsHTML = table.columns
    .map(
      (col) => `
    <tr class="border-b border-green-800/50">
      <td class="px-4 py-2 font-semibold">${escapeHtml(col.name)}</td>
      <td class="px-4 py-2"><code class="bg-green-950 text-green-400 px-2 py-0.5 rounded border border-green-800 text-sm">${escapeHtml(col.dataType)}</code></td>
      <td class="px-4 py-2">${col.nullable ? "✓" : "✗"}</td>
      <td class="px-4 py-2">${col === table.primaryKey ? "🔑" : ""}</td>
    </tr>
  `,
    )
    .join("");

  const body = `
    <div class="mb-6">
      <a href="index.html" class="text-green-600 hover:text-green-400 text-sm">← Back to Overview</a>
      <h1 class="text-2xl font-bold text-green-400 mt-2">Table: ${escapeHtml(table.name)}</h1>
    </div>

    <div class="border border-green-800 rounded p-5 bg-black mb-6">
      <div class="mb-2">
        <span class="text-green-600 text-sm">Primary Key</span>
        <div class="text-green-300">${table.primaryKey ? escapeHtml(table.primaryKey.name) : "None"}</div>
      </div>
      <div class="border border-green-800 rounded overflow-hidden mt-4">
        <table class="w-full text-sm">
          <thead><tr class="bg-green-950 border-b border-green-800">
            <th class="px-3 py-2 text-left text-green-400">Column</th>
            <th class="px-3 py-2 text-left text-green-400">Type</th>
            <th class="px-3 py-2 text-left text-green-400">Nullable</th>
            <th class="px-3 py-2 text-left text-green-400">Key</th>
          </tr></thead>
          <tbody>${columnsHTML}</tbody>
        </table>
      </div>
    </div>

    <div class="border border-green-800 rounded p-5 bg-black mb-6">
      <h2 class="text-lg font-semibold text-green-400 mb-4">DDL</h2>
      <pre class="bg-black border border-green-800 rounded p-4 overflow-auto max-h-96 text-sm text-green-300"><code>${escapeHtml(ddl)}</code></pre>
    </div>
  `;

  return layout(`${table.name} - Shape → Table Schema`, body);
}
