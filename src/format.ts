// Result Formatting - rows → text table

import type { Row } from "./types.js";

export const NO_RESULTS = "(no results)";

const DEFAULT_MAX_WIDTH = 40;

/**
 * Text of one table cell. Nodes, edges, lists and maps print as JSON.
 */
export function cellText(value: unknown): string {
  switch (typeof value) {
    case "undefined":
      return "";
    case "object":
      return value === null ? "null" : JSON.stringify(value);
    default:
      return String(value);
  }
}

/**
 * Render rows as table lines: header, separator, one line per row.
 * Columns come from the first row; cells wider than `maxWidth` are cut.
 */
export function formatTable(rows: Row[], maxWidth: number = DEFAULT_MAX_WIDTH): string[] {
  if (rows.length === 0) {
    return [NO_RESULTS];
  }

  const columns = Object.keys(rows[0]);
  const widths = columns.map((col) => col.length);
  const cells = rows.map((row) =>
    columns.map((col, i) => {
      const text = cellText(row[col]);
      widths[i] = Math.max(widths[i], text.length);
      return text;
    })
  );
  for (const [i, width] of widths.entries()) {
    widths[i] = Math.min(width, maxWidth);
  }

  const line = (values: string[]): string =>
    values.map((text, i) => text.slice(0, widths[i]).padEnd(widths[i])).join(" | ");

  return [line(columns), widths.map((w) => "-".repeat(w)).join("-+-"), ...cells.map(line)];
}
