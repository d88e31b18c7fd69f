// Schema Inference - RETURN clause → AGE column definition list

import type { Column, ColumnSpec } from "./types.js";

// ============================================================================
// Default Schema
// ============================================================================

export const DEFAULT_COLUMN_NAME = "result";

export function defaultSchema(name: string = DEFAULT_COLUMN_NAME): ColumnSpec {
  return [{ name, type: "agtype" }];
}

// ============================================================================
// Patterns
// ============================================================================

// Everything after RETURN up to the next ORDER/LIMIT/SKIP/UNION, or the end.
const RETURN_CLAUSE_PATTERN = /\bRETURN\s+(.+?)(?:\s+(?:ORDER|LIMIT|SKIP|UNION)|$)/is;

const ALIAS_PATTERN = /\s+AS\s+(\w+)/i;

const IDENTIFIER_PATTERN = /(\w+)/;

// ============================================================================
// Inference
// ============================================================================

/**
 * Extract the projected items of the first RETURN clause, or null if the
 * statement has none. Items are split on every comma, so `RETURN {a: 1, b: 2}`
 * yields two items.
 */
export function parseReturnItems(statement: string): string[] | null {
  const match = RETURN_CLAUSE_PATTERN.exec(statement.trim());
  if (!match) return null;

  return match[1]
    .trim()
    .split(",")
    .map((item) => item.trim());
}

/**
 * Column name for one projected item: its alias, else its first
 * identifier-like token, else `col<position>`.
 */
export function columnName(item: string, position: number): string {
  const alias = ALIAS_PATTERN.exec(item);
  if (alias) return alias[1];

  const identifier = IDENTIFIER_PATTERN.exec(item);
  if (identifier) return identifier[1];

  return `col${position}`;
}

/**
 * Derive the column definition list for a statement.
 *
 * Statements without RETURN, or returning a single item, get the default
 * schema: one column is all AGE needs, and naming a single complex value
 * gains nothing.
 */
export function inferSchema(statement: string, fallback: ColumnSpec): ColumnSpec {
  const items = parseReturnItems(statement);
  if (items === null || items.length < 2) {
    return fallback;
  }

  const [first, ...rest] = items.map(
    (item, i): Column => ({ name: columnName(item, i + 1), type: "agtype" })
  );
  return [first, ...rest];
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render as SQL: `(node agtype, name agtype)`
 */
export function renderColumns(columns: ColumnSpec): string {
  return `(${columns.map((col) => `${col.name} ${col.type}`).join(", ")})`;
}

export function sameColumns(a: ColumnSpec, b: ColumnSpec): boolean {
  return renderColumns(a) === renderColumns(b);
}
