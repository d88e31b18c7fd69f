// agtype decoding - AGE result text → JavaScript values

import type { Row } from "./types.js";

// {...}::vertex, {...}::edge, [...]::path
const GRAPH_ANNOTATION = /([}\]])::(?:vertex|edge|path)/g;

// A JSON string, or a number token outside of strings
const JSON_TOKEN = /"(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/g;

const INTEGER = /^-?\d+$/;

/**
 * Quote integers that a double can't hold exactly (AGE integers are 64-bit),
 * so they parse to their exact decimal text.
 */
function quoteUnsafeIntegers(json: string): string {
  if (!/\d{16}/.test(json)) return json;
  return json.replace(JSON_TOKEN, (token) =>
    INTEGER.test(token) && !Number.isSafeInteger(Number(token)) ? `"${token}"` : token
  );
}

/**
 * Decode one agtype value as returned by `pg` (which has no parser for the
 * agtype OID and hands it over as text).
 *
 * Vertices, edges and paths carry a `::vertex`/`::edge`/`::path` suffix that
 * is dropped before JSON parsing. Integers beyond 2^53 come back as strings.
 * Text that still isn't JSON is returned as is.
 */
export function parseAgtype(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }

  const json = quoteUnsafeIntegers(value.replace(GRAPH_ANNOTATION, "$1"));
  try {
    return JSON.parse(json);
  } catch {
    // Not JSON (e.g. NaN, Infinity), keep the raw text
    return value;
  }
}

/**
 * Decode every column of a row, keeping column order.
 */
export function formatRow(row: Row): Row {
  const formatted: Row = {};
  for (const [key, value] of Object.entries(row)) {
    formatted[key] = parseAgtype(value);
  }
  return formatted;
}
