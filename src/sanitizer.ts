// Query Sanitizer - Unwraps Cypher that arrives inside cypher(...) SQL

// ============================================================================
// Patterns
// ============================================================================

// SELECT * FROM cypher('graph', $$ ... $$) AS (col agtype, ...);
const SQL_WRAPPER_PATTERN =
  /SELECT\s+\*\s+FROM\s+cypher\([^$]*\$\$\s*(?<cypher>.+?)\s*\$\$\)\s+AS\s*\([^)]+\);?/is;

// cypher('graph', $$ ... $$)
const CYPHER_CALL_PATTERN = /cypher\([^$]*\$\$\s*(?<cypher>.+?)\s*\$\$\)\s*;?/is;

const TRAILING_TERMINATORS = /[\s;]+$/;

// ============================================================================
// Sanitizer
// ============================================================================

/**
 * Remove trailing `;` (and whitespace around them). AGE's cypher() rejects them.
 */
export function stripTerminators(query: string): string {
  return query.trim().replace(TRAILING_TERMINATORS, "");
}

function extractCypher(query: string): string | undefined {
  for (const pattern of [SQL_WRAPPER_PATTERN, CYPHER_CALL_PATTERN]) {
    const body = pattern.exec(query)?.groups?.cypher;
    if (body !== undefined) return body;
  }
  return undefined;
}

/**
 * Extract pure Cypher from text that may be a full `SELECT * FROM cypher(...)`
 * wrapper or a bare `cypher(...)` call. Anything else is returned with its
 * trailing terminators removed.
 *
 * Wrappers nested inside a body are unwrapped too, so the result is a fixed
 * point: sanitizing it again changes nothing.
 */
export function sanitizeQuery(text: string): string {
  let query = text.trim();

  for (let body = extractCypher(query); body !== undefined; body = extractCypher(query)) {
    query = body;
  }

  return stripTerminators(query);
}
