// Statement Splitter - Raw input → individual Cypher statements

export const STATEMENT_TERMINATOR = ";";

/**
 * Split text into trimmed statements on `;`, dropping empty pieces.
 *
 * The split is naive: a `;` inside a string literal also ends a statement.
 */
export function splitStatements(text: string): string[] {
  return text
    .split(STATEMENT_TERMINATOR)
    .map((stmt) => stmt.trim())
    .filter((stmt) => stmt.length > 0);
}
