// cypherbridge - Shared Types

// ============================================================================
// Column Definitions
// ============================================================================

/**
 * The only type AGE can declare for a cypher() result column.
 */
export type GraphValueType = "agtype";

export interface Column {
  name: string;
  type: GraphValueType;
}

/**
 * Column definition list declared to `cypher(...) AS (...)`.
 * Never empty.
 */
export type ColumnSpec = readonly [Column, ...Column[]];

/**
 * A result row keyed by the declared column names, in declared order.
 */
export type Row = Record<string, unknown>;

// ============================================================================
// Outcomes
// ============================================================================

export interface ExecutionResult {
  success: true;
  data: Row[];
  meta: {
    count: number;
    time_ms: number;
  };
}

export interface ExecutionError {
  success: false;
  error: {
    /** Single line, e.g. `Cypher error: syntax error at or near "MATC"` */
    message: string;
  };
}

export type QueryResponse = ExecutionResult | ExecutionError;

// ============================================================================
// Bridge
// ============================================================================

/**
 * The relational entry point to the graph: runs Cypher through
 * `cypher(graph, $$ ... $$) AS (...)`.
 *
 * `run` opens a transaction if none is open and throws on any database
 * error. The caller must end every attempt with `commit` or `rollback`.
 */
export interface CypherBridge {
  run(graphName: string, cypher: string, columns: ColumnSpec): Promise<Row[]>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

// ============================================================================
// Logging
// ============================================================================

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ============================================================================
// Error Class
// ============================================================================

export type CypherBridgeErrorCode = "config" | "connection";

/**
 * Error thrown outside the execution boundary: bad configuration or an
 * unreachable database.
 * Query failures are never thrown; they come back as `ExecutionError`.
 */
export class CypherBridgeError extends Error {
  public readonly code: CypherBridgeErrorCode;

  constructor(message: string, code: CypherBridgeErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CypherBridgeError";
    this.code = code;
  }
}
