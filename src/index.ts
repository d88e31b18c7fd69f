// cypherbridge
// Run free-form Cypher against PostgreSQL + Apache AGE.

import { createRequire } from "module";
import { resolveConfig, type CypherBridgeConfig, type CypherBridgeOptions } from "./config.js";
import { AgeDatabase } from "./db.js";
import { Executor, type StatementEvent } from "./executor.js";
import { createLogger } from "./logger.js";
import { defaultSchema } from "./schema.js";
import type { Logger, QueryResponse } from "./types.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

// ============================================================================
// Re-exports
// ============================================================================

export type {
  Column,
  ColumnSpec,
  CypherBridge,
  ExecutionError,
  ExecutionResult,
  GraphValueType,
  Logger,
  QueryResponse,
  Row,
} from "./types.js";
export { CypherBridgeError } from "./types.js";

export { splitStatements } from "./splitter.js";
export { sanitizeQuery, stripTerminators } from "./sanitizer.js";
export { defaultSchema, inferSchema, renderColumns, DEFAULT_COLUMN_NAME } from "./schema.js";
export { parseAgtype, formatRow } from "./agtype.js";

export { Executor, isSchemaMismatch } from "./executor.js";
export type { ExecutorOptions, StatementEvent } from "./executor.js";

export { AgeDatabase, buildCypherSql } from "./db.js";
export type { SqlClient } from "./db.js";

export { resolveConfig, initStatements, parsePort } from "./config.js";
export type { CypherBridgeConfig, CypherBridgeOptions, DatabaseConfig } from "./config.js";

export { createLogger, silentLogger } from "./logger.js";
export { runFiles } from "./loader.js";
export type { FileRunResult, StatementRun, LoaderHooks } from "./loader.js";
export { formatTable, cellText } from "./format.js";
export { createApp } from "./routes.js";

// ============================================================================
// Version
// ============================================================================

export const VERSION: string = pkg.version;

// ============================================================================
// Main Factory Function
// ============================================================================

export interface ConnectHooks {
  logger?: Logger;
  onStatement?: (event: StatementEvent) => void;
}

export interface CypherBridgeClient {
  config: CypherBridgeConfig;
  db: AgeDatabase;
  executor: Executor;
  logger: Logger;
  executeStatement(text: string): Promise<QueryResponse>;
  executeBatch(text: string): Promise<QueryResponse>;
  /** Important: always call this when done, the connection keeps the process alive. */
  close(): Promise<void>;
}

/**
 * Connect to PostgreSQL, load AGE, create the graph if needed.
 *
 * Options fall back to PGHOST, PGPORT, PGDATABASE, PGUSER, PGPASSWORD and
 * AGE_GRAPH.
 *
 * @example
 * ```typescript
 * import { connect } from 'cypherbridge';
 *
 * const client = await connect({ graphName: 'social' });
 * const result = await client.executeBatch(
 *   "CREATE (:Person {name: 'Ada'}); MATCH (p:Person) RETURN p.name AS name, p AS person"
 * );
 * if (!result.success) console.error(result.error.message);
 * await client.close();
 * ```
 *
 * @throws CypherBridgeError on invalid options ("config") or when the
 * server cannot be reached ("connection")
 */
export async function connect(
  options: CypherBridgeOptions = {},
  hooks: ConnectHooks = {}
): Promise<CypherBridgeClient> {
  const config = resolveConfig(options);
  const logger = hooks.logger ?? createLogger({ verbose: config.verbose });

  const db = await AgeDatabase.connect(config.db, logger);
  await db.initialize(config.graphName);

  const executor = new Executor(db, {
    graphName: config.graphName,
    defaultSchema: defaultSchema(config.defaultColumn),
    logger,
    onStatement: hooks.onStatement,
  });

  return {
    config,
    db,
    executor,
    logger,
    executeStatement: (text) => executor.executeStatement(text),
    executeBatch: (text) => executor.executeBatch(text),
    close: () => db.close(),
  };
}

export default connect;
