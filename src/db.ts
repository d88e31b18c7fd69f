// Database Wrapper for PostgreSQL + Apache AGE

import pg from "pg";
import { formatRow } from "./agtype.js";
import { initStatements, type DatabaseConfig } from "./config.js";
import { silentLogger } from "./logger.js";
import { renderColumns } from "./schema.js";
import { CypherBridgeError, type ColumnSpec, type CypherBridge, type Logger, type Row } from "./types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * The slice of `pg.Client` the session needs.
 */
export interface SqlClient {
  query(text: string): Promise<{ rows: Row[] }>;
  end(): Promise<void>;
}

// ============================================================================
// SQL Building
// ============================================================================

/**
 * Pick a dollar-quote delimiter that does not occur in the query.
 */
export function dollarQuote(query: string): string {
  if (!query.includes("$$")) return "$$";
  let n = 1;
  while (query.includes(`$cypher${n}$`)) n++;
  return `$cypher${n}$`;
}

/**
 * SELECT * FROM cypher('demo', $$ MATCH (n) RETURN n $$) AS (result agtype);
 */
export function buildCypherSql(graphName: string, cypher: string, columns: ColumnSpec): string {
  const quote = dollarQuote(cypher);
  return `SELECT * FROM cypher('${graphName}', ${quote} ${cypher} ${quote}) AS ${renderColumns(columns)};`;
}

// ============================================================================
// Database Class
// ============================================================================

/**
 * One PostgreSQL session with AGE loaded.
 *
 * Like a DB-API connection, the first query after a commit or rollback
 * implicitly opens a transaction; nothing is committed until `commit()`.
 */
export class AgeDatabase implements CypherBridge {
  private client: SqlClient;
  private logger: Logger;
  private inTransaction = false;

  constructor(client: SqlClient, logger: Logger = silentLogger) {
    this.client = client;
    this.logger = logger;
  }

  /**
   * Open a connection with node-postgres.
   * @throws CypherBridgeError with code "connection" if the server is unreachable
   */
  static async connect(config: DatabaseConfig, logger: Logger = silentLogger): Promise<AgeDatabase> {
    const client = new pg.Client({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
    });

    // pg emits "error" when an idle connection drops; unhandled, it kills the process
    client.on("error", (error) => {
      logger.error(`Database connection error: ${error.message}`);
    });

    try {
      await client.connect();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CypherBridgeError(message, "connection", { cause: error });
    }

    logger.debug(`Connected to ${config.host}:${config.port}/${config.database}`);
    return new AgeDatabase(
      {
        query: (text) => client.query(text),
        end: () => client.end(),
      },
      logger
    );
  }

  /**
   * Load AGE and create the graph. Statements run in autocommit mode and
   * failures are skipped, e.g. when the graph already exists.
   */
  async initialize(graphName: string): Promise<void> {
    for (const stmt of initStatements(graphName)) {
      try {
        await this.client.query(stmt);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.debug(`Init statement skipped: ${stmt} (${message})`);
      }
    }
  }

  async run(graphName: string, cypher: string, columns: ColumnSpec): Promise<Row[]> {
    if (!this.inTransaction) {
      await this.client.query("BEGIN");
      this.inTransaction = true;
    }

    const sql = buildCypherSql(graphName, cypher, columns);
    this.logger.debug(`DB IN  > ${sql}`);

    const result = await this.client.query(sql);
    const rows = result.rows.map(formatRow);

    const sample = rows.length > 0 ? JSON.stringify(rows[0]) : "none";
    this.logger.debug(`DB OUT < rows=${rows.length} sample=${sample}`);
    return rows;
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) return;
    this.inTransaction = false;
    await this.client.query("COMMIT");
  }

  async rollback(): Promise<void> {
    if (!this.inTransaction) return;
    this.inTransaction = false;
    await this.client.query("ROLLBACK");
  }

  isInTransaction(): boolean {
    return this.inTransaction;
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
