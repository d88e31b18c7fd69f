// Query Executor - Sanitize → Infer columns → Run → Commit/Rollback → Retry

import { silentLogger } from "./logger.js";
import { sanitizeQuery } from "./sanitizer.js";
import { defaultSchema, inferSchema, renderColumns, sameColumns } from "./schema.js";
import { splitStatements } from "./splitter.js";
import type {
  ColumnSpec,
  CypherBridge,
  ExecutionError,
  ExecutionResult,
  Logger,
  QueryResponse,
  Row,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Reported after each statement of a multi-statement batch.
 */
export interface StatementEvent {
  /** 1-based position in the batch */
  index: number;
  statement: string;
  response: QueryResponse;
}

export interface ExecutorOptions {
  graphName: string;
  /** Column list used when nothing better can be inferred, and for the retry */
  defaultSchema?: ColumnSpec;
  logger?: Logger;
  onStatement?: (event: StatementEvent) => void;
}

// ============================================================================
// Errors
// ============================================================================

const SCHEMA_MISMATCH = "return row and column definition list do not match";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * AGE's error when the declared columns don't fit what RETURN produced.
 */
export function isSchemaMismatch(error: unknown): boolean {
  return errorMessage(error).toLowerCase().includes(SCHEMA_MISMATCH);
}

/**
 * First line of the error only; AGE appends LINE/HINT/context lines.
 */
export function firstLine(error: unknown): string {
  return errorMessage(error).split("\n")[0];
}

// ============================================================================
// Executor
// ============================================================================

export class Executor {
  private bridge: CypherBridge;
  private graphName: string;
  private defaultSchema: ColumnSpec;
  private logger: Logger;
  private onStatement?: (event: StatementEvent) => void;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(bridge: CypherBridge, options: ExecutorOptions) {
    this.bridge = bridge;
    this.graphName = options.graphName;
    this.defaultSchema = options.defaultSchema ?? defaultSchema();
    this.logger = options.logger ?? silentLogger;
    this.onStatement = options.onStatement;
  }

  /**
   * Execute one Cypher statement, which may arrive wrapped in cypher(...) SQL.
   */
  executeStatement(text: string): Promise<QueryResponse> {
    return this.exclusive(() => this.runStatement(text));
  }

  /**
   * Execute `;`-separated statements in order, stopping at the first failure.
   *
   * Each statement commits on its own: statements before a failure stay
   * committed.
   */
  executeBatch(text: string): Promise<QueryResponse> {
    return this.exclusive(() => this.runBatch(text));
  }

  /**
   * Run calls one at a time; the bridge's transaction state is shared.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private async runBatch(text: string): Promise<QueryResponse> {
    const startTime = performance.now();
    const statements = splitStatements(text);

    if (statements.length === 0) {
      return success([], startTime);
    }
    if (statements.length === 1) {
      return this.runStatement(statements[0]);
    }

    const rows: Row[] = [];
    for (const [i, statement] of statements.entries()) {
      const response = await this.runStatement(statement);
      this.notify({ index: i + 1, statement, response });

      if (!response.success) {
        this.logger.debug(`Batch stopped at statement ${i + 1} of ${statements.length}`);
        return response;
      }
      rows.push(...response.data);
    }

    return success(rows, startTime);
  }

  private async runStatement(text: string): Promise<QueryResponse> {
    const startTime = performance.now();

    try {
      const cypher = sanitizeQuery(text);
      if (!cypher) {
        return success([], startTime);
      }

      const columns = inferSchema(cypher, this.defaultSchema);

      try {
        return success(await this.attempt(cypher, columns), startTime);
      } catch (error) {
        if (sameColumns(columns, this.defaultSchema)) {
          throw error;
        }

        const reason = isSchemaMismatch(error) ? "column mismatch" : firstLine(error);
        this.logger.debug(
          `Retrying with ${renderColumns(this.defaultSchema)} instead of ${renderColumns(columns)}: ${reason}`
        );
        await this.rollbackQuietly();
        return success(await this.attempt(cypher, this.defaultSchema), startTime);
      }
    } catch (error) {
      await this.rollbackQuietly();
      this.logger.debug(`Cypher execution failed: ${errorMessage(error)}`);
      return failure(`Cypher error: ${firstLine(error)}`);
    }
  }

  /**
   * A throwing hook is logged; the batch goes on.
   */
  private notify(event: StatementEvent): void {
    try {
      this.onStatement?.(event);
    } catch (error) {
      this.logger.warn(`onStatement hook failed: ${errorMessage(error)}`);
    }
  }

  private async attempt(cypher: string, columns: ColumnSpec): Promise<Row[]> {
    const rows = await this.bridge.run(this.graphName, cypher, columns);
    await this.bridge.commit();
    return rows;
  }

  /**
   * Roll back after a failure. A failing rollback must not replace the
   * original error, so it is only logged.
   */
  private async rollbackQuietly(): Promise<void> {
    try {
      await this.bridge.rollback();
    } catch (error) {
      this.logger.warn(`Rollback failed: ${errorMessage(error)}`);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function success(data: Row[], startTime: number): ExecutionResult {
  return {
    success: true,
    data,
    meta: {
      count: data.length,
      time_ms: Math.round((performance.now() - startTime) * 100) / 100,
    },
  };
}

function failure(message: string): ExecutionError {
  return { success: false, error: { message } };
}
