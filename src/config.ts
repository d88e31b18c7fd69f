// Configuration - options → environment variables → defaults

import * as os from "os";
import * as path from "path";
import { CypherBridgeError } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface CypherBridgeConfig {
  db: DatabaseConfig;
  graphName: string;
  /** Name of the single column used when no better schema can be inferred */
  defaultColumn: string;
  historyFile: string;
  verbose: boolean;
}

/**
 * Options for resolving a configuration.
 *
 * All fields fall back to environment variables, then defaults:
 * - `host`: PGHOST (default: 'localhost')
 * - `port`: PGPORT (default: 5432)
 * - `database`: PGDATABASE (default: 'postgres')
 * - `user`: PGUSER (default: 'postgres')
 * - `password`: PGPASSWORD (default: '')
 * - `graphName`: AGE_GRAPH (default: 'demo')
 * - `historyFile`: CYPHERBRIDGE_HISTORY (default: '~/.cypherbridge_history')
 */
export interface CypherBridgeOptions {
  host?: string;
  port?: number | string;
  database?: string;
  user?: string;
  password?: string;
  graphName?: string;
  defaultColumn?: string;
  historyFile?: string;
  verbose?: boolean;
}

// ============================================================================
// Resolution
// ============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function parsePort(value: number | string): number {
  const port = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new CypherBridgeError(`Invalid port: ${value}. Must be an integer between 1 and 65535.`, "config");
  }
  return port;
}

function requireIdentifier(value: string, what: string): string {
  // Spliced into SQL as a literal and a column name
  if (!IDENTIFIER.test(value)) {
    throw new CypherBridgeError(
      `Invalid ${what}: '${value}'. Use letters, digits and underscores, not starting with a digit.`,
      "config"
    );
  }
  return value;
}

export function resolveConfig(options: CypherBridgeOptions = {}): CypherBridgeConfig {
  const env = process.env;

  return {
    db: {
      host: options.host ?? env.PGHOST ?? "localhost",
      port: parsePort(options.port ?? env.PGPORT ?? 5432),
      database: options.database ?? env.PGDATABASE ?? "postgres",
      user: options.user ?? env.PGUSER ?? "postgres",
      password: options.password ?? env.PGPASSWORD ?? "",
    },
    graphName: requireIdentifier(options.graphName ?? env.AGE_GRAPH ?? "demo", "graph name"),
    defaultColumn: requireIdentifier(options.defaultColumn ?? "result", "column name"),
    historyFile:
      options.historyFile ?? env.CYPHERBRIDGE_HISTORY ?? path.join(os.homedir(), ".cypherbridge_history"),
    verbose: options.verbose ?? false,
  };
}

/**
 * Statements run once per connection before any Cypher.
 * `create_graph` fails when the graph exists; callers ignore that.
 */
export function initStatements(graphName: string): string[] {
  return [
    "CREATE EXTENSION IF NOT EXISTS age;",
    "LOAD 'age';",
    'SET search_path = ag_catalog, "$user", public;',
    `SELECT create_graph('${graphName}');`,
  ];
}
