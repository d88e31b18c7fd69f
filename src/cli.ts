#!/usr/bin/env node

import { Command } from "commander";
import { serve } from "@hono/node-server";
import * as fs from "fs";
import * as readline from "readline";
import { parsePort, type CypherBridgeConfig, type CypherBridgeOptions } from "./config.js";
import type { StatementEvent } from "./executor.js";
import { formatTable } from "./format.js";
import { connect, VERSION, type CypherBridgeClient } from "./index.js";
import { runFiles } from "./loader.js";
import { createLogger } from "./logger.js";
import { PROMPT, ReplSession, responseLines } from "./repl.js";
import { createApp } from "./routes.js";
import { splitStatements } from "./splitter.js";
import { CypherBridgeError, type Logger } from "./types.js";

const program = new Command();

program
  .name("cypherbridge")
  .description("Run Cypher against PostgreSQL with Apache AGE")
  .version(VERSION);

// ============================================================================
// Shared Options
// ============================================================================

interface ConnectionFlags {
  host?: string;
  port?: string;
  database?: string;
  user?: string;
  graph?: string;
  verbose: boolean;
}

function withConnectionOptions(command: Command): Command {
  return command
    .option("-H, --host <host>", "PostgreSQL host (default: PGHOST or localhost)")
    .option("-p, --port <port>", "PostgreSQL port (default: PGPORT or 5432)")
    .option("-d, --database <name>", "Database name (default: PGDATABASE or postgres)")
    .option("-U, --user <user>", "Database user (default: PGUSER or postgres)")
    .option("-g, --graph <name>", "AGE graph name (default: AGE_GRAPH or demo)")
    .option("-v, --verbose", "Log SQL sent to the database and retries", false);
}

function toOptions(flags: ConnectionFlags): CypherBridgeOptions {
  return {
    host: flags.host,
    port: flags.port,
    database: flags.database,
    user: flags.user,
    graphName: flags.graph,
    verbose: flags.verbose,
  };
}

async function openSession(
  flags: ConnectionFlags,
  onStatement?: (event: StatementEvent) => void
): Promise<CypherBridgeClient> {
  return connect(toOptions(flags), { logger: createLogger({ verbose: flags.verbose }), onStatement });
}

function reportStartupError(error: unknown): void {
  if (error instanceof CypherBridgeError && error.code === "connection") {
    console.error(`Database connection failed: ${error.message}`);
    console.error("Please ensure the PostgreSQL server is running and accessible.");
  } else if (error instanceof CypherBridgeError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error(`Database error: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
}

function printLines(lines: string[], indent = ""): void {
  for (const line of lines) {
    console.log(`${indent}${line}`);
  }
}

// ============================================================================
// shell - Run files, then the interactive prompt (default)
// ============================================================================

withConnectionOptions(
  program
    .command("shell [files...]", { isDefault: true })
    .description("Execute Cypher files, then start the interactive shell")
    .option("-e, --execute", "Execute files and exit (do not start the shell)", false)
).action(async (files: string[], flags: ConnectionFlags & { execute: boolean }) => {
  let session: CypherBridgeClient;
  try {
    session = await openSession(flags);
  } catch (error) {
    reportStartupError(error);
    return;
  }

  const { config, executor, logger } = session;
  console.log(`Cypher shell for AGE/PostgreSQL - graph: ${config.graphName}`);

  try {
    if (files.length > 0) {
      await runFiles(executor, files, {
        onFile: (path) => console.log(`\n--- Executing file: ${path} ---`),
        onReadError: (_path, message) => console.log(message),
        onStatement: (run, index) => {
          console.log(`\nStatement ${index}:`);
          console.log(`${PROMPT}${run.statement}`);
          printLines(responseLines(run.response));
        },
      });
    }

    if (flags.execute) {
      console.log("\nExecution complete.");
      return;
    }

    console.log("End a query with ; to run it. Use Ctrl+D or \\q to quit, \\h for help.\n");
    await runShell(new ReplSession(executor, { graphName: config.graphName, logEnabled: false }), config, logger);
  } finally {
    await session.close();
  }
});

function loadHistory(file: string, logger: Logger): string[] {
  try {
    // readline wants the most recent entry first
    return fs.readFileSync(file, "utf-8").split("\n").filter(Boolean).reverse();
  } catch (error) {
    logger.debug(`No history loaded from ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
}

function appendHistory(file: string, line: string, logger: Logger): void {
  try {
    fs.appendFileSync(file, `${line}\n`);
  } catch (error) {
    logger.warn(`Could not write history to ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

async function runShell(session: ReplSession, config: CypherBridgeConfig, logger: Logger): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    history: loadHistory(config.historyFile, logger),
    historySize: 1000,
  });

  rl.on("SIGINT", () => {
    session.reset();
    console.log("\n(Use Ctrl+D or \\q to quit. \\h for list of commands)");
    rl.setPrompt(session.prompt);
    rl.prompt();
  });

  rl.setPrompt(session.prompt);
  rl.prompt();

  for await (const line of rl) {
    if (line.trim()) {
      appendHistory(config.historyFile, line, logger);
    }

    const output = await session.handle(line);
    printLines(output.lines);
    if (output.exit) {
      rl.close();
      return;
    }

    rl.setPrompt(session.prompt);
    rl.prompt();
  }

  console.log("\nExiting shell.");
}

// ============================================================================
// query - Execute Cypher and print the result
// ============================================================================

withConnectionOptions(
  program
    .command("query <cypher>")
    .description("Execute one or more ;-separated Cypher statements")
    .option("--json", "Output raw JSON", false)
).action(async (cypher: string, flags: ConnectionFlags & { json: boolean }) => {
  const multi = splitStatements(cypher).length > 1;

  const printStatement = (event: StatementEvent): void => {
    console.log(`\n--- Statement ${event.index} ---`);
    printLines(responseLines(event.response), "  ");
  };

  let session: CypherBridgeClient;
  try {
    session = await openSession(flags, multi && !flags.json ? printStatement : undefined);
  } catch (error) {
    reportStartupError(error);
    return;
  }

  try {
    const result = await session.executor.executeBatch(cypher);

    if (!result.success) {
      console.error(result.error.message);
      process.exitCode = 1;
      return;
    }

    if (flags.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    console.log(`\nResults (${result.meta.count} rows, ${result.meta.time_ms}ms):\n`);
    if (!multi) {
      printLines(formatTable(result.data), "  ");
      console.log("");
    }
  } finally {
    await session.close();
  }
});

// ============================================================================
// serve - Start the HTTP server
// ============================================================================

withConnectionOptions(
  program
    .command("serve")
    .description("Serve POST /query over HTTP")
    .option("-P, --listen-port <port>", "Port to listen on", "3000")
    .option("-L, --listen-host <host>", "Host to bind to", "localhost")
).action(async (flags: ConnectionFlags & { listenPort: string; listenHost: string }) => {
  let port: number;
  let session: CypherBridgeClient;
  try {
    port = parsePort(flags.listenPort);
    session = await openSession(flags);
  } catch (error) {
    reportStartupError(error);
    return;
  }

  const app = createApp(session.executor);

  serve({ fetch: app.fetch, port, hostname: flags.listenHost });
  console.log(`cypherbridge v${VERSION} serving graph '${session.config.graphName}' on http://${flags.listenHost}:${port}`);

  const shutdown = (): void => {
    console.log("\nShutting down...");
    session.close().then(
      () => process.exit(0),
      (error: unknown) => {
        session.logger.error(`Close failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
});

// Parse and run
await program.parseAsync();
