// File Loader - run Cypher files statement by statement

import * as fs from "fs";
import type { Executor } from "./executor.js";
import { splitStatements } from "./splitter.js";
import type { QueryResponse } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface StatementRun {
  statement: string;
  response: QueryResponse;
}

export interface FileRunResult {
  path: string;
  statements: StatementRun[];
  /** Set when the file could not be read; no statements ran */
  error?: string;
}

export interface LoaderHooks {
  onFile?: (path: string) => void;
  onReadError?: (path: string, message: string) => void;
  onStatement?: (run: StatementRun, index: number) => void;
}

// ============================================================================
// Loader
// ============================================================================

function readError(path: string, error: unknown): string {
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return `Error: File '${path}' not found`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `Error reading file '${path}': ${message}`;
}

/**
 * Run every statement of every file in order. A failing statement does not
 * stop the rest of the file; an unreadable file is reported and skipped.
 */
export async function runFiles(
  executor: Executor,
  paths: string[],
  hooks: LoaderHooks = {}
): Promise<FileRunResult[]> {
  const results: FileRunResult[] = [];

  for (const path of paths) {
    hooks.onFile?.(path);

    let content: string;
    try {
      content = await fs.promises.readFile(path, "utf-8");
    } catch (error) {
      const message = readError(path, error);
      hooks.onReadError?.(path, message);
      results.push({ path, statements: [], error: message });
      continue;
    }

    const runs: StatementRun[] = [];
    for (const [i, statement] of splitStatements(content).entries()) {
      const response = await executor.executeStatement(statement);
      const run = { statement, response };
      runs.push(run);
      hooks.onStatement?.(run, i + 1);
    }

    results.push({ path, statements: runs });
  }

  return results;
}
