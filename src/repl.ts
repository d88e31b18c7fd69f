// Interactive Shell - line handling for the cypher> prompt

import type { Executor } from "./executor.js";
import { formatTable } from "./format.js";
import { runFiles } from "./loader.js";
import type { QueryResponse } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface ReplState {
  graphName: string;
  /** Prefix result lines with [DB] */
  logEnabled: boolean;
}

export interface ReplOutput {
  lines: string[];
  exit: boolean;
}

export const PROMPT = "cypher> ";
export const CONTINUATION_PROMPT = "   ...> ";

export const HELP_LINES = [
  "Available commands:",
  "  \\q              Quit the shell",
  "  \\h              Show this help message",
  "  \\log [on|off]   Toggle [DB] prefixes on results",
  "  \\load <file>    Execute the statements in a file",
  "  \\graph          Show the current graph",
  "End a query with ; to run it.",
];

// ============================================================================
// Helpers
// ============================================================================

export function parseToggle(value: string): boolean | null {
  const val = value.toLowerCase();
  if (val === "on" || val === "true") return true;
  if (val === "off" || val === "false") return false;
  return null;
}

export function responseLines(response: QueryResponse): string[] {
  return response.success ? formatTable(response.data) : [response.error.message];
}

// ============================================================================
// Session
// ============================================================================

/**
 * Holds the pending multi-line buffer and the shell toggles. The readline
 * loop lives in the CLI; this class only turns input lines into output lines.
 */
export class ReplSession {
  private executor: Executor;
  private state: ReplState;
  private buffer: string[] = [];

  constructor(executor: Executor, state: ReplState) {
    this.executor = executor;
    this.state = state;
  }

  get prompt(): string {
    return this.buffer.length > 0 ? CONTINUATION_PROMPT : PROMPT;
  }

  get logEnabled(): boolean {
    return this.state.logEnabled;
  }

  /**
   * Drop a partially typed query (Ctrl+C).
   */
  reset(): void {
    this.buffer = [];
  }

  async handle(line: string): Promise<ReplOutput> {
    const stripped = line.trim();

    if (this.buffer.length === 0) {
      if (!stripped) return { lines: [], exit: false };
      if (stripped.startsWith("\\")) return this.command(stripped);
    }

    this.buffer.push(line);
    if (!stripped.endsWith(";")) {
      return { lines: [], exit: false };
    }

    const text = this.buffer.join("\n");
    this.buffer = [];
    const response = await this.executor.executeBatch(text);
    return { lines: this.decorate(responseLines(response)), exit: false };
  }

  private decorate(lines: string[]): string[] {
    return this.state.logEnabled ? lines.map((l) => `[DB] ${l}`) : lines;
  }

  private async command(input: string): Promise<ReplOutput> {
    const [name, ...args] = input.split(/\s+/);
    const arg = args.join(" ");

    switch (name) {
      case "\\q":
        return { lines: [], exit: true };

      case "\\h":
        return { lines: [...HELP_LINES], exit: false };

      case "\\graph":
        return { lines: [`Graph: ${this.state.graphName}`], exit: false };

      case "\\log": {
        const val = parseToggle(arg);
        if (val === null) {
          return { lines: ["Usage: \\log [on|off|true|false]"], exit: false };
        }
        this.state.logEnabled = val;
        return { lines: [`Logging ${val ? "enabled" : "disabled"}.`], exit: false };
      }

      case "\\load": {
        if (!arg) {
          return { lines: ["Usage: \\load <file>"], exit: false };
        }
        const [result] = await runFiles(this.executor, [arg]);
        if (result.error) {
          return { lines: [result.error], exit: false };
        }
        const lines = result.statements.flatMap((run, i) => [
          `Statement ${i + 1}:`,
          `${PROMPT}${run.statement}`,
          ...this.decorate(responseLines(run.response)),
        ]);
        return { lines, exit: false };
      }

      default:
        return { lines: [`Unknown command: ${name}. Type \\h for help.`], exit: false };
    }
  }
}
