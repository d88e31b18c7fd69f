// Test utilities: an in-process stand-in for the AGE bridge

import type { ColumnSpec, CypherBridge, Row } from "../src/types.js";

export interface BridgeCall {
  graphName: string;
  cypher: string;
  columns: string[];
}

/**
 * Decides the outcome of one `run`: rows to return, or an Error to throw.
 */
export type BridgeHandler = (call: BridgeCall) => Row[] | Error;

/**
 * Records every call in order. `events` interleaves runs, commits and
 * rollbacks so tests can check the transaction discipline.
 */
export class FakeBridge implements CypherBridge {
  public calls: BridgeCall[] = [];
  public events: string[] = [];
  private handler: BridgeHandler;

  constructor(handler: BridgeHandler = () => []) {
    this.handler = handler;
  }

  async run(graphName: string, cypher: string, columns: ColumnSpec): Promise<Row[]> {
    const call = { graphName, cypher, columns: columns.map((c) => c.name) };
    this.calls.push(call);
    this.events.push(`run ${call.columns.join(",")}`);

    const outcome = this.handler(call);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  async commit(): Promise<void> {
    this.events.push("commit");
  }

  async rollback(): Promise<void> {
    this.events.push("rollback");
  }
}

/**
 * Error shaped like the ones node-postgres raises for AGE, with detail lines.
 */
export function ageError(firstLine: string): Error {
  return new Error(`${firstLine}\nLINE 1: SELECT * FROM cypher('demo', $$ ...\n        ^`);
}

export const MISMATCH = "return row and column definition list do not match";
