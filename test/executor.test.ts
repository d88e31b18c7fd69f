import { describe, it, expect, vi } from "vitest";
import { Executor, firstLine, isSchemaMismatch } from "../src/executor.js";
import { defaultSchema } from "../src/schema.js";
import type { Logger } from "../src/types.js";
import { FakeBridge, ageError, MISMATCH, type BridgeHandler } from "./utils.js";

function createExecutor(handler?: BridgeHandler, logger?: Logger) {
  const bridge = new FakeBridge(handler);
  const executor = new Executor(bridge, { graphName: "demo", logger });
  return { bridge, executor };
}

describe("Executor", () => {
  describe("executeStatement", () => {
    it("runs sanitized Cypher with the inferred columns and commits", async () => {
      const { bridge, executor } = createExecutor(() => [{ node: { id: 1 }, name: "Ada" }]);

      const result = await executor.executeStatement(
        "MATCH (n) RETURN n AS node, n.name AS name LIMIT 5;"
      );

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toEqual([{ node: { id: 1 }, name: "Ada" }]);
      expect(result.meta.count).toBe(1);
      expect(bridge.calls).toEqual([
        { graphName: "demo", cypher: "MATCH (n) RETURN n AS node, n.name AS name LIMIT 5", columns: ["node", "name"] },
      ]);
      expect(bridge.events).toEqual(["run node,name", "commit"]);
    });

    it("unwraps SQL wrappers before running", async () => {
      const { bridge, executor } = createExecutor();

      await executor.executeStatement("SELECT * FROM cypher('other', $$ MATCH (n) RETURN n $$) AS (n agtype);");

      expect(bridge.calls[0].cypher).toBe("MATCH (n) RETURN n");
      expect(bridge.calls[0].graphName).toBe("demo");
      expect(bridge.calls[0].columns).toEqual(["result"]);
    });

    it("returns no rows without calling the bridge for empty input", async () => {
      const { bridge, executor } = createExecutor();

      const result = await executor.executeStatement("  ;; ");

      expect(result).toMatchObject({ success: true, data: [], meta: { count: 0 } });
      expect(bridge.events).toEqual([]);
    });

    it("retries once with the default schema after a failure", async () => {
      const { bridge, executor } = createExecutor((call) =>
        call.columns.length > 1 ? ageError(MISMATCH) : [{ result: [1, 2] }]
      );

      const result = await executor.executeStatement("MATCH (n) RETURN collect(n.a), collect(n.b)");

      expect(result).toMatchObject({ success: true, data: [{ result: [1, 2] }] });
      expect(bridge.calls).toHaveLength(2);
      expect(bridge.events).toEqual(["run collect,collect", "rollback", "run result", "commit"]);
    });

    it("fails when the retry fails too, without a third attempt", async () => {
      const { bridge, executor } = createExecutor(() => ageError("could not find rte for z"));

      const result = await executor.executeStatement("MATCH (n) RETURN n.a, z.b");

      expect(result).toEqual({ success: false, error: { message: "Cypher error: could not find rte for z" } });
      expect(bridge.events).toEqual(["run n,z", "rollback", "run result", "rollback"]);
    });

    it("does not retry when the default schema was used", async () => {
      const { bridge, executor } = createExecutor(() => ageError('syntax error at or near "MATC"'));

      const result = await executor.executeStatement("MATC (n) RETURN n");

      expect(result).toEqual({
        success: false,
        error: { message: 'Cypher error: syntax error at or near "MATC"' },
      });
      expect(bridge.events).toEqual(["run result", "rollback"]);
    });

    it("reports a non-Error failure as text", async () => {
      const bridge = new FakeBridge();
      bridge.run = async () => {
        throw "connection reset";
      };
      const executor = new Executor(bridge, { graphName: "demo" });

      const result = await executor.executeStatement("RETURN 1");

      expect(result).toEqual({ success: false, error: { message: "Cypher error: connection reset" } });
    });

    it("keeps the original error when the rollback fails", async () => {
      const warn = vi.fn();
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
      const { bridge, executor } = createExecutor(() => ageError("division by zero"), logger);
      bridge.rollback = async () => {
        throw new Error("no connection to the server");
      };

      const result = await executor.executeStatement("RETURN 1 / 0");

      expect(result).toEqual({ success: false, error: { message: "Cypher error: division by zero" } });
      expect(warn).toHaveBeenCalledWith("Rollback failed: no connection to the server");
    });

    it("still retries when the rollback before the retry fails", async () => {
      const warn = vi.fn();
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
      const { bridge, executor } = createExecutor(
        (call) => (call.columns.length > 1 ? ageError(MISMATCH) : [{ result: 1 }]),
        logger
      );
      bridge.rollback = async () => {
        throw new Error("no connection to the server");
      };

      const result = await executor.executeStatement("MATCH (n) RETURN n.a, n.b");

      expect(result).toMatchObject({ success: true, data: [{ result: 1 }] });
      expect(bridge.calls.map((c) => c.columns)).toEqual([["n", "n"], ["result"]]);
      expect(warn).toHaveBeenCalledWith("Rollback failed: no connection to the server");
    });

    it("reports the bridge error when the retry fails after a failed rollback", async () => {
      const { bridge, executor } = createExecutor(() => ageError("could not find rte for z"));
      bridge.rollback = async () => {
        throw new Error("no connection to the server");
      };

      const result = await executor.executeStatement("MATCH (n) RETURN n.a, z.b");

      expect(result).toEqual({ success: false, error: { message: "Cypher error: could not find rte for z" } });
      expect(bridge.calls).toHaveLength(2);
    });

    it("uses the configured default schema", async () => {
      const bridge = new FakeBridge();
      const executor = new Executor(bridge, { graphName: "g", defaultSchema: defaultSchema("value") });

      await executor.executeStatement("MATCH (n) RETURN n");

      expect(bridge.calls[0].columns).toEqual(["value"]);
    });
  });

  describe("executeBatch", () => {
    it("returns no rows for empty input", async () => {
      const { bridge, executor } = createExecutor();

      const result = await executor.executeBatch(" ; ;\n ");

      expect(result).toMatchObject({ success: true, data: [] });
      expect(bridge.calls).toHaveLength(0);
    });

    it("runs a single statement directly", async () => {
      const onStatement = vi.fn();
      const bridge = new FakeBridge(() => [{ result: 1 }]);
      const executor = new Executor(bridge, { graphName: "demo", onStatement });

      const result = await executor.executeBatch("RETURN 1;");

      expect(result).toMatchObject({ success: true, data: [{ result: 1 }] });
      expect(onStatement).not.toHaveBeenCalled();
    });

    it("accumulates rows across statements in order", async () => {
      const { bridge, executor } = createExecutor((call) => [{ result: call.cypher }]);

      const result = await executor.executeBatch("RETURN 'a'; CREATE (:X); RETURN 'c'");

      expect(result).toMatchObject({
        success: true,
        data: [{ result: "RETURN 'a'" }, { result: "CREATE (:X)" }, { result: "RETURN 'c'" }],
        meta: { count: 3 },
      });
      expect(bridge.events.filter((e) => e === "commit")).toHaveLength(3);
    });

    it("stops at the first failing statement", async () => {
      const { bridge, executor } = createExecutor((call) =>
        call.cypher === "B" ? ageError("B failed") : []
      );

      const result = await executor.executeBatch("A; B; C");

      expect(result).toEqual({ success: false, error: { message: "Cypher error: B failed" } });
      expect(bridge.calls.map((c) => c.cypher)).toEqual(["A", "B"]);
      expect(bridge.events).toEqual(["run result", "commit", "run result", "rollback"]);
    });

    it("reports every statement of a multi-statement batch", async () => {
      const events: Array<[number, string, boolean]> = [];
      const bridge = new FakeBridge((call) => (call.cypher === "B" ? ageError("nope") : []));
      const executor = new Executor(bridge, {
        graphName: "demo",
        onStatement: (e) => events.push([e.index, e.statement, e.response.success]),
      });

      await executor.executeBatch("A; B; C");

      expect(events).toEqual([
        [1, "A", true],
        [2, "B", false],
      ]);
    });
  });

  describe("onStatement", () => {
    it("keeps running the batch when the hook throws", async () => {
      const warn = vi.fn();
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
      const bridge = new FakeBridge((call) => [{ result: call.cypher }]);
      const executor = new Executor(bridge, {
        graphName: "demo",
        logger,
        onStatement: () => {
          throw new Error("hook");
        },
      });

      const result = await executor.executeBatch("A; B");

      expect(result).toMatchObject({ success: true, data: [{ result: "A" }, { result: "B" }] });
      expect(warn).toHaveBeenCalledTimes(2);
      expect(warn).toHaveBeenCalledWith("onStatement hook failed: hook");
    });
  });

  describe("serialization", () => {
    it("does not interleave concurrent calls", async () => {
      const bridge = new FakeBridge();
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const originalRun = bridge.run.bind(bridge);
      bridge.run = async (graphName, cypher, columns) => {
        const rows = await originalRun(graphName, cypher, columns);
        if (cypher === "FIRST") await gate;
        return rows;
      };
      const executor = new Executor(bridge, { graphName: "demo" });

      const first = executor.executeStatement("FIRST");
      const second = executor.executeBatch("SECOND");
      await Promise.resolve();
      release();
      await Promise.all([first, second]);

      expect(bridge.events).toEqual(["run result", "commit", "run result", "commit"]);
      expect(bridge.calls.map((c) => c.cypher)).toEqual(["FIRST", "SECOND"]);
    });
  });
});

describe("error helpers", () => {
  it("keeps only the first line", () => {
    expect(firstLine(ageError("syntax error at end of input"))).toBe("syntax error at end of input");
  });

  it("recognises AGE column mismatches", () => {
    expect(isSchemaMismatch(new Error(MISMATCH))).toBe(true);
    expect(isSchemaMismatch(new Error("syntax error"))).toBe(false);
  });
});
