import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as os from "os";
import * as path from "path";
import { initStatements, parsePort, resolveConfig } from "../src/config.js";
import { CypherBridgeError } from "../src/types.js";

const ENV_KEYS = ["PGHOST", "PGPORT", "PGDATABASE", "PGUSER", "PGPASSWORD", "AGE_GRAPH", "CYPHERBRIDGE_HISTORY"];

describe("resolveConfig", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
  });

  function clearEnv(): void {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  }

  it("uses defaults when nothing is set", () => {
    clearEnv();

    expect(resolveConfig()).toEqual({
      db: { host: "localhost", port: 5432, database: "postgres", user: "postgres", password: "" },
      graphName: "demo",
      defaultColumn: "result",
      historyFile: path.join(os.homedir(), ".cypherbridge_history"),
      verbose: false,
    });
  });

  it("reads environment variables", () => {
    clearEnv();
    vi.stubEnv("PGHOST", "db.internal");
    vi.stubEnv("PGPORT", "6543");
    vi.stubEnv("PGDATABASE", "graphs");
    vi.stubEnv("PGUSER", "age");
    vi.stubEnv("PGPASSWORD", "test-secret");
    vi.stubEnv("AGE_GRAPH", "social");
    vi.stubEnv("CYPHERBRIDGE_HISTORY", "/tmp/history");

    const config = resolveConfig();

    expect(config.db).toEqual({
      host: "db.internal",
      port: 6543,
      database: "graphs",
      user: "age",
      password: "test-secret",
    });
    expect(config.graphName).toBe("social");
    expect(config.historyFile).toBe("/tmp/history");
  });

  it("prefers explicit options over the environment", () => {
    clearEnv();
    vi.stubEnv("AGE_GRAPH", "social");
    vi.stubEnv("PGPORT", "6543");

    const config = resolveConfig({ graphName: "movies", port: "5433", verbose: true });

    expect(config.graphName).toBe("movies");
    expect(config.db.port).toBe(5433);
    expect(config.verbose).toBe(true);
  });

  it("rejects graph names that are not identifiers", () => {
    clearEnv();
    expect(() => resolveConfig({ graphName: "demo'); DROP TABLE x; --" })).toThrow(CypherBridgeError);
    expect(() => resolveConfig({ graphName: "1graph" })).toThrow("Invalid graph name: '1graph'");
  });

  it("rejects invalid ports", () => {
    clearEnv();
    expect(() => resolveConfig({ port: "abc" })).toThrow("Invalid port: abc");
    expect(() => resolveConfig({ port: 70000 })).toThrow(CypherBridgeError);
  });

  it("tags configuration errors", () => {
    clearEnv();
    try {
      resolveConfig({ defaultColumn: "my column" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CypherBridgeError);
      expect(error).toMatchObject({ code: "config", name: "CypherBridgeError" });
    }
  });
});

describe("initStatements", () => {
  it("creates the named graph last", () => {
    const statements = initStatements("social");
    expect(statements).toHaveLength(4);
    expect(statements[3]).toBe("SELECT create_graph('social');");
  });
});

describe("parsePort", () => {
  it("accepts ports given as numbers or text", () => {
    expect(parsePort(3000)).toBe(3000);
    expect(parsePort(" 8080 ")).toBe(8080);
  });

  it("rejects listen ports that are not valid", () => {
    expect(() => parsePort("abc")).toThrow("Invalid port: abc. Must be an integer between 1 and 65535.");
    expect(() => parsePort("0")).toThrow(CypherBridgeError);
    expect(() => parsePort("3000.5")).toThrow(CypherBridgeError);
    expect(() => parsePort("")).toThrow(CypherBridgeError);
  });
});
