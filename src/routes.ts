// HTTP Routes using Hono

import { Hono } from "hono";
import type { Executor } from "./executor.js";

// ============================================================================
// Types
// ============================================================================

export interface QueryRequest {
  cypher: string;
}

function isQueryRequest(body: unknown): body is QueryRequest {
  return (
    typeof body === "object" &&
    body !== null &&
    "cypher" in body &&
    typeof body.cypher === "string" &&
    body.cypher.length > 0
  );
}

// ============================================================================
// Create App
// ============================================================================

export function createApp(executor: Executor): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.post("/query", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        {
          success: false,
          error: { message: "Invalid JSON body" },
        },
        400
      );
    }

    if (!isQueryRequest(body)) {
      return c.json(
        {
          success: false,
          error: { message: "Missing or invalid 'cypher' field" },
        },
        400
      );
    }

    const result = await executor.executeBatch(body.cypher);

    if (!result.success) {
      return c.json(result, 400);
    }

    return c.json(result);
  });

  return app;
}
