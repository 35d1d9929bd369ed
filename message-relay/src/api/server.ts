import express, { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import type { IRelayService } from "../service";
import { RelayError, type RelayErrorCode } from "../errors";
import { createApiRouter } from "./router";

const STATUS_BY_CODE: Record<RelayErrorCode, number> = {
  validation_error: 400,
  invalid_cursor: 400,
  message_not_found: 404,
  conversation_not_found: 404,
  membership_unavailable: 503,
  persistence_failure: 503,
  delivery_attempt_failure: 500,
};

/**
 * Factory function that creates an Express app wired to the given service.
 * Returns the app WITHOUT calling .listen() so it can be used with supertest.
 */
export function createServer(service: IRelayService): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "64kb" }));

  // Request logger
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const { method, url } = req;
    const user = req.get("x-user-id") ?? "-";

    console.log(`[api] --> ${method} ${url} as ${user}`);
    res.on("finish", () => {
      const ms = Date.now() - start;
      console.log(`[api] <-- ${method} ${url} ${res.statusCode} ${ms}ms`);
    });

    next();
  });

  app.use("/api", createApiRouter(service));

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found", code: "not_found" });
  });

  // Global error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RelayError) {
      res.status(STATUS_BY_CODE[err.code]).json({
        error: err.message,
        code: err.code,
        retryable: err.retryable,
      });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "malformed JSON", code: "validation_error", retryable: false });
      return;
    }
    console.error("[api] unhandled error:", err);
    res.status(500).json({ error: "Internal server error", code: "internal_error", retryable: true });
  });

  return app;
}
