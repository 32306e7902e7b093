import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";

import { ShieldError, ValidationError } from "../core/errors";
import type { SecurityPipeline } from "../core/pipeline";
import { createLogger } from "../util/logger";

const logger = createLogger("http");

// ---- Schemas ----
const BodySchema = z.object({
  text: z.string().min(1, "text is required"),
  sessionId: z.string().min(1).max(200).default("default"),
});

// body-parser rejections (malformed JSON, oversized body) carry a 4xx status
const ClientErrorSchema = z.object({ status: z.number().int().min(400).max(499) });

export function createApp(pipeline: SecurityPipeline) {
  const app = express();
  app.use(express.json({ limit: "512kb" }));

  // ---- Routes ----
  app.get("/live", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.post("/check", (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = BodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });
        return;
      }

      const { text, sessionId } = parsed.data;
      const result = pipeline.process(text, sessionId);

      if (result.reason === "rate_limit_exceeded" && result.retryAfterMs !== undefined) {
        res.set("Retry-After", String(Math.ceil(result.retryAfterMs / 1000)));
        res.status(429).json(result);
        return;
      }
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  app.get("/sessions/:id", (req: Request, res: Response) => {
    res.json(pipeline.stats(req.params.id));
  });

  // ---- Error handler (no raw text logging) ----
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ error: "invalid_input", code: err.code, message: err.message });
      return;
    }
    const client = ClientErrorSchema.safeParse(err);
    if (client.success) {
      // the parser's message can quote the body, so only the status is logged
      logger.warn({ status: client.data.status }, "Request rejected");
      res.status(client.data.status).json({ error: "invalid_request" });
      return;
    }
    logger.error({ err }, "Request failed");
    const code = err instanceof ShieldError ? err.code : "INTERNAL";
    res.status(500).json({ error: "check_failed", code });
  });

  return app;
}
