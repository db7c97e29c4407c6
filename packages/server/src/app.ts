import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { errorMessage, moduleLogger, type Logger, type Responder } from "@faqbot/core";
import { ChatRequestSchema } from "./schema.js";
import { toHttpError } from "./errors.js";

export interface AppOptions {
  corsOrigins?: string[];
  logger?: Logger;
}

export function createApp(responder: Responder, opts: AppOptions = {}): express.Express {
  const logger = opts.logger ?? moduleLogger("http");
  const app = express();

  app.use(cors({ origin: opts.corsOrigins ?? [], credentials: true }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/bot/chat", (req: Request, res: Response, next: NextFunction) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json({ detail: parsed.error.issues });
      return;
    }

    responder
      .ask(parsed.data)
      .then((outcome) => {
        if (outcome.ok) {
          res.json(outcome.response);
          return;
        }
        const { status, body } = toHttpError(outcome.error);
        res.status(status).json(body);
      })
      .catch(next);
  });

  // Malformed or oversized JSON bodies and anything thrown past the handlers.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const type = bodyErrorType(err);
    if (type === "entity.parse.failed") {
      res.status(422).json({ detail: "Request body must be valid JSON." });
      return;
    }
    if (type === "entity.too.large") {
      res.status(413).json({ detail: "Request body is too large." });
      return;
    }
    logger.error(`Unhandled error in HTTP layer: ${errorMessage(err)}`);
    res.status(500).json({ detail: "Unexpected error while processing the chat request." });
  });

  return app;
}

function bodyErrorType(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return undefined;
}
