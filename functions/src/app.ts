import express from "express";
import type { Express, NextFunction, Request, Response } from "express";

import { createProcessRosterHandler, processRosterToSheet } from "./processRosterToSheet";
import type { DocumentProcessor } from "./processRosterToSheet";

/**
 * Express app with the roster endpoint. The upload body is streamed to
 * busboy, so no body-parser middleware is mounted.
 */
export function createApp(processor?: DocumentProcessor): Express {
  const app = express();
  const processRoster = processor ? createProcessRosterHandler(processor) : processRosterToSheet;

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  // every method reaches the handler so that it can answer 405
  app.all("/process-roster", (req: Request, res: Response, next: NextFunction) => {
    processRoster(req, res).catch(next);
  });

  return app;
}
