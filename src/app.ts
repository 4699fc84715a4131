import express from "express";
import type { Logger } from "pino";
import type { Orchestrator } from "./plugin/createOrchestrator.js";
import { makeRoutes } from "./api/routes.js";
import { makeAdapterRoutes } from "./api/adapters.js";
import { makeErrorHandler } from "./api/error-handler.js";

export function createApp(args: {
  orchestrator: Orchestrator;
  log: Logger;
  adminKey: string;
  rateLimit: { windowMs: number; max: number };
  googleChatToken?: string;
}) {
  const app = express();
  app.use(express.json({ limit: "512kb" }));

  app.use("/api/adapters", makeAdapterRoutes({
    orchestrator: args.orchestrator,
    rateLimit: args.rateLimit,
    googleChatToken: args.googleChatToken
  }));
  app.use("/api", makeRoutes({
    orchestrator: args.orchestrator,
    adminKey: args.adminKey,
    rateLimit: args.rateLimit
  }));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "not_found" });
  });
  app.use(makeErrorHandler(args.log));

  return app;
}
