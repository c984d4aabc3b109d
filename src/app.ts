import express from "express";
import cors from "cors";
import { getCorsAllowlist } from "./config";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { requestContext } from "./middleware/requestContext";
import { requestLogger } from "./middleware/requestLogger";
import { createApplicationsRouter } from "./modules/applications/applications.routes";
import type { RulesService } from "./modules/rules/rules.service";
import { createRulesRouter } from "./modules/rules/rules.routes";
import type { WorkflowOrchestrator } from "./modules/workflow/workflowOrchestrator";

export type AppServices = {
  orchestrator: WorkflowOrchestrator;
  rules: RulesService;
};

function buildCorsOptions(): cors.CorsOptions {
  const allowlist = getCorsAllowlist();
  return {
    origin: allowlist.includes("*") ? "*" : allowlist,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"],
    exposedHeaders: ["X-Request-Id"],
  };
}

export function buildApp(services: AppServices): express.Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(requestContext);
  app.use(requestLogger);
  app.use(cors(buildCorsOptions()));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  app.get("/ready", (_req, res) => {
    const index = services.rules.status();
    res.status(index.ready ? 200 : 503).json({ ready: index.ready, ruleIndex: index });
  });

  app.use("/api/applications", createApplicationsRouter(services.orchestrator));
  app.use("/api/rules", createRulesRouter(services.rules));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
