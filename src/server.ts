import path from "path";
import type { Server } from "http";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import express from "express";

import { makeRoutes } from "./api/routes.js";
import { loadConfig } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { createWorkflow } from "./plugin/createWorkflow.js";

const config = loadConfig();
const log = createLogger(config.logLevel);
const workflow = createWorkflow({ config, logger: log });

async function main() {
  await workflow.start();

  let server: Server | undefined;
  if (config.apiEnabled) {
    const app = express();
    app.use(express.json({ limit: "512kb" }));
    app.use(
      "/api",
      makeRoutes({
        engine: workflow.engine,
        gate: workflow.gate,
        dashboard: workflow.dashboard,
        apiKey: config.apiKey,
        rateLimit: { windowMs: config.rateLimitWindowMs, max: config.rateLimitMax },
        logger: log
      })
    );
    server = app.listen(config.port, () => {
      log.info({ PORT: config.port, VAULT_PATH: config.vaultPath, DRY_RUN: config.dryRun }, "api: listening");
    });
    if (!config.apiKey) log.warn("api: API_KEY is not set, mutating routes are open");
  }

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, "shutdown: requested");
    server?.close();
    workflow.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, "shutdown: failed");
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
