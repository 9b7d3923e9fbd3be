import "dotenv/config";
import express from "express";
import { config } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { createApiRouter } from "./api/index.js";
import { getProductionContainer } from "./app/container.production.js";

// ============================================
// Express App
// ============================================

const container = getProductionContainer();
const app = express();

app.get("/healthz", (_req, res) => res.status(200).send("ok"));

app.use(
  "/api",
  createApiRouter(container, {
    keys: config.api.keys,
    allowedOrigins: config.api.allowedOrigins,
    rateLimitWindowMs: config.api.rateLimitWindowMs,
    rateLimitMaxRequests: config.api.rateLimitMaxRequests,
  })
);

// ============================================
// Startup
// ============================================

logger.info("Starting support desk assistant", {
  stage: "startup",
  port: config.port,
  collection: config.policies.collection,
  chatModel: config.openai.chatModel,
});

app.listen(config.port, () => {
  logger.info("Server listening", { stage: "startup", port: config.port });
});
