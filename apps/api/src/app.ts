import cors from "cors";
import express from "express";
import { loadConfig, type AppConfig } from "./config.js";
import { errorHandler } from "./middleware/error-handler.js";
import { createV1Router } from "./routes/v1.js";

export function createApp(config: AppConfig = loadConfig()) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: config.jsonLimit }));
  app.use("/v1", createV1Router(config));
  app.use(errorHandler);
  return app;
}
