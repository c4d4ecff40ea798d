import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { priorityModeSchema, type PriorityMode } from "@dispatch/contracts";

export function bootstrapEnv() {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(process.cwd(), ".env"),
    path.resolve(process.cwd(), "../../.env"),
    path.resolve(here, "../../../.env"),
  ];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    loadEnv({ path: envPath, override: false });
    return;
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  UPLOAD_LIMIT_MB: z.coerce.number().positive().default(25),
  JSON_LIMIT: z.string().min(1).default("5mb"),
  DEFAULT_PRIORITY: priorityModeSchema.default("input-order"),
});

export type AppConfig = {
  port: number;
  uploadLimitBytes: number;
  jsonLimit: string;
  defaultPriority: PriorityMode;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment: ${problems.join("; ")}`);
  }
  return {
    port: parsed.data.PORT,
    uploadLimitBytes: Math.round(parsed.data.UPLOAD_LIMIT_MB * 1024 * 1024),
    jsonLimit: parsed.data.JSON_LIMIT,
    defaultPriority: parsed.data.DEFAULT_PRIORITY,
  };
}
