import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";

loadDotenv({ path: process.env.DOTENV_PATH || path.resolve(process.cwd(), ".env") });
loadDotenv();

export type AppConfig = {
  catalogPath: string;
  catalogDelimiter: string;
  recommendLimit: number;
  color: boolean;
  logEvents: boolean;
};

const envSchema = z.object({
  CATALOG_PATH: z.string().optional(),
  CATALOG_DELIMITER: z.string().length(1, "must be a single character").default(","),
  RECOMMEND_LIMIT: z.coerce.number().int().positive().default(5),
  NO_COLOR: z.string().optional(),
  LOG_EVENTS: z.enum(["true", "false"]).default("false")
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue ? issue.path.join(".") : "environment";
    throw new Error(`Invalid env var ${name}: ${issue ? issue.message : parsed.error.message}`);
  }
  const v = parsed.data;
  return {
    catalogPath: v.CATALOG_PATH || path.resolve(cwd, "catalog/songs.csv"),
    catalogDelimiter: v.CATALOG_DELIMITER,
    recommendLimit: v.RECOMMEND_LIMIT,
    color: !v.NO_COLOR,
    logEvents: v.LOG_EVENTS === "true"
  };
}
