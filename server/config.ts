import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv({ path: ".env" });
loadEnv({ path: ".env.local", override: true });

function positiveIntegerFromEnv(max = Number.MAX_SAFE_INTEGER) {
  return z.preprocess((value) => {
    if (value === undefined || value === null || value === "") return undefined;
    if (typeof value === "string") {
      const parsed = Number(value.trim());
      return Number.isInteger(parsed) && parsed > 0 ? parsed : Number.NaN;
    }
    return value;
  }, z.number().int().positive().max(max));
}

const environmentSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  PORT: positiveIntegerFromEnv(65535).default(8000),
  MAVENDB_PATH: z.string().trim().min(1).default("mavendb.sqlite"),
  // 100,000 pages of 4 KiB, about 400 MB
  SQLITE_CACHE_PAGES: positiveIntegerFromEnv().default(100_000),
  // 512 MB
  SQLITE_MMAP_BYTES: positiveIntegerFromEnv().default(536_870_912),
  RATE_LIMIT_PER_MINUTE: positiveIntegerFromEnv().default(300),
});

export type AppConfig = z.infer<typeof environmentSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment configuration:\n${issues.join("\n")}`);
    this.name = "ConfigError";
  }
}

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "environment";
    return `- ${path}: ${issue.message}`;
  });
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = environmentSchema.safeParse(env);
  if (result.success) return result.data;
  throw new ConfigError(formatZodIssues(result.error));
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = parseConfig(process.env);
  return cached;
}
