import dotenv from "dotenv";
import { z } from "zod";

const directoryEnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATABASE_URL: z.string().min(1).optional(),
  AZURE_AUTHORITY_HOST: z.string().url().default("https://login.microsoftonline.com"),
  AZURE_TENANT_ID: z.string().min(1).optional(),
  AZURE_CLIENT_ID: z.string().min(1).optional(),
  AZURE_CLIENT_SECRET: z.string().min(1).optional(),
  GRAPH_ACCESS_TOKEN: z.string().min(1).optional(),
  GRAPH_BASE_URL: z.string().url().default("https://graph.microsoft.com/v1.0"),
  GRAPH_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  GRAPH_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  SNAPSHOT_PATH: z.string().min(1).default("./core-data/license-catalog.csv"),
});

const envSchema = directoryEnvSchema.extend({
  PORT: z.coerce.number().default(3000),
  JWT_SECRET: z.string().min(16),
  JWT_ISSUER: z.string().default("tenant-license-tools"),
  JWT_AUDIENCE: z.string().default("tlt-operator"),
});

export type DirectoryConfig = z.infer<typeof directoryEnvSchema>;
export type EnvConfig = z.infer<typeof envSchema>;

function parseEnv<T extends z.ZodTypeAny>(schema: T): z.infer<T> {
  dotenv.config();
  const parsed = schema.safeParse(process.env);

  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${message}`);
  }

  return parsed.data;
}

export function loadConfig(): EnvConfig {
  return parseEnv(envSchema);
}

/** Subset used by the command-line tools, which never serve HTTP. */
export function loadDirectoryConfig(): DirectoryConfig {
  return parseEnv(directoryEnvSchema);
}
