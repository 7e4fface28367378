import dotenv from "dotenv";

dotenv.config();

export type AppConfig = {
  port: number;
  nodeEnv: string;
  corsOrigins: string[];
  openaiApiKey: string;
  openaiModel: string;
  supabaseUrl: string;
  supabaseServiceRoleKey: string;
};

const DEFAULT_PORT = 8000;
const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

const REQUIRED_KEYS = [
  "OPENAI_API_KEY",
  "SUPABASE_URL",
  "SUPABASE_SERVICE_ROLE_KEY",
] as const;

export const parseCorsOrigins = (raw: string | undefined): string[] =>
  (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const missing = REQUIRED_KEYS.filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new Error(`Missing ${missing.join(", ")}`);
  }

  const port = Number(env.PORT ?? DEFAULT_PORT);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    port,
    nodeEnv: env.NODE_ENV ?? "development",
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
    openaiApiKey: env.OPENAI_API_KEY ?? "",
    openaiModel: env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL,
    supabaseUrl: env.SUPABASE_URL ?? "",
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? "",
  };
};
