import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

export const DEFAULT_KNOWLEDGE_FILE = "context_docs/faq.json";
export const DEFAULT_CORS_ORIGINS = ["http://localhost:3000", "https://localhost:3000"];

const blankAsUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  KNOWLEDGE_MATCH_THRESHOLD: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(1).default(0.45)),
  KNOWLEDGE_BASE_FILE: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_KNOWLEDGE_FILE)),
  GEMINI_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  GEMINI_MODEL: z.preprocess(blankAsUndefined, z.string().default("gemini-1.5-flash")),
  GEMINI_TEMPERATURE: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(2).default(0.3)),
  GEMINI_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1000).default(15000)),
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(65535).default(8000)),
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info")
  ),
  CORS_ORIGINS: z.preprocess(blankAsUndefined, z.string().optional()),
});

export interface GeneratorConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface AppConfig {
  minScore: number;
  knowledgeFile: string; // absolute
  generator: GeneratorConfig;
  port: number;
  logLevel: string;
  corsOrigins: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;

  return {
    minScore: e.KNOWLEDGE_MATCH_THRESHOLD,
    knowledgeFile: path.resolve(cwd, e.KNOWLEDGE_BASE_FILE),
    generator: {
      ...(e.GEMINI_API_KEY !== undefined && { apiKey: e.GEMINI_API_KEY }),
      model: e.GEMINI_MODEL,
      temperature: e.GEMINI_TEMPERATURE,
      timeoutMs: e.GEMINI_TIMEOUT_MS,
    },
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGINS
      ? e.CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean)
      : DEFAULT_CORS_ORIGINS,
  };
}
