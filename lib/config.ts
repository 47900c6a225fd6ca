import os from "os";
import { z } from "zod";
import {
  GROQ_MODEL,
  LLM_PROVIDERS,
  type LlmProvider,
  OPENROUTER_BASE_URL,
  OPENROUTER_MODEL,
} from "@/lib/ai/config";
import { CLIP_FORMATS, type ClipFormat } from "@/lib/clips/ffmpegCutter";
import { ConfigError } from "@/lib/errors";

// `FOO=` in a .env file should behave like an unset variable
const optionalString = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().optional()
);

function withDefault<T extends z.ZodTypeAny>(schema: T, fallback: z.input<T>) {
  return z.preprocess(
    (value) => (value === "" || value === undefined ? fallback : value),
    schema
  );
}

const envSchema = z.object({
  LLM_PROVIDER: withDefault(z.enum(LLM_PROVIDERS), "groq"),
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: withDefault(z.string(), GROQ_MODEL),
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: withDefault(z.string(), OPENROUTER_MODEL),
  OPENROUTER_BASE_URL: withDefault(z.string().url(), OPENROUTER_BASE_URL),
  REDIS_URL: withDefault(z.string().url(), "redis://127.0.0.1:6379"),
  CLIPS_DIR: withDefault(z.string(), "generated_clips"),
  CAPTIONS_DIR: withDefault(z.string(), "captions"),
  TRANSCRIPT_LANGUAGE: withDefault(z.string().min(2), "en"),
  EXTRACTION_MAX_ATTEMPTS: withDefault(z.coerce.number().int().min(1), 3),
  EXTRACTION_BACKOFF_MS: withDefault(z.coerce.number().int().min(0), 2000),
  CUT_CONCURRENCY: withDefault(
    z.coerce.number().int().min(1),
    os.availableParallelism()
  ),
  CLIP_FORMAT: withDefault(z.enum(CLIP_FORMATS), "source"),
});

export type AppConfig = {
  llm: {
    provider: LlmProvider;
    groqApiKey?: string;
    groqModel: string;
    openRouterApiKey?: string;
    openRouterModel: string;
    openRouterBaseUrl: string;
  };
  redisUrl: string;
  clipsDir: string;
  captionsDir: string;
  transcriptLanguage: string;
  extraction: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  cutConcurrency: number;
  clipFormat: ClipFormat;
};

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  const e = parsed.data;

  return {
    llm: {
      provider: e.LLM_PROVIDER,
      groqApiKey: e.GROQ_API_KEY,
      groqModel: e.GROQ_MODEL,
      openRouterApiKey: e.OPENROUTER_API_KEY,
      openRouterModel: e.OPENROUTER_MODEL,
      openRouterBaseUrl: e.OPENROUTER_BASE_URL,
    },
    redisUrl: e.REDIS_URL,
    clipsDir: e.CLIPS_DIR,
    captionsDir: e.CAPTIONS_DIR,
    transcriptLanguage: e.TRANSCRIPT_LANGUAGE,
    extraction: {
      maxAttempts: e.EXTRACTION_MAX_ATTEMPTS,
      baseDelayMs: e.EXTRACTION_BACKOFF_MS,
    },
    cutConcurrency: e.CUT_CONCURRENCY,
    clipFormat: e.CLIP_FORMAT,
  };
}
