export const LLM_PROVIDERS = ["groq", "openrouter"] as const;

export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export const GROQ_MODEL = "llama-3.3-70b-versatile";

export const OPENROUTER_MODEL = "openai/gpt-4.1";
export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export const SEGMENT_TEMPERATURE = 0.3;
export const TRANSLATION_TEMPERATURE = 0.1;
