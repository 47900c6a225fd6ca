import { ConfigError } from "@/lib/errors";
import type { AppConfig } from "@/lib/config";
import { createGroqClient } from "./providers/groqClient";
import { createOpenRouterClient } from "./providers/openRouterClient";

/**
 * Opaque text channel to a language model. Nothing about the returned text
 * is guaranteed; callers validate it themselves.
 */
export interface CompletionClient {
  complete(prompt: string): Promise<string>;
}

export function createCompletionClient(
  llm: AppConfig["llm"],
  temperature?: number
): CompletionClient {
  switch (llm.provider) {
    case "groq":
      if (!llm.groqApiKey) throw new ConfigError("GROQ_API_KEY is not set");
      return createGroqClient({
        apiKey: llm.groqApiKey,
        model: llm.groqModel,
        temperature,
      });

    case "openrouter":
      if (!llm.openRouterApiKey) {
        throw new ConfigError("OPENROUTER_API_KEY is not set");
      }
      return createOpenRouterClient({
        apiKey: llm.openRouterApiKey,
        model: llm.openRouterModel,
        baseURL: llm.openRouterBaseUrl,
        temperature,
      });
  }
}
