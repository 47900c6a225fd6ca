import OpenAI from "openai";
import { SEGMENT_TEMPERATURE } from "@/lib/ai/config";
import { CLIP_ANALYST_SYSTEM_PROMPT } from "@/lib/ai/prompts/segment.system";
import type { CompletionClient } from "@/lib/ai/completionClient";

type OpenRouterClientOptions = {
  apiKey: string;
  model: string;
  baseURL: string;
  temperature?: number;
};

// OpenRouter speaks the OpenAI chat completions protocol
export function createOpenRouterClient({
  apiKey,
  model,
  baseURL,
  temperature = SEGMENT_TEMPERATURE,
}: OpenRouterClientOptions): CompletionClient {
  const openrouter = new OpenAI({
    apiKey,
    baseURL,
    defaultHeaders: { "X-Title": "viral-clip-pipeline" },
  });

  return {
    async complete(prompt) {
      const completion = await openrouter.chat.completions.create({
        model,
        messages: [
          { role: "system", content: CLIP_ANALYST_SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature,
        stream: false,
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) throw new Error("Empty LLM response");

      return content;
    },
  };
}
