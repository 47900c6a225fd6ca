import Groq from "groq-sdk";
import { SEGMENT_TEMPERATURE } from "@/lib/ai/config";
import { CLIP_ANALYST_SYSTEM_PROMPT } from "@/lib/ai/prompts/segment.system";
import type { CompletionClient } from "@/lib/ai/completionClient";

type GroqClientOptions = {
  apiKey: string;
  model: string;
  temperature?: number;
};

export function createGroqClient({
  apiKey,
  model,
  temperature = SEGMENT_TEMPERATURE,
}: GroqClientOptions): CompletionClient {
  const groq = new Groq({ apiKey });

  return {
    async complete(prompt) {
      const completion = await groq.chat.completions.create({
        model,
        messages: [
          { role: "system", content: CLIP_ANALYST_SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature,
      });

      const content = completion.choices?.[0]?.message?.content;
      if (!content) throw new Error("Empty LLM response");

      return content;
    },
  };
}
