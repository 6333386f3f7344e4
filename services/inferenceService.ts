import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { Persona } from "../types.js";
import { settingsService } from "./settingsService.js";
import { loggerService } from "./loggerService.js";

export interface ModelRequest {
  query: string;
  /** Assembled retrieval context; empty when the persona retrieves nothing. */
  context: string;
  showThinking: boolean;
  persona: Persona;
}

export interface ModelResponse {
  answer: string;
  reasoning?: string;
}

export interface ModelInvoker {
  invoke(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse>;
}

const REASONING_PATTERN = /<reasoning>([\s\S]*?)<\/reasoning>/i;

const getClient = () => {
  const { endpoint } = settingsService.getInferenceSettings();
  const apiKey = settingsService.getApiKey() || "lm-studio";
  return new OpenAI({
    baseURL: endpoint,
    apiKey,
  });
};

export const buildSystemPrompt = (persona: Persona, showThinking: boolean): string => {
  const lines = [`You are the ${persona.name} assistant.`];
  if (persona.dataSource === "library") {
    lines.push("Answer from the supplied library documents when they are relevant, and say so when they are not.");
  } else if (persona.dataSource === "internet") {
    lines.push("Answer from the supplied web search results, citing the source URLs you rely on.");
  }
  if (showThinking) {
    lines.push("Before answering, explain your reasoning inside <reasoning></reasoning> tags, then give the final answer after the closing tag.");
  }
  return lines.join(" ");
};

export const buildUserPrompt = (query: string, context: string): string => {
  const parts: string[] = [];
  if (context) {
    parts.push(`Context:\n${context}\n`);
  }
  parts.push(`Query: ${query}`);
  return parts.join("\n");
};

/**
 * Splits a `<reasoning>` block from the final answer. Text without the block is
 * returned as the answer unchanged.
 */
export const splitReasoning = (text: string): ModelResponse => {
  const match = REASONING_PATTERN.exec(text);
  if (!match) return { answer: text.trim() };
  const reasoning = match[1].trim();
  const answer = (text.slice(0, match.index) + text.slice(match.index + match[0].length)).trim();
  return reasoning ? { answer, reasoning } : { answer };
};

export const inferenceService: ModelInvoker = {
  invoke: async ({ query, context, showThinking, persona }, signal) => {
    const { model, temperature } = settingsService.getInferenceSettings();
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: buildSystemPrompt(persona, showThinking) },
      { role: "user", content: buildUserPrompt(query, context) },
    ];

    if (persona.trace) {
      loggerService.info("InferenceService: Calling model", {
        model,
        temperature,
        persona: persona.name,
        contextChars: context.length,
      });
    }

    const client = getClient();
    const result = await client.chat.completions.create(
      { model, messages, temperature },
      { signal }
    );

    const text = result.choices[0]?.message?.content ?? "";
    return splitReasoning(text);
  },
};
