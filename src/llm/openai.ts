import { z } from "zod";
import { LlmConfig } from "../config";
import { errorMessage } from "../core/errors";
import { createLogger, Logger } from "../logging/logger";

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .default([]),
});

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ChatClientOptions {
  config: LlmConfig;
  fetchImpl?: FetchLike;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export interface ChatClient {
  /** Resolves to the assistant's text, or null when the endpoint is unavailable or answered with an error. */
  complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string | null>;
}

export function createOpenAiChatClient(options: ChatClientOptions): ChatClient {
  const { config } = options;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger("llm");

  return {
    async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string | null> {
      if (!config.enabled) {
        return null;
      }
      const apiKey = env[config.apiKeyEnv];
      if (!apiKey) {
        logger.warn(`No API key in ${config.apiKeyEnv}; skipping AI request.`);
        return null;
      }

      const timeout = AbortSignal.timeout(config.timeoutMs);
      const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

      let response: Response;
      try {
        response = await fetchImpl(`${config.baseUrl}/chat/completions`, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify({
            model: config.model,
            messages,
            max_tokens: config.maxOutputTokens,
            temperature: config.temperature,
          }),
          signal: requestSignal,
        });
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        logger.warn(`AI request failed: ${errorMessage(error)}`);
        return null;
      }

      if (!response.ok) {
        logger.warn(`AI request returned HTTP ${response.status}`);
        return null;
      }

      const payload = ChatCompletionSchema.safeParse(await response.json());
      if (!payload.success) {
        logger.warn("AI response did not match the chat completion shape.");
        return null;
      }
      const content = payload.data.choices[0]?.message?.content?.trim();
      return content || null;
    },
  };
}
