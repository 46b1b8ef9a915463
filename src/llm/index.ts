import { createLogger, Logger } from "../logging/logger";
import { ChatClient } from "./openai";
import { ApplicationMessageResult, parseApplicationMessage, parseQuestionAnswers } from "./parse";
import { buildAnswersPrompt, buildMessagePrompt, MessagePromptInput, AnswersPromptInput, SYSTEM_PROMPT } from "./prompts";

export type { ApplicationMessageResult } from "./parse";
export type { MessagePromptInput, AnswersPromptInput, PromptQuestion } from "./prompts";

export interface AiCollaborator {
  generateApplicationMessage(request: MessagePromptInput, signal?: AbortSignal): Promise<ApplicationMessageResult | null>;
  /** Maps exact question text to an answer. */
  generateQuestionAnswers(request: AnswersPromptInput, signal?: AbortSignal): Promise<Record<string, string> | null>;
}

export function createAiCollaborator(client: ChatClient, logger: Logger = createLogger("ai")): AiCollaborator {
  return {
    async generateApplicationMessage(request, signal) {
      const content = await client.complete(
        [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildMessagePrompt(request) },
        ],
        signal
      );
      if (!content) {
        return null;
      }
      const parsed = parseApplicationMessage(content);
      if (!parsed) {
        logger.warn("Could not parse the application message response.");
      }
      return parsed;
    },

    async generateQuestionAnswers(request, signal) {
      const content = await client.complete(
        [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildAnswersPrompt(request) },
        ],
        signal
      );
      if (!content) {
        return null;
      }
      const parsed = parseQuestionAnswers(content);
      if (!parsed) {
        logger.warn("Could not parse the question answers response.");
      }
      return parsed;
    },
  };
}
