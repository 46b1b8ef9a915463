import { z } from "zod";

export const ApplicationMessageSchema = z.object({
  message: z.string(),
  addressedRequirements: z.array(z.string()).default([]),
  matchingSkills: z.array(z.string()).default([]),
  confidenceScore: z.coerce.number().catch(0),
});

export type ApplicationMessagePayload = z.infer<typeof ApplicationMessageSchema>;

export const QuestionAnswersSchema = z.object({
  answers: z.record(z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value))),
});

export interface ApplicationMessageResult {
  message: string;
  addressedRequirements: string[];
  matchingSkills: string[];
  confidenceScore: number;
}

/**
 * Pulls the JSON object out of a model response: a fenced ```json block first,
 * then the outermost brace span, then the whole trimmed text.
 */
export function extractJson(response: string): unknown {
  const fenced = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i.exec(response);
  if (fenced) {
    const parsed = tryParse(fenced[1]);
    if (parsed !== undefined) {
      return parsed;
    }
  }

  const start = response.indexOf("{");
  const end = response.lastIndexOf("}");
  if (start >= 0 && end > start) {
    const parsed = tryParse(response.slice(start, end + 1));
    if (parsed !== undefined) {
      return parsed;
    }
  }

  return tryParse(response.trim()) ?? null;
}

export function parseApplicationMessage(response: string): ApplicationMessageResult | null {
  const result = ApplicationMessageSchema.safeParse(extractJson(response));
  if (!result.success) {
    return null;
  }
  return {
    message: result.data.message.trim(),
    addressedRequirements: result.data.addressedRequirements,
    matchingSkills: result.data.matchingSkills,
    confidenceScore: clampConfidence(result.data.confidenceScore),
  };
}

export function parseQuestionAnswers(response: string): Record<string, string> | null {
  const result = QuestionAnswersSchema.safeParse(extractJson(response));
  return result.success ? result.data.answers : null;
}

export function clampConfidence(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(score)));
}

function tryParse(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}
