import { QuestionType } from "../types/application";

export interface MessagePromptInput {
  profile: string;
  jobTitle: string;
  company: string;
  jobDescription: string;
}

export interface PromptQuestion {
  text: string;
  type: QuestionType;
  options: string[];
  required: boolean;
}

export interface AnswersPromptInput {
  profile: string;
  jobTitle: string;
  company: string;
  jobDescription: string;
  questions: PromptQuestion[];
}

export const SYSTEM_PROMPT =
  "You are a professional job application assistant. Use the candidate profile only and respond with JSON.";

export function buildMessagePrompt(input: MessagePromptInput): string {
  return [
    "Generate a personalized, concise application message.",
    "",
    "CANDIDATE PROFILE:",
    input.profile || "(no profile provided)",
    "",
    "JOB DETAILS:",
    `- Title: ${input.jobTitle}`,
    `- Company: ${input.company}`,
    `- Description: ${input.jobDescription || "(not available)"}`,
    "",
    "INSTRUCTIONS:",
    "1. Write a professional message of 150-200 words at most.",
    "2. Address 2-3 specific requirements from the job description.",
    "3. Highlight matching experience from the candidate profile.",
    "4. No greeting line and no sign-off.",
    "",
    "Respond with JSON only:",
    "```json",
    '{"message": "...", "addressedRequirements": ["..."], "matchingSkills": ["..."], "confidenceScore": 85}',
    "```",
  ].join("\n");
}

export function buildAnswersPrompt(input: AnswersPromptInput): string {
  const questions = input.questions.map((question, index) => {
    const flags = [question.type, question.required ? "required" : "optional"].join(", ");
    const options = question.options.length > 0 ? ` Options: ${question.options.join(" | ")}` : "";
    return `${index + 1}. ${question.text} (${flags})${options}`;
  });

  return [
    "Answer the application questions below for the candidate.",
    "",
    "CANDIDATE PROFILE:",
    input.profile || "(no profile provided)",
    "",
    "JOB CONTEXT:",
    `${input.jobTitle} at ${input.company}`,
    input.jobDescription || "(not available)",
    "",
    "QUESTIONS TO ANSWER:",
    ...questions,
    "",
    "INSTRUCTIONS:",
    "1. Answer each question concisely using the profile where possible.",
    "2. For questions with options, answer with one of the options verbatim.",
    "3. For yes/no questions answer Yes or No.",
    "4. Use each question text exactly as the key.",
    "",
    "Respond with JSON only:",
    "```json",
    '{"answers": {"Question text": "Answer"}}',
    "```",
  ].join("\n");
}
