import { AiCollaborator } from "../llm";
import { createLogger, Logger } from "../logging/logger";
import { Question } from "../types/application";
import { ApplicationSession } from "./applicationSession";
import { errorMessage } from "./errors";
import { isEditable } from "./transitions";

export interface ResolveContext {
  profile: string;
  jobDescription: string;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ResolutionSummary {
  messageGenerated: boolean;
  answersApplied: number;
}

/** Questions the AI is asked about: unanswered, not pre-filled and of a fillable type. */
export function targetQuestions(session: ApplicationSession): ReadonlyArray<Readonly<Question>> {
  return session.questions.filter(
    (question) =>
      !question.preFilled &&
      question.answer.trim().length === 0 &&
      question.type !== "unknown" &&
      question.type !== "fileUpload"
  );
}

export async function resolveAnswers(
  session: ApplicationSession,
  ai: AiCollaborator,
  context: ResolveContext
): Promise<ResolutionSummary> {
  const logger = context.logger ?? createLogger("resolver");
  const summary: ResolutionSummary = { messageGenerated: false, answersApplied: 0 };
  if (!isEditable(session.status)) {
    logger.warn(`Skipping answer resolution for session ${session.id} in status ${session.status}`);
    return summary;
  }

  const job = {
    profile: context.profile,
    jobTitle: session.jobTitle,
    company: session.company,
    jobDescription: context.jobDescription,
  };

  try {
    const result = await ai.generateApplicationMessage(job, context.signal);
    if (result && isEditable(session.status)) {
      session.setMessage(result.message);
      session.setMetadata({
        matchingSkills: result.matchingSkills,
        addressedRequirements: result.addressedRequirements,
        confidenceScore: result.confidenceScore,
      });
      summary.messageGenerated = result.message.length > 0;
    } else if (!result) {
      logger.warn("AI did not return an application message; leaving it empty.");
    }
  } catch (error) {
    logger.warn(`Application message generation failed: ${errorMessage(error)}`);
  }

  const targets = targetQuestions(session);
  if (targets.length === 0) {
    return summary;
  }

  try {
    const answers = await ai.generateQuestionAnswers(
      {
        ...job,
        questions: targets.map((question) => ({
          text: question.text,
          type: question.type,
          options: [...question.options],
          required: question.required,
        })),
      },
      context.signal
    );
    if (!answers) {
      logger.warn("AI did not return question answers; questions stay unanswered.");
      return summary;
    }
    if (!isEditable(session.status)) {
      return summary;
    }
    for (const question of targets) {
      if (Object.hasOwn(answers, question.text)) {
        session.setAnswer(question.id, answers[question.text]);
        summary.answersApplied += 1;
      }
    }
  } catch (error) {
    logger.warn(`Question answer generation failed: ${errorMessage(error)}`);
  }

  return summary;
}
