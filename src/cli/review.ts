import readline from "readline";
import { ApplicationSession } from "../core/applicationSession";
import { Question } from "../types/application";
import { ReviewDecision, ReviewGate } from "../types/review";

export type ConfidenceLevel = "High" | "Medium" | "Low";

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 80) {
    return "High";
  }
  if (score >= 60) {
    return "Medium";
  }
  return "Low";
}

export function reviewableQuestions(session: ApplicationSession): ReadonlyArray<Readonly<Question>> {
  return session.questions.filter((question) => !question.preFilled);
}

export function formatReviewSummary(session: ApplicationSession, message: string, answers: Record<string, string>): string {
  const lines = [
    `${session.jobTitle} at ${session.company}`,
    `Confidence: ${session.confidenceScore} (${confidenceLevel(session.confidenceScore)})`,
  ];
  if (session.matchingSkills.length > 0) {
    lines.push(`Matching skills: ${session.matchingSkills.join(", ")}`);
  }
  if (session.addressedRequirements.length > 0) {
    lines.push(`Addressed requirements: ${session.addressedRequirements.join(", ")}`);
  }
  lines.push("", "Message:", message || "(empty)", "");

  const questions = reviewableQuestions(session);
  const unknown = questions.filter((question) => question.type === "unknown").length;
  lines.push(`Questions (${questions.length}${unknown > 0 ? `, ${unknown} unrecognised` : ""}):`);
  questions.forEach((question, index) => {
    const flags = [question.type, `page ${question.pageIndex + 1}`, question.required ? "required" : ""]
      .filter(Boolean)
      .join(", ");
    lines.push(`  ${index + 1}. ${question.text} [${flags}]`);
    if (question.options.length > 0) {
      lines.push(`     options: ${question.options.join(" | ")}`);
    }
    lines.push(`     answer: ${answers[question.id] || "(none)"}`);
  });
  return lines.join("\n");
}

export interface TerminalReviewOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function createTerminalReviewGate(options: TerminalReviewOptions = {}): ReviewGate {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  return {
    async review(session: ApplicationSession): Promise<ReviewDecision> {
      const rl = readline.createInterface({ input, output });
      const ask = createPrompter(rl);
      let message = session.applicationMessage;
      const questions = reviewableQuestions(session);
      const answers: Record<string, string> = {};
      for (const question of questions) {
        answers[question.id] = question.answer;
      }

      try {
        output.write(`${formatReviewSummary(session, message, answers)}\n\n`);
        for (;;) {
          const line = await ask("[a]pprove, [m]essage, [1-N] edit answer, [s]how, [c]ancel > ");
          if (line === null) {
            return closed(output);
          }
          const choice = line.trim().toLowerCase();
          if (choice === "a") {
            return { outcome: "approve", message, answers };
          }
          if (choice === "c") {
            return { outcome: "cancel" };
          }
          if (choice === "s") {
            output.write(`${formatReviewSummary(session, message, answers)}\n\n`);
            continue;
          }
          if (choice === "m") {
            const edited = await ask("New message (single line): ");
            if (edited === null) {
              return closed(output);
            }
            message = edited;
            continue;
          }
          const index = Number(choice);
          const question = Number.isInteger(index) ? questions[index - 1] : undefined;
          if (!question) {
            output.write("Unknown choice.\n");
            continue;
          }
          const answer = await ask(`${question.text}\n> `);
          if (answer === null) {
            return closed(output);
          }
          answers[question.id] = answer.trim();
        }
      } finally {
        rl.close();
      }
    },
  };
}

function closed(output: NodeJS.WritableStream): ReviewDecision {
  output.write("\nInput closed, cancelling.\n");
  return { outcome: "cancel" };
}

type Prompter = (prompt: string) => Promise<string | null>;

/** Questions resolve null once the interface has closed. */
function createPrompter(rl: readline.Interface): Prompter {
  let open = true;
  rl.once("close", () => {
    open = false;
  });
  // Ctrl-C at the prompt reaches readline, not the process.
  rl.on("SIGINT", () => rl.close());

  return (prompt) =>
    new Promise((resolve) => {
      if (!open) {
        resolve(null);
        return;
      }
      const onClose = (): void => resolve(null);
      rl.once("close", onClose);
      rl.question(prompt, (answer) => {
        rl.removeListener("close", onClose);
        resolve(answer);
      });
    });
}
