/**
 * Question Loader
 *
 * Reads a question set from JSON, either `{ name, questions: [...] }` or a bare
 * array, and validates every question against the shared schema.
 */

import { promises as fs } from "node:fs";
import { z } from "zod";
import { questionSchema, questionSetSchema, type Question, type QuestionSet } from "@shared/schema";
import type { PriorityQuestion } from "../engine/priorityContract";

export class QuestionSetError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "QuestionSetError";
  }
}

const questionFileSchema = z.union([questionSetSchema, z.array(questionSchema).transform((questions) => ({ questions }))]);

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function parseQuestionSet(raw: unknown, source = "question set"): QuestionSet {
  const parsed = questionFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new QuestionSetError(`Invalid ${source}`, formatIssues(parsed.error));
  }

  const seen = new Set<string>();
  const duplicates = parsed.data.questions.map((question) => question.id).filter((id) => {
    if (seen.has(id)) return true;
    seen.add(id);
    return false;
  });
  if (duplicates.length > 0) {
    throw new QuestionSetError(`Invalid ${source}`, duplicates.map((id) => `duplicate question id ${id}`));
  }

  return parsed.data;
}

export async function loadQuestionSet(filePath: string): Promise<QuestionSet> {
  const text = await fs.readFile(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new QuestionSetError(`${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseQuestionSet(raw, filePath);
}

export function toPriorityQuestion(question: Question): PriorityQuestion {
  return {
    id: question.id,
    stem: question.stem,
    options: question.options,
    format: question.format,
    questionType: question.questionType,
  };
}
