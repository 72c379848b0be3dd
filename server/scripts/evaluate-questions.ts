import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import { closePool } from "../db";
import { loadEngineConfig } from "../src/config";
import type { EvaluationMetrics } from "../src/evaluation/evaluationMetrics";
import { loadQuestionSet, QuestionSetError } from "../src/questions/questionLoader";
import { PredictionService } from "../src/services/predictionService";

const DEFAULT_QUESTIONS = fileURLToPath(new URL("../data/sample-questions.json", import.meta.url));

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function printMetrics(metrics: EvaluationMetrics): void {
  const { overall, byFormat } = metrics;
  console.log(
    `Overall: ${overall.correct}/${overall.total} (${percent(overall.accuracy)}, 95% CI ${percent(overall.ciLower)}-${percent(overall.ciUpper)})`,
  );
  if (byFormat.single) {
    const single = byFormat.single;
    console.log(`  single:  ${single.correct}/${single.total} (${percent(single.accuracy)})`);
  }
  if (byFormat.sata) {
    const sata = byFormat.sata;
    console.log(
      `  sata:    ${sata.correct}/${sata.total} exact (${percent(sata.exactMatchAccuracy)}), F1 ${sata.f1.toFixed(3)}`,
    );
  }
  if (byFormat.ordered) {
    const ordered = byFormat.ordered;
    console.log(
      `  ordered: ${ordered.correct}/${ordered.total} perfect (${percent(ordered.perfectSequenceAccuracy)}), mean tau ${ordered.averageKendallTau.toFixed(3)}`,
    );
  }
}

async function evaluateQuestions() {
  const args = process.argv.slice(2);
  const record = args.includes("--record");
  const file = path.resolve(args.find((arg) => !arg.startsWith("--")) ?? DEFAULT_QUESTIONS);

  try {
    const questionSet = await loadQuestionSet(file);
    const service = await PredictionService.create(loadEngineConfig());

    console.log(`Evaluating ${questionSet.questions.length} questions from ${questionSet.name ?? file}`);
    const run = await service.evaluate(questionSet.questions, record);

    for (const prediction of run.predictions) {
      const mark = prediction.outcome ? (prediction.outcome.wasCorrect ? "✓" : "✗") : "?";
      const exception = prediction.appliedException ? ` [${prediction.appliedException.type}]` : "";
      console.log(`  ${mark} ${prediction.questionId}: ${prediction.answers.join(",")}${exception}`);
    }

    printMetrics(run.metrics);
    if (run.ungraded > 0) console.log(`${run.ungraded} questions had no answer key`);
  } catch (error: unknown) {
    if (error instanceof QuestionSetError) {
      console.error(error.message);
      error.issues.forEach((issue) => console.error(`  ${issue}`));
    } else {
      console.error("Evaluation failed:", error instanceof Error ? error.message : error);
    }
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void evaluateQuestions();
