import { ValidationError } from "../errors.js";

const ANSWER_SPAN = /<answer>([\s\S]*?)<\/answer>/;

export type AccuracyReport = {
  total: number;
  exactMatchCount: number;
  formatCorrectCount: number;
  exactMatchAccuracy: number;
  formatAccuracy: number;
};

/** Text inside the first answer span, or the whole text when there is none. */
export function extractAnswer(text: string): string {
  const span = text.match(ANSWER_SPAN);
  return (span ? span[1] : text).trim();
}

export function normalizeAnswer(answer: string): string {
  return answer
    .toLowerCase()
    .replace(/[^\w\s]/g, "")
    .split(/\s+/)
    .filter((w) => w.length > 0)
    .join(" ");
}

/** 1 when the text carries a complete answer span, else 0. */
export function formatScore(text: string): number {
  return ANSWER_SPAN.test(text) ? 1 : 0;
}

export function exactMatch(prediction: string, reference: string): number {
  return normalizeAnswer(extractAnswer(prediction)) === normalizeAnswer(reference) ? 1 : 0;
}

export function computeAccuracy(predictions: readonly string[], references: readonly string[]): AccuracyReport {
  if (predictions.length !== references.length) {
    throw new ValidationError(
      "VALIDATION_FAILED",
      `Got ${predictions.length} predictions for ${references.length} references`,
    );
  }
  const total = predictions.length;
  let exactMatchCount = 0;
  let formatCorrectCount = 0;
  predictions.forEach((prediction, i) => {
    exactMatchCount += exactMatch(prediction, references[i]);
    formatCorrectCount += formatScore(prediction);
  });
  return {
    total,
    exactMatchCount,
    formatCorrectCount,
    exactMatchAccuracy: total > 0 ? exactMatchCount / total : 0,
    formatAccuracy: total > 0 ? formatCorrectCount / total : 0,
  };
}
