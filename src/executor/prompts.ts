import type { EvidenceItem, Subtask, SubtaskResult, Table } from "../planner/types.js";
import { formatTable } from "../planner/table.js";

export type SubtaskPromptInput = {
  task: Subtask;
  table: Table;
  dependencyResults: Array<{ id: string; description: string; result: SubtaskResult }>;
  evidence: EvidenceItem[];
  previewRows: number;
  maxEvidence: number;
  outputTruncation: number;
};

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...(truncated)` : text;
}

export function buildSubtaskPrompt(input: SubtaskPromptInput): string {
  const { task } = input;
  const sections = [`Table:\n${formatTable(input.table, input.previewRows)}`];

  if (input.dependencyResults.length > 0) {
    sections.push(
      "Results of earlier subtasks:\n" +
        input.dependencyResults
          .map((d) => `- ${d.id} (${d.description}): ${truncate(d.result.output, input.outputTruncation)}`)
          .join("\n"),
    );
  }

  const evidence = input.evidence.slice(0, input.maxEvidence);
  if (evidence.length > 0) {
    sections.push(
      "Retrieved evidence:\n" +
        evidence.map((e, i) => `${i + 1}. ${e.content} [${e.locator}] (score: ${e.score.toFixed(3)})`).join("\n"),
    );
  }

  const lines = [`Task: ${task.description}`, `Task type: ${task.taskType}`];
  if (task.expectedOutput) lines.push(`Expected output: ${task.expectedOutput}`);
  if (task.reasoningSteps.length > 0) {
    lines.push("Reasoning steps:", ...task.reasoningSteps.map((s, i) => `${i + 1}. ${s}`));
  }
  sections.push(lines.join("\n"));
  sections.push("Carry out the task and reply with its result only.");

  return sections.join("\n\n");
}

const ANSWER_SPAN = /<answer>([\s\S]*?)<\/answer>/;

/** Subtask output: trimmed oracle text, unwrapped from an answer span when present. */
export function parseSubtaskOutput(raw: string): string | undefined {
  const span = raw.match(ANSWER_SPAN);
  const text = (span ? span[1] : raw).trim();
  return text.length > 0 ? text : undefined;
}
