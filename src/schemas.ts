import { z } from "zod";
import { ValidationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Input envelope
// ---------------------------------------------------------------------------

export const CellValueSchema = z.union([z.string(), z.number()]);

export const TableSchema = z
  .object({
    columns: z.array(z.string()),
    rows: z.array(z.array(CellValueSchema)),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    for (const col of table.columns) {
      if (seen.has(col)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate column name "${col}"`, path: ["columns"] });
      }
      seen.add(col);
    }
    table.rows.forEach((row, i) => {
      if (row.length !== table.columns.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Row ${i} has ${row.length} cells, expected ${table.columns.length}`,
          path: ["rows", i],
        });
      }
    });
  });

export const QuestionSchema = z.object({
  text: z.string().trim().min(1, "question text must not be empty"),
  table: TableSchema,
});

/** One line of an evaluation dataset. */
export const EvalSampleSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  question: z.string().min(1),
  table: TableSchema,
  answer: z.union([z.string(), z.number()]).transform(String),
});

// ---------------------------------------------------------------------------
// Decomposer output. Fields are lenient; normalisation happens in the decomposer.
// ---------------------------------------------------------------------------

export const RawSubtaskSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  description: z.string().optional().catch(undefined),
  task: z.string().optional().catch(undefined),
  task_type: z.string().optional().catch(undefined),
  dependencies: z.array(z.unknown()).optional().catch(undefined),
  depends_on: z.array(z.unknown()).optional().catch(undefined),
  expected_output: z.string().optional().catch(undefined),
  reasoning_steps: z.array(z.unknown()).optional().catch(undefined),
  needs_retrieval: z.boolean().optional().catch(undefined),
});

export const DecomposerResponseSchema = z.object({
  strategy: z.string().optional(),
  subtasks: z.array(z.unknown()),
});

// ---------------------------------------------------------------------------
// Oracle transport
// ---------------------------------------------------------------------------

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const EngineConfigSchema = z.object({
  timeouts: z.object({
    oracle: z.number().int().positive(),
    httpHealth: z.number().int().positive(),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1),
    baseDelayMs: z.number().int().nonnegative(),
    maxDelayMs: z.number().int().nonnegative(),
  }),
  limits: z.object({
    maxConcurrency: z.number().int().min(1),
    maxFailures: z.number().int().nonnegative(),
    maxDecomposeAttempts: z.number().int().min(1),
    tablePreviewRows: z.number().int().min(1),
    outputTruncation: z.number().int().min(1),
  }),
  retrieval: z.object({
    tools: z.array(z.string().min(1)).min(1),
    topK: z.number().int().min(1),
    promptEvidence: z.number().int().nonnegative(),
    weights: z.record(z.number().nonnegative()),
    defaultWeight: z.number().nonnegative(),
  }),
  oracle: z.object({
    url: z.string().url().optional(),
    model: z.string().min(1),
    temperature: z.number().min(0),
    maxTokens: z.number().int().positive(),
  }),
  store: z.object({
    path: z.string().optional(),
  }),
});

export const ConfigFileSchema = EngineConfigSchema.deepPartial();

/** Parse with a schema, throwing a ValidationError that lists every issue. */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${msg}`);
  }
  return result.data;
}
