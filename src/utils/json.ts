/**
 * Pull a JSON object out of model output that may wrap it in markdown fences
 * or surround it with prose. Returns undefined when nothing parses.
 */
export function extractJsonObject(raw: string): unknown {
  const unfenced = raw
    .replace(/^```(?:json)?\s*\n?/m, "")
    .replace(/\n?```\s*$/m, "")
    .trim();

  const direct = safeParse(unfenced);
  if (isObject(direct)) return direct;

  const fenced = raw.match(/```(?:json)?\s*(\{[\s\S]*?\})\s*```/);
  if (fenced) {
    const parsed = safeParse(fenced[1]);
    if (isObject(parsed)) return parsed;
  }

  const span = raw.match(/\{[\s\S]*\}/);
  if (span) {
    const parsed = safeParse(span[0]);
    if (isObject(parsed)) return parsed;
  }
  return undefined;
}

function safeParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
