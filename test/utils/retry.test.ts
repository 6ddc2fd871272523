import { describe, expect, it } from "vitest";
import { withRetry } from "../../src/utils/retry.js";

describe("withRetry", () => {
  it("returns the first successful attempt", async () => {
    const attempts: number[] = [];
    const result = await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error(`fail ${attempt}`);
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 1 },
    );
    expect(result).toBe("ok");
    expect(attempts).toEqual([1, 2, 3]);
  });

  it("throws the last error once attempts run out", async () => {
    const delays: number[] = [];
    await expect(
      withRetry(
        async (attempt) => {
          throw new Error(`fail ${attempt}`);
        },
        { maxAttempts: 3, baseDelayMs: 2, maxDelayMs: 3, onRetry: (_err, _attempt, ms) => delays.push(ms) },
      ),
    ).rejects.toThrow("fail 3");
    expect(delays).toEqual([2, 3]);
  });

  it("stops early when shouldRetry refuses", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error("permanent");
        },
        { maxAttempts: 5, baseDelayMs: 1, shouldRetry: () => false },
      ),
    ).rejects.toThrow("permanent");
    expect(calls).toBe(1);
  });
});
