import { describe, expect, it } from "vitest";
import { OracleError } from "../../src/errors.js";
import { FunctionOracle } from "../../src/oracle/function-oracle.js";
import { delay } from "../helpers.js";

describe("FunctionOracle", () => {
  it("has correct type and name", () => {
    const oracle = new FunctionOracle({ name: "local", fn: async () => "ok" });
    expect(oracle.name).toBe("local");
    expect(oracle.type).toBe("function");
  });

  it("returns the function's output", async () => {
    const oracle = new FunctionOracle({ name: "echo", fn: async (prompt) => `echo: ${prompt}` });
    expect(await oracle.infer("hi")).toBe("echo: hi");
  });

  it("wraps thrown errors", async () => {
    const oracle = new FunctionOracle({
      name: "broken",
      fn: async () => {
        throw new Error("kaput");
      },
    });
    await expect(oracle.infer("x")).rejects.toMatchObject({
      code: "ORACLE_FAILED",
      oracle: "broken",
      message: 'Oracle "broken" failed: kaput',
    });
  });

  it("times out slow functions", async () => {
    const oracle = new FunctionOracle({
      name: "slow",
      timeout: 20,
      fn: async () => {
        await delay(200);
        return "late";
      },
    });
    const err = await oracle.infer("x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OracleError);
    expect(err).toMatchObject({ code: "ORACLE_TIMEOUT", message: 'Oracle "slow" timed out after 20ms' });
  });

  it("rejects blank output", async () => {
    const oracle = new FunctionOracle({ name: "mute", fn: async () => "  \n" });
    await expect(oracle.infer("x")).rejects.toMatchObject({ code: "ORACLE_EMPTY_RESPONSE" });
  });
});
