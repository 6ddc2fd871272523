import { getConfig } from "../config.js";
import { OracleError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { ReasoningOracle } from "./oracle.js";

const log = createLogger("oracle");

export type OracleFunction = (prompt: string) => Promise<string>;

export type FunctionOracleOptions = {
  name: string;
  fn: OracleFunction;
  description?: string;
  /** Timeout in ms (default: config timeouts.oracle) */
  timeout?: number;
};

/** Wraps any async text generator as an oracle. Used for local models and test stand-ins. */
export class FunctionOracle implements ReasoningOracle {
  readonly name: string;
  readonly type = "function" as const;
  readonly description?: string;

  private fn: OracleFunction;
  private timeout: number;

  constructor(opts: FunctionOracleOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
    this.description = opts.description;
    this.timeout = opts.timeout ?? getConfig().timeouts.oracle;
  }

  async infer(prompt: string): Promise<string> {
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;
    let output: string;
    try {
      output = await Promise.race([
        this.fn(prompt),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new OracleError("ORACLE_TIMEOUT", this.name, `Oracle "${this.name}" timed out after ${this.timeout}ms`)),
            this.timeout,
          );
        }),
      ]);
    } catch (err) {
      log.warn(`[${this.name}] inference failed`, { error: errorMessage(err), durationMs: Date.now() - start });
      if (err instanceof OracleError) throw err;
      throw new OracleError("ORACLE_FAILED", this.name, `Oracle "${this.name}" failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }

    if (output.trim().length === 0) {
      throw new OracleError("ORACLE_EMPTY_RESPONSE", this.name, `Oracle "${this.name}" returned an empty response`);
    }
    log.debug(`[${this.name}] inference done`, { durationMs: Date.now() - start, chars: output.length });
    return output;
  }
}
