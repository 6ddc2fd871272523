import { OracleError } from "../errors.js";

/**
 * The reasoning oracle boundary: prompt in, text out.
 *
 * Implementations throw an `OracleError` on timeouts, transport failures and
 * empty responses; callers treat those as a recoverable failure of whatever
 * subtask made the call.
 */
export interface ReasoningOracle {
  name: string;
  type: "function" | "http" | string;
  description?: string;

  infer(prompt: string): Promise<string>;
  healthCheck?(): Promise<boolean>;
}

/**
 * Client errors from an HTTP oracle (4xx other than 408 and 429) will fail
 * the same way on every attempt.
 */
export function isRetryableOracleError(err: unknown): boolean {
  if (!(err instanceof OracleError) || err.status === undefined) return true;
  return err.status >= 500 || err.status === 408 || err.status === 429;
}
