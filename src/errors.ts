import type { GraphIssue } from "./planner/types.js";

export type ErrorCode =
  | "PARSE_FAILED"
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "GRAPH_MALFORMED"
  | "GRAPH_INVALID"
  | "ORACLE_FAILED"
  | "ORACLE_TIMEOUT"
  | "ORACLE_EMPTY_RESPONSE"
  | "CONFIG_INVALID";

/** Base class for every error raised by the engine. */
export class TableQaError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ParseError extends TableQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
  }
}

export class ValidationError extends TableQaError {
  constructor(code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION", message: string) {
    super(code, message);
  }
}

/** Decomposer output could not be turned into a usable graph. */
export class GraphMalformedError extends TableQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GRAPH_MALFORMED", message, options);
  }
}

/** Hard validator failure. The caller decides whether to re-decompose. */
export class GraphInvalidError extends TableQaError {
  readonly issues: GraphIssue[];

  constructor(issues: GraphIssue[]) {
    super("GRAPH_INVALID", `Subtask graph is invalid: ${issues.map((i) => i.message).join("; ")}`);
    this.issues = issues;
  }
}

export class OracleError extends TableQaError {
  readonly oracle: string;
  /** HTTP status of the oracle's reply, when it answered with an error status. */
  readonly status?: number;

  constructor(
    code: "ORACLE_FAILED" | "ORACLE_TIMEOUT" | "ORACLE_EMPTY_RESPONSE",
    oracle: string,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(code, message, options);
    this.oracle = oracle;
    this.status = options?.status;
  }
}

export class ConfigError extends TableQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
