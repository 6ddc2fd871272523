import { getConfig } from "../config.js";
import { OracleError, errorMessage } from "../errors.js";
import { ChatCompletionResponseSchema } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { ReasoningOracle } from "./oracle.js";

const log = createLogger("oracle");

export type HttpOracleOptions = {
  name: string;
  /** Base URL of an OpenAI-compatible server, e.g. http://127.0.0.1:8000/v1 */
  url: string;
  model?: string;
  apiKey?: string;
  headers?: Record<string, string>;
  temperature?: number;
  maxTokens?: number;
  /** Timeout in ms (default: config timeouts.oracle) */
  timeout?: number;
};

/** Oracle backed by a `/chat/completions` endpoint. */
export class HttpOracle implements ReasoningOracle {
  readonly name: string;
  readonly type = "http" as const;

  private url: string;
  private model: string;
  private headers: Record<string, string>;
  private temperature: number;
  private maxTokens: number;
  private timeout: number;

  constructor(opts: HttpOracleOptions) {
    const cfg = getConfig();
    this.name = opts.name;
    this.url = opts.url.replace(/\/$/, "");
    this.model = opts.model ?? cfg.oracle.model;
    this.headers = {
      ...(opts.apiKey ? { Authorization: `Bearer ${opts.apiKey}` } : {}),
      ...opts.headers,
    };
    this.temperature = opts.temperature ?? cfg.oracle.temperature;
    this.maxTokens = opts.maxTokens ?? cfg.oracle.maxTokens;
    this.timeout = opts.timeout ?? cfg.timeouts.oracle;
  }

  async infer(prompt: string): Promise<string> {
    const start = Date.now();
    let res: Response;
    try {
      res = await fetch(`${this.url}/chat/completions`, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        }),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (err) {
      const isTimeout = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
      log.error(`[${this.name}] request failed`, { error: errorMessage(err), durationMs: Date.now() - start });
      throw new OracleError(
        isTimeout ? "ORACLE_TIMEOUT" : "ORACLE_FAILED",
        this.name,
        `Oracle "${this.name}" request failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (!res.ok) {
      const body = await res.text();
      throw new OracleError("ORACLE_FAILED", this.name, `Oracle "${this.name}" returned HTTP ${res.status}: ${body.slice(0, 200)}`, {
        status: res.status,
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new OracleError("ORACLE_FAILED", this.name, `Oracle "${this.name}" returned invalid JSON`, { cause: err });
    }
    const parsed = ChatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new OracleError("ORACLE_FAILED", this.name, `Oracle "${this.name}" returned an unexpected response shape`);
    }
    const content = parsed.data.choices[0].message.content ?? "";
    if (content.trim().length === 0) {
      throw new OracleError("ORACLE_EMPTY_RESPONSE", this.name, `Oracle "${this.name}" returned an empty response`);
    }
    log.debug(`[${this.name}] inference done`, { durationMs: Date.now() - start, chars: content.length });
    return content;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.url}/models`, {
        headers: this.headers,
        signal: AbortSignal.timeout(getConfig().timeouts.httpHealth),
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}
