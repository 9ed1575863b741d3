import type { z } from "zod";
import {
  AuthorizationError,
  SubmissionRejectedError,
  TransientError,
  createLogger,
  isRetryable,
  retry,
} from "@agentport/shared";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RemoteClientOptions {
  baseUrl: string;
  accessToken?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  fetch?: FetchLike;
}

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * RemoteClient performs authenticated JSON calls against a remote target.
 *
 * Each attempt carries its own timeout. Network failures, timeouts and
 * 408/429/5xx responses are retried with exponential backoff up to
 * `maxAttempts`; 401/403 surface immediately as AuthorizationError and any
 * other non-2xx as SubmissionRejectedError with the body verbatim.
 */
export class RemoteClient {
  private logger = createLogger("remote-client");
  private options: Required<Omit<RemoteClientOptions, "accessToken">> & { accessToken?: string };
  private calls = 0;

  constructor(options: RemoteClientOptions) {
    this.options = {
      baseUrl: options.baseUrl.replace(/\/+$/, ""),
      accessToken: options.accessToken,
      timeoutMs: options.timeoutMs ?? 60_000,
      maxAttempts: options.maxAttempts ?? 3,
      baseDelayMs: options.baseDelayMs ?? 1000,
      fetch: options.fetch ?? ((input, init) => fetch(input, init)),
    };
  }

  /** Number of HTTP requests issued, including retried attempts. */
  get requestCount(): number {
    return this.calls;
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /** Issues the request and validates the JSON response against `schema`. */
  async request<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, method: string, path: string, body?: unknown): Promise<T> {
    const label = `${method} ${path}`;
    const { status, payload } = await retry(() => this.attempt(method, path, label, body), {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.baseDelayMs,
      shouldRetry: isRetryable,
      onRetry: (err, attempt, delayMs) => {
        this.logger.warn(`${label} attempt ${attempt} failed, retrying in ${delayMs}ms: ${err.message}`);
      },
    });

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new SubmissionRejectedError(
        status,
        `unexpected response body: ${parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"} ${i.message}`).join("; ")}`,
        label,
      );
    }
    return parsed.data;
  }

  private async attempt(
    method: string,
    path: string,
    label: string,
    body: unknown,
  ): Promise<{ status: number; payload: unknown }> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (this.options.accessToken) headers.Authorization = `Bearer ${this.options.accessToken}`;

    this.calls++;
    let resp: Response;
    try {
      resp = await this.options.fetch(`${this.options.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error && err.name === "TimeoutError"
        ? `timed out after ${this.options.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new TransientError(`${label} failed: ${reason}`, { cause: err });
    }

    if (resp.ok) {
      const text = await resp.text();
      this.logger.debug(`${label} -> ${resp.status}`);
      if (!text) return { status: resp.status, payload: {} };
      try {
        const payload: unknown = JSON.parse(text);
        return { status: resp.status, payload };
      } catch {
        throw new SubmissionRejectedError(resp.status, `invalid JSON response: ${text.slice(0, 200)}`, label);
      }
    }

    const text = await resp.text();
    if (resp.status === 401 || resp.status === 403) {
      throw new AuthorizationError(`${label} was not authorized (${resp.status}): ${text}`, resp.status);
    }
    if (TRANSIENT_STATUSES.has(resp.status)) {
      throw new TransientError(`${label} failed (${resp.status}): ${text}`, { status: resp.status });
    }
    throw new SubmissionRejectedError(resp.status, text, label);
  }
}
