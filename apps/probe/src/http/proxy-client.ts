import { log, createTimer } from "../logger.js";
import {
  ProxyAbortedError,
  ProxyConnectionError,
  ProxyHttpError,
  ProxyRequestError,
  ProxyResponseError,
  ProxyTimeoutError,
} from "./errors.js";
import {
  messageSchema,
  streamEventSchema,
  type Message,
  type MessageRequest,
} from "./messages.js";
import { parseSseStream, type SseEvent } from "./sse.js";

// =============================================================================
// Proxy HTTP Client
// =============================================================================
// Thin fetch wrapper for the Maximize proxy:
// - one timeout per call, enforced with AbortController
// - a client-wide signal that aborts whatever is in flight (Ctrl+C)
// - Messages API calls with bearer auth, buffered or streamed
// No retries: every call is a single attempt.
// =============================================================================

export const ANTHROPIC_VERSION = "2023-06-01";
const USER_AGENT = "maximize-probe/0.1.0";

export interface ProxyFetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: ProxyFetchInit) => Promise<Response>;

export interface ProxyClientOptions {
  baseUrl: string;
  /** Sent as `Authorization: Bearer <key>` on authenticated calls */
  apiKey?: string;
  /** Defaults to the global fetch; tests inject an in-process one */
  fetch?: FetchLike;
  /** Aborting it cancels every in-flight call with ProxyAbortedError */
  signal?: AbortSignal;
}

export interface RequestOptions {
  timeoutMs: number;
  body?: unknown;
  /** Attach the API key (default true) */
  authenticated?: boolean;
}

export interface CallOptions {
  timeoutMs: number;
}

export interface ProxyResponse {
  status: number;
  ok: boolean;
  headers: Headers;
  text: string;
  json(): unknown;
}

/**
 * Per-call deadline: a timer plus a link to the client-wide signal
 */
class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly onOuterAbort = () => this.controller.abort();
  private timedOut = false;

  constructor(
    private readonly timeoutMs: number,
    private readonly outer?: AbortSignal
  ) {
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, timeoutMs);

    if (outer?.aborted) {
      this.controller.abort();
    } else {
      outer?.addEventListener("abort", this.onOuterAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Map whatever fetch or the body reader threw onto the client's error types
   */
  translate(error: unknown, url: string): Error {
    if (this.timedOut) return new ProxyTimeoutError(url, this.timeoutMs);
    if (this.outer?.aborted) return new ProxyAbortedError(url);
    if (error instanceof ProxyRequestError) return error;
    if (error instanceof Error && error.name === "AbortError") return new ProxyAbortedError(url);
    // fetch() reports network failures as `TypeError: fetch failed`
    if (error instanceof TypeError) return new ProxyConnectionError(url, error);
    return error instanceof Error ? error : new ProxyRequestError(String(error));
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.outer?.removeEventListener("abort", this.onOuterAbort);
  }
}

export class ProxyClient {
  readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: FetchLike;
  private readonly signal?: AbortSignal;

  constructor(options: ProxyClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.signal = options.signal;
  }

  url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  /**
   * Single HTTP call. Resolves for every status code; rejects only with
   * connection, timeout or abort errors.
   */
  async request(method: "GET" | "POST", path: string, options: RequestOptions): Promise<ProxyResponse> {
    const url = this.url(path);
    const timer = createTimer();
    const deadline = new Deadline(options.timeoutMs, this.signal);

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: this.buildHeaders(path, options.body !== undefined, options.authenticated ?? true),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: deadline.signal,
      });
      const text = await response.text();

      log.http.debug(
        { method, url, status: response.status, latencyMs: Math.round(timer()) },
        "request"
      );

      return {
        status: response.status,
        ok: response.ok,
        headers: response.headers,
        text,
        json: () => parseJson(text, response.status),
      };
    } catch (error) {
      const translated = deadline.translate(error, url);
      log.http.debug({ method, url, error: translated.message }, "request failed");
      throw translated;
    } finally {
      deadline.dispose();
    }
  }

  /**
   * POST /v1/messages and validate the returned message
   */
  async createMessage(request: MessageRequest, options: CallOptions): Promise<Message> {
    const response = await this.request("POST", "/v1/messages", {
      timeoutMs: options.timeoutMs,
      body: request,
    });

    if (!response.ok) {
      throw new ProxyHttpError(response.status, response.text);
    }

    const parsed = messageSchema.safeParse(response.json());
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ProxyResponseError(
        `Unexpected message shape: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`
      );
    }

    return parsed.data;
  }

  /**
   * POST /v1/messages with `stream: true`, yielding text deltas as they arrive.
   * The timeout covers the whole stream, not just the first byte.
   */
  async *streamText(request: MessageRequest, options: CallOptions): AsyncGenerator<string> {
    const url = this.url("/v1/messages");
    const timer = createTimer();
    const deadline = new Deadline(options.timeoutMs, this.signal);

    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          ...this.buildHeaders("/v1/messages", true, true),
          accept: "text/event-stream",
        },
        body: JSON.stringify({ ...request, stream: true }),
        signal: deadline.signal,
      });

      if (!response.ok) {
        throw new ProxyHttpError(response.status, await response.text());
      }
      if (response.body === null) {
        throw new ProxyResponseError("Streaming response has no body");
      }

      let chunks = 0;
      for await (const event of parseSseStream(response.body)) {
        const text = textFromEvent(event);
        if (text) {
          chunks++;
          yield text;
        }
      }

      log.http.debug({ method: "POST", url, chunks, latencyMs: Math.round(timer()) }, "stream complete");
    } catch (error) {
      const translated = deadline.translate(error, url);
      log.http.debug({ method: "POST", url, error: translated.message }, "stream failed");
      throw translated;
    } finally {
      deadline.dispose();
    }
  }

  private buildHeaders(path: string, hasBody: boolean, authenticated: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      accept: "application/json",
      "user-agent": USER_AGENT,
    };
    if (hasBody) {
      headers["content-type"] = "application/json";
    }
    if (path.startsWith("/v1/")) {
      headers["anthropic-version"] = ANTHROPIC_VERSION;
    }
    if (authenticated && this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function parseJson(text: string, status: number): unknown {
  try {
    return JSON.parse(text);
  } catch {
    const preview = text.length > 100 ? `${text.slice(0, 100)}...` : text;
    throw new ProxyResponseError(`Invalid JSON response (status ${status}): ${preview}`);
  }
}

/**
 * Text carried by one SSE event, if any. An `error` event ends the stream.
 */
export function textFromEvent(event: SseEvent): string | undefined {
  if (event.data === "[DONE]") return undefined;

  let payload: unknown;
  try {
    payload = JSON.parse(event.data);
  } catch {
    throw new ProxyResponseError(`Malformed stream event: ${event.data.slice(0, 100)}`);
  }

  const parsed = streamEventSchema.safeParse(payload);
  if (!parsed.success) return undefined;

  if (parsed.data.type === "error") {
    const { type, message } = parsed.data.error;
    throw new ProxyResponseError(`Stream error (${type}): ${message}`);
  }

  const { delta } = parsed.data;
  return delta.type === "text_delta" ? delta.text : undefined;
}
