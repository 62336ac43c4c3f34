// =============================================================================
// Proxy Client Errors
// =============================================================================
// ProxyRequestError
//   ├─ ProxyConnectionError  network failure before a response
//   ├─ ProxyTimeoutError     the per-call timer fired
//   ├─ ProxyAbortedError     the run was interrupted
//   ├─ ProxyHttpError        non-2xx response
//   └─ ProxyResponseError    2xx response with an unusable body
// =============================================================================

export class ProxyRequestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProxyConnectionError extends ProxyRequestError {
  /** errno-style code of the underlying socket error, e.g. ECONNREFUSED */
  readonly code?: string;

  constructor(url: string, cause: unknown) {
    const detail = describeCause(cause);
    super(`Connection error: ${detail.message} (${url})`, { cause });
    this.code = detail.code;
  }

  get refused(): boolean {
    return this.code === "ECONNREFUSED";
  }
}

export class ProxyTimeoutError extends ProxyRequestError {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request timed out after ${timeoutMs}ms (${url})`);
  }
}

export class ProxyAbortedError extends ProxyRequestError {
  constructor(readonly url: string) {
    super(`Request aborted (${url})`);
  }
}

/**
 * Non-2xx response. The message mirrors the vendor SDK's
 * `Error code: <status> - <body>` so text-based matching keeps working.
 */
export class ProxyHttpError extends ProxyRequestError {
  readonly errorType?: string;
  readonly errorMessage?: string;

  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`Error code: ${status} - ${body.trim() || "(empty body)"}`);
    const envelope = parseErrorEnvelope(body);
    this.errorType = envelope?.type;
    this.errorMessage = envelope?.message;
  }
}

export class ProxyResponseError extends ProxyRequestError {}

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Read `{ error: { type, message } }` from an error body, if it is one
 */
export function parseErrorEnvelope(body: string): { type?: string; message?: string } | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed) || !isRecord(parsed.error)) return undefined;

  const { type, message } = parsed.error;
  return {
    type: typeof type === "string" ? type : undefined,
    message: typeof message === "string" ? message : undefined,
  };
}

/**
 * fetch() rejects with `TypeError: fetch failed` and hides the socket error
 * in `cause`; dig it out.
 */
function describeCause(cause: unknown): { message: string; code?: string } {
  let current: unknown = cause;
  let message = cause instanceof Error ? cause.message : String(cause);
  let code: string | undefined;

  // AggregateError (dual-stack connect) carries the code but an empty message
  while (current instanceof Error) {
    if (current.message) message = current.message;
    if (isRecord(current) && typeof current.code === "string") {
      code = current.code;
    }
    current = current.cause;
  }

  return { message, code };
}

/**
 * One-line description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
