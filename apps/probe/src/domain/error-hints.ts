import { ProxyHttpError, describeError } from "../http/errors.js";

function lowerMessage(error: unknown): string {
  return describeError(error).toLowerCase();
}

/**
 * The model behind a nickname is not part of the subscription
 */
export function isModelUnavailable(error: unknown): boolean {
  if (error instanceof ProxyHttpError && (error.status === 404 || error.errorType === "not_found_error")) {
    return true;
  }
  const message = lowerMessage(error);
  return message.includes("invalid_request_error") || message.includes("not found");
}

/**
 * Extended thinking is rejected by the proxy or the model
 */
export function isThinkingUnavailable(error: unknown): boolean {
  const message = lowerMessage(error);
  return message.includes("thinking") || message.includes("not supported");
}

/**
 * The proxy's upstream OAuth token was refused (not a proxy fault)
 */
export function isUpstreamAuthError(error: unknown): boolean {
  const message = describeError(error);
  return message.includes("Invalid bearer token") || message.includes("401");
}
