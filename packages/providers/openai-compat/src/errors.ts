// Error classification for OpenAI-compatible providers.
//
//   HTTP errors      the server answered with a non-2xx status; classified by status
//   Transport errors the request never completed (server down, DNS, reset)

import type { ProviderErrorCode } from "@inventory-chat/core";

/** A non-2xx response from the chat completions endpoint. */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`HTTP ${status}${body ? `: ${body.slice(0, 500)}` : ""}`);
    this.name = "HttpStatusError";
  }
}

export function classifyStatus(status: number, body = ""): ProviderErrorCode {
  if (status === 401 || status === 403) return "auth_failed";
  if (status === 429) return "throttled";
  if (status === 408 || status === 500 || status === 502 || status === 503 || status === 504) return "transient_network";
  if (status === 400 || status === 404 || status === 413 || status === 422) {
    return /context length|too long|maximum context/i.test(body) ? "context_length_exceeded" : "invalid_request";
  }
  return "unknown";
}

const TRANSPORT_PATTERNS = ["econnrefused", "econnreset", "enotfound", "etimedout", "socket hang up", "fetch failed", "network"];

/** Map a caught error to a normalized ProviderErrorCode. */
export function classifyError(error: unknown): ProviderErrorCode {
  if (error instanceof HttpStatusError) return classifyStatus(error.status, error.body);
  if (!(error instanceof Error)) return "unknown";

  // AbortError is not a transport failure
  if (error.name === "AbortError" || error.name === "TimeoutError") return "cancelled";

  // undici reports the socket error on `cause`
  const causeMessage = error.cause instanceof Error ? error.cause.message : "";
  const haystack = `${error.message} ${causeMessage}`.toLowerCase();
  if (TRANSPORT_PATTERNS.some((p) => haystack.includes(p))) return "transient_network";

  return "unknown";
}

/** Hint appended to transport failures: the usual cause is a local server that isn't running. */
export function buildErrorHint(code: ProviderErrorCode, providerName: string, baseUrl: string): string {
  return code === "transient_network" ? ` (is ${providerName} reachable at ${baseUrl}?)` : "";
}
