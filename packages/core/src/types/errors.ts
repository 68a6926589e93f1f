// Error types and Result monad for explicit error handling

import type { ProviderErrorCode } from "./provider";

export type Result<T, E = InventoryChatError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export class InventoryChatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "InventoryChatError";
  }
}

export class ProviderError extends InventoryChatError {
  constructor(
    message: string,
    public readonly providerCode: ProviderErrorCode = "unknown",
    cause?: unknown,
  ) {
    super(message, "PROVIDER_ERROR", cause);
    this.name = "ProviderError";
  }
}

export class ConfigError extends InventoryChatError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export class SessionError extends InventoryChatError {
  constructor(message: string, cause?: unknown) {
    super(message, "SESSION_ERROR", cause);
    this.name = "SessionError";
  }
}

// ── Tool layer ───────────────────────────────────────────────────────────────

export class ToolRegistryError extends InventoryChatError {
  constructor(
    message: string,
    public readonly kind: "DuplicateTool",
  ) {
    super(message, "TOOL_REGISTRY_ERROR");
    this.name = "ToolRegistryError";
  }
}

/** Rejections raised before a capability runs. These indicate an integration defect. */
export type ToolInvocationErrorKind = "UnknownTool" | "MissingParameter" | "InvalidParameterType";

export class ToolInvocationError extends InventoryChatError {
  constructor(
    message: string,
    public readonly kind: ToolInvocationErrorKind,
    public readonly toolName: string,
    public readonly parameter?: string,
  ) {
    super(message, "TOOL_INVOCATION_ERROR");
    this.name = "ToolInvocationError";
  }
}

export type BackendErrorKind = "BackendUnavailable" | "BackendQueryError";

export class InventoryBackendError extends InventoryChatError {
  constructor(
    message: string,
    public readonly kind: BackendErrorKind,
    cause?: unknown,
  ) {
    super(message, "INVENTORY_BACKEND_ERROR", cause);
    this.name = "InventoryBackendError";
  }
}

// ── Oracle layer ─────────────────────────────────────────────────────────────

export type MalformedReason =
  | "empty"
  | "unknown_tool"
  | "unparsable"
  | "invalid_arguments"
  | "timeout";

export class MalformedOracleResponseError extends InventoryChatError {
  constructor(
    message: string,
    public readonly reason: MalformedReason,
  ) {
    super(message, "MALFORMED_ORACLE_RESPONSE");
    this.name = "MalformedOracleResponseError";
  }
}

/** The reasoning service could not be reached after the adapter's own retries. */
export class OracleUnavailableError extends InventoryChatError {
  constructor(message: string, cause?: unknown) {
    super(message, "ORACLE_UNAVAILABLE", cause);
    this.name = "OracleUnavailableError";
  }
}

export class CancelledError extends InventoryChatError {
  constructor(message = "Operation cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}
