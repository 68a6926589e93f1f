// Tool system types -- descriptors, invocation requests, results

import type { BackendErrorKind, ToolInvocationErrorKind } from "./errors";

export type ParameterType = "string" | "integer" | "number" | "boolean";

export interface ParameterSpec {
  readonly type: ParameterType;
  readonly description: string;
  readonly required?: boolean;
  /** Closed set of accepted values (string parameters only). */
  readonly enum?: readonly string[];
}

/**
 * A named, schema-typed, read-only inventory capability.
 * Parameter order is the declaration order and is preserved in the catalog.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
  /** Human-readable description of the payload shape. */
  readonly returns: string;
}

/**
 * JSON Schema describing a tool the LLM can call.
 * Sent to the provider as part of the request.
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>; // JSON Schema object
}

/**
 * A tool invocation requested by the oracle.
 */
export interface ToolInvocationRequest {
  readonly id: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
}

export type ToolFailureKind = BackendErrorKind | ToolInvocationErrorKind;

/**
 * The outcome of one invocation. Frozen once produced and appended to the
 * transcript so the oracle can continue reasoning.
 */
export type ToolResult =
  | {
      readonly invocationId: string;
      readonly name: string;
      readonly status: "success";
      readonly payload: unknown;
    }
  | {
      readonly invocationId: string;
      readonly name: string;
      readonly status: "failure";
      readonly error: { readonly kind: ToolFailureKind; readonly detail: string };
    };

export interface ToolExecutionContext {
  /** Fires on caller cancellation or when the invocation timeout elapses. */
  readonly signal: AbortSignal;
}

export type ToolExecutor = (
  args: Record<string, unknown>,
  context: ToolExecutionContext,
) => Promise<unknown>;
