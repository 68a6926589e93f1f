// LLM provider interface with cancellation, error normalization, and tool support

import type { Message } from "./message";
import type { ToolDefinition } from "./tool";

export type ProviderErrorCode =
  | "throttled"
  | "auth_failed"
  | "invalid_request"
  | "context_length_exceeded"
  | "transient_network"
  | "cancelled"
  | "unknown";

export interface ProviderOptions {
  readonly signal?: AbortSignal;
  readonly tools?: ToolDefinition[];
}

/** Exact token counts reported by the provider after a response completes. */
export interface ProviderUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
}

/**
 * A native tool call as streamed by the provider. `argsError` is set when the
 * accumulated argument string did not parse to a JSON object.
 */
export interface ProviderToolCall {
  readonly id: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
  readonly argsError?: string;
}

/**
 * Chunks yielded by the provider during streaming.
 * - "text": a piece of the response text
 * - "tool_call": the LLM wants to call a tool
 * - "usage": exact token counts (yielded once, after content)
 */
export type ProviderChunk =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "tool_call"; readonly toolCall: ProviderToolCall }
  | { readonly type: "usage"; readonly usage: ProviderUsage };

export interface Provider {
  readonly name: string;
  readonly model?: string | null;
  chat(messages: Message[], options?: ProviderOptions): AsyncIterable<ProviderChunk>;
}
