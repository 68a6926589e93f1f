// OpenAICompatibleProvider: streaming Chat Completions client for any
// OpenAI-style server (Ollama, vLLM, llama.cpp, LM Studio, hosted APIs).
//
// Handles:
//   • Base URL normalization (with or without /v1, full endpoint URLs)
//   • Message and tool definition conversion to the wire format
//   • SSE streaming with tolerant chunk parsing
//   • ThinkStripper for local models that emit <think>…</think> blocks
//   • Tool call accumulation across streaming chunks
//   • Unified error classification

import type {
  Logger,
  Message,
  ProviderOptions,
  ProviderChunk,
  ProviderToolCall,
  ToolDefinition,
} from "@inventory-chat/core";
import { AbstractProvider, ProviderError, generateId } from "@inventory-chat/core";
import type { WireMessage, WireRequest, WireToolCall, WireToolDef } from "./wire";
import { processSSEBuffer } from "./sse";
import { ThinkStripper } from "./think-stripper";
import { HttpStatusError, buildErrorHint, classifyError } from "./errors";

// ── Config ───────────────────────────────────────────────────────────────────

export interface OpenAICompatibleConfig {
  /** Provider name used in logs and error messages. */
  readonly name: string;
  /** Model identifier. Pass null/undefined to omit it from the request body. */
  readonly model?: string | null;
  /**
   * Base URL for the API. Accepts any of:
   *   http://localhost:11434
   *   http://localhost:11434/v1
   *   http://localhost:11434/v1/chat/completions   (trailing endpoint stripped)
   * All are normalized to http://localhost:11434/v1 internally.
   */
  readonly baseUrl: string;
  /** API key. If empty/undefined, the Authorization header is omitted. */
  readonly apiKey?: string;
  /** Sampling temperature. Omitted from the request when undefined. */
  readonly temperature?: number;
  readonly maxTokens?: number;
  /** Strip <think>…</think> blocks from model output. Default: true. */
  readonly stripThinkTags?: boolean;
  readonly logger?: Logger;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

export function normalizeBaseUrl(raw: string): string {
  let url = raw.replace(/\/+$/, "");
  url = url.replace(/\/chat\/completions$/, "");
  if (!url.endsWith("/v1")) url += "/v1";
  return url;
}

export function toWireMessages(messages: Message[]): WireMessage[] {
  return messages.map((msg): WireMessage => {
    switch (msg.role) {
      case "system":
        return { role: "system", content: msg.content };
      case "user":
        return { role: "user", content: msg.content };
      case "tool":
        return { role: "tool", tool_call_id: msg.toolCallId ?? "", content: msg.content };
      case "assistant": {
        if (!msg.toolCalls?.length) return { role: "assistant", content: msg.content };
        const toolCalls = msg.toolCalls.map(
          (tc): WireToolCall => ({
            id: tc.id,
            type: "function",
            function: { name: tc.name, arguments: JSON.stringify(tc.args) },
          }),
        );
        return { role: "assistant", content: msg.content || null, tool_calls: toolCalls };
      }
    }
  });
}

function toWireTools(tools: ToolDefinition[]): WireToolDef[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }));
}

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Turn an accumulated call into a ProviderToolCall, flagging arguments that are not a JSON object. */
function finishToolCall(tc: PartialToolCall): ProviderToolCall {
  const raw = tc.arguments.trim() || "{}";
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      id: tc.id,
      name: tc.name,
      args: {},
      argsError: error instanceof Error ? error.message : String(error),
    };
  }
  if (!isRecord(parsed)) {
    return { id: tc.id, name: tc.name, args: {}, argsError: "arguments are not a JSON object" };
  }
  return { id: tc.id, name: tc.name, args: parsed };
}

// ── Provider ─────────────────────────────────────────────────────────────────

export class OpenAICompatibleProvider extends AbstractProvider {
  readonly name: string;
  readonly model: string | null;
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;
  private readonly stripThinkTags: boolean;

  constructor(config: OpenAICompatibleConfig) {
    super(config.logger?.child({ component: "OpenAICompatibleProvider", provider: config.name }));
    this.name = config.name;
    this.model = config.model ?? null;
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.apiKey = config.apiKey ?? "";
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.stripThinkTags = config.stripThinkTags ?? true;
  }

  /** The JSON body sent to /chat/completions. */
  buildRequest(messages: Message[], options?: ProviderOptions): WireRequest {
    const body: WireRequest = {
      messages: toWireMessages(messages),
      stream: true,
      stream_options: { include_usage: true },
    };
    if (this.model != null) body.model = this.model;
    if (this.temperature !== undefined) body.temperature = this.temperature;
    if (this.maxTokens !== undefined) body.max_tokens = this.maxTokens;

    const tools = options?.tools;
    if (tools && tools.length > 0) body.tools = toWireTools(tools);
    return body;
  }

  protected async *_chat(messages: Message[], options?: ProviderOptions): AsyncIterable<ProviderChunk> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const thinkStripper = this.stripThinkTags ? new ThinkStripper() : null;
    const toolCalls = new Map<number, PartialToolCall>();

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify(this.buildRequest(messages, options)),
        signal: options?.signal,
      });

      if (!response.ok) {
        throw new HttpStatusError(response.status, await response.text());
      }
      if (!response.body) {
        throw new Error(`No response body received from ${this.name}`);
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = "";
      let done = false;

      while (!done) {
        if (options?.signal?.aborted) return;

        const read = await reader.read();
        if (read.done) break;

        const { events, remaining } = processSSEBuffer(buffer, decoder.decode(read.value, { stream: true }));
        buffer = remaining;

        for (const event of events) {
          switch (event.type) {
            case "text": {
              const visible = thinkStripper ? thinkStripper.feed(event.text) : event.text;
              if (visible) yield { type: "text", text: visible };
              break;
            }
            case "reasoning":
              // Reasoning channels are never part of the answer
              this.logger.debug("Discarding reasoning chunk", { length: event.text.length });
              break;
            case "tool_delta": {
              const existing = toolCalls.get(event.index);
              if (existing) {
                if (event.name && !existing.name) existing.name = event.name;
                existing.arguments += event.arguments ?? "";
              } else {
                toolCalls.set(event.index, {
                  id: event.id ?? generateId("call-"),
                  name: event.name ?? "",
                  arguments: event.arguments ?? "",
                });
              }
              break;
            }
            case "usage":
              yield {
                type: "usage",
                usage: {
                  inputTokens: event.promptTokens,
                  outputTokens: event.completionTokens,
                  totalTokens: event.totalTokens,
                },
              };
              break;
            case "finish":
              break;
            case "done":
              done = true;
              break;
          }
        }
      }

      if (thinkStripper) {
        const rest = thinkStripper.flush();
        if (rest) yield { type: "text", text: rest };
      }

      for (const tc of toolCalls.values()) {
        yield { type: "tool_call", toolCall: finishToolCall(tc) };
      }
    } catch (error) {
      if (options?.signal?.aborted) return;

      const code = classifyError(error);
      const hint = buildErrorHint(code, this.name, this.baseUrl);
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`${this.name} error: ${message}${hint}`, code, error);
    }
  }
}
