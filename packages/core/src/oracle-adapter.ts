// ReasoningOracleAdapter: one provider round-trip → a validated OracleStep
//
// The provider's output is free-form; the adapter narrows it to exactly one
// of two variants (final answer | tool request) or rejects it as malformed.

import type {
  Logger,
  Message,
  OracleStep,
  OracleStepOptions,
  Provider,
  ProviderErrorCode,
  ProviderToolCall,
  ReasoningOracle,
  ToolDefinition,
  ToolDescriptor,
  Turn,
} from "./types";
import {
  CancelledError,
  MalformedOracleResponseError,
  OracleUnavailableError,
  ProviderError,
} from "./types/errors";
import { buildCorrection, buildOracleMessages, type ToolProtocol } from "./prompt";
import { toToolDefinition } from "./tool-schema";
import { deadline, delay, generateId, raceAbort } from "./abort";

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;

const RETRYABLE: ReadonlySet<ProviderErrorCode> = new Set(["transient_network", "throttled"]);

export interface OracleAdapterOptions {
  readonly provider: Provider;
  readonly logger: Logger;
  readonly toolProtocol?: ToolProtocol;
  /** Bound on a single provider round-trip. */
  readonly timeoutMs?: number;
  /** Attempts per step for retryable provider failures. */
  readonly maxAttempts?: number;
  readonly retryBaseDelayMs?: number;
  /** Replaces the default first paragraph of the system prompt. */
  readonly preamble?: string;
}

interface RawReply {
  readonly text: string;
  readonly toolCalls: ProviderToolCall[];
}

type JsonToolCall =
  | { readonly kind: "none" }
  | { readonly kind: "call"; readonly name: string; readonly args: Record<string, unknown> }
  | { readonly kind: "invalid"; readonly error: MalformedOracleResponseError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripCodeFence(text: string): string {
  const fenced = text.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced ? fenced[1] : text;
}

function parseObject(text: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Find a `{"tool_name": ...}` object embedded in surrounding prose, such as
 * "Let me check.\n{...}". Tries the braces nearest the key first.
 */
function findEmbeddedCall(text: string): Record<string, unknown> | undefined {
  const key = text.indexOf('"tool_name"');
  if (key === -1) return undefined;

  for (let open = text.lastIndexOf("{", key); open !== -1; open = open > 0 ? text.lastIndexOf("{", open - 1) : -1) {
    for (let close = text.lastIndexOf("}"); close > key; close = text.lastIndexOf("}", close - 1)) {
      const parsed = parseObject(text.slice(open, close + 1));
      if (parsed && "tool_name" in parsed) return parsed;
    }
  }
  return undefined;
}

/**
 * Detect the single-line `{"tool_name": ..., "arguments": {...}}` protocol.
 * JSON without a `tool_name` key is an ordinary answer. A call wrapped in
 * lead-in or trailing prose is still a call; a `tool_name` that cannot be
 * parsed out at all is rejected as unparsable.
 */
export function parseJsonToolCall(text: string): JsonToolCall {
  const candidate = stripCodeFence(text.trim());
  const whole = candidate.startsWith("{") ? parseObject(candidate) : undefined;
  if (whole && !("tool_name" in whole)) return { kind: "none" };

  const parsed = whole ?? findEmbeddedCall(candidate);
  if (!parsed) {
    if (candidate.includes('"tool_name"')) {
      return {
        kind: "invalid",
        error: new MalformedOracleResponseError("Tool call JSON is truncated or unparsable", "unparsable"),
      };
    }
    return { kind: "none" };
  }

  const name = parsed.tool_name;
  if (typeof name !== "string" || name.length === 0) {
    return {
      kind: "invalid",
      error: new MalformedOracleResponseError('"tool_name" must be a non-empty string', "invalid_arguments"),
    };
  }
  const args = parsed.arguments ?? {};
  if (!isRecord(args)) {
    return {
      kind: "invalid",
      error: new MalformedOracleResponseError(
        `"arguments" for tool "${name}" must be a JSON object`,
        "invalid_arguments",
      ),
    };
  }
  return { kind: "call", name, args };
}

export class ReasoningOracleAdapter implements ReasoningOracle {
  private readonly provider: Provider;
  private readonly logger: Logger;
  private readonly protocol: ToolProtocol;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly preamble?: string;

  constructor(options: OracleAdapterOptions) {
    this.provider = options.provider;
    this.logger = options.logger.child({ component: "OracleAdapter", provider: options.provider.name });
    this.protocol = options.toolProtocol ?? "json";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.preamble = options.preamble;
  }

  async nextStep(
    transcript: readonly Turn[],
    catalog: readonly ToolDescriptor[],
    options?: OracleStepOptions,
  ): Promise<OracleStep> {
    const messages = buildOracleMessages(transcript, catalog, {
      protocol: this.protocol,
      preamble: this.preamble,
      correction: options?.correction
        ? buildCorrection(options.correction, catalog, this.protocol)
        : undefined,
    });
    const tools = this.protocol === "native" && catalog.length > 0 ? catalog.map(toToolDefinition) : undefined;

    const reply = await this.request(messages, tools, options?.signal);
    return this.interpret(reply, catalog);
  }

  /** Provider round-trip with timeout, cancellation and bounded retry of transient failures. */
  private async request(
    messages: Message[],
    tools: ToolDefinition[] | undefined,
    callerSignal?: AbortSignal,
  ): Promise<RawReply> {
    for (let attempt = 1; ; attempt++) {
      if (callerSignal?.aborted) throw new CancelledError("Oracle call cancelled");

      const { signal, timeout } = deadline(this.timeoutMs, callerSignal);
      try {
        const reply = await raceAbort(this.collect(messages, tools, signal), signal);
        // Providers end the stream quietly when their signal fires.
        if (callerSignal?.aborted) throw new CancelledError("Oracle call cancelled");
        if (timeout.aborted) throw this.timedOut();
        return reply;
      } catch (error) {
        if (error instanceof CancelledError || error instanceof MalformedOracleResponseError) throw error;
        if (callerSignal?.aborted) throw new CancelledError("Oracle call cancelled");
        if (timeout.aborted) throw this.timedOut();

        const code: ProviderErrorCode = error instanceof ProviderError ? error.providerCode : "unknown";
        const message = error instanceof Error ? error.message : String(error);

        if (RETRYABLE.has(code) && attempt < this.maxAttempts) {
          const backoff = this.retryBaseDelayMs * 2 ** (attempt - 1);
          this.logger.warn("Oracle call failed, retrying", { attempt, code, backoffMs: backoff, error: message });
          await delay(backoff, callerSignal);
          continue;
        }

        this.logger.error("Oracle unavailable", { attempt, code, error: message });
        throw new OracleUnavailableError(
          `Oracle request failed after ${attempt} attempt(s): ${message}`,
          error,
        );
      }
    }
  }

  private async collect(
    messages: Message[],
    tools: ToolDefinition[] | undefined,
    signal: AbortSignal,
  ): Promise<RawReply> {
    let text = "";
    const toolCalls: ProviderToolCall[] = [];

    for await (const chunk of this.provider.chat(messages, { signal, tools })) {
      if (chunk.type === "text") {
        text += chunk.text;
      } else if (chunk.type === "tool_call") {
        toolCalls.push(chunk.toolCall);
      } else {
        this.logger.debug("Oracle usage", { ...chunk.usage });
      }
    }

    return { text, toolCalls };
  }

  private interpret(reply: RawReply, catalog: readonly ToolDescriptor[]): OracleStep {
    const known = new Set(catalog.map((t) => t.name));

    if (reply.toolCalls.length > 0) {
      const [call, ...rest] = reply.toolCalls;
      if (rest.length > 0) {
        this.logger.warn("Oracle requested several tools at once; only the first is executed", {
          executed: call.name,
          dropped: rest.map((c) => c.name),
        });
      }
      if (call.argsError !== undefined) {
        throw new MalformedOracleResponseError(
          `Arguments for tool "${call.name}" are not a valid JSON object (${call.argsError})`,
          "unparsable",
        );
      }
      if (!known.has(call.name)) {
        throw new MalformedOracleResponseError(`Tool "${call.name}" is not in the catalog`, "unknown_tool");
      }
      return { kind: "tool-request", request: { id: call.id, name: call.name, args: call.args } };
    }

    const text = reply.text.trim();
    if (text.length === 0) {
      throw new MalformedOracleResponseError("Oracle returned an empty response", "empty");
    }

    const json = parseJsonToolCall(text);
    if (json.kind === "invalid") throw json.error;
    if (json.kind === "call") {
      if (!known.has(json.name)) {
        throw new MalformedOracleResponseError(`Tool "${json.name}" is not in the catalog`, "unknown_tool");
      }
      return {
        kind: "tool-request",
        request: { id: generateId("call-"), name: json.name, args: json.args },
      };
    }

    return { kind: "final-answer", text };
  }

  private timedOut(): MalformedOracleResponseError {
    this.logger.warn("Oracle call timed out", { timeoutMs: this.timeoutMs });
    return new MalformedOracleResponseError(`Oracle did not respond within ${this.timeoutMs}ms`, "timeout");
  }
}
