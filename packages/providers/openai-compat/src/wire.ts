// Wire types for the OpenAI-compatible Chat Completions API (snake_case).
// Request shapes are plain interfaces; streamed chunks are parsed with zod so
// a server that sends something unexpected is skipped instead of trusted.

import { z } from "zod";

export interface WireToolDef {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type WireMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

export interface WireRequest {
  model?: string;
  messages: WireMessage[];
  stream: true;
  stream_options: { include_usage: true };
  temperature?: number;
  max_tokens?: number;
  tools?: WireToolDef[];
}

const wireToolCallDelta = z.object({
  index: z.number().int().nonnegative().default(0),
  id: z.string().optional(),
  function: z
    .object({
      name: z.string().optional(),
      arguments: z.string().optional(),
    })
    .optional(),
});

const wireDelta = z.object({
  content: z.string().nullish(),
  reasoning: z.string().nullish(),
  reasoning_content: z.string().nullish(),
  tool_calls: z.array(wireToolCallDelta).nullish(),
});

// Some "compatible" servers emit message instead of delta inside SSE chunks
const wireChoice = z.object({
  delta: wireDelta.optional(),
  message: wireDelta.optional(),
  finish_reason: z.string().nullish(),
});

const wireUsage = z.object({
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative(),
});

export const wireChunkSchema = z.object({
  choices: z.array(wireChoice).optional(),
  usage: wireUsage.nullish(),
});

export type WireDelta = z.infer<typeof wireDelta>;
export type WireChoice = z.infer<typeof wireChoice>;
export type WireUsage = z.infer<typeof wireUsage>;
export type WireChunk = z.infer<typeof wireChunkSchema>;
