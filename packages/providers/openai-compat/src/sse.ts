// Tolerant SSE line parser for OpenAI-compatible streaming responses.
//
// Malformed or unexpected lines are skipped, never thrown. Text may arrive in
// delta.content or message.content depending on the server, and reasoning
// in reasoning or reasoning_content. [DONE] ends the stream.

import { wireChunkSchema, type WireChunk } from "./wire";

export type SSEEvent =
  | { type: "text"; text: string }
  | { type: "reasoning"; text: string }
  | { type: "tool_delta"; index: number; id?: string; name?: string; arguments?: string }
  | { type: "usage"; promptTokens: number; completionTokens: number; totalTokens: number }
  | { type: "finish"; reason: string }
  | { type: "done" };

function parseChunk(data: string): WireChunk | null {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return null;
  }
  const parsed = wireChunkSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Process a buffer of raw SSE text into discrete events.
 * Returns the events and the leftover (incomplete) line to prepend next time.
 */
export function processSSEBuffer(
  buffer: string,
  incoming: string,
): { events: SSEEvent[]; remaining: string } {
  const lines = (buffer + incoming).split("\n");
  const remaining = lines.pop() ?? "";
  const events: SSEEvent[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("data:")) continue;

    const data = trimmed.slice(5).trim();
    if (data === "[DONE]") {
      events.push({ type: "done" });
      continue;
    }

    const chunk = parseChunk(data);
    if (!chunk) continue;

    const choice = chunk.choices?.[0];
    if (choice) {
      const part = choice.delta ?? choice.message;

      const reasoning = part?.reasoning_content ?? part?.reasoning;
      if (reasoning) events.push({ type: "reasoning", text: reasoning });

      if (part?.content) events.push({ type: "text", text: part.content });

      for (const tc of part?.tool_calls ?? []) {
        events.push({
          type: "tool_delta",
          index: tc.index,
          id: tc.id,
          name: tc.function?.name,
          arguments: tc.function?.arguments,
        });
      }

      if (choice.finish_reason) {
        events.push({ type: "finish", reason: choice.finish_reason });
      }
    }

    // include_usage puts usage on a final chunk whose choices array is empty
    if (chunk.usage) {
      events.push({
        type: "usage",
        promptTokens: chunk.usage.prompt_tokens,
        completionTokens: chunk.usage.completion_tokens,
        totalTokens: chunk.usage.total_tokens,
      });
    }
  }

  return { events, remaining };
}
