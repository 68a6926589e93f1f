import { describe, test, expect } from "vitest";
import { processSSEBuffer } from "../sse";

const data = (payload: unknown) => `data: ${JSON.stringify(payload)}\n\n`;

describe("processSSEBuffer", () => {
  test("parses a standard text chunk", () => {
    const { events, remaining } = processSSEBuffer("", data({ choices: [{ delta: { content: "Hello" } }] }));
    expect(events).toEqual([{ type: "text", text: "Hello" }]);
    expect(remaining).toBe("");
  });

  test("falls back to message.content if delta is absent", () => {
    const { events } = processSSEBuffer("", data({ choices: [{ message: { content: "World" } }] }));
    expect(events).toEqual([{ type: "text", text: "World" }]);
  });

  test("accepts data: without a space", () => {
    const { events } = processSSEBuffer("", `data:${JSON.stringify({ choices: [{ delta: { content: "x" } }] })}\n`);
    expect(events).toEqual([{ type: "text", text: "x" }]);
  });

  test("skips blank lines, comments and non-data lines", () => {
    const { events } = processSSEBuffer("", "\n\n: keep-alive\nevent: ping\ndata: [DONE]\n\n");
    expect(events).toEqual([{ type: "done" }]);
  });

  test("skips malformed JSON and unexpected shapes", () => {
    const input = 'data: {"choices": [\n' + data({ choices: "nope" }) + data({ choices: [{ delta: { content: "ok" } }] });
    const { events } = processSSEBuffer("", input);
    expect(events).toEqual([{ type: "text", text: "ok" }]);
  });

  test("keeps an incomplete trailing line for the next read", () => {
    const line = JSON.stringify({ choices: [{ delta: { content: "split" } }] });
    const first = processSSEBuffer("", `data: ${line.slice(0, 12)}`);
    expect(first.events).toEqual([]);
    expect(first.remaining).toBe(`data: ${line.slice(0, 12)}`);

    const second = processSSEBuffer(first.remaining, `${line.slice(12)}\n`);
    expect(second.events).toEqual([{ type: "text", text: "split" }]);
    expect(second.remaining).toBe("");
  });

  test("reports reasoning separately, preferring reasoning_content", () => {
    const { events } = processSSEBuffer(
      "",
      data({ choices: [{ delta: { reasoning_content: "hmm", reasoning: "other", content: null } }] }) +
        data({ choices: [{ delta: { reasoning: "still thinking" } }] }),
    );
    expect(events).toEqual([
      { type: "reasoning", text: "hmm" },
      { type: "reasoning", text: "still thinking" },
    ]);
  });

  test("emits tool deltas, defaulting the index to 0", () => {
    const { events } = processSSEBuffer(
      "",
      data({
        choices: [
          {
            delta: {
              tool_calls: [
                { id: "call_1", function: { name: "list_clusters", arguments: "" } },
                { index: 1, function: { arguments: '{"a"' } },
              ],
            },
          },
        ],
      }),
    );
    expect(events).toEqual([
      { type: "tool_delta", index: 0, id: "call_1", name: "list_clusters", arguments: "" },
      { type: "tool_delta", index: 1, id: undefined, name: undefined, arguments: '{"a"' },
    ]);
  });

  test("emits finish reasons and trailing usage", () => {
    const { events } = processSSEBuffer(
      "",
      data({ choices: [{ delta: {}, finish_reason: "stop" }] }) +
        data({ choices: [], usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 } }),
    );
    expect(events).toEqual([
      { type: "finish", reason: "stop" },
      { type: "usage", promptTokens: 12, completionTokens: 3, totalTokens: 15 },
    ]);
  });
});
