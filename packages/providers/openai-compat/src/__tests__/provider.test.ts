import { describe, test, expect, vi, afterEach } from "vitest";
import { ProviderError, type ProviderChunk } from "@inventory-chat/core";
import { recordingLogger, type LogRecord } from "@inventory-chat/core/fixtures";
import { OpenAICompatibleProvider, normalizeBaseUrl, toWireMessages, type OpenAICompatibleConfig } from "../provider";

function makeProvider(overrides: Partial<OpenAICompatibleConfig> = {}) {
  return new OpenAICompatibleProvider({ name: "test", baseUrl: "http://127.0.0.1:8080", model: null, ...overrides });
}

/** A streaming Response carrying the given SSE lines. */
function sseResponse(lines: string[], status = 200): Response {
  return new Response(lines.join("\n") + "\n", { status, headers: { "content-type": "text/event-stream" } });
}

const sse = (payload: unknown) => `data: ${JSON.stringify(payload)}`;
const text = (content: string) => sse({ choices: [{ delta: { content }, finish_reason: null }] });
const toolDelta = (index: number, fn: { name?: string; arguments?: string }, id?: string) =>
  sse({ choices: [{ delta: { tool_calls: [{ index, id, function: fn }] }, finish_reason: null }] });
const usage = sse({ choices: [], usage: { prompt_tokens: 20, completion_tokens: 4, total_tokens: 24 } });
const done = "data: [DONE]";

function stubFetch(respond: () => Response | Promise<Response>) {
  return vi.spyOn(globalThis, "fetch").mockImplementation(async () => respond());
}

async function collect(stream: AsyncIterable<ProviderChunk>): Promise<ProviderChunk[]> {
  const chunks: ProviderChunk[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return chunks;
}

async function failure(stream: AsyncIterable<ProviderChunk>): Promise<ProviderError> {
  try {
    await collect(stream);
  } catch (error) {
    if (error instanceof ProviderError) return error;
    throw error;
  }
  throw new Error("expected the stream to fail");
}

const user = [{ role: "user" as const, content: "How many clusters?" }];

afterEach(() => {
  vi.restoreAllMocks();
});

describe("normalizeBaseUrl", () => {
  test.each([
    ["http://127.0.0.1:8080", "http://127.0.0.1:8080/v1"],
    ["http://127.0.0.1:8080/v1", "http://127.0.0.1:8080/v1"],
    ["http://127.0.0.1:8080/v1/", "http://127.0.0.1:8080/v1"],
    ["http://127.0.0.1:8080/v1/chat/completions", "http://127.0.0.1:8080/v1"],
    ["http://127.0.0.1:8080///", "http://127.0.0.1:8080/v1"],
  ])("%s → %s", (raw, expected) => {
    expect(normalizeBaseUrl(raw)).toBe(expected);
    expect(makeProvider({ baseUrl: raw }).baseUrl).toBe(expected);
  });
});

describe("buildRequest", () => {
  test("omits optional fields that are not configured", () => {
    expect(makeProvider().buildRequest(user)).toEqual({
      messages: [{ role: "user", content: "How many clusters?" }],
      stream: true,
      stream_options: { include_usage: true },
    });
  });

  test("includes model, sampling and tools when set", () => {
    const provider = makeProvider({ model: "phi:latest", temperature: 0.1, maxTokens: 512 });
    const body = provider.buildRequest(user, {
      tools: [{ name: "list_clusters", description: "List clusters", parameters: { type: "object", properties: {} } }],
    });
    expect(body).toMatchObject({ model: "phi:latest", temperature: 0.1, max_tokens: 512 });
    expect(body.tools).toEqual([
      {
        type: "function",
        function: { name: "list_clusters", description: "List clusters", parameters: { type: "object", properties: {} } },
      },
    ]);
  });

  test("omits tools when the list is empty", () => {
    expect(makeProvider().buildRequest(user, { tools: [] })).not.toHaveProperty("tools");
  });
});

describe("toWireMessages", () => {
  test("converts assistant tool calls and tool results", () => {
    expect(
      toWireMessages([
        { role: "assistant", content: "", toolCalls: [{ id: "call_1", name: "list_clusters", args: { provider: "AWS" } }] },
        { role: "tool", content: '{"count":2}', toolCallId: "call_1", toolName: "list_clusters" },
      ]),
    ).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "call_1", type: "function", function: { name: "list_clusters", arguments: '{"provider":"AWS"}' } },
        ],
      },
      { role: "tool", tool_call_id: "call_1", content: '{"count":2}' },
    ]);
  });
});

describe("OpenAICompatibleProvider.chat", () => {
  test("posts to chat/completions and streams text then usage", async () => {
    const fetchSpy = stubFetch(() => sseResponse([text("There are "), text("3."), usage, done]));

    const chunks = await collect(makeProvider().chat(user));

    expect(chunks).toEqual([
      { type: "text", text: "There are " },
      { type: "text", text: "3." },
      { type: "usage", usage: { inputTokens: 20, outputTokens: 4, totalTokens: 24 } },
    ]);
    expect(fetchSpy.mock.calls[0]?.[0]).toBe("http://127.0.0.1:8080/v1/chat/completions");
  });

  test("sends Authorization only when an API key is set", async () => {
    const fetchSpy = stubFetch(() => sseResponse([done]));

    await collect(makeProvider({ apiKey: "test-key" }).chat(user));
    await collect(makeProvider().chat(user));

    expect(fetchSpy.mock.calls[0]?.[1]?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
    expect(fetchSpy.mock.calls[1]?.[1]?.headers).toEqual({ "Content-Type": "application/json" });
  });

  test("strips <think> blocks split across chunks", async () => {
    stubFetch(() => sseResponse([text("<thi"), text("nk>let me see</th"), text("ink>Two clusters."), done]));
    const chunks = await collect(makeProvider().chat(user));
    expect(chunks.flatMap((c) => (c.type === "text" ? [c.text] : [])).join("")).toBe("Two clusters.");
  });

  test("keeps <think> text when stripping is disabled", async () => {
    stubFetch(() => sseResponse([text("<think>x</think>y"), done]));
    const chunks = await collect(makeProvider({ stripThinkTags: false }).chat(user));
    expect(chunks).toEqual([{ type: "text", text: "<think>x</think>y" }]);
  });

  test("discards reasoning chunks", async () => {
    const records: LogRecord[] = [];
    stubFetch(() => sseResponse([sse({ choices: [{ delta: { reasoning_content: "hmm" } }] }), text("ok"), done]));

    const chunks = await collect(makeProvider({ logger: recordingLogger(records) }).chat(user));

    expect(chunks).toEqual([{ type: "text", text: "ok" }]);
    expect(records).toContainEqual({
      level: "debug",
      message: "Discarding reasoning chunk",
      data: { component: "OpenAICompatibleProvider", provider: "test", length: 3 },
    });
  });

  test("accumulates streamed tool call arguments", async () => {
    stubFetch(() =>
      sseResponse([
        toolDelta(0, { name: "list_clusters", arguments: '{"prov' }, "call_1"),
        toolDelta(0, { arguments: 'ider": "AWS"}' }),
        sse({ choices: [{ delta: {}, finish_reason: "tool_calls" }] }),
        done,
      ]),
    );
    const chunks = await collect(makeProvider().chat(user));
    expect(chunks).toEqual([
      { type: "tool_call", toolCall: { id: "call_1", name: "list_clusters", args: { provider: "AWS" } } },
    ]);
  });

  test("flags tool arguments that are not a JSON object", async () => {
    stubFetch(() =>
      sseResponse([toolDelta(0, { name: "list_clusters", arguments: "[1, 2]" }), toolDelta(1, { name: "ping" }), done]),
    );
    const chunks = await collect(makeProvider().chat(user));

    const calls = chunks.flatMap((c) => (c.type === "tool_call" ? [c.toolCall] : []));
    expect(calls).toHaveLength(2);
    expect(calls[0]).toMatchObject({ name: "list_clusters", args: {}, argsError: "arguments are not a JSON object" });
    expect(calls[0]?.id).toMatch(/^call-/);
    expect(calls[1]).toMatchObject({ name: "ping", args: {} });
    expect(calls[1]?.argsError).toBeUndefined();
  });

  test("classifies HTTP errors", async () => {
    stubFetch(() => new Response("bad key", { status: 401 }));
    const error = await failure(makeProvider().chat(user));
    expect(error.providerCode).toBe("auth_failed");
    expect(error.message).toBe("test error: HTTP 401: bad key");
  });

  test("treats an internal server error as transient", async () => {
    stubFetch(() => new Response("model is loading", { status: 500 }));
    const error = await failure(makeProvider().chat(user));
    expect(error.providerCode).toBe("transient_network");
    expect(error.message).toBe("test error: HTTP 500: model is loading (is test reachable at http://127.0.0.1:8080/v1?)");
  });

  test("adds a reachability hint to transport failures", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });
    const error = await failure(makeProvider().chat(user));
    expect(error.providerCode).toBe("transient_network");
    expect(error.message).toBe("test error: fetch failed (is test reachable at http://127.0.0.1:8080/v1?)");
  });

  test("ends quietly when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    stubFetch(() => {
      throw Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
    });
    expect(await collect(makeProvider().chat(user, { signal: controller.signal }))).toEqual([]);
  });
});
