// Prompt construction: system prompt, transcript → provider messages, corrections

import type { Message, ToolDescriptor, ToolResult, Turn } from "./types";
import type { MalformedOracleResponseError } from "./types/errors";
import { describeParameters } from "./tool-schema";

/**
 * "native": the catalog is sent as function definitions and the model answers
 *           with structured tool calls.
 * "json":   the catalog lives only in the system prompt and the model replies
 *           with a one-line JSON object. Works with servers lacking function calling.
 */
export type ToolProtocol = "native" | "json";

export const DEFAULT_PREAMBLE =
  "You are a helpful assistant specialized in answering questions about a cloud inventory " +
  "(clusters, accounts and instances across cloud providers) using the tools listed below.";

export function renderCatalog(catalog: readonly ToolDescriptor[]): string {
  if (catalog.length === 0) return "No tools are currently available.";
  const lines = ["Available tools:"];
  for (const tool of catalog) {
    lines.push(`- Name: ${tool.name}`);
    lines.push(`  Description: ${tool.description}`);
    lines.push(`  Parameters: ${describeParameters(tool)}`);
    lines.push(`  Returns: ${tool.returns}`);
  }
  return lines.join("\n");
}

export function buildSystemPrompt(
  catalog: readonly ToolDescriptor[],
  protocol: ToolProtocol,
  preamble: string = DEFAULT_PREAMBLE,
): string {
  const toolStep =
    protocol === "json"
      ? `3. To use a tool, reply with a single-line JSON object only, for example:
   {"tool_name": "list_clusters", "arguments": {"provider": "AWS"}}
   Do NOT include any other text in that reply.`
      : "3. To use a tool, call it through the function-calling interface. Call one tool at a time.";

  return `${preamble}

Your responsibilities:
- Understand the user's request.
- Use the available tools to retrieve the data the answer depends on.
- Present a clear and accurate final answer grounded in tool results.

Guidelines:
1. Analyze the user's question.
2. If a tool can provide the required data, go to step 3. If no tool applies and the question needs no inventory data, answer directly. Never invent inventory facts.
${toolStep}
4. Successful tool results arrive as JSON. A result containing "Tool Error (<kind>): <detail>" means the lookup failed. Then retry with corrected arguments or try another tool. If neither helps, say that the information is unavailable.
5. Answer naturally and concisely. Use tables for listings and comparisons, sentences for single facts.

${renderCatalog(catalog)}

Only use the tool-call format when you need a tool. Every other reply, including the final answer, must be natural language.`;
}

export function renderToolResult(result: ToolResult): string {
  if (result.status === "success") return JSON.stringify(result.payload);
  return `Tool Error (${result.error.kind}): ${result.error.detail}`;
}

function renderTurn(turn: Turn, protocol: ToolProtocol): Message {
  switch (turn.kind) {
    case "user-query":
      return { role: "user", content: turn.text };
    case "oracle-text":
      return { role: "assistant", content: turn.text };
    case "oracle-tool-request": {
      const { request } = turn;
      if (protocol === "json") {
        return {
          role: "assistant",
          content: JSON.stringify({ tool_name: request.name, arguments: request.args }),
        };
      }
      return { role: "assistant", content: "", toolCalls: [request] };
    }
    case "tool-result": {
      const { result } = turn;
      if (protocol === "json") {
        return { role: "user", content: `[${result.name} result]:\n${renderToolResult(result)}` };
      }
      return {
        role: "tool",
        content: renderToolResult(result),
        toolCallId: result.invocationId,
        toolName: result.name,
      };
    }
  }
}

export function buildOracleMessages(
  transcript: readonly Turn[],
  catalog: readonly ToolDescriptor[],
  options: { protocol: ToolProtocol; preamble?: string; correction?: string },
): Message[] {
  const messages: Message[] = [
    { role: "system", content: buildSystemPrompt(catalog, options.protocol, options.preamble) },
    ...transcript.map((turn) => renderTurn(turn, options.protocol)),
  ];
  if (options.correction) {
    messages.push({ role: "user", content: options.correction });
  }
  return messages;
}

/** Re-prompt instruction sent after the oracle's reply was rejected. */
export function buildCorrection(
  error: MalformedOracleResponseError,
  catalog: readonly ToolDescriptor[],
  protocol: ToolProtocol,
): string {
  const names = catalog.map((t) => t.name).join(", ") || "(none)";
  const format =
    protocol === "json"
      ? 'a single-line JSON object {"tool_name": "<name>", "arguments": {...}}'
      : "one function call";
  return (
    `Your previous reply could not be used: ${error.message}. ` +
    `Reply either with a final answer in plain language, or with ${format} naming exactly one of these tools: ${names}.`
  );
}
