// Provider-facing chat messages, rendered from a transcript for each oracle call

import type { ToolInvocationRequest } from "./tool";

export interface Message {
  readonly role: "user" | "assistant" | "system" | "tool";
  readonly content: string;
  /** Tool calls requested by the assistant (present when role === "assistant") */
  readonly toolCalls?: readonly ToolInvocationRequest[];
  /** Links a tool result message back to its call (present when role === "tool") */
  readonly toolCallId?: string;
  /** The tool name (present when role === "tool") */
  readonly toolName?: string;
}
