// Transcript of one query/answer exchange: append-only, ordered turns

import type { ToolInvocationRequest, ToolResult } from "./tool";

export type Turn =
  | { readonly kind: "user-query"; readonly text: string; readonly at: number }
  | { readonly kind: "oracle-text"; readonly text: string; readonly at: number }
  | { readonly kind: "oracle-tool-request"; readonly request: ToolInvocationRequest; readonly at: number }
  | { readonly kind: "tool-result"; readonly result: ToolResult; readonly at: number };

export type TurnKind = Turn["kind"];

export type DispatchState = "AWAITING_ORACLE" | "EXECUTING_TOOL" | "ANSWERED" | "FAILED";
