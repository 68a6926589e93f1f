// ChatService: the inbound contract. One query in, an answer or a stable error out.

import { OracleUnavailableError, type DispatchLoop, type Logger } from "@inventory-chat/core";

export type ChatErrorKind =
  | "LoopBudgetExceeded"
  | "MalformedOracleResponse"
  | "OracleUnavailable"
  | "Cancelled"
  | "InternalError";

export type ChatReply =
  | { readonly answer: string }
  | { readonly error: ChatErrorKind; readonly detail: string };

// User-facing text. Internal detail stays in the logs.
export const CHAT_ERROR_DETAIL: Readonly<Record<ChatErrorKind, string>> = {
  LoopBudgetExceeded: "Unable to determine an answer to this question. Try asking something more specific.",
  MalformedOracleResponse: "The assistant could not produce a usable response. Please try again.",
  OracleUnavailable: "The language model service is currently unavailable. Please try again later.",
  Cancelled: "The request was cancelled.",
  InternalError: "An unexpected error occurred while answering the question.",
};

export interface ChatServiceDeps {
  readonly loop: DispatchLoop;
  readonly logger: Logger;
}

export class ChatService {
  private readonly loop: DispatchLoop;
  private readonly logger: Logger;

  constructor(deps: ChatServiceDeps) {
    this.loop = deps.loop;
    this.logger = deps.logger.child({ component: "ChatService" });
  }

  async answer(query: string, options?: { signal?: AbortSignal }): Promise<ChatReply> {
    try {
      const outcome = await this.loop.run(query, { signal: options?.signal });
      if (outcome.status === "answered") return { answer: outcome.answer };
      return failure(outcome.reason);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof OracleUnavailableError) {
        this.logger.error("Chat failed: oracle unavailable", { error: message });
        return failure("OracleUnavailable");
      }
      this.logger.error("Chat failed unexpectedly", {
        error: message,
        stack: error instanceof Error ? error.stack : undefined,
      });
      return failure("InternalError");
    }
  }
}

function failure(kind: ChatErrorKind): ChatReply {
  return { error: kind, detail: CHAT_ERROR_DETAIL[kind] };
}
