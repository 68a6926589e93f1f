// ConversationSession: transcript + counters for one query/answer exchange

import type { DispatchState, Turn } from "./types/transcript";
import type { ToolInvocationRequest, ToolResult } from "./types/tool";
import { SessionError } from "./types/errors";
import { generateId } from "./abort";

/**
 * Owned and mutated by exactly one DispatchLoop run. The transcript is
 * append-only and every append is checked against the current state:
 *
 *   AWAITING_ORACLE --answer-->       ANSWERED
 *   AWAITING_ORACLE --tool request--> EXECUTING_TOOL
 *   EXECUTING_TOOL  --tool result-->  AWAITING_ORACLE   (ids must match)
 *   any non-terminal --fail-->        FAILED
 */
export class ConversationSession {
  readonly id: string;
  readonly startedAt: number;
  private readonly turns: Turn[] = [];
  private _state: DispatchState = "AWAITING_ORACLE";
  private _iterations = 0;
  private _corrections = 0;
  private pending: ToolInvocationRequest | null = null;

  constructor(query: string, id: string = generateId("sess-")) {
    this.id = id;
    this.startedAt = Date.now();
    this.push({ kind: "user-query", text: query, at: this.startedAt });
  }

  get state(): DispatchState {
    return this._state;
  }

  get terminated(): boolean {
    return this._state === "ANSWERED" || this._state === "FAILED";
  }

  /** Oracle calls plus tool calls performed so far. */
  get iterations(): number {
    return this._iterations;
  }

  get corrections(): number {
    return this._corrections;
  }

  get pendingRequest(): ToolInvocationRequest | null {
    return this.pending;
  }

  /** Snapshot of the turns; later appends do not affect it. */
  get transcript(): readonly Turn[] {
    return Object.freeze(this.turns.slice());
  }

  countIteration(): number {
    this.assertOpen("count an iteration");
    return ++this._iterations;
  }

  countCorrection(): number {
    this.assertOpen("count a correction");
    return ++this._corrections;
  }

  recordAnswer(text: string): void {
    this.expect("AWAITING_ORACLE", "record an answer");
    this.push({ kind: "oracle-text", text, at: Date.now() });
    this._state = "ANSWERED";
  }

  recordToolRequest(request: ToolInvocationRequest): void {
    this.expect("AWAITING_ORACLE", "record a tool request");
    const frozen = Object.freeze({ ...request, args: Object.freeze({ ...request.args }) });
    this.push({ kind: "oracle-tool-request", request: frozen, at: Date.now() });
    this.pending = frozen;
    this._state = "EXECUTING_TOOL";
  }

  recordToolResult(result: ToolResult): void {
    this.expect("EXECUTING_TOOL", "record a tool result");
    if (!this.pending || this.pending.id !== result.invocationId) {
      throw new SessionError(
        `Tool result "${result.invocationId}" does not match pending request "${this.pending?.id ?? "none"}"`,
      );
    }
    this.push({ kind: "tool-result", result, at: Date.now() });
    this.pending = null;
    this._state = "AWAITING_ORACLE";
  }

  fail(): void {
    this.assertOpen("fail");
    this._state = "FAILED";
  }

  private push(turn: Turn): void {
    this.turns.push(Object.freeze(turn));
  }

  private expect(state: DispatchState, action: string): void {
    this.assertOpen(action);
    if (this._state !== state) {
      throw new SessionError(`Cannot ${action} in state ${this._state} (session ${this.id})`);
    }
  }

  private assertOpen(action: string): void {
    if (this.terminated) {
      throw new SessionError(`Cannot ${action}: session ${this.id} is already ${this._state}`);
    }
  }
}
