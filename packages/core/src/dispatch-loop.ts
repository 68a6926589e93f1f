// DispatchLoop: query → oracle ⇄ tools → grounded answer or a clear failure
//
// Flow: user query → ask oracle → if tool request, validate + invoke →
//   append result → ask oracle again → repeat until a final answer,
//   the iteration budget runs out, or the oracle keeps replying garbage.

import type { Logger, ReasoningOracle, ToolResult, Turn } from "./types";
import {
  CancelledError,
  MalformedOracleResponseError,
  OracleUnavailableError,
  SessionError,
} from "./types/errors";
import type { EventBus } from "./events";
import type { ToolRegistry } from "./tool-registry";
import { ConversationSession } from "./session";

const DEFAULT_MAX_ITERATIONS = 10;
const DEFAULT_MAX_CORRECTIONS = 2;

export type DispatchFailureReason = "LoopBudgetExceeded" | "MalformedOracleResponse" | "Cancelled";

export type DispatchOutcome =
  | {
      readonly status: "answered";
      readonly sessionId: string;
      readonly answer: string;
      readonly transcript: readonly Turn[];
      readonly iterations: number;
    }
  | {
      readonly status: "failed";
      readonly sessionId: string;
      readonly reason: DispatchFailureReason;
      readonly detail: string;
      readonly transcript: readonly Turn[];
      readonly iterations: number;
    };

export interface DispatchLoopDeps {
  readonly oracle: ReasoningOracle;
  readonly registry: ToolRegistry;
  readonly logger: Logger;
  readonly eventBus?: EventBus;
  /** Oracle calls plus tool calls allowed per query. */
  readonly maxIterations?: number;
  /** Re-prompts allowed after malformed oracle replies. */
  readonly maxCorrections?: number;
}

export interface DispatchRunOptions {
  readonly signal?: AbortSignal;
}

/**
 * Drives one ConversationSession per run. Holds no per-query state, so one
 * instance serves concurrent requests.
 *
 * OracleUnavailableError is not an outcome: it propagates to the caller
 * after the session is marked FAILED.
 */
export class DispatchLoop {
  private readonly logger: Logger;
  private readonly maxIterations: number;
  private readonly maxCorrections: number;

  constructor(private readonly deps: DispatchLoopDeps) {
    this.logger = deps.logger.child({ component: "DispatchLoop" });
    this.maxIterations = deps.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.maxCorrections = deps.maxCorrections ?? DEFAULT_MAX_CORRECTIONS;
  }

  async run(query: string, options?: DispatchRunOptions): Promise<DispatchOutcome> {
    const signal = options?.signal;
    const session = new ConversationSession(query);
    const log = this.logger.child({ sessionId: session.id });

    log.info("Dispatch started", { queryLength: query.length });
    this.deps.eventBus?.emit("dispatch:started", { sessionId: session.id, query });

    let correction: MalformedOracleResponseError | undefined;

    try {
      while (!session.terminated) {
        if (signal?.aborted) {
          return this.fail(session, "Cancelled", "Request cancelled");
        }
        if (session.iterations >= this.maxIterations) {
          return this.fail(
            session,
            "LoopBudgetExceeded",
            `Unable to determine an answer within ${this.maxIterations} steps`,
          );
        }
        session.countIteration();

        if (session.state === "EXECUTING_TOOL") {
          await this.execute(session, log, signal);
          continue;
        }

        try {
          const step = await this.deps.oracle.nextStep(session.transcript, this.deps.registry.catalog(), {
            signal,
            correction,
          });
          correction = undefined;

          if (step.kind === "final-answer") {
            session.recordAnswer(step.text);
            const durationMs = Date.now() - session.startedAt;
            log.info("Dispatch answered", { iterations: session.iterations, durationMs });
            this.deps.eventBus?.emit("dispatch:answered", {
              sessionId: session.id,
              iterations: session.iterations,
              durationMs,
            });
            return {
              status: "answered",
              sessionId: session.id,
              answer: step.text,
              transcript: session.transcript,
              iterations: session.iterations,
            };
          }

          session.recordToolRequest(step.request);
        } catch (error) {
          if (!(error instanceof MalformedOracleResponseError)) throw error;

          const corrections = session.countCorrection();
          log.warn("Oracle reply rejected", { reason: error.reason, detail: error.message, corrections });
          this.deps.eventBus?.emit("oracle:rejected", {
            sessionId: session.id,
            reason: error.reason,
            detail: error.message,
            corrections,
          });

          if (corrections > this.maxCorrections) {
            return this.fail(session, "MalformedOracleResponse", error.message);
          }
          correction = error;
        }
      }
    } catch (error) {
      if (error instanceof CancelledError || signal?.aborted) {
        return this.fail(session, "Cancelled", "Request cancelled");
      }
      if (error instanceof OracleUnavailableError && !session.terminated) {
        session.fail();
        log.error("Oracle unavailable", { error: error.message, iterations: session.iterations });
        this.deps.eventBus?.emit("dispatch:failed", {
          sessionId: session.id,
          reason: "OracleUnavailable",
          detail: error.message,
          iterations: session.iterations,
        });
      }
      throw error;
    }

    // Every terminal transition above returns.
    throw new SessionError(`Session ${session.id} ended in state ${session.state} without an outcome`);
  }

  private async execute(session: ConversationSession, log: Logger, signal?: AbortSignal): Promise<void> {
    const request = session.pendingRequest;
    if (!request) {
      throw new SessionError(`No pending tool request in session ${session.id}`);
    }

    log.info("Calling tool", { tool: request.name, invocationId: request.id });
    this.deps.eventBus?.emit("tool:calling", { sessionId: session.id, request });

    const startedAt = Date.now();
    const invoked = await this.deps.registry.invoke(request, { signal });

    let result: ToolResult;
    if (invoked.ok) {
      result = invoked.value;
    } else {
      // The adapter checks names against the catalog, so reaching this is an
      // integration defect. The oracle still gets a chance to fix its arguments.
      log.error("Tool invocation rejected", {
        tool: request.name,
        kind: invoked.error.kind,
        error: invoked.error.message,
      });
      result = Object.freeze({
        invocationId: request.id,
        name: request.name,
        status: "failure" as const,
        error: Object.freeze({ kind: invoked.error.kind, detail: invoked.error.message }),
      });
    }

    session.recordToolResult(result);
    const durationMs = Date.now() - startedAt;

    if (result.status === "success") {
      log.debug("Tool result", { tool: request.name, durationMs, preview: preview(result.payload) });
    } else {
      log.warn("Tool failed", { tool: request.name, kind: result.error.kind, detail: result.error.detail });
    }
    this.deps.eventBus?.emit("tool:result", { sessionId: session.id, result, durationMs });
  }

  private fail(session: ConversationSession, reason: DispatchFailureReason, detail: string): DispatchOutcome {
    if (!session.terminated) session.fail();
    this.logger.warn("Dispatch failed", { sessionId: session.id, reason, detail, iterations: session.iterations });
    this.deps.eventBus?.emit("dispatch:failed", {
      sessionId: session.id,
      reason,
      detail,
      iterations: session.iterations,
    });
    return {
      status: "failed",
      sessionId: session.id,
      reason,
      detail,
      transcript: session.transcript,
      iterations: session.iterations,
    };
  }
}

function preview(payload: unknown): string {
  const text = JSON.stringify(payload ?? null);
  return text.length > 200 ? `${text.slice(0, 200)}…` : text;
}
