// EventBus: typed pub/sub for cross-cutting concerns (metrics, audit, tracing)

import type { Logger, ToolInvocationRequest, ToolResult } from "./types";
import type { DispatchFailureReason } from "./dispatch-loop";

export interface DispatchEvents {
  "dispatch:started": { sessionId: string; query: string };
  "oracle:rejected": { sessionId: string; reason: string; detail: string; corrections: number };
  "tool:calling": { sessionId: string; request: ToolInvocationRequest };
  "tool:result": { sessionId: string; result: ToolResult; durationMs: number };
  "dispatch:answered": { sessionId: string; iterations: number; durationMs: number };
  "dispatch:failed": { sessionId: string; reason: DispatchFailureReason | "OracleUnavailable"; detail: string; iterations: number };
}

type Listener<K extends keyof DispatchEvents> = (data: DispatchEvents[K]) => void | Promise<void>;

type ListenerMap = { [K in keyof DispatchEvents]: Set<Listener<K>> };

export interface EventBus {
  /** Fire-and-forget emit. Listener errors are caught and logged, never block the caller. */
  emit<K extends keyof DispatchEvents>(event: K, data: DispatchEvents[K]): void;
  on<K extends keyof DispatchEvents>(event: K, handler: Listener<K>): void;
  off<K extends keyof DispatchEvents>(event: K, handler: Listener<K>): void;
}

export class SimpleEventBus implements EventBus {
  private readonly listeners: ListenerMap = {
    "dispatch:started": new Set(),
    "oracle:rejected": new Set(),
    "tool:calling": new Set(),
    "tool:result": new Set(),
    "dispatch:answered": new Set(),
    "dispatch:failed": new Set(),
  };
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "EventBus" });
  }

  emit<K extends keyof DispatchEvents>(event: K, data: DispatchEvents[K]): void {
    const listeners: Set<Listener<K>> = this.listeners[event];
    for (const listener of listeners) {
      try {
        const result = listener(data);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error("Async listener error (fire-and-forget)", {
              event,
              error: String(error),
            });
          });
        }
      } catch (error) {
        this.logger.error("Sync listener error", { event, error: String(error) });
      }
    }
  }

  on<K extends keyof DispatchEvents>(event: K, handler: Listener<K>): void {
    const listeners: Set<Listener<K>> = this.listeners[event];
    listeners.add(handler);
  }

  off<K extends keyof DispatchEvents>(event: K, handler: Listener<K>): void {
    const listeners: Set<Listener<K>> = this.listeners[event];
    listeners.delete(handler);
  }
}
