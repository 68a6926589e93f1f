// Lifecycle interface for resource-owning components (idempotent)

export type LifecycleStatus = "stopped" | "starting" | "running" | "stopping";

export interface Lifecycle {
  /** Start the component. No-op if already running. */
  start(): Promise<void>;
  /** Stop the component. Safe to call without start(). */
  stop(): Promise<void>;
  readonly status: LifecycleStatus;
}
