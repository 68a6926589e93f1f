// @inventory-chat/core: contract package and dispatch engine
// Re-exports all types, interfaces, and core logic

// Types
export * from "./types";

// Events
export { type DispatchEvents, type EventBus, SimpleEventBus } from "./events";

// Cancellation and timeouts
export { deadline, raceAbort, delay, generateId } from "./abort";

// Providers
export { AbstractProvider } from "./base-provider";

// Tool registry
export {
  type ToolRegistryOptions,
  type ToolInvokeOptions,
  ToolRegistry,
} from "./tool-registry";
export {
  type ArgumentSchema,
  compileArgumentSchema,
  validateArguments,
  toToolDefinition,
  describeParameters,
} from "./tool-schema";

// Prompting and the oracle adapter
export {
  type ToolProtocol,
  DEFAULT_PREAMBLE,
  buildSystemPrompt,
  buildOracleMessages,
  buildCorrection,
  renderCatalog,
  renderToolResult,
} from "./prompt";
export { type OracleAdapterOptions, ReasoningOracleAdapter, parseJsonToolCall } from "./oracle-adapter";

// Session and loop
export { ConversationSession } from "./session";
export {
  type DispatchFailureReason,
  type DispatchOutcome,
  type DispatchLoopDeps,
  type DispatchRunOptions,
  DispatchLoop,
} from "./dispatch-loop";
