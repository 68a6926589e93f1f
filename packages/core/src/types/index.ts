// Barrel export: the public type surface of @inventory-chat/core types

export type { Message } from "./message";

export type {
  Provider,
  ProviderOptions,
  ProviderErrorCode,
  ProviderChunk,
  ProviderToolCall,
  ProviderUsage,
} from "./provider";

export type {
  ParameterType,
  ParameterSpec,
  ToolDescriptor,
  ToolDefinition,
  ToolInvocationRequest,
  ToolFailureKind,
  ToolResult,
  ToolExecutionContext,
  ToolExecutor,
} from "./tool";

export type { Turn, TurnKind, DispatchState } from "./transcript";

export type { OracleStep, OracleStepOptions, ReasoningOracle } from "./oracle";

export type { Lifecycle, LifecycleStatus } from "./lifecycle";

export type { Logger, LogLevel, LogSink } from "./logger";
export { ConsoleLogger, silentLogger } from "./logger";

export {
  InventoryChatError,
  ProviderError,
  ConfigError,
  SessionError,
  ToolRegistryError,
  ToolInvocationError,
  InventoryBackendError,
  MalformedOracleResponseError,
  OracleUnavailableError,
  CancelledError,
  ok,
  err,
} from "./errors";
export type {
  Result,
  ToolInvocationErrorKind,
  BackendErrorKind,
  MalformedReason,
} from "./errors";
