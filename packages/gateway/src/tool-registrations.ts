// Tool registrations: binds the inventory tool set to a fresh ToolRegistry

import type { Logger } from "@inventory-chat/core";
import { ToolRegistry } from "@inventory-chat/core";
import { registerInventoryTools, type InventoryBackend } from "@inventory-chat/tool-inventory";

export interface ToolRegistryOptions {
  /** Per-invocation bound on a backend call. */
  readonly timeoutMs?: number;
  readonly maxResultChars?: number;
}

/**
 * Build a ToolRegistry pre-loaded with the inventory tools.
 * Pure function: only depends on the injected backend and options.
 */
export function buildToolRegistry(
  backend: InventoryBackend,
  logger: Logger,
  options?: ToolRegistryOptions,
): ToolRegistry {
  const registry = new ToolRegistry({ timeoutMs: options?.timeoutMs, maxResultChars: options?.maxResultChars });
  registerInventoryTools(registry, backend, logger);

  logger.child({ component: "ToolRegistry" }).debug("Tools registered", {
    tools: registry.catalog().map((t) => t.name),
  });
  return registry;
}
