// ToolRegistry: catalog of inventory capabilities + validated invocation

import type {
  ToolDescriptor,
  ToolExecutor,
  ToolFailureKind,
  ToolInvocationRequest,
  ToolResult,
} from "./types/tool";
import {
  InventoryBackendError,
  ToolInvocationError,
  ToolRegistryError,
  type Result,
  ok,
  err,
} from "./types/errors";
import { compileArgumentSchema, validateArguments, type ArgumentSchema } from "./tool-schema";
import { deadline, raceAbort } from "./abort";

const DEFAULT_MAX_RESULT_CHARS = 50_000;
const DEFAULT_TIMEOUT_MS = 120_000;

interface RegisteredTool {
  readonly descriptor: ToolDescriptor;
  readonly executor: ToolExecutor;
  readonly schema: ArgumentSchema;
}

export interface ToolRegistryOptions {
  /** Payloads whose JSON form exceeds this are reported as a failure. */
  readonly maxResultChars?: number;
  /** Per-invocation bound on the backend call. */
  readonly timeoutMs?: number;
}

export interface ToolInvokeOptions {
  readonly signal?: AbortSignal;
}

function freezeDescriptor(descriptor: ToolDescriptor): ToolDescriptor {
  const parameters: ToolDescriptor["parameters"] = Object.freeze(
    Object.fromEntries(
      Object.entries(descriptor.parameters).map(([name, spec]) => [
        name,
        Object.freeze({ ...spec, ...(spec.enum && { enum: Object.freeze([...spec.enum]) }) }),
      ]),
    ),
  );
  return Object.freeze({ ...descriptor, parameters });
}

function failure(request: ToolInvocationRequest, kind: ToolFailureKind, detail: string): ToolResult {
  return Object.freeze({
    invocationId: request.id,
    name: request.name,
    status: "failure" as const,
    error: Object.freeze({ kind, detail }),
  });
}

/**
 * Holds no session state and performs no I/O of its own: only the bound
 * executors read from the inventory. Safe for concurrent use.
 */
export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();
  private readonly maxResultChars: number;
  private readonly timeoutMs: number;

  constructor(options?: ToolRegistryOptions) {
    this.maxResultChars = options?.maxResultChars ?? DEFAULT_MAX_RESULT_CHARS;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Register a capability. The descriptor is frozen; names must be unique.
   */
  register(descriptor: ToolDescriptor, executor: ToolExecutor): void {
    if (this.tools.has(descriptor.name)) {
      throw new ToolRegistryError(`Tool "${descriptor.name}" is already registered`, "DuplicateTool");
    }
    const frozen = freezeDescriptor(descriptor);
    this.tools.set(frozen.name, {
      descriptor: frozen,
      executor,
      schema: compileArgumentSchema(frozen),
    });
  }

  /** Registered descriptors in registration order. */
  catalog(): readonly ToolDescriptor[] {
    return Object.freeze(Array.from(this.tools.values(), (t) => t.descriptor));
  }

  /**
   * Validate and execute one request.
   *
   * Rejections that happen before execution (unknown tool, missing or
   * mistyped parameter) come back as `err`. Once the executor runs, every
   * outcome is an `ok` ToolResult: backend failures, timeouts and
   * cancellation are reported with status "failure" and never thrown.
   */
  async invoke(
    request: ToolInvocationRequest,
    options?: ToolInvokeOptions,
  ): Promise<Result<ToolResult, ToolInvocationError>> {
    const entry = this.tools.get(request.name);
    if (!entry) {
      return err(
        new ToolInvocationError(
          `Unknown tool "${request.name}". Available tools: ${Array.from(this.tools.keys()).join(", ")}`,
          "UnknownTool",
          request.name,
        ),
      );
    }

    const validated = validateArguments(entry.descriptor, entry.schema, request.args);
    if (!validated.ok) return validated;

    if (options?.signal?.aborted) {
      return ok(failure(request, "BackendUnavailable", "Invocation cancelled before execution"));
    }

    const { signal, timeout } = deadline(this.timeoutMs, options?.signal);

    try {
      const payload = await raceAbort(entry.executor(validated.value, { signal }), signal);
      const serialized = JSON.stringify(payload ?? null);

      if (serialized.length > this.maxResultChars) {
        return ok(
          failure(
            request,
            "BackendQueryError",
            `Result too large (${serialized.length} chars, limit ${this.maxResultChars}). Narrow the query with filters or a limit.`,
          ),
        );
      }

      return ok(
        Object.freeze({
          invocationId: request.id,
          name: request.name,
          status: "success" as const,
          payload: payload ?? null,
        }),
      );
    } catch (error) {
      if (options?.signal?.aborted) {
        return ok(failure(request, "BackendUnavailable", "Invocation cancelled"));
      }
      if (timeout.aborted) {
        return ok(failure(request, "BackendUnavailable", `Timed out after ${this.timeoutMs}ms`));
      }
      if (error instanceof InventoryBackendError) {
        return ok(failure(request, error.kind, error.message));
      }
      return ok(
        failure(
          request,
          "BackendQueryError",
          `Error executing "${request.name}": ${error instanceof Error ? error.message : String(error)}`,
        ),
      );
    }
  }

  get size(): number {
    return this.tools.size;
  }
}
