// Gateway: composition root that wires all dependencies and manages lifecycle

import { createServer, type Server } from "node:http";
import { z } from "zod";
import {
  type Lifecycle,
  type LifecycleStatus,
  type Logger,
  type Provider,
  type EventBus,
  type ToolRegistry,
  ConsoleLogger,
  DispatchLoop,
  ReasoningOracleAdapter,
  SimpleEventBus,
} from "@inventory-chat/core";
import { loadConfig, redactConfig, type AppConfig } from "@inventory-chat/config";
import { OpenAICompatibleProvider } from "@inventory-chat/provider-openai-compat";
import { ClusterIqClient, INVENTORY_PREAMBLE, type InventoryBackend } from "@inventory-chat/tool-inventory";
import { buildToolRegistry } from "./tool-registrations";
import { ChatService, type ChatErrorKind } from "./chat-service";
import { nodeListener } from "./node-bridge";

export interface GatewayDeps {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly eventBus: EventBus;
  readonly registry: ToolRegistry;
  readonly chat: ChatService;
}

const ChatRequestSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
});

const ERROR_STATUS: Readonly<Record<ChatErrorKind, number>> = {
  LoopBudgetExceeded: 422,
  MalformedOracleResponse: 422,
  OracleUnavailable: 502,
  // Client closed the request (nginx convention)
  Cancelled: 499,
  InternalError: 500,
};

export class Gateway implements Lifecycle {
  private _status: LifecycleStatus = "stopped";
  private server: Server | null = null;

  readonly deps: GatewayDeps;

  constructor(deps: GatewayDeps) {
    this.deps = deps;
  }

  get status(): LifecycleStatus {
    return this._status;
  }

  /** The bound port; differs from config when it asked for port 0. */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  async start(): Promise<void> {
    if (this._status === "running" || this._status === "starting") return;
    this._status = "starting";

    const { config, logger } = this.deps;

    const server = createServer(
      nodeListener(
        (req) => this.handleRequest(req),
        (error) => logger.error("Unhandled request error", { error: error instanceof Error ? error.message : String(error) }),
      ),
    );

    try {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.server.port, () => {
          server.off("error", reject);
          resolve();
        });
      });
    } catch (error) {
      this._status = "stopped";
      throw error;
    }

    this.server = server;
    this._status = "running";

    logger.info("Gateway started", {
      port: this.port,
      model: config.llm.model,
      toolProtocol: config.llm.toolProtocol,
      inventory: config.inventory.apiUrl,
      tools: this.deps.registry.size,
    });
  }

  async stop(): Promise<void> {
    if (this._status === "stopped" || this._status === "stopping") return;
    this._status = "stopping";

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
    }

    this.deps.logger.info("Gateway stopped");
    this._status = "stopped";
  }

  async handleRequest(req: Request): Promise<Response> {
    const url = new URL(req.url);

    // Health endpoint
    if (req.method === "GET" && url.pathname === "/api/health") {
      return Response.json({
        status: "ok",
        uptime: process.uptime(),
        model: this.deps.config.llm.model,
        tools: this.deps.registry.catalog().map((t) => t.name),
      });
    }

    if (req.method === "POST" && url.pathname === "/chat") {
      return this.handleChat(req);
    }

    // 404
    return Response.json({ error: "NotFound", detail: "Not found" }, { status: 404 });
  }

  private async handleChat(req: Request): Promise<Response> {
    let raw: unknown;
    try {
      raw = await req.json();
    } catch {
      return Response.json({ error: "InvalidRequest", detail: "Request body must be JSON" }, { status: 400 });
    }

    const body = ChatRequestSchema.safeParse(raw);
    if (!body.success) {
      const issue = body.error.issues[0];
      const detail = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid request body";
      return Response.json({ error: "InvalidRequest", detail }, { status: 400 });
    }

    const reply = await this.deps.chat.answer(body.data.query, { signal: req.signal });
    if ("answer" in reply) {
      return Response.json({ response: reply.answer });
    }
    return Response.json({ error: reply.error, detail: reply.detail }, { status: ERROR_STATUS[reply.error] });
  }
}

/**
 * Create a fully-wired Gateway from environment config.
 * Throws ConfigError when the environment is invalid.
 */
export function createGateway(overrides?: {
  config?: AppConfig;
  logger?: Logger;
  provider?: Provider;
  backend?: InventoryBackend;
}): Gateway {
  // Load config
  let config: AppConfig;
  if (overrides?.config) {
    config = overrides.config;
  } else {
    const loaded = loadConfig();
    if (!loaded.ok) throw loaded.error;
    config = loaded.value;
  }

  const logger = overrides?.logger ?? new ConsoleLogger(config.server.logLevel);
  logger.debug("Configuration loaded", { config: redactConfig(config) });

  const eventBus = new SimpleEventBus(logger);

  // Inventory backend + tools
  const inventoryTimeoutMs = config.inventory.timeoutSeconds * 1000;
  const backend =
    overrides?.backend ??
    new ClusterIqClient({ baseUrl: config.inventory.apiUrl, timeoutMs: inventoryTimeoutMs, logger });
  const registry = buildToolRegistry(backend, logger, { timeoutMs: inventoryTimeoutMs });

  // Reasoning oracle over an OpenAI-compatible endpoint
  const provider =
    overrides?.provider ??
    new OpenAICompatibleProvider({
      name: "llm",
      model: config.llm.model,
      baseUrl: config.llm.apiUrl,
      apiKey: config.llm.apiKey ?? undefined,
      temperature: config.llm.temperature,
      logger,
    });
  const oracle = new ReasoningOracleAdapter({
    provider,
    logger,
    toolProtocol: config.llm.toolProtocol,
    timeoutMs: config.llm.timeoutSeconds * 1000,
    preamble: INVENTORY_PREAMBLE,
  });

  const loop = new DispatchLoop({
    oracle,
    registry,
    logger,
    eventBus,
    maxIterations: config.dispatch.maxIterations,
    maxCorrections: config.dispatch.maxCorrections,
  });

  return new Gateway({
    config,
    logger,
    eventBus,
    registry,
    chat: new ChatService({ loop, logger }),
  });
}
