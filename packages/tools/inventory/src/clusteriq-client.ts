// ClusterIqClient: InventoryBackend over the ClusterIQ REST API (read-only GETs)

import { InventoryBackendError, silentLogger, type Logger } from "@inventory-chat/core";
import type { z } from "zod";
import {
  AccountsEnvelope,
  ClustersEnvelope,
  InstancesEnvelope,
  OverviewSchema,
  type Account,
  type BackendCallOptions,
  type Cluster,
  type Instance,
  type InventoryBackend,
  type Overview,
} from "./types";

const DEFAULT_TIMEOUT_MS = 120_000;

export interface ClusterIqClientOptions {
  /** e.g. http://localhost:8080/api/v1. Paths are appended verbatim. */
  readonly baseUrl: string;
  readonly timeoutMs?: number;
  readonly logger?: Logger;
  /** Injected for tests; defaults to the global fetch. */
  readonly fetch?: typeof globalThis.fetch;
}

export class ClusterIqClient implements InventoryBackend {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof globalThis.fetch;

  constructor(options: ClusterIqClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = (options.logger ?? silentLogger).child({ component: "ClusterIqClient" });
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async overview(options?: BackendCallOptions): Promise<Overview> {
    return this.get("/overview", OverviewSchema, options);
  }

  async listAccounts(options?: BackendCallOptions): Promise<Account[]> {
    const body = await this.get("/accounts", AccountsEnvelope, options);
    return body.accounts ?? [];
  }

  async getAccount(name: string, options?: BackendCallOptions): Promise<Account | null> {
    const body = await this.get(`/accounts/${encodeURIComponent(name)}`, AccountsEnvelope, options);
    return body.accounts?.[0] ?? null;
  }

  async listClusters(options?: BackendCallOptions): Promise<Cluster[]> {
    const body = await this.get("/clusters", ClustersEnvelope, options);
    return body.clusters ?? [];
  }

  async getCluster(name: string, options?: BackendCallOptions): Promise<Cluster | null> {
    const body = await this.get(`/clusters/${encodeURIComponent(name)}`, ClustersEnvelope, options);
    return body.clusters?.[0] ?? null;
  }

  async listInstances(options?: BackendCallOptions): Promise<Instance[]> {
    const body = await this.get("/instances", InstancesEnvelope, options);
    return body.instances ?? [];
  }

  async listClusterInstances(cluster: string, options?: BackendCallOptions): Promise<Instance[]> {
    const body = await this.get(`/clusters/${encodeURIComponent(cluster)}/instances`, InstancesEnvelope, options);
    return body.instances ?? [];
  }

  private async get<S extends z.ZodTypeAny>(path: string, schema: S, options?: BackendCallOptions): Promise<z.output<S>> {
    const url = `${this.baseUrl}${path}`;
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options?.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    this.logger.debug("Calling ClusterIQ API", { method: "GET", path });

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { Accept: "application/json" }, signal });
    } catch (error) {
      if (timeout.aborted) {
        throw this.fail(`ClusterIQ request timed out after ${this.timeoutMs}ms (GET ${path})`, "BackendUnavailable", error);
      }
      if (options?.signal?.aborted) {
        throw this.fail(`ClusterIQ request cancelled (GET ${path})`, "BackendUnavailable", error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw this.fail(`ClusterIQ API unreachable at ${this.baseUrl}: ${reason}`, "BackendUnavailable", error);
    }

    if (!response.ok) {
      const kind = response.status >= 500 ? "BackendUnavailable" : "BackendQueryError";
      throw this.fail(`ClusterIQ API returned HTTP ${response.status} for GET ${path}`, kind);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw this.fail(`ClusterIQ API returned invalid JSON for GET ${path}`, "BackendQueryError", error);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? issue.path.join(".") : "(root)";
      throw this.fail(
        `Unexpected response shape for GET ${path}: ${where}: ${issue?.message ?? "invalid"}`,
        "BackendQueryError",
        parsed.error,
      );
    }
    return parsed.data;
  }

  private fail(
    message: string,
    kind: InventoryBackendError["kind"],
    cause?: unknown,
  ): InventoryBackendError {
    this.logger.warn("ClusterIQ call failed", { kind, error: message });
    return new InventoryBackendError(message, kind, cause);
  }
}
