import { describe, test, expect, beforeEach } from "vitest";
import {
  DispatchLoop,
  InventoryBackendError,
  ReasoningOracleAdapter,
  ToolRegistry,
  silentLogger,
  type ToolResult,
} from "@inventory-chat/core";
import { ScriptedProvider } from "@inventory-chat/core/fixtures";
import { INVENTORY_PREAMBLE, INVENTORY_TOOLS, registerInventoryTools } from "../inventory-tools";
import { InMemoryInventoryBackend } from "../__fixtures__/in-memory-backend";
import { snapshot } from "../__fixtures__/snapshot";

let backend: InMemoryInventoryBackend;
let registry: ToolRegistry;

beforeEach(() => {
  backend = new InMemoryInventoryBackend(snapshot);
  registry = new ToolRegistry();
  registerInventoryTools(registry, backend, silentLogger);
});

let seq = 0;
async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolResult> {
  const result = await registry.invoke({ id: `t-${++seq}`, name, args });
  if (!result.ok) throw result.error;
  return result.value;
}

async function payload(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const result = await call(name, args);
  if (result.status !== "success") throw new Error(`${name} failed: ${result.error.detail}`);
  return result.payload;
}

function ids(value: unknown): string[] {
  if (typeof value !== "object" || value === null || !("clusters" in value) || !Array.isArray(value.clusters)) {
    throw new Error("no clusters in payload");
  }
  return value.clusters.map((c: { id: string }) => c.id);
}

describe("registerInventoryTools", () => {
  test("registers the full catalog in a stable order", () => {
    expect(registry.catalog().map((t) => t.name)).toEqual([
      "get_inventory_overview",
      "list_accounts",
      "count_accounts",
      "list_clusters",
      "list_instances",
      "count_instances",
      "sort_clusters",
    ]);
  });

  test("registering twice is a duplicate", () => {
    expect(() => registerInventoryTools(registry, backend, silentLogger)).toThrow(
      'Tool "get_inventory_overview" is already registered',
    );
  });

  test("the preamble steers top-N questions to sort_clusters", () => {
    expect(INVENTORY_PREAMBLE).toContain("use sort_clusters with a limit");
  });
});

describe("accounts", () => {
  test("count_accounts groups GCP accounts regardless of case", async () => {
    expect(await payload("count_accounts", { provider: "gcp", group_by: "provider" })).toEqual({
      total: 3,
      groups: { GCP: 3 },
    });
  });

  test("count_accounts without grouping returns the total", async () => {
    expect(await payload("count_accounts")).toEqual({ total: 5 });
  });

  test("count_accounts grouped across providers", async () => {
    expect(await payload("count_accounts", { group_by: "provider" })).toEqual({ total: 5, groups: { AWS: 2, GCP: 3 } });
  });

  test("list_accounts filters by provider", async () => {
    const result = await payload("list_accounts", { provider: "AWS" });
    expect(result).toMatchObject({ count: 2, accounts: [{ name: "aws-prod" }, { name: "aws-dev" }] });
  });

  test("list_accounts narrows to a single account by name", async () => {
    expect(await payload("list_accounts", { account_name: "gcp-ml" })).toEqual({
      accounts: [{ id: "acc-5", name: "gcp-ml", provider: "gcp" }],
      count: 1,
    });
    expect(backend.calls).toEqual(["getAccount"]);
  });

  test("an unknown account yields an empty list", async () => {
    expect(await payload("list_accounts", { account_name: "nope" })).toEqual({ accounts: [], count: 0 });
  });
});

describe("clusters", () => {
  test("list_clusters combines filters", async () => {
    expect(ids(await payload("list_clusters", { provider: "aws", status: "running" }))).toEqual(["c-01", "c-06", "c-07"]);
    expect(ids(await payload("list_clusters", { account_name: "gcp-analytics" }))).toEqual(["c-02", "c-08"]);
  });

  test("list_clusters by name", async () => {
    expect(ids(await payload("list_clusters", { cluster_name: "vega" }))).toEqual(["c-03"]);
  });

  test("sort_clusters returns the five oldest clusters in order", async () => {
    const result = await payload("sort_clusters", { field: "creation_date", order: "ascending", limit: 5 });
    expect(ids(result)).toEqual(["c-05", "c-02", "c-04", "c-07", "c-03"]);
    expect(result).toMatchObject({ count: 5, total: 8, field: "creation_date", order: "ascending" });
  });

  test("sort_clusters descending keeps undated clusters last", async () => {
    const result = await payload("sort_clusters", { field: "creation_date", order: "descending", limit: 8 });
    expect(ids(result)).toEqual(["c-06", "c-01", "c-03", "c-07", "c-02", "c-04", "c-05", "c-08"]);
  });

  test("sort_clusters by cost within a provider", async () => {
    const result = await payload("sort_clusters", { field: "total_cost", order: "descending", limit: 2, provider: "GCP" });
    expect(ids(result)).toEqual(["c-04", "c-02"]);
  });

  test("sort_clusters by name", async () => {
    const result = await payload("sort_clusters", { field: "name", order: "ascending", limit: 3 });
    expect(ids(result)).toEqual(["c-06", "c-05", "c-04"]);
  });

  test("sort_clusters rejects an out-of-range limit", async () => {
    expect(await call("sort_clusters", { field: "name", order: "ascending", limit: 0 })).toMatchObject({
      status: "failure",
      error: { kind: "BackendQueryError", detail: "limit must be between 1 and 100" },
    });
  });

  test("sort_clusters rejects an unknown field before execution", async () => {
    const result = await registry.invoke({ id: "x", name: "sort_clusters", args: { field: "age", order: "ascending", limit: 3 } });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("InvalidParameterType");
    expect(backend.calls).toEqual([]);
  });

  test("repeated calls on a fixed snapshot return identical payloads", async () => {
    const args = { field: "instance_count", order: "descending", limit: 8 };
    const first = await payload("sort_clusters", args);
    const second = await payload("sort_clusters", args);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });
});

describe("instances", () => {
  test("list_instances for one cluster", async () => {
    expect(await payload("list_instances", { cluster_name: "orion" })).toMatchObject({
      count: 2,
      instances: [{ id: "i-1" }, { id: "i-2" }],
    });
  });

  test("count_instances groups by cluster, account and provider", async () => {
    expect(await payload("count_instances", { group_by: "cluster" })).toEqual({
      total: 7,
      groups: { draco: 3, lyra: 1, orion: 2, vega: 1 },
    });
    expect(await payload("count_instances", { group_by: "account" })).toEqual({
      total: 7,
      groups: { "aws-dev": 1, "aws-prod": 2, "gcp-analytics": 1, "gcp-ml": 3 },
    });
    expect(await payload("count_instances", { group_by: "provider" })).toEqual({
      total: 7,
      groups: { AWS: 3, GCP: 4 },
    });
  });

  test("count_instances for a missing cluster reports the backend error", async () => {
    expect(await call("count_instances", { cluster_name: "nope" })).toMatchObject({
      status: "failure",
      error: { kind: "BackendQueryError", detail: 'Cluster "nope" not found' },
    });
  });
});

describe("overview", () => {
  test("passes the backend overview through", async () => {
    expect(await payload("get_inventory_overview")).toEqual({
      clusters: { running: 5, stopped: 2, archived: 1 },
      instances: { count: 7 },
      providers: ["AWS", "GCP"],
    });
  });

  test("an unavailable backend becomes a failure result", async () => {
    backend.failure = new InventoryBackendError("ClusterIQ API unreachable at http://inventory.test: fetch failed", "BackendUnavailable");
    expect(await call("get_inventory_overview")).toMatchObject({
      status: "failure",
      error: { kind: "BackendUnavailable" },
    });
  });
});

describe("end to end through the dispatch loop", () => {
  test("how many GCP accounts", async () => {
    const provider = new ScriptedProvider([
      { text: '{"tool_name": "count_accounts", "arguments": {"provider": "GCP", "group_by": "provider"}}' },
      { text: "There are 3 GCP accounts." },
    ]);
    const oracle = new ReasoningOracleAdapter({ provider, logger: silentLogger, preamble: INVENTORY_PREAMBLE });
    const loop = new DispatchLoop({ oracle, registry, logger: silentLogger });

    const outcome = await loop.run("How many GCP accounts do we have?");

    expect(outcome).toMatchObject({ status: "answered", answer: "There are 3 GCP accounts." });
    const result = outcome.transcript.find((t) => t.kind === "tool-result");
    expect(result).toMatchObject({ result: { status: "success", payload: { total: 3, groups: { GCP: 3 } } } });
    expect(provider.lastCall()?.at(-1)?.content).toBe('[count_accounts result]:\n{"total":3,"groups":{"GCP":3}}');
  });

  test("five oldest clusters from a fleet with distinct creation dates", async () => {
    const created = [
      "2023-05-01T00:00:00Z",
      "2021-03-15T00:00:00Z",
      "2022-08-09T00:00:00Z",
      "2020-12-01T00:00:00Z",
      "2019-07-04T00:00:00Z",
      "2024-01-20T00:00:00Z",
      "2021-09-30T00:00:00Z",
      "2022-02-14T00:00:00Z",
    ];
    const fleet = new ToolRegistry();
    registerInventoryTools(
      fleet,
      new InMemoryInventoryBackend({
        ...snapshot,
        clusters: snapshot.clusters.map((c, i) => ({ ...c, creation_timestamp: created[i] })),
      }),
      silentLogger,
    );
    const answer = "The five oldest clusters are cygnus, draco, lyra, hydra and pavo.";
    const provider = new ScriptedProvider([
      { text: '{"tool_name": "sort_clusters", "arguments": {"field": "creation_date", "order": "ascending", "limit": 5}}' },
      { text: answer },
    ]);
    const oracle = new ReasoningOracleAdapter({ provider, logger: silentLogger, preamble: INVENTORY_PREAMBLE });
    const loop = new DispatchLoop({ oracle, registry: fleet, logger: silentLogger });

    const outcome = await loop.run("Which are the 5 oldest clusters?");

    expect(outcome).toMatchObject({ status: "answered", answer });
    const request = outcome.transcript.find((t) => t.kind === "oracle-tool-request");
    expect(request).toMatchObject({
      request: { name: "sort_clusters", args: { field: "creation_date", order: "ascending", limit: 5 } },
    });
    const turn = outcome.transcript.find((t) => t.kind === "tool-result");
    if (turn?.kind !== "tool-result" || turn.result.status !== "success") throw new Error("sort_clusters did not succeed");
    expect(ids(turn.result.payload)).toEqual(["c-05", "c-04", "c-02", "c-07", "c-08"]);
    expect(turn.result.payload).toMatchObject({ count: 5, total: 8 });
  });

  test("catalog descriptors match the exported definitions", () => {
    expect(registry.catalog()).toEqual(Object.values(INVENTORY_TOOLS));
  });
});
