import { describe, test, expect, vi, type Mock } from "vitest";
import { InventoryBackendError } from "@inventory-chat/core";
import { recordingLogger, type LogRecord } from "@inventory-chat/core/fixtures";
import { ClusterIqClient } from "../clusteriq-client";

const BASE = "http://inventory.test/api/v1";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function client(fetchImpl: typeof fetch, timeoutMs?: number, records?: LogRecord[]) {
  return new ClusterIqClient({ baseUrl: `${BASE}/`, fetch: fetchImpl, timeoutMs, logger: recordingLogger(records) });
}

function requestedUrl(mock: Mock<typeof fetch>, call = 0): string {
  const input = mock.mock.calls[call]?.[0];
  if (input instanceof Request) return input.url;
  return String(input);
}

async function rejection(promise: Promise<unknown>): Promise<InventoryBackendError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof InventoryBackendError) return error;
    throw error;
  }
  throw new Error("expected the call to fail");
}

/** Never settles until the request signal fires, then rejects like fetch does. */
const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) return reject(signal.reason);
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

describe("ClusterIqClient paths", () => {
  test("lists clusters from the envelope", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      json({ clusters: [{ id: "c-1", name: "orion", provider: "AWS", region: "eu-west-1", owner: "ops" }] }),
    );
    const clusters = await client(fetchMock).listClusters();

    expect(requestedUrl(fetchMock)).toBe(`${BASE}/clusters`);
    expect(clusters).toEqual([
      { id: "c-1", name: "orion", provider: "AWS", region: "eu-west-1", owner: "ops", instance_count: 0 },
    ]);
  });

  test("a null envelope means an empty list", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => json({ instances: null }));
    expect(await client(fetchMock).listInstances()).toEqual([]);
    expect(requestedUrl(fetchMock)).toBe(`${BASE}/instances`);
  });

  test("names are URL-encoded", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => json({ clusters: [] }));
    const backend = client(fetchMock);

    expect(await backend.getCluster("my cluster")).toBeNull();
    expect(await backend.listClusterInstances("a/b")).toEqual([]);

    expect(requestedUrl(fetchMock, 0)).toBe(`${BASE}/clusters/my%20cluster`);
    expect(requestedUrl(fetchMock, 1)).toBe(`${BASE}/clusters/a%2Fb/instances`);
  });

  test("getAccount returns the first record or null", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(json({ accounts: [{ name: "aws-prod", provider: "AWS" }] }))
      .mockResolvedValueOnce(json({ accounts: [] }));
    const backend = client(fetchMock);

    expect(await backend.getAccount("aws-prod")).toEqual({ name: "aws-prod", provider: "AWS" });
    expect(await backend.getAccount("ghost")).toBeNull();
    expect(requestedUrl(fetchMock, 0)).toBe(`${BASE}/accounts/aws-prod`);
  });

  test("overview is passed through", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => json({ clusters: { running: 2 }, instances: { count: 4 } }));
    expect(await client(fetchMock).overview()).toEqual({ clusters: { running: 2 }, instances: { count: 4 } });
    expect(requestedUrl(fetchMock)).toBe(`${BASE}/overview`);
  });
});

describe("ClusterIqClient errors", () => {
  test("server errors are BackendUnavailable", async () => {
    const records: LogRecord[] = [];
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("down", { status: 503 }));
    const error = await rejection(client(fetchMock, undefined, records).overview());

    expect(error.kind).toBe("BackendUnavailable");
    expect(error.message).toBe("ClusterIQ API returned HTTP 503 for GET /overview");
    expect(records.filter((r) => r.level === "warn").map((r) => r.message)).toEqual(["ClusterIQ call failed"]);
  });

  test("client errors are BackendQueryError", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("missing", { status: 404 }));
    const error = await rejection(client(fetchMock).getCluster("ghost"));
    expect(error.kind).toBe("BackendQueryError");
    expect(error.message).toBe("ClusterIQ API returned HTTP 404 for GET /clusters/ghost");
  });

  test("network failures are BackendUnavailable", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    const error = await rejection(client(fetchMock).listAccounts());
    expect(error.kind).toBe("BackendUnavailable");
    expect(error.message).toBe(`ClusterIQ API unreachable at ${BASE}: fetch failed`);
  });

  test("a slow API times out", async () => {
    const error = await rejection(client(hangingFetch, 20).listClusters());
    expect(error.kind).toBe("BackendUnavailable");
    expect(error.message).toBe("ClusterIQ request timed out after 20ms (GET /clusters)");
  });

  test("caller cancellation is reported", async () => {
    const controller = new AbortController();
    controller.abort();
    const error = await rejection(client(hangingFetch).listAccounts({ signal: controller.signal }));
    expect(error.kind).toBe("BackendUnavailable");
    expect(error.message).toBe("ClusterIQ request cancelled (GET /accounts)");
  });

  test("invalid JSON is a query error", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("<html>", { status: 200 }));
    const error = await rejection(client(fetchMock).listClusters());
    expect(error.kind).toBe("BackendQueryError");
    expect(error.message).toBe("ClusterIQ API returned invalid JSON for GET /clusters");
  });

  test("an unexpected shape names the offending field", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => json({ clusters: [{ name: "orion" }] }));
    const error = await rejection(client(fetchMock).listClusters());
    expect(error.kind).toBe("BackendQueryError");
    expect(error.message).toBe("Unexpected response shape for GET /clusters: clusters.0.id: Required");
  });
});
