import { describe, test, expect } from "vitest";
import { clusterIndex, countBy, filterAccounts, filterClusters, matches, sortClusters } from "../queries";
import { snapshot } from "../__fixtures__/snapshot";

const ids = (items: readonly { id?: string }[]) => items.map((i) => i.id);

describe("matches", () => {
  test("ignores case and treats a missing filter as a wildcard", () => {
    expect(matches("GCP", "gcp")).toBe(true);
    expect(matches("AWS", "gcp")).toBe(false);
    expect(matches(undefined, "gcp")).toBe(false);
    expect(matches(undefined, undefined)).toBe(true);
  });
});

describe("filters", () => {
  test("filterAccounts by provider", () => {
    expect(ids(filterAccounts(snapshot.accounts, "Gcp"))).toEqual(["acc-1", "acc-3", "acc-5"]);
    expect(filterAccounts(snapshot.accounts)).toHaveLength(5);
  });

  test("filterClusters by status alone", () => {
    expect(ids(filterClusters(snapshot.clusters, { status: "stopped" }))).toEqual(["c-03", "c-08"]);
  });
});

describe("countBy", () => {
  test("merges spellings and orders keys", () => {
    expect(countBy(["b", "A", "a", "B", "c"], (s) => s)).toEqual({ A: 2, b: 2, c: 1 });
    expect(Object.keys(countBy(["zeta", "Alpha", "mid"], (s) => s))).toEqual(["Alpha", "mid", "zeta"]);
  });

  test("missing keys count as unknown", () => {
    expect(countBy<{ k?: string }>([{ k: "x" }, {}], (o) => o.k)).toEqual({ unknown: 1, x: 1 });
  });
});

describe("sortClusters", () => {
  test("instance count descending with id tie-break", () => {
    expect(ids(sortClusters(snapshot.clusters, "instance_count", "descending"))).toEqual([
      "c-04", "c-01", "c-06", "c-02", "c-03", "c-08", "c-07", "c-05",
    ]);
  });

  test("cost ascending puts unpriced clusters last", () => {
    expect(ids(sortClusters(snapshot.clusters, "total_cost", "ascending"))).toEqual([
      "c-07", "c-03", "c-02", "c-06", "c-01", "c-04", "c-05", "c-08",
    ]);
  });

  test("does not mutate its input", () => {
    const before = ids(snapshot.clusters);
    sortClusters(snapshot.clusters, "name", "descending");
    expect(ids(snapshot.clusters)).toEqual(before);
  });
});

describe("clusterIndex", () => {
  test("resolves by id or by name", () => {
    const owner = clusterIndex(snapshot.clusters);
    expect(owner({ id: "i-x", cluster_id: "c-02" })?.name).toBe("lyra");
    expect(owner({ id: "i-y", cluster_id: "vega" })?.id).toBe("c-03");
    expect(owner({ id: "i-z" })).toBeUndefined();
  });
});
