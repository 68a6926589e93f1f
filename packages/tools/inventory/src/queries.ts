// Pure filtering, grouping and ordering over inventory records.
// Everything here is deterministic for a fixed input.

import type { Account, Cluster, Instance } from "./types";

export type SortField = "creation_date" | "name" | "instance_count" | "total_cost";
export type SortOrder = "ascending" | "descending";

export const SORT_FIELDS: readonly SortField[] = ["creation_date", "name", "instance_count", "total_cost"];
export const SORT_ORDERS: readonly SortOrder[] = ["ascending", "descending"];

/** Case-insensitive equality; an absent filter matches everything. */
export function matches(value: string | undefined, filter: string | undefined): boolean {
  if (filter === undefined) return true;
  return value !== undefined && value.toLowerCase() === filter.toLowerCase();
}

export interface ClusterFilter {
  readonly provider?: string;
  readonly accountName?: string;
  readonly status?: string;
}

export function filterClusters(clusters: readonly Cluster[], filter: ClusterFilter): Cluster[] {
  return clusters.filter(
    (c) =>
      matches(c.provider, filter.provider) &&
      matches(c.account_name, filter.accountName) &&
      matches(c.status, filter.status),
  );
}

export function filterAccounts(accounts: readonly Account[], provider?: string): Account[] {
  return accounts.filter((a) => matches(a.provider, provider));
}

/**
 * Count items per key. Keys keep the spelling of their first occurrence and
 * match case-insensitively, so "gcp" and "GCP" land in one group. The result
 * is ordered by key.
 */
export function countBy<T>(items: readonly T[], key: (item: T) => string | undefined): Record<string, number> {
  const spelling = new Map<string, string>();
  const counts = new Map<string, number>();
  for (const item of items) {
    const raw = key(item) ?? "unknown";
    const folded = raw.toLowerCase();
    if (!spelling.has(folded)) spelling.set(folded, raw);
    counts.set(folded, (counts.get(folded) ?? 0) + 1);
  }
  const groups: Record<string, number> = {};
  for (const folded of [...counts.keys()].sort()) {
    groups[spelling.get(folded) ?? folded] = counts.get(folded) ?? 0;
  }
  return groups;
}

function sortValue(cluster: Cluster, field: SortField): number | string | undefined {
  switch (field) {
    case "creation_date": {
      const at = cluster.creation_timestamp === undefined ? NaN : Date.parse(cluster.creation_timestamp);
      return Number.isNaN(at) ? undefined : at;
    }
    case "name":
      return cluster.name;
    case "instance_count":
      return cluster.instance_count;
    case "total_cost":
      return cluster.total_cost;
  }
}

function compare(a: number | string, b: number | string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order clusters by `field`. Clusters missing the field go last in either
 * order; ties break on id ascending so repeated calls agree.
 */
export function sortClusters(clusters: readonly Cluster[], field: SortField, order: SortOrder): Cluster[] {
  const direction = order === "ascending" ? 1 : -1;
  return [...clusters].sort((a, b) => {
    const va = sortValue(a, field);
    const vb = sortValue(b, field);
    if (va === undefined || vb === undefined) {
      if (va !== vb) return va === undefined ? 1 : -1;
    } else {
      const byField = compare(va, vb) * direction;
      if (byField !== 0) return byField;
    }
    return compare(a.id, b.id);
  });
}

/** Resolve each instance to its cluster, by id or by name. */
export function clusterIndex(clusters: readonly Cluster[]): (instance: Instance) => Cluster | undefined {
  const byId = new Map<string, Cluster>();
  for (const c of clusters) {
    byId.set(c.id, c);
    if (!byId.has(c.name)) byId.set(c.name, c);
  }
  return (instance) => (instance.cluster_id === undefined ? undefined : byId.get(instance.cluster_id));
}
