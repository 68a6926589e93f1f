// Inventory tool set: descriptors + executors bound to an InventoryBackend
//
// Tools are read-only. Filters compare provider, account and status values
// case-insensitively. Backend errors propagate to the registry, which turns
// them into failure results for the oracle.

import type { Logger, ToolDescriptor, ToolExecutor, ToolRegistry } from "@inventory-chat/core";
import { InventoryBackendError } from "@inventory-chat/core";
import type { InventoryBackend } from "./types";
import {
  SORT_FIELDS,
  SORT_ORDERS,
  clusterIndex,
  countBy,
  filterAccounts,
  filterClusters,
  sortClusters,
  type SortField,
  type SortOrder,
} from "./queries";

/** System prompt opening tuned for inventory questions. */
export const INVENTORY_PREAMBLE =
  "You are a helpful assistant specialized in answering questions about a cloud inventory " +
  "(accounts, clusters and instances across cloud providers such as AWS, GCP and Azure) using the tools listed below. " +
  'For "how many" questions prefer the count_* tools. For "top N", "oldest", "newest", "largest" or ' +
  '"most expensive" questions use sort_clusters with a limit instead of listing everything.';

const PROVIDER = {
  type: "string",
  description: "Cloud provider, e.g. AWS, GCP or Azure (case-insensitive)",
} as const;

const ACCOUNT_NAME = { type: "string", description: "Exact account name" } as const;

export const INVENTORY_TOOLS = {
  get_inventory_overview: {
    name: "get_inventory_overview",
    description:
      "Summary of the whole inventory: counts of running, stopped and archived clusters, total instances and per-provider details.",
    parameters: {},
    returns: "The overview object as reported by the inventory",
  },
  list_accounts: {
    name: "list_accounts",
    description: "List inventory accounts, optionally filtered by provider or narrowed to one account by name.",
    parameters: { provider: PROVIDER, account_name: ACCOUNT_NAME },
    returns: "{ accounts: Account[], count: number }",
  },
  count_accounts: {
    name: "count_accounts",
    description: "Count inventory accounts, optionally filtered by provider and grouped by provider.",
    parameters: {
      provider: PROVIDER,
      group_by: { type: "string", description: "Group the count", enum: ["provider"] },
    },
    returns: "{ total: number, groups?: Record<string, number> }",
  },
  list_clusters: {
    name: "list_clusters",
    description: "List clusters, optionally filtered by account, provider, status, or narrowed to one cluster by name.",
    parameters: {
      account_name: ACCOUNT_NAME,
      provider: PROVIDER,
      status: { type: "string", description: "Cluster status, e.g. Running, Stopped or Terminated" },
      cluster_name: { type: "string", description: "Exact cluster name or id" },
    },
    returns: "{ clusters: Cluster[], count: number }",
  },
  list_instances: {
    name: "list_instances",
    description: "List instances, across the inventory or for a single cluster.",
    parameters: { cluster_name: { type: "string", description: "Cluster name or id" } },
    returns: "{ instances: Instance[], count: number }",
  },
  count_instances: {
    name: "count_instances",
    description: "Count instances, across the inventory or for a single cluster, optionally grouped.",
    parameters: {
      cluster_name: { type: "string", description: "Cluster name or id" },
      group_by: { type: "string", description: "Group the count", enum: ["cluster", "account", "provider"] },
    },
    returns: "{ total: number, groups?: Record<string, number> }",
  },
  sort_clusters: {
    name: "sort_clusters",
    description:
      "Return the first `limit` clusters ordered by a field. Use for top-N, oldest/newest, largest or most expensive questions.",
    parameters: {
      field: { type: "string", description: "Field to order by", required: true, enum: SORT_FIELDS },
      order: { type: "string", description: "Sort direction", required: true, enum: SORT_ORDERS },
      limit: { type: "integer", description: "How many clusters to return (1-100)", required: true },
      account_name: ACCOUNT_NAME,
      provider: PROVIDER,
    },
    returns: "{ clusters: Cluster[], count: number, total: number, field, order }",
  },
} satisfies Record<string, ToolDescriptor>;

export type InventoryToolName = keyof typeof INVENTORY_TOOLS;

const MAX_LIMIT = 100;

// Arguments are validated against the descriptor before an executor runs;
// these helpers only narrow the already-checked values.
function str(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function isSortField(value: string | undefined): value is SortField {
  return SORT_FIELDS.some((f) => f === value);
}

function isSortOrder(value: string | undefined): value is SortOrder {
  return SORT_ORDERS.some((o) => o === value);
}

export function createInventoryExecutors(
  backend: InventoryBackend,
  logger: Logger,
): Record<InventoryToolName, ToolExecutor> {
  const log = logger.child({ component: "InventoryTools" });

  return {
    get_inventory_overview: async (_args, { signal }) => backend.overview({ signal }),

    list_accounts: async (args, { signal }) => {
      const name = str(args, "account_name");
      const source = name
        ? [await backend.getAccount(name, { signal })].flatMap((a) => (a ? [a] : []))
        : await backend.listAccounts({ signal });
      const accounts = filterAccounts(source, str(args, "provider"));
      return { accounts, count: accounts.length };
    },

    count_accounts: async (args, { signal }) => {
      const accounts = filterAccounts(await backend.listAccounts({ signal }), str(args, "provider"));
      if (str(args, "group_by") !== "provider") return { total: accounts.length };
      return { total: accounts.length, groups: countBy(accounts, (a) => a.provider) };
    },

    list_clusters: async (args, { signal }) => {
      const name = str(args, "cluster_name");
      const source = name
        ? [await backend.getCluster(name, { signal })].flatMap((c) => (c ? [c] : []))
        : await backend.listClusters({ signal });
      const clusters = filterClusters(source, {
        provider: str(args, "provider"),
        accountName: str(args, "account_name"),
        status: str(args, "status"),
      });
      return { clusters, count: clusters.length };
    },

    list_instances: async (args, { signal }) => {
      const cluster = str(args, "cluster_name");
      const instances = cluster
        ? await backend.listClusterInstances(cluster, { signal })
        : await backend.listInstances({ signal });
      return { instances, count: instances.length };
    },

    count_instances: async (args, { signal }) => {
      const cluster = str(args, "cluster_name");
      const instances = cluster
        ? await backend.listClusterInstances(cluster, { signal })
        : await backend.listInstances({ signal });
      const groupBy = str(args, "group_by");
      if (!groupBy) return { total: instances.length };

      const owner = clusterIndex(await backend.listClusters({ signal }));
      const groups = countBy(instances, (instance) => {
        const c = owner(instance);
        if (groupBy === "cluster") return c?.name ?? instance.cluster_id;
        if (groupBy === "account") return c?.account_name;
        return instance.provider ?? c?.provider;
      });
      return { total: instances.length, groups };
    },

    sort_clusters: async (args, { signal }) => {
      const field = str(args, "field");
      const order = str(args, "order");
      const limit = args.limit;
      if (!isSortField(field) || !isSortOrder(order)) {
        throw new InventoryBackendError(
          `sort_clusters needs field (${SORT_FIELDS.join(", ")}) and order (${SORT_ORDERS.join(", ")})`,
          "BackendQueryError",
        );
      }
      if (typeof limit !== "number" || limit < 1 || limit > MAX_LIMIT) {
        throw new InventoryBackendError(`limit must be between 1 and ${MAX_LIMIT}`, "BackendQueryError");
      }

      const candidates = filterClusters(await backend.listClusters({ signal }), {
        provider: str(args, "provider"),
        accountName: str(args, "account_name"),
      });
      const clusters = sortClusters(candidates, field, order).slice(0, limit);
      log.debug("Sorted clusters", { field, order, limit, total: candidates.length });
      return { clusters, count: clusters.length, total: candidates.length, field, order };
    },
  };
}

/** Register the inventory tool set. Throws ToolRegistryError if a name is taken. */
export function registerInventoryTools(registry: ToolRegistry, backend: InventoryBackend, logger: Logger): void {
  const executors = createInventoryExecutors(backend, logger);
  for (const name of Object.keys(INVENTORY_TOOLS)) {
    if (!isToolName(name)) continue;
    registry.register(INVENTORY_TOOLS[name], executors[name]);
  }
}

function isToolName(name: string): name is InventoryToolName {
  return Object.prototype.hasOwnProperty.call(INVENTORY_TOOLS, name);
}
