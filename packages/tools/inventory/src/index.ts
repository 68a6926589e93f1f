export {
  INVENTORY_PREAMBLE,
  INVENTORY_TOOLS,
  createInventoryExecutors,
  registerInventoryTools,
  type InventoryToolName,
} from "./inventory-tools";
export { ClusterIqClient, type ClusterIqClientOptions } from "./clusteriq-client";
export {
  countBy,
  filterAccounts,
  filterClusters,
  sortClusters,
  SORT_FIELDS,
  SORT_ORDERS,
  type SortField,
  type SortOrder,
  type ClusterFilter,
} from "./queries";
export {
  AccountSchema,
  ClusterSchema,
  InstanceSchema,
  OverviewSchema,
  type Account,
  type Cluster,
  type Instance,
  type Overview,
  type InventoryBackend,
  type BackendCallOptions,
} from "./types";
