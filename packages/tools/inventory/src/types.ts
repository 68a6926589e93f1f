// ClusterIQ inventory records and the read-only backend contract

import { z } from "zod";

// Fields the tools read are typed; everything else the API sends is kept as-is.

export const AccountSchema = z
  .object({
    id: z.string().optional(),
    name: z.string(),
    provider: z.string(),
    cluster_count: z.number().int().nonnegative().optional(),
    total_cost: z.number().optional(),
  })
  .passthrough();

export const ClusterSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    provider: z.string(),
    status: z.string().optional(),
    region: z.string().optional(),
    account_name: z.string().optional(),
    instance_count: z.number().int().nonnegative().default(0),
    creation_timestamp: z.string().optional(),
    total_cost: z.number().optional(),
  })
  .passthrough();

export const InstanceSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    cluster_id: z.string().optional(),
    provider: z.string().optional(),
    status: z.string().optional(),
    instance_type: z.string().optional(),
    availability_zone: z.string().optional(),
  })
  .passthrough();

export const OverviewSchema = z.record(z.unknown());

// List endpoints wrap results in a named array; ClusterIQ sends null for "none".
export const AccountsEnvelope = z.object({ accounts: z.array(AccountSchema).nullish() });
export const ClustersEnvelope = z.object({ clusters: z.array(ClusterSchema).nullish() });
export const InstancesEnvelope = z.object({ instances: z.array(InstanceSchema).nullish() });

export type Account = z.infer<typeof AccountSchema>;
export type Cluster = z.infer<typeof ClusterSchema>;
export type Instance = z.infer<typeof InstanceSchema>;
export type Overview = z.infer<typeof OverviewSchema>;

export interface BackendCallOptions {
  readonly signal?: AbortSignal;
}

/**
 * Read-only view of the inventory. Implementations throw
 * InventoryBackendError: BackendUnavailable for network failures, timeouts
 * and 5xx; BackendQueryError for 4xx, invalid JSON and unexpected shapes.
 */
export interface InventoryBackend {
  overview(options?: BackendCallOptions): Promise<Overview>;
  listAccounts(options?: BackendCallOptions): Promise<Account[]>;
  /** `null` when the account exists in no record the API returns. */
  getAccount(name: string, options?: BackendCallOptions): Promise<Account | null>;
  listClusters(options?: BackendCallOptions): Promise<Cluster[]>;
  getCluster(name: string, options?: BackendCallOptions): Promise<Cluster | null>;
  listInstances(options?: BackendCallOptions): Promise<Instance[]>;
  listClusterInstances(cluster: string, options?: BackendCallOptions): Promise<Instance[]>;
}
