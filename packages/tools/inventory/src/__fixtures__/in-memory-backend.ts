// Test fixture: InventoryBackend over a fixed in-process snapshot

import { InventoryBackendError } from "@inventory-chat/core";
import type { Account, Cluster, Instance, InventoryBackend, Overview } from "../types";

export interface InventorySnapshot {
  readonly accounts: Account[];
  readonly clusters: Cluster[];
  readonly instances: Instance[];
}

export class InMemoryInventoryBackend implements InventoryBackend {
  /** Method names in call order. */
  readonly calls: string[] = [];
  /** When set, every call throws this. */
  failure: InventoryBackendError | null = null;

  constructor(private readonly snapshot: InventorySnapshot) {}

  async overview(): Promise<Overview> {
    this.enter("overview");
    const { clusters, instances } = this.snapshot;
    const byStatus = (status: string) => clusters.filter((c) => c.status === status).length;
    return {
      clusters: { running: byStatus("Running"), stopped: byStatus("Stopped"), archived: byStatus("Terminated") },
      instances: { count: instances.length },
      providers: [...new Set(clusters.map((c) => c.provider))].sort(),
    };
  }

  async listAccounts(): Promise<Account[]> {
    this.enter("listAccounts");
    return structuredClone(this.snapshot.accounts);
  }

  async getAccount(name: string): Promise<Account | null> {
    this.enter("getAccount");
    return structuredClone(this.snapshot.accounts.find((a) => a.name === name) ?? null);
  }

  async listClusters(): Promise<Cluster[]> {
    this.enter("listClusters");
    return structuredClone(this.snapshot.clusters);
  }

  async getCluster(name: string): Promise<Cluster | null> {
    this.enter("getCluster");
    return structuredClone(this.snapshot.clusters.find((c) => c.name === name || c.id === name) ?? null);
  }

  async listInstances(): Promise<Instance[]> {
    this.enter("listInstances");
    return structuredClone(this.snapshot.instances);
  }

  async listClusterInstances(cluster: string): Promise<Instance[]> {
    this.enter("listClusterInstances");
    const match = this.snapshot.clusters.find((c) => c.name === cluster || c.id === cluster);
    if (!match) throw new InventoryBackendError(`Cluster "${cluster}" not found`, "BackendQueryError");
    return structuredClone(this.snapshot.instances.filter((i) => i.cluster_id === match.id));
  }

  private enter(method: string): void {
    this.calls.push(method);
    if (this.failure) throw this.failure;
  }
}
