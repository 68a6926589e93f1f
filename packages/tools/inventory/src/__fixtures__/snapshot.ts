// Test fixture: a small, made-up inventory

import type { InventorySnapshot } from "./in-memory-backend";

export const snapshot: InventorySnapshot = {
  accounts: [
    { id: "acc-1", name: "gcp-analytics", provider: "GCP" },
    { id: "acc-2", name: "aws-prod", provider: "AWS" },
    { id: "acc-3", name: "gcp-sandbox", provider: "GCP" },
    { id: "acc-4", name: "aws-dev", provider: "AWS" },
    { id: "acc-5", name: "gcp-ml", provider: "gcp" },
  ],
  clusters: [
    { id: "c-01", name: "orion", provider: "AWS", status: "Running", account_name: "aws-prod", instance_count: 6, creation_timestamp: "2023-03-14T09:00:00Z", total_cost: 410.5 },
    { id: "c-02", name: "lyra", provider: "GCP", status: "Running", account_name: "gcp-analytics", instance_count: 3, creation_timestamp: "2021-11-02T12:30:00Z", total_cost: 120 },
    { id: "c-03", name: "vega", provider: "AWS", status: "Stopped", account_name: "aws-dev", instance_count: 2, creation_timestamp: "2022-06-20T08:15:00Z", total_cost: 33.25 },
    { id: "c-04", name: "draco", provider: "GCP", status: "Running", account_name: "gcp-ml", instance_count: 9, creation_timestamp: "2021-11-02T12:30:00Z", total_cost: 980 },
    { id: "c-05", name: "cygnus", provider: "GCP", status: "Terminated", account_name: "gcp-sandbox", instance_count: 0, creation_timestamp: "2020-01-05T00:00:00Z" },
    { id: "c-06", name: "aquila", provider: "AWS", status: "Running", account_name: "aws-prod", instance_count: 4, creation_timestamp: "2024-02-29T16:45:00Z", total_cost: 260 },
    { id: "c-07", name: "hydra", provider: "AWS", status: "Running", account_name: "aws-dev", instance_count: 1, creation_timestamp: "2022-01-10T10:00:00Z", total_cost: 15 },
    { id: "c-08", name: "pavo", provider: "GCP", status: "Stopped", account_name: "gcp-analytics", instance_count: 2 },
  ],
  instances: [
    { id: "i-1", name: "orion-a", cluster_id: "c-01", provider: "AWS", status: "Running" },
    { id: "i-2", name: "orion-b", cluster_id: "c-01", provider: "AWS", status: "Running" },
    { id: "i-3", name: "lyra-a", cluster_id: "c-02", provider: "GCP", status: "Running" },
    { id: "i-4", name: "vega-a", cluster_id: "c-03", provider: "AWS", status: "Stopped" },
    { id: "i-5", name: "draco-a", cluster_id: "c-04", provider: "GCP", status: "Running" },
    { id: "i-6", name: "draco-b", cluster_id: "c-04", provider: "GCP", status: "Running" },
    { id: "i-7", name: "draco-c", cluster_id: "c-04", provider: "GCP", status: "Running" },
  ],
};
