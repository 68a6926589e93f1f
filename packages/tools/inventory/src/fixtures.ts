// Test fixtures for packages that exercise the inventory tools without a ClusterIQ API
export { InMemoryInventoryBackend, type InventorySnapshot } from "./__fixtures__/in-memory-backend";
export { snapshot } from "./__fixtures__/snapshot";
