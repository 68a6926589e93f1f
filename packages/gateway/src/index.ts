// @inventory-chat/gateway: composition root
// Entry point: load .env, create and start the gateway

import "dotenv/config";
import { ConfigError } from "@inventory-chat/core";
import { createGateway, type Gateway } from "./gateway";

let gateway: Gateway;
try {
  gateway = createGateway();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error("Configuration error:", error.message);
    process.exit(1);
  }
  throw error;
}

// Start the server
await gateway.start();

// Graceful shutdown, guarded against double-fire
let shuttingDown = false;
const shutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  await gateway.stop();
  process.exit(0);
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
