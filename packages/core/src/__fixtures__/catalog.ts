// Test fixture: small descriptor set exercising every parameter type

import type { ToolDescriptor } from "../types";

export const lookupTool: ToolDescriptor = {
  name: "lookup",
  description: "Look up an item by name.",
  parameters: {
    name: { type: "string", description: "Item name", required: true },
    limit: { type: "integer", description: "Maximum rows" },
    ratio: { type: "number", description: "Scaling ratio" },
    verbose: { type: "boolean", description: "Include details" },
    order: { type: "string", description: "Sort order", enum: ["ascending", "descending"] },
  },
  returns: "{ item }",
};

export const pingTool: ToolDescriptor = {
  name: "ping",
  description: "Check the backend.",
  parameters: {},
  returns: "{ pong: true }",
};
