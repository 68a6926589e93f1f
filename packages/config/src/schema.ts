import { z } from "zod";

export const HttpUrlSchema = z
  .string()
  .refine((value) => {
    try {
      const url = new URL(value);
      return url.protocol === "http:" || url.protocol === "https:";
    } catch {
      return false;
    }
  }, "Invalid URL (expected http:// or https://)");

export const LogLevelEnum = z.enum(["debug", "info", "warn", "error"]);

export const ToolProtocolEnum = z.enum(["json", "native"]);

// Environment values arrive as strings; numbers are coerced, then range-checked.
const seconds = z.coerce.number().positive().max(3600);

const ServerSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  logLevel: LogLevelEnum.default("info"),
});

const LlmSchema = z.object({
  apiUrl: HttpUrlSchema.default("http://localhost:11434"),
  model: z.string().min(1).default("phi:latest"),
  apiKey: z.string().nullable().default(null),
  temperature: z.coerce.number().min(0).max(2).default(0.1),
  timeoutSeconds: seconds.default(120),
  toolProtocol: ToolProtocolEnum.default("json"),
});

const InventorySchema = z.object({
  apiUrl: HttpUrlSchema.default("http://localhost:8080"),
  timeoutSeconds: seconds.default(120),
});

const DispatchSchema = z.object({
  maxIterations: z.coerce.number().int().min(1).max(100).default(10),
  maxCorrections: z.coerce.number().int().min(0).max(10).default(2),
});

export const AppConfigSchema = z.object({
  server: ServerSchema.default({}),
  llm: LlmSchema.default({}),
  inventory: InventorySchema.default({}),
  dispatch: DispatchSchema.default({}),
});
