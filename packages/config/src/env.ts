// Environment variables → validated AppConfig

import { ConfigError, type Result, ok, err } from "@inventory-chat/core";
import { AppConfigSchema } from "./schema";
import type { AppConfig, Env } from "./types";

/** Where each setting is read from. Unset or empty variables fall back to the schema default. */
export const ENV_KEYS = {
  "server.port": "PORT",
  "server.logLevel": "LOG_LEVEL",
  "llm.apiUrl": "LLM_API_URL",
  "llm.model": "LLM_MODEL_NAME",
  "llm.apiKey": "LLM_API_KEY",
  "llm.temperature": "LLM_TEMPERATURE",
  "llm.timeoutSeconds": "LLM_TIMEOUT_SECONDS",
  "llm.toolProtocol": "LLM_TOOL_PROTOCOL",
  "inventory.apiUrl": "CLUSTERIQ_API_URL",
  "inventory.timeoutSeconds": "CLUSTERIQ_API_TIMEOUT",
  "dispatch.maxIterations": "DISPATCH_MAX_ITERATIONS",
  "dispatch.maxCorrections": "DISPATCH_MAX_CORRECTIONS",
} as const;

type ConfigPath = keyof typeof ENV_KEYS;

function isConfigPath(path: string): path is ConfigPath {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, path);
}

function read(env: Env, path: ConfigPath): string | undefined {
  const value = env[ENV_KEYS[path]]?.trim();
  return value ? value : undefined;
}

/**
 * Load and validate configuration from environment variables.
 * Returns Result; never throws.
 */
export function loadConfig(env: Env = process.env): Result<AppConfig, ConfigError> {
  const input = {
    server: {
      port: read(env, "server.port"),
      logLevel: read(env, "server.logLevel")?.toLowerCase(),
    },
    llm: {
      apiUrl: read(env, "llm.apiUrl"),
      model: read(env, "llm.model"),
      apiKey: read(env, "llm.apiKey"),
      temperature: read(env, "llm.temperature"),
      timeoutSeconds: read(env, "llm.timeoutSeconds"),
      toolProtocol: read(env, "llm.toolProtocol")?.toLowerCase(),
    },
    inventory: {
      apiUrl: read(env, "inventory.apiUrl"),
      timeoutSeconds: read(env, "inventory.timeoutSeconds"),
    },
    dispatch: {
      maxIterations: read(env, "dispatch.maxIterations"),
      maxCorrections: read(env, "dispatch.maxCorrections"),
    },
  };

  const parsed = AppConfigSchema.safeParse(input);
  if (parsed.success) return ok(parsed.data);

  const problems = parsed.error.issues.map((issue) => {
    const path = issue.path.join(".");
    const key = isConfigPath(path) ? ENV_KEYS[path] : path;
    return `${key}: ${issue.message}`;
  });
  return err(new ConfigError(`Invalid configuration: ${problems.join("; ")}`, parsed.error));
}
