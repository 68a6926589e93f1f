import type { AppConfig } from "./types";

/** Copy of the config that is safe to log: secrets are replaced by a set/unset marker. */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    llm: { ...config.llm, apiKey: config.llm.apiKey === null ? null : "[redacted]" },
  };
}
