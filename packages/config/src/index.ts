export { AppConfigSchema, HttpUrlSchema, LogLevelEnum, ToolProtocolEnum } from "./schema";
export type { AppConfig, Env } from "./types";
export { defaultConfig } from "./defaults";
export { loadConfig, ENV_KEYS } from "./env";
export { redactConfig } from "./redact";
