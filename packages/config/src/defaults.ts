import { AppConfigSchema } from "./schema";
import type { AppConfig } from "./types";

export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
