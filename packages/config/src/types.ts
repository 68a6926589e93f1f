import type { z } from "zod";
import type { AppConfigSchema } from "./schema";

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Process environment as handed to loadConfig. */
export type Env = Readonly<Record<string, string | undefined>>;
