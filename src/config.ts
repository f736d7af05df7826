import { z } from "zod";
import { ConfigError } from "./core/errors";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export const ENGINE_DEFAULTS = {
  logLevel: "warn",
  diagnosticsLimit: 100,
  tombstoneRetention: 500,
  fallbackMessage: "Nothing happens.",
  saveKey: "taletick_autosave"
} as const;

const engineConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
  tombstoneRetention: z.number().int().nonnegative(),
  fallbackMessage: z.string().min(1),
  saveKey: z.string().min(1)
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export function resolveEngineConfig(
  overrides: Partial<EngineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const envLevel = env.TALETICK_LOG_LEVEL?.trim().toLowerCase();
  const result = engineConfigSchema.safeParse({
    logLevel: ENGINE_DEFAULTS.logLevel,
    tombstoneRetention: ENGINE_DEFAULTS.tombstoneRetention,
    fallbackMessage: ENGINE_DEFAULTS.fallbackMessage,
    saveKey: ENGINE_DEFAULTS.saveKey,
    ...(envLevel ? { logLevel: envLevel } : {}),
    ...overrides
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new ConfigError(`Invalid engine config: ${issues.join("; ")}`);
  }
  return result.data;
}
