/**
 * Engine configuration
 *
 * Read once from the environment, validated, then passed around as a plain object.
 */

import { z } from "zod";
import { GITHUB_API_URL } from "#/constants";
import { safeValidate, type ParseResult } from "#/friendly-errors";

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

export const EngineConfigSchema = z.object({
  githubApiUrl: z
    .string()
    .url()
    .default(GITHUB_API_URL)
    .transform((url) => (url.endsWith("/") ? url.slice(0, -1) : url)),
  githubToken: z.preprocess(emptyToUndefined, z.string().optional()),
  registriesFile: z.preprocess(emptyToUndefined, z.string().optional()),
  logLevel: z.enum(["silent", "error", "warn", "info", "debug"]).default("info"),
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export type Env = Record<string, string | undefined>;

/**
 * Environment variables:
 * - REGISTRY_GITHUB_API_URL (default https://api.github.com)
 * - GITHUB_TOKEN
 * - REGISTRY_FILE: YAML file with registry records
 * - REGISTRY_LOG_LEVEL: silent | error | warn | info | debug
 */
export function loadEngineConfig(env: Env = process.env): ParseResult<EngineConfig> {
  return safeValidate(
    {
      githubApiUrl: emptyToUndefined(env.REGISTRY_GITHUB_API_URL),
      githubToken: env.GITHUB_TOKEN,
      registriesFile: env.REGISTRY_FILE,
      logLevel: emptyToUndefined(env.REGISTRY_LOG_LEVEL),
    },
    EngineConfigSchema,
    "engine config"
  );
}
