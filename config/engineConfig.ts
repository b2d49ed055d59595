import { z } from "zod";
import { AyanamshaSystemSchema } from "../astro/ayanamsha/ayanamshaSystems.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

export const EngineConfigSchema = z
  .object({
    PANCHANG_DEFAULT_AYANAMSHA: AyanamshaSystemSchema.default("LAHIRI"),
    PANCHANG_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(5000),
    PANCHANG_CACHE_TTL_PANCHANG_SECONDS: z.coerce.number().int().positive().default(1800),
    PANCHANG_CACHE_TTL_MUHURTA_SECONDS: z.coerce.number().int().positive().default(7200),
    PANCHANG_CACHE_PERSIST: booleanFlag,
    MUHURTA_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
    EPHEMERIS_MIN_YEAR: z.coerce.number().int().default(1600),
    EPHEMERIS_MAX_YEAR: z.coerce.number().int().default(2400),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  })
  .refine((c) => c.EPHEMERIS_MIN_YEAR < c.EPHEMERIS_MAX_YEAR, {
    message: "EPHEMERIS_MIN_YEAR must be below EPHEMERIS_MAX_YEAR",
    path: ["EPHEMERIS_MIN_YEAR"],
  })
  .refine((c) => !c.PANCHANG_CACHE_PERSIST || Boolean(c.SUPABASE_URL && c.SUPABASE_SERVICE_ROLE_KEY), {
    message: "PANCHANG_CACHE_PERSIST needs SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY",
    path: ["PANCHANG_CACHE_PERSIST"],
  });

export type EngineConfig = z.output<typeof EngineConfigSchema>;

/**
 * Read engine settings from an env-like record (process.env by default).
 * Empty strings count as unset.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EngineConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid engine configuration (${detail})`);
  }
  return parsed.data;
}
