import { z } from "zod";
import { loadDataFile } from "../data/loadDataFile.js";
import { UnknownAyanamshaSystemError } from "../errors.js";

export const AYANAMSHA_SYSTEMS = [
  "LAHIRI",
  "RAMAN",
  "KRISHNAMURTI",
  "YUKTESHWAR",
  "SURYASIDDHANTA",
  "FAGAN_BRADLEY",
  "DELUCE",
  "PUSHYA_PAKSHA",
  "GALACTIC_CENTER",
  "TRUE_CITRA",
] as const;

export type AyanamshaSystem = (typeof AYANAMSHA_SYSTEMS)[number];

export const AyanamshaSystemSchema = z.enum(AYANAMSHA_SYSTEMS);

export const AyanamshaDefinitionSchema = z
  .object({
    id: AyanamshaSystemSchema,
    label: z.string().min(1),
    epoch_jd_tt: z.number().finite(),
    base_offset_deg: z.number().finite(),
    rate_arcsec_per_year: z.number().finite(),
    quadratic_arcsec_per_century2: z.number().finite().default(0),
    cubic_arcsec_per_century3: z.number().finite().default(0),
    valid_from_year: z.number().int(),
    valid_to_year: z.number().int(),
  })
  .refine((d) => d.valid_from_year < d.valid_to_year, {
    message: "valid_from_year must precede valid_to_year",
  });

export type AyanamshaDefinition = z.output<typeof AyanamshaDefinitionSchema>;

const AyanamshaTableFileSchema = z.object({
  table_version: z.string().min(1),
  note: z.string().optional(),
  systems: z.array(AyanamshaDefinitionSchema),
});

export interface AyanamshaTable {
  readonly table_version: string;
  readonly definitions: ReadonlyMap<AyanamshaSystem, AyanamshaDefinition>;
}

export const DEFAULT_AYANAMSHA_TABLE_FILE = "ayanamshaSystems.v1.json";

/**
 * Load a table of ayanamsha constants. Every system in AYANAMSHA_SYSTEMS
 * must be defined exactly once.
 */
export function loadAyanamshaTable(fileName: string = DEFAULT_AYANAMSHA_TABLE_FILE): AyanamshaTable {
  const file = loadDataFile(fileName, AyanamshaTableFileSchema);
  const definitions = new Map<AyanamshaSystem, AyanamshaDefinition>();

  for (const def of file.systems) {
    if (definitions.has(def.id)) {
      throw new Error(`Ayanamsha table ${fileName} defines ${def.id} twice`);
    }
    definitions.set(def.id, Object.freeze(def));
  }

  const missing = AYANAMSHA_SYSTEMS.filter((s) => !definitions.has(s));
  if (missing.length > 0) {
    throw new Error(`Ayanamsha table ${fileName} is missing: ${missing.join(", ")}`);
  }

  return Object.freeze({ table_version: file.table_version, definitions });
}

let defaultTable: AyanamshaTable | null = null;

export function defaultAyanamshaTable(): AyanamshaTable {
  if (!defaultTable) {
    defaultTable = loadAyanamshaTable();
  }
  return defaultTable;
}

export function getAyanamshaDefinition(
  system: AyanamshaSystem,
  table: AyanamshaTable = defaultAyanamshaTable()
): AyanamshaDefinition {
  const def = table.definitions.get(system);
  if (!def) {
    throw new UnknownAyanamshaSystemError(system);
  }
  return def;
}

export function isAyanamshaSystem(tag: string): tag is AyanamshaSystem {
  return AyanamshaSystemSchema.safeParse(tag).success;
}

/**
 * Accepts the canonical tag in any case, with `-` or spaces for `_`.
 */
export function parseAyanamshaSystem(tag: string): AyanamshaSystem {
  const normalized = tag.trim().toUpperCase().replace(/[\s-]+/g, "_");
  if (isAyanamshaSystem(normalized)) {
    return normalized;
  }
  throw new UnknownAyanamshaSystemError(tag);
}

export function mapAyanamshaSystems<V>(fn: (system: AyanamshaSystem) => V): Record<AyanamshaSystem, V> {
  return {
    LAHIRI: fn("LAHIRI"),
    RAMAN: fn("RAMAN"),
    KRISHNAMURTI: fn("KRISHNAMURTI"),
    YUKTESHWAR: fn("YUKTESHWAR"),
    SURYASIDDHANTA: fn("SURYASIDDHANTA"),
    FAGAN_BRADLEY: fn("FAGAN_BRADLEY"),
    DELUCE: fn("DELUCE"),
    PUSHYA_PAKSHA: fn("PUSHYA_PAKSHA"),
    GALACTIC_CENTER: fn("GALACTIC_CENTER"),
    TRUE_CITRA: fn("TRUE_CITRA"),
  };
}
