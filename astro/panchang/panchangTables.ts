import { z } from "zod";
import { loadDataFile } from "../data/loadDataFile.js";

const SignIndexSchema = z.number().int().min(0).max(11);
const SegmentSchema = z.array(z.number().int().min(1).max(8)).length(7);

const PlanetNameSchema = z.enum(["Sun", "Moon", "Mars", "Mercury", "Jupiter", "Venus", "Saturn", "Rahu", "Ketu"]);

const DignitySchema = z.object({
  exalted: SignIndexSchema,
  debilitated: SignIndexSchema,
  own: z.array(SignIndexSchema).min(1),
});

export const PanchangTablesSchema = z.object({
  table_version: z.string().min(1),
  tithis: z.array(z.string().min(1)).length(30),
  nakshatras: z.array(z.object({ name: z.string().min(1), lord: PlanetNameSchema })).length(27),
  yogas: z.array(z.string().min(1)).length(27),
  karanas: z.object({
    first_fixed: z.string().min(1),
    movable: z.array(z.string().min(1)).length(7),
    last_fixed: z.array(z.string().min(1)).length(3),
  }),
  varas: z
    .array(z.object({ name: z.string().min(1), sanskrit: z.string().min(1), lord: PlanetNameSchema }))
    .length(7),
  rashis: z.array(z.object({ name: z.string().min(1), lord: PlanetNameSchema })).length(12),
  kaal_segments: z.object({
    note: z.string().optional(),
    rahu_kaal: SegmentSchema,
    gulika_kaal: SegmentSchema,
    yamaganda_kaal: SegmentSchema,
  }),
  dignities: z.object({
    sun: DignitySchema,
    moon: DignitySchema,
    mars: DignitySchema,
    mercury: DignitySchema,
    jupiter: DignitySchema,
    venus: DignitySchema,
    saturn: DignitySchema,
  }),
  panchaka: z.object({
    note: z.string().optional(),
    nakshatras: z.array(z.string().min(1)).length(5),
    kinds_by_vara: z.array(z.string().min(1).nullable()).length(7),
  }),
  taras: z
    .array(z.object({ name: z.string().min(1), result: z.string().min(1), favorable: z.boolean() }))
    .length(9),
  chandrabala_favorable_positions: z.array(z.number().int().min(1).max(12)).min(1),
});

export type PanchangTables = z.output<typeof PanchangTablesSchema>;
export type PlanetName = z.output<typeof PlanetNameSchema>;

export const DEFAULT_PANCHANG_TABLE_FILE = "panchangTables.v1.json";

let tables: PanchangTables | null = null;

export function loadPanchangTables(fileName: string = DEFAULT_PANCHANG_TABLE_FILE): PanchangTables {
  return Object.freeze(loadDataFile(fileName, PanchangTablesSchema));
}

export function panchangTables(): PanchangTables {
  if (!tables) {
    tables = loadPanchangTables();
  }
  return tables;
}
