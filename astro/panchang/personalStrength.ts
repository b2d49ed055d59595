import { InvalidRequestError } from "../errors.js";
import type { Chandrabala, Tarabala } from "../schemas/panchang.schema.js";
import { panchangTables, type PanchangTables } from "./panchangTables.js";

function findByName(names: readonly string[], tag: string): number {
  const wanted = tag.trim().toLowerCase();
  return names.findIndex((name) => name.toLowerCase() === wanted);
}

export function parseNakshatraName(tag: string, tables: PanchangTables = panchangTables()): number {
  const index = findByName(
    tables.nakshatras.map((n) => n.name),
    tag
  );
  if (index < 0) {
    throw new InvalidRequestError(`Unknown nakshatra "${tag}"`, { nakshatra: tag });
  }
  return index;
}

export function parseRashiName(tag: string, tables: PanchangTables = panchangTables()): number {
  const index = findByName(
    tables.rashis.map((r) => r.name),
    tag
  );
  if (index < 0) {
    throw new InvalidRequestError(`Unknown rashi "${tag}"`, { rashi: tag });
  }
  return index;
}

/**
 * Tara of the current nakshatra counted from the birth nakshatra
 * (birth itself is 1), folded into the nine-tara cycle.
 */
export function tarabala(
  birthNakshatraIndex: number,
  currentNakshatraIndex: number,
  tables: PanchangTables = panchangTables()
): Tarabala {
  const count = (((currentNakshatraIndex - birthNakshatraIndex) % 27) + 27) % 27 % 9 + 1;
  const tara = tables.taras[count - 1];
  return {
    birth_nakshatra: tables.nakshatras[birthNakshatraIndex].name,
    count,
    name: tara.name,
    result: tara.result,
    favorable: tara.favorable,
  };
}

/** Moon sign position counted from the birth sign (birth sign is 1). */
export function chandrabala(
  birthRashiIndex: number,
  moonRashiIndex: number,
  tables: PanchangTables = panchangTables()
): Chandrabala {
  const position = (((moonRashiIndex - birthRashiIndex) % 12) + 12) % 12 + 1;
  return {
    birth_rashi: tables.rashis[birthRashiIndex].name,
    position,
    favorable: tables.chandrabala_favorable_positions.includes(position),
  };
}
