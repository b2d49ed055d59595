import type { TraditionalYears } from "../schemas/panchang.schema.js";
import type { Instant } from "../time/instant.js";
import { localDayFor } from "./deriveDayTimings.js";

/** Expanded ISO years carry a sign and six digits. */
const LOCAL_DATE = /^([+-]?\d{4,6})-(\d{2})-\d{2}$/;

/**
 * Era years for the local civil date. New-year boundaries are approximated
 * by calendar month (Vikram and Bengali from April, Shaka from March).
 */
export function traditionalYears(instant: Instant, longitude = 0): TraditionalYears {
  const { local_date } = localDayFor(instant.epoch_ms, longitude);
  const match = LOCAL_DATE.exec(local_date);
  if (!match) {
    throw new Error(`Unexpected local date format: ${local_date}`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);

  return {
    vikram_samvat: month >= 4 ? year + 57 : year + 56,
    shaka_samvat: month >= 3 ? year - 78 : year - 79,
    kali_yuga: year + 3102,
    bengali_san: month >= 4 ? year - 593 : year - 594,
  };
}
