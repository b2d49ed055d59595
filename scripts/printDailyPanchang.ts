/**
 * Print the panchang, day timings and ayanamsha comparison for one place and instant.
 *
 * Run: npx tsx scripts/printDailyPanchang.ts [instant] [latitude] [longitude] [system]
 * e.g. npx tsx scripts/printDailyPanchang.ts 2024-01-07T06:30:00Z 28.6139 77.209 LAHIRI
 */

import "dotenv/config";
import { PanchangEngine } from "../astro/panchangEngine.js";

async function main() {
  const [instant = new Date().toISOString(), lat = "28.6139", lon = "77.209", system] = process.argv.slice(2);
  const location = { latitude: Number(lat), longitude: Number(lon) };
  const engine = new PanchangEngine();

  try {
    const result = await engine.computePanchang(location, instant, system);
    if (result.status === "error") {
      console.error(`${result.error.kind}: ${result.error.message}`);
      process.exitCode = 1;
      return;
    }

    const p = result.value;
    console.log(`=== Panchang for ${p.instant} at ${lat}, ${lon} (${p.ayanamsha.system}) ===\n`);
    console.log(`  Ayanamsha:  ${p.ayanamsha.degrees.toFixed(6)}°${p.ayanamsha.extrapolated ? " (extrapolated)" : ""}`);
    console.log(`  Vara:       ${p.vara.name} (${p.vara.sanskrit})`);
    console.log(`  Tithi:      ${p.tithi.paksha} ${p.tithi.name} (${p.tithi.number}), ${p.tithi.progress_pct}% elapsed`);
    console.log(`  Nakshatra:  ${p.nakshatra.name} pada ${p.nakshatra.pada}, lord ${p.nakshatra.lord}`);
    console.log(`  Yoga:       ${p.yoga.name}`);
    console.log(`  Karana:     ${p.karana.name}`);
    console.log(`  Sun rashi:  ${p.sun_rashi.name}`);
    console.log(`  Moon rashi: ${p.moon_rashi.name}`);
    console.log(`  Moon:       ${p.moon_phase.label}, ${p.moon_phase.illumination_pct}% lit`);
    console.log("");

    const d = p.day;
    console.log(`  Local date: ${d.local_date}`);
    console.log(`  Sunrise:    ${d.sunrise}`);
    console.log(`  Sunset:     ${d.sunset}`);
    console.log(`  Moonrise:   ${d.moonrise ?? "none"}`);
    console.log(`  Moonset:    ${d.moonset ?? "none"}`);
    if (d.moon_event_note) console.log(`  Note:       ${d.moon_event_note}`);
    console.log(`  Rahu Kaal:  ${d.rahu_kaal.start} → ${d.rahu_kaal.end}`);
    console.log(`  Gulika:     ${d.gulika_kaal.start} → ${d.gulika_kaal.end}`);
    console.log(`  Yamaganda:  ${d.yamaganda_kaal.start} → ${d.yamaganda_kaal.end}`);
    console.log(`  Abhijit:    ${d.abhijit_muhurta.start} → ${d.abhijit_muhurta.end}`);
    console.log("");

    const comparison = await engine.compareAyanamsha(instant);
    if (comparison.status === "ok") {
      console.log("=== Ayanamsha comparison ===");
      for (const value of Object.values(comparison.value)) {
        console.log(`  ${value.system.padEnd(16)} ${value.degrees.toFixed(6)}°`);
      }
    }
  } finally {
    engine.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
