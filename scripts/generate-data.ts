/**
 * Synthetic dataset generator
 *
 * Writes the four Pulse Mobile CSV files (default: public/data/).
 * npm run generate -- --customers 5000 --seed 42 --reference-date today
 */

import path from "path";
import { generateSyntheticData, serializeDataset } from "../src/lib/telecom-synth-engine";
import { writeDataset } from "../src/lib/dataset-store";
import { buildConfig } from "./generate-config";

async function main() {
  const { config, outDir } = buildConfig(process.argv.slice(2));
  console.log("Generating synthetic telecom data for the Pulse Mobile AI Assistant demo...\n");

  const startTime = Date.now();
  const result = generateSyntheticData(config);
  const files = await writeDataset(outDir, serializeDataset(result));
  const duration = ((Date.now() - startTime) / 1000).toFixed(2);

  const counts = [result.customers.length, result.usage.length, result.tickets.length, result.interventions.length];
  const units = ["customers", "records", "tickets", "interventions"];
  files.forEach((file, i) => {
    console.log(`✓ Generated ${path.basename(file)} (${counts[i]} ${units[i]})`);
  });

  console.log("\n--- Summary ---");
  console.log(`Seed: ${config.simulation.seed}`);
  console.log(`Reference date: ${config.dates.referenceDate}`);
  console.log(`AI-assisted customers: ${result.stats.aiAssistedCustomers}`);
  console.log(`Output: ${outDir}`);
  console.log(`Duration: ${duration}s`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
