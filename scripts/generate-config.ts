// CLI flags for generate-data.ts, kept apart so they can be tested without
// running the script.

import { parseArgs } from "node:util";
import path from "path";
import {
  SYNTH_PRESETS,
  formatIsoDate,
  getDefaultConfig,
  type SynthConfig,
} from "../src/lib/telecom-synth-engine";
import { DEFAULT_DATA_DIR } from "../src/lib/dataset-store";

function parseInteger(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new RangeError(`--${flag} expects an integer, got "${value}"`);
  return n;
}

export function buildConfig(argv: string[]): { config: SynthConfig; outDir: string } {
  const { values } = parseArgs({
    args: argv,
    options: {
      preset: { type: "string" },
      customers: { type: "string" },
      months: { type: "string" },
      seed: { type: "string" },
      "reference-date": { type: "string" },
      out: { type: "string" },
    },
    strict: true,
  });

  let config = getDefaultConfig();
  if (values.preset) {
    const preset = SYNTH_PRESETS[values.preset];
    if (!preset) throw new RangeError(`Unknown preset "${values.preset}". Available: ${Object.keys(SYNTH_PRESETS).join(", ")}`);
    config = structuredClone(preset.config);
  }
  if (values.customers) config.population.totalCustomers = parseInteger("customers", values.customers);
  if (values.months) config.population.usageMonths = parseInteger("months", values.months);
  if (values.seed) config.simulation.seed = parseInteger("seed", values.seed);
  const ref = values["reference-date"];
  if (ref) config.dates.referenceDate = ref === "today" ? formatIsoDate(Date.now()) : ref;

  const outDir = values.out ? path.resolve(values.out) : DEFAULT_DATA_DIR;
  return { config, outDir };
}
