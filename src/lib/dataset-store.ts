// Server-side persistence of the four CSV files. Node only: imported by the
// API route and the generate-data script, never by client components.

import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { DATA_FILES, DATASET_KEYS, parseDataset } from "./telecom-data";
import type { DatasetCsvPayload } from "./telecom-synth-engine";
import type { TelecomDataset } from "./telecom-types";

export const DEFAULT_DATA_DIR = path.join(process.cwd(), "public", "data");

/** Writes all four files; any I/O error propagates to the caller. */
export async function writeDataset(dir: string, csv: DatasetCsvPayload): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const targets = DATASET_KEYS.map((key) => ({
    file: path.join(dir, DATA_FILES[key]),
    content: csv[key],
  }));

  await Promise.all(targets.map((t) => writeFile(t.file, t.content, "utf-8")));
  return targets.map((t) => t.file);
}

export async function readDatasetCsv(dir: string): Promise<DatasetCsvPayload> {
  const [customers, usage, tickets, interventions] = await Promise.all([
    readFile(path.join(dir, DATA_FILES.customers), "utf-8"),
    readFile(path.join(dir, DATA_FILES.usage), "utf-8"),
    readFile(path.join(dir, DATA_FILES.tickets), "utf-8"),
    readFile(path.join(dir, DATA_FILES.interventions), "utf-8"),
  ]);
  return { customers, usage, tickets, interventions };
}

export async function readDataset(dir: string): Promise<TelecomDataset> {
  return parseDataset(await readDatasetCsv(dir));
}
