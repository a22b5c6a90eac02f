import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { writeDataset, readDataset } from "./dataset-store";
import { generateSyntheticData, getDefaultConfig, serializeDataset } from "./telecom-synth-engine";

describe("dataset-store", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("writes the four CSV files and reads them back", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "pulse-data-"));
    const cfg = getDefaultConfig();
    cfg.population.totalCustomers = 25;
    cfg.population.usageMonths = 3;
    const generated = generateSyntheticData(cfg);

    const target = path.join(dir, "nested", "data");
    const written = await writeDataset(target, serializeDataset(generated));

    expect(written.map((f) => path.basename(f))).toEqual([
      "synthetic-customers.csv",
      "synthetic-usage-data.csv",
      "synthetic-support-tickets.csv",
      "synthetic-ai-interventions.csv",
    ]);
    expect((await readdir(target)).sort()).toEqual([
      "synthetic-ai-interventions.csv",
      "synthetic-customers.csv",
      "synthetic-support-tickets.csv",
      "synthetic-usage-data.csv",
    ]);

    const header = (await readFile(path.join(target, "synthetic-ai-interventions.csv"), "utf-8")).split("\n")[0];
    expect(header).toBe("customer_id,intervention_date,intervention_type,savings_amount,confidence_score");

    const loaded = await readDataset(target);
    expect(loaded.customers).toEqual(generated.customers);
    expect(loaded.usage).toHaveLength(75);
  });

  it("propagates a missing file as an error", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "pulse-data-"));
    await writeFile(path.join(dir, "synthetic-customers.csv"), "customer_id\nCUST000001\n", "utf-8");
    await expect(readDataset(dir)).rejects.toThrow(/ENOENT/);
  });

  it("fails when the target path is a file", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "pulse-data-"));
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "", "utf-8");
    const csv = { customers: "", usage: "", tickets: "", interventions: "" };
    await expect(writeDataset(blocker, csv)).rejects.toThrow();
  });
});
