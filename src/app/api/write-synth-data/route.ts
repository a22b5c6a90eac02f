import { NextRequest, NextResponse } from "next/server";
import { DEFAULT_DATA_DIR, writeDataset } from "@/lib/dataset-store";
import { toCsvPayload } from "@/lib/telecom-data";

export async function POST(req: NextRequest) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ ok: false, error: "Request body must be JSON" }, { status: 400 });
  }

  const payload = toCsvPayload(body);
  if (!payload) {
    return NextResponse.json(
      { ok: false, error: "Expected CSV strings for customers, usage, tickets and interventions" },
      { status: 400 },
    );
  }

  try {
    const files = await writeDataset(DEFAULT_DATA_DIR, payload);
    return NextResponse.json({ ok: true, files: files.length });
  } catch (err) {
    console.error("Failed to write synthetic data:", err);
    return NextResponse.json({ ok: false, error: String(err) }, { status: 500 });
  }
}
