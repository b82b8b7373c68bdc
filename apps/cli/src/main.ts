#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { isFormulationError } from "@formulator/formulation-engine";
import { loadConfig } from "./config.js";
import { buildReport } from "./report.js";

const USAGE = "Usage: formulator-report <formulation.json> [targetValue] [targetUnit]";

function bootstrapEnv() {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [path.resolve(process.cwd(), ".env"), path.resolve(here, "../../../.env")];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    loadEnv({ path: envPath, override: false });
    return;
  }
}

function main(argv: string[]): number {
  const [file, targetValue, targetUnit] = argv;
  if (!file) {
    console.error(`[cli] ${USAGE}`);
    return 2;
  }

  const config = loadConfig();
  const recordPath = path.resolve(file);
  const record: unknown = JSON.parse(fs.readFileSync(recordPath, "utf8"));
  const target = targetValue ? { value: targetValue, unit: targetUnit ?? config.fallbackTarget.unit } : undefined;

  console.log(buildReport(record, { target, fallbackTarget: config.fallbackTarget, decimals: config.decimals }));
  return 0;
}

bootstrapEnv();

try {
  process.exitCode = main(process.argv.slice(2));
} catch (error) {
  if (isFormulationError(error)) {
    console.error(`[cli] ${error.code}: ${error.message}`);
  } else {
    console.error("[cli]", error);
  }
  process.exitCode = 1;
}
