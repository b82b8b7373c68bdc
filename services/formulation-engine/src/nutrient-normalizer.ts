/**
 * Nutrient Normalizer
 *
 * Augments a raw nutrient list from the food database with rows the source
 * omitted or spelled inconsistently: fat equivalence, canonical units, alias
 * merging, nitrogen, a water estimate for branded foods and Atwater energy.
 * Pure functions; every step returns a new array and leaves its input alone.
 */

import type { LookupFoodNutrient } from "@formulator/contracts";
import { Decimal, ZERO } from "./decimal.js";
import { parseUserNumber } from "./number-parser.js";
import { KCAL_TO_KJ, canonicalUnit } from "./units.js";

export type RawNutrient = {
  name: string;
  unit: string;
  /** Amount per 100 g; null when the source lists the nutrient without a value. */
  amount: Decimal | null;
  sourceId?: number | null;
  sourceNumber?: string | null;
  rank?: number | null;
};

export const ATWATER_PROTEIN = new Decimal(4);
export const ATWATER_CARBOHYDRATE = new Decimal(4);
export const ATWATER_FAT = new Decimal(9);
export const PROTEIN_TO_NITROGEN = new Decimal("6.25");

const TOTAL_LIPID = "Total lipid (fat)";
const TOTAL_FAT_NLEA = "Total fat (NLEA)";
const CARBOHYDRATE = "carbohydrate, by difference";

const canonicalNames: Record<string, string> = {
  "total sugars": "Sugars, Total",
  "sugars, total": "Sugars, Total",
  "cystine": "Cysteine",
  "cysteine": "Cysteine",
  "carbohydrate, by summation": "Carbohydrate, by difference",
  "carbohydrate by summation": "Carbohydrate, by difference",
  "choline, from phosphotidyl choline": "Choline, from phosphatidyl choline"
};

const droppedNames = new Set(["energy (atwater general factors)", "energy (atwater specific factors)"]);

const energyMacroNames = new Set(["protein", CARBOHYDRATE, "total lipid (fat)", "total fat (nlea)"]);
const waterMacroNames = new Set([...energyMacroNames, "ash", "fiber, total dietary"]);

function normName(row: RawNutrient): string {
  return row.name.trim().toLowerCase();
}

/**
 * Display name that keeps alias spellings in one column.
 * Atwater energy variants map to "" (they are dropped); unknown names pass through.
 */
export function canonicalAliasName(name: string): string {
  const lower = name.trim().toLowerCase();
  if (droppedNames.has(lower)) return "";
  return canonicalNames[lower] ?? name;
}

function firstAmount(rows: RawNutrient[], names: string[]): Decimal | null {
  for (const row of rows) {
    if (row.amount !== null && names.includes(normName(row))) return row.amount;
  }
  return null;
}

function minIndex(rows: RawNutrient[], names: Set<string>): number {
  const index = rows.findIndex((row) => names.has(normName(row)));
  return index === -1 ? 0 : index;
}

// ============================================================================
// 1. FAT EQUIVALENCE
// ============================================================================

/**
 * "Total lipid (fat)" and "Total fat (NLEA)" measure the same thing. When only
 * one carries a value, clone it under the other name next to the original;
 * when both do, keep the first occurrence of each.
 */
export function augmentFatNutrients(rows: RawNutrient[]): RawNutrient[] {
  if (rows.length === 0) return [];

  const lipidKey = TOTAL_LIPID.toLowerCase();
  const nleaKey = TOTAL_FAT_NLEA.toLowerCase();
  const lipid = rows.find((row) => normName(row) === lipidKey && row.amount !== null);
  const nlea = rows.find((row) => normName(row) === nleaKey && row.amount !== null);

  if (!lipid && !nlea) return [...rows];

  const result: RawNutrient[] = [];
  for (const row of rows) {
    const name = normName(row);
    if (name !== lipidKey && name !== nleaKey) {
      result.push(row);
      continue;
    }
    if (row === lipid) {
      result.push(row);
      if (!nlea) result.push(cloneAs(row, TOTAL_FAT_NLEA));
    } else if (row === nlea) {
      if (!lipid) result.push(cloneAs(row, TOTAL_LIPID));
      result.push(row);
    }
  }
  return result;
}

function cloneAs(row: RawNutrient, name: string): RawNutrient {
  return { name, unit: row.unit, amount: row.amount, sourceId: null, sourceNumber: null, rank: null };
}

// ============================================================================
// 2. CANONICAL UNITS
// ============================================================================

function canonicalizeUnits(rows: RawNutrient[]): RawNutrient[] {
  return rows.map((row) => {
    const unit = canonicalUnit(row.unit);
    return unit && unit !== row.unit ? { ...row, unit } : row;
  });
}

// ============================================================================
// 3. ALIAS MERGE
// ============================================================================

function mergeAliases(rows: RawNutrient[]): RawNutrient[] {
  const merged = new Map<string, RawNutrient>();

  for (const row of rows) {
    const canonical = canonicalAliasName(row.name).trim();
    if (!canonical) continue;
    // kcal and kJ rows share a name but are distinct measurements
    const key = canonical.toLowerCase() === "energy" ? `${canonical}|${row.unit.toLowerCase()}` : canonical;

    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, canonical === row.name ? row : { ...row, name: canonical });
    } else if (existing.amount === null && row.amount !== null) {
      merged.set(key, { ...existing, amount: row.amount });
    }
  }
  return [...merged.values()];
}

// ============================================================================
// 4. NITROGEN
// ============================================================================

function augmentNitrogen(rows: RawNutrient[]): RawNutrient[] {
  if (rows.some((row) => normName(row) === "nitrogen" && row.amount !== null)) return rows;

  const proteinIndex = rows.findIndex((row) => normName(row) === "protein" && row.amount !== null);
  const protein = rows[proteinIndex];
  if (!protein || protein.amount === null) return rows;

  const amount = protein.amount.div(PROTEIN_TO_NITROGEN);
  const emptyNitrogenIndex = rows.findIndex((row) => normName(row) === "nitrogen");
  if (emptyNitrogenIndex !== -1) {
    return rows.map((row, index) => (index === emptyNitrogenIndex ? { ...row, amount } : row));
  }

  const nitrogen: RawNutrient = { name: "Nitrogen", unit: "g", amount };
  return [...rows.slice(0, proteinIndex), nitrogen, ...rows.slice(proteinIndex)];
}

// ============================================================================
// 5. BRANDED WATER ESTIMATE
// ============================================================================

/** Branded labels rarely list water: estimate it as 100 g minus the other macros. */
function augmentBrandedWater(rows: RawNutrient[], dataType: string | null | undefined): RawNutrient[] {
  if ((dataType ?? "").trim().toLowerCase() !== "branded") return rows;
  if (rows.some((row) => normName(row) === "water" && row.amount !== null)) return rows;

  const fat = firstAmount(rows, ["total lipid (fat)", "total fat (nlea)"]) ?? ZERO;
  const protein = firstAmount(rows, ["protein"]) ?? ZERO;
  const carbs = firstAmount(rows, [CARBOHYDRATE]) ?? ZERO;
  const ash = firstAmount(rows, ["ash"]) ?? ZERO;
  const fiber = firstAmount(rows, ["fiber, total dietary"]) ?? ZERO;

  const estimate = Decimal.max(ZERO, new Decimal(100).minus(fat.plus(protein).plus(carbs).plus(ash).plus(fiber)));

  const emptyWaterIndex = rows.findIndex((row) => normName(row) === "water");
  if (emptyWaterIndex !== -1) {
    return rows.map((row, index) => (index === emptyWaterIndex ? { ...row, amount: estimate } : row));
  }

  const insertAt = minIndex(rows, waterMacroNames);
  const water: RawNutrient = { name: "Water", unit: "g", amount: estimate };
  return [...rows.slice(0, insertAt), water, ...rows.slice(insertAt)];
}

// ============================================================================
// 6. ENERGY
// ============================================================================

/**
 * Energy is always recomputed from macros with Atwater factors:
 * kcal = protein*4 + carbs*4 + fat*9, kJ = kcal*4.184.
 * Existing kcal/kJ rows are rewritten in place; extra energy rows are dropped.
 */
function augmentEnergy(rows: RawNutrient[]): RawNutrient[] {
  const result: RawNutrient[] = [];
  let kcalIndex = -1;
  let kjIndex = -1;

  for (const row of rows) {
    if (normName(row) !== "energy") {
      result.push(row);
      continue;
    }
    const unit = row.unit.trim().toLowerCase();
    if (unit === "kcal" && kcalIndex === -1) {
      kcalIndex = result.length;
      result.push(row);
    } else if (unit === "kj" && kjIndex === -1) {
      kjIndex = result.length;
      result.push(row);
    }
  }

  const protein = firstAmount(result, ["protein"]) ?? ZERO;
  const carbs = firstAmount(result, [CARBOHYDRATE]) ?? ZERO;
  const fat = firstAmount(result, ["total lipid (fat)", "total fat (nlea)"]) ?? ZERO;
  const { kcal, kj } = atwaterEnergy(protein, carbs, fat);

  const energyRow = (unit: string, amount: Decimal): RawNutrient => ({
    name: "Energy",
    unit,
    amount,
    sourceId: null,
    sourceNumber: null,
    rank: null
  });

  if (kcalIndex === -1) {
    kcalIndex = minIndex(result, energyMacroNames);
    result.splice(kcalIndex, 0, energyRow("kcal", kcal));
    if (kjIndex >= kcalIndex) kjIndex += 1;
  } else {
    result[kcalIndex] = energyRow("kcal", kcal);
  }

  if (kjIndex === -1) {
    result.splice(kcalIndex + 1, 0, energyRow("kJ", kj));
  } else {
    result[kjIndex] = energyRow("kJ", kj);
  }

  return result;
}

export function atwaterEnergy(protein: Decimal, carbs: Decimal, fat: Decimal): { kcal: Decimal; kj: Decimal } {
  const kcal = protein.times(ATWATER_PROTEIN).plus(carbs.times(ATWATER_CARBOHYDRATE)).plus(fat.times(ATWATER_FAT));
  return { kcal, kj: kcal.times(KCAL_TO_KJ) };
}

// ============================================================================
// PIPELINE
// ============================================================================

export function normalizeNutrients(rows: RawNutrient[], dataType?: string | null): RawNutrient[] {
  if (rows.length === 0) return [];
  let normalized = augmentFatNutrients(rows);
  normalized = canonicalizeUnits(normalized);
  normalized = mergeAliases(normalized);
  normalized = augmentNitrogen(normalized);
  normalized = augmentBrandedWater(normalized, dataType);
  return augmentEnergy(normalized);
}

/** Flatten food-lookup nutrient entries into rows; entries without a name are skipped. */
export function nutrientRowsFromLookup(entries: LookupFoodNutrient[]): RawNutrient[] {
  const rows: RawNutrient[] = [];
  let skipped = 0;
  for (const entry of entries) {
    const name = (entry.nutrient.name ?? "").trim();
    if (!name) {
      skipped += 1;
      continue;
    }
    const number = entry.nutrient.number;
    rows.push({
      name,
      unit: entry.nutrient.unitName ?? "",
      amount: parseUserNumber(entry.amount),
      sourceId: entry.nutrient.id ?? null,
      sourceNumber: number === null || number === undefined ? null : String(number),
      rank: entry.nutrient.rank ?? null
    });
  }
  if (skipped > 0) {
    console.warn(`[nutrient-normalizer] Skipped ${skipped} lookup nutrient entr${skipped === 1 ? "y" : "ies"} without a name`);
  }
  return rows;
}
