/**
 * Cost Engine
 *
 * Multi-currency ingredient costs, process costs by billing model, packaging
 * and unit economics for a target pack mass. All amounts are in the base
 * currency ("$"). Missing or invalid cost inputs are never errors: they
 * resolve to null and are counted toward a completeness figure.
 */

import { BASE_CURRENCY_SYMBOL, scaleTypes, timeUnits, type ScaleType, type TimeUnit } from "@formulator/contracts";
import { Decimal, HUNDRED, ONE, ZERO, type DecimalValue } from "./decimal.js";
import type { CurrencyRate, Formulation, Ingredient, PackagingItem, ProcessCost } from "./models.js";
import { parseUserNumber } from "./number-parser.js";
import { massToG, massToKg, normalizeMassUnit } from "./units.js";

export type RateSource = Pick<CurrencyRate, "symbol" | "rateToBase">;
export type RateMap = Map<string, Decimal>;

export interface Completeness {
  defined: number;
  missing: number;
  /** defined / total × 100; 0 when there is nothing to cost. */
  percent: Decimal;
}

export interface ResolvedFixedProcess {
  timeH: Decimal | null;
  costPerHour: Decimal | null;
  total: Decimal | null;
}

export interface UnitCostBreakdown {
  batchMassG: Decimal;
  sellableMassG: Decimal;
  targetMassG: Decimal;
  unitsCount: Decimal;
  ingredientsCostPerUnit: Decimal;
  processCostPerUnit: Decimal;
  totalCostPerUnit: Decimal;
  packagingCostPerPack: Decimal;
  totalPackCost: Decimal;
}

type OptionalNumber = DecimalValue | null | undefined;

function completeness(defined: number, missing: number): Completeness {
  const total = defined + missing;
  const percent = total > 0 ? HUNDRED.times(defined).div(total) : ZERO;
  return { defined, missing, percent };
}

// ============================================================================
// CURRENCY
// ============================================================================

/** "$" → 1 always; other rates need a symbol and a positive rate. */
export function buildRateMap(rates: readonly RateSource[]): RateMap {
  const map: RateMap = new Map([[BASE_CURRENCY_SYMBOL, ONE]]);
  for (const rate of rates) {
    const symbol = rate.symbol.trim();
    if (!symbol || symbol === BASE_CURRENCY_SYMBOL) continue;
    const value = parseUserNumber(rate.rateToBase);
    if (value === null || value.lte(0)) continue;
    map.set(symbol, value);
  }
  return map;
}

/** A blank symbol means the base currency. */
export function convertCurrencyToBase(
  value: OptionalNumber,
  symbol: string | null | undefined,
  rates: readonly RateSource[]
): Decimal | null {
  const amount = parseUserNumber(value);
  if (amount === null) return null;
  const currency = (symbol ?? "").trim() || BASE_CURRENCY_SYMBOL;
  const rate = buildRateMap(rates).get(currency);
  return rate ? amount.times(rate) : null;
}

// ============================================================================
// INGREDIENTS
// ============================================================================

export interface IngredientCostInput {
  packAmount: OptionalNumber;
  packUnit: string | null | undefined;
  costValue: OptionalNumber;
  currencySymbol: string | null | undefined;
}

/** `(costValue × rate) / packAmountInGrams`, or null when any input is unusable. */
export function normalizeIngredientCostPerG(input: IngredientCostInput, rates: readonly RateSource[]): Decimal | null {
  const packAmount = parseUserNumber(input.packAmount);
  const costValue = parseUserNumber(input.costValue);
  if (packAmount === null || costValue === null) return null;
  if (packAmount.lte(0) || costValue.lte(0)) return null;

  const unit = normalizeMassUnit(input.packUnit);
  if (!unit) return null;
  const packAmountG = massToG(packAmount, unit);
  if (packAmountG === null || packAmountG.lte(0)) return null;

  // Unlike packaging, ingredient costs never default to the base currency
  const symbol = (input.currencySymbol ?? "").trim();
  if (!symbol) return null;
  const rate = buildRateMap(rates).get(symbol);
  if (!rate) return null;

  return costValue.times(rate).div(packAmountG);
}

/** Normalize the pack unit and currency symbol, then refresh `costPerGBase`. */
export function updateIngredientCostFields(ingredient: Ingredient, rates: readonly RateSource[]): void {
  ingredient.costPackUnit = normalizeMassUnit(ingredient.costPackUnit) || null;
  ingredient.costCurrencySymbol = (ingredient.costCurrencySymbol ?? "").trim() || null;
  ingredient.costPerGBase = normalizeIngredientCostPerG(
    {
      packAmount: ingredient.costPackAmount,
      packUnit: ingredient.costPackUnit,
      costValue: ingredient.costValue,
      currencySymbol: ingredient.costCurrencySymbol
    },
    rates
  );
}

export function totalIngredientsCostBatch(formulation: Formulation): { total: Decimal; missing: number } {
  let total = ZERO;
  let missing = 0;
  for (const ingredient of formulation.ingredients) {
    updateIngredientCostFields(ingredient, formulation.currencyRates);
    if (ingredient.costPerGBase === null) {
      missing += 1;
      continue;
    }
    total = total.plus(ingredient.costPerGBase.times(ingredient.amountG));
  }
  return { total, missing };
}

export function ingredientCostCompleteness(formulation: Formulation): Completeness {
  const { missing } = totalIngredientsCostBatch(formulation);
  return completeness(formulation.ingredients.length - missing, missing);
}

// ============================================================================
// PROCESSES
// ============================================================================

/** Case- and whitespace-insensitive; null for anything but "min" and "h". */
export function parseTimeUnit(unit: string | null | undefined): TimeUnit | null {
  const cleaned = (unit ?? "").trim().toLowerCase();
  return timeUnits.find((candidate) => candidate === cleaned) ?? null;
}

/** Case- and whitespace-insensitive; null for unknown billing models. */
export function parseScaleType(scaleType: string | null | undefined): ScaleType | null {
  const cleaned = (scaleType ?? "").trim().toUpperCase();
  return scaleTypes.find((candidate) => candidate === cleaned) ?? null;
}

/** "h" as-is, "min" / 60; null for other units and non-positive amounts. */
export function timeToHours(value: OptionalNumber, unit: string | null | undefined): Decimal | null {
  const amount = parseUserNumber(value);
  if (amount === null || amount.lte(0)) return null;
  switch (parseTimeUnit(unit)) {
    case "h":
      return amount;
    case "min":
      return amount.div(60);
    default:
      return null;
  }
}

/**
 * FIXED processes: time × rate = total. With two of the three known, the
 * third is back-solved, deriving the total first.
 */
export function resolveFixedProcess(process: ProcessCost): ResolvedFixedProcess {
  let timeH = timeToHours(process.timeValue, process.timeUnit);
  let costPerHour = process.costPerHour;
  let total = process.totalCost;

  const known = [timeH, costPerHour, total].filter((value) => value !== null).length;
  if (known >= 2) {
    if (total === null && timeH !== null && costPerHour !== null) {
      total = timeH.times(costPerHour);
    } else if (costPerHour === null && timeH !== null && total !== null && timeH.gt(0)) {
      costPerHour = total.div(timeH);
    } else if (timeH === null && costPerHour !== null && total !== null && costPerHour.gt(0)) {
      timeH = total.div(costPerHour);
    }
  }
  return { timeH, costPerHour, total };
}

export function processTotalCost(process: ProcessCost, batchMassKg: Decimal): Decimal | null {
  const costPerHour = process.costPerHour;

  switch (parseScaleType(process.scaleType)) {
    case "FIXED":
      return resolveFixedProcess(process).total;
    case "VARIABLE_PER_KG": {
      const timePerKgH = timeToHours(process.timePerKgValue, process.timeUnit);
      if (timePerKgH === null || costPerHour === null) return null;
      return timePerKgH.times(batchMassKg).times(costPerHour);
    }
    case "MIXED": {
      const setupH = timeToHours(process.setupTimeValue, process.setupTimeUnit);
      const timePerKgH = timeToHours(process.timePerKgValue, process.timeUnit);
      if (setupH === null || timePerKgH === null || costPerHour === null) return null;
      return setupH.plus(timePerKgH.times(batchMassKg)).times(costPerHour);
    }
    default:
      return null;
  }
}

function batchMassKg(formulation: Formulation): Decimal {
  return massToKg(formulation.totalWeight, "g") ?? ZERO;
}

export function totalProcessCostBatch(formulation: Formulation): { total: Decimal; incomplete: number } {
  const massKg = batchMassKg(formulation);
  let total = ZERO;
  let incomplete = 0;
  for (const process of formulation.processCosts) {
    const cost = processTotalCost(process, massKg);
    if (cost === null) {
      incomplete += 1;
      continue;
    }
    total = total.plus(cost);
  }
  return { total, incomplete };
}

export function processCostCompleteness(formulation: Formulation): Completeness {
  const { incomplete } = totalProcessCostBatch(formulation);
  return completeness(formulation.processCosts.length - incomplete, incomplete);
}

// ============================================================================
// PACKAGING
// ============================================================================

/** A foreign-currency unit cost wins over the stored base-currency one. */
export function packagingUnitCostBase(item: PackagingItem, rates: readonly RateSource[]): Decimal | null {
  if (item.unitCostValue !== null) {
    return convertCurrencyToBase(item.unitCostValue, item.unitCostCurrencySymbol, rates);
  }
  return item.unitCost;
}

export function packagingItemCost(item: PackagingItem, rates: readonly RateSource[]): Decimal | null {
  const unitCost = packagingUnitCostBase(item, rates);
  return unitCost === null ? null : item.quantityPerPack.times(unitCost);
}

/** Packaging cost of one pack; items without a unit cost count as 0. */
export function totalPackagingCost(formulation: Formulation): Decimal {
  let total = ZERO;
  for (const item of formulation.packagingItems) {
    total = total.plus(packagingItemCost(item, formulation.currencyRates) ?? ZERO);
  }
  return total;
}

// ============================================================================
// TOTALS
// ============================================================================

export function totalBatchCost(formulation: Formulation): Decimal {
  return totalIngredientsCostBatch(formulation).total.plus(totalProcessCostBatch(formulation).total);
}

/**
 * Unit economics for packs of `targetValue targetUnit`. Sellable mass is the
 * batch after yield; per-unit costs are 0 when no whole batch share exists.
 */
export function unitCostsForTargetMass(
  formulation: Formulation,
  targetValue: OptionalNumber,
  targetUnit: string | null | undefined
): UnitCostBreakdown {
  const batchMassG = formulation.totalWeight;
  const converted = massToG(parseUserNumber(targetValue) ?? ZERO, targetUnit ?? "") ?? ZERO;
  const targetMassG = converted.gt(0) ? converted : ZERO;

  const yieldPercent = Decimal.min(Decimal.max(formulation.yieldPercent, ZERO), HUNDRED);
  const sellableMassG = batchMassG.times(yieldPercent).div(HUNDRED);
  const unitsCount = targetMassG.gt(0) && sellableMassG.gt(0) ? sellableMassG.div(targetMassG) : ZERO;

  const perUnit = (batchTotal: Decimal): Decimal => (unitsCount.gt(0) ? batchTotal.div(unitsCount) : ZERO);
  const ingredientsCostPerUnit = perUnit(totalIngredientsCostBatch(formulation).total);
  const processCostPerUnit = perUnit(totalProcessCostBatch(formulation).total);
  const totalCostPerUnit = ingredientsCostPerUnit.plus(processCostPerUnit);
  const packagingCostPerPack = totalPackagingCost(formulation);

  return {
    batchMassG,
    sellableMassG,
    targetMassG,
    unitsCount,
    ingredientsCostPerUnit,
    processCostPerUnit,
    totalCostPerUnit,
    packagingCostPerPack,
    totalPackCost: totalCostPerUnit.plus(packagingCostPerPack)
  };
}
