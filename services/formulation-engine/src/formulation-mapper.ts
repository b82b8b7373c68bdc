/**
 * Formulation Mapper
 *
 * Converts between engine entities and the plain records of the persistence
 * contract, and turns food lookup payloads into normalized Foods. Records are
 * validated with the contract's zod schemas before any entity is built.
 */

import {
  foodLookupSchema,
  formulationRecordSchema,
  type FoodLookup,
  type FormulationRecord,
  type IngredientRecord,
  type NutrientRecord
} from "@formulator/contracts";
import type { ZodError } from "zod";
import type { Decimal, DecimalValue } from "./decimal.js";
import { ErrorCode, FormulationError } from "./errors.js";
import {
  CurrencyRate,
  Food,
  Formulation,
  Ingredient,
  Nutrient,
  PackagingItem,
  ProcessCost
} from "./models.js";
import { normalizeNutrients, nutrientRowsFromLookup } from "./nutrient-normalizer.js";
import { NutrientOrdering } from "./nutrient-ordering.js";
import { parseUserNumber } from "./number-parser.js";
import { canonicalUnit } from "./units.js";

function decimalText(value: Decimal | null): string | null {
  return value === null ? null : value.toString();
}

function invalidRecord(what: string, error: ZodError): FormulationError {
  const issues = error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
  return new FormulationError(`Invalid ${what}: ${issues.join("; ")}`, ErrorCode.INVALID_RECORD, { issues });
}

/** The first value present; older records carry the `_mn` spelling. */
function preferred(
  current: DecimalValue | null | undefined,
  legacy: DecimalValue | null | undefined
): DecimalValue | null {
  return current ?? legacy ?? null;
}

// ============================================================================
// ENTITY → RECORD
// ============================================================================

function nutrientToRecord(nutrient: Nutrient): NutrientRecord {
  return {
    name: nutrient.name,
    unit: nutrient.unit,
    amount: nutrient.amount.toString(),
    nutrient_id: nutrient.sourceId,
    nutrient_number: nutrient.sourceNumber
  };
}

function ingredientToRecord(ingredient: Ingredient): IngredientRecord {
  return {
    fdc_id: ingredient.fdcId,
    description: ingredient.description,
    data_type: ingredient.food.dataType,
    brand_owner: ingredient.food.brandOwner,
    amount_g: ingredient.amountG.toString(),
    locked: ingredient.locked,
    cost_pack_amount: decimalText(ingredient.costPackAmount),
    cost_pack_unit: ingredient.costPackUnit,
    cost_value: decimalText(ingredient.costValue),
    cost_currency_symbol: ingredient.costCurrencySymbol,
    cost_per_g: decimalText(ingredient.costPerGBase),
    nutrients: ingredient.food.nutrients.map(nutrientToRecord)
  };
}

export function formulationToRecord(formulation: Formulation): FormulationRecord {
  return {
    name: formulation.name,
    quantity_mode: formulation.quantityMode,
    yield_percent: formulation.yieldPercent.toString(),
    cost_target_mass_value: decimalText(formulation.costTargetMassValue),
    cost_target_mass_unit: formulation.costTargetMassUnit,
    ingredients: formulation.ingredients.map(ingredientToRecord),
    process_costs: formulation.processCosts.map((process) => ({
      name: process.name,
      scale_type: process.scaleType,
      time_value: decimalText(process.timeValue),
      time_unit: process.timeUnit,
      cost_per_hour: decimalText(process.costPerHour),
      total_cost: decimalText(process.totalCost),
      setup_time_value: decimalText(process.setupTimeValue),
      setup_time_unit: process.setupTimeUnit,
      time_per_kg_value: decimalText(process.timePerKgValue),
      notes: process.notes
    })),
    packaging_items: formulation.packagingItems.map((item) => ({
      name: item.name,
      quantity_per_pack: item.quantityPerPack.toString(),
      unit_cost: decimalText(item.unitCost),
      unit_cost_value: decimalText(item.unitCostValue),
      unit_cost_currency_symbol: item.unitCostCurrencySymbol,
      notes: item.notes
    })),
    currency_rates: formulation.currencyRates.map((rate) => ({
      name: rate.name,
      symbol: rate.symbol,
      rate_to_base: rate.rateToBase.toString()
    }))
  };
}

// ============================================================================
// RECORD → ENTITY
// ============================================================================

function ingredientFromRecord(record: IngredientRecord): Ingredient {
  const food = new Food({
    fdcId: record.fdc_id,
    description: record.description,
    dataType: record.data_type,
    brandOwner: record.brand_owner,
    nutrients: record.nutrients.map(
      (nutrient) =>
        new Nutrient({
          name: nutrient.name,
          unit: nutrient.unit,
          amount: nutrient.amount,
          sourceId: nutrient.nutrient_id,
          sourceNumber: nutrient.nutrient_number
        })
    )
  });
  return new Ingredient({
    food,
    amountG: record.amount_g,
    locked: record.locked,
    costPackAmount: record.cost_pack_amount,
    costPackUnit: record.cost_pack_unit,
    costValue: record.cost_value,
    costCurrencySymbol: record.cost_currency_symbol,
    costPerGBase: preferred(record.cost_per_g, record.cost_per_g_mn)
  });
}

/**
 * Build a Formulation from an untrusted record. Schema violations throw
 * INVALID_RECORD; entity invariant violations throw INVALID_ENTITY.
 */
export function formulationFromRecord(input: unknown): Formulation {
  const parsed = formulationRecordSchema.safeParse(input);
  if (!parsed.success) throw invalidRecord("formulation record", parsed.error);
  const record = parsed.data;

  const currencyRates: CurrencyRate[] = [];
  for (const rate of record.currency_rates) {
    const value = parseUserNumber(preferred(rate.rate_to_base, rate.rate_to_mn));
    if (value === null) {
      console.warn(`[formulation-mapper] Dropped currency rate "${rate.symbol}" without a numeric rate`);
      continue;
    }
    currencyRates.push(new CurrencyRate({ name: rate.name, symbol: rate.symbol, rateToBase: value }));
  }

  return new Formulation({
    name: record.name,
    quantityMode: record.quantity_mode,
    yieldPercent: record.yield_percent,
    costTargetMassValue: record.cost_target_mass_value,
    costTargetMassUnit: record.cost_target_mass_unit,
    ingredients: record.ingredients.map(ingredientFromRecord),
    processCosts: record.process_costs.map(
      (process) =>
        new ProcessCost({
          name: process.name,
          scaleType: process.scale_type,
          timeValue: process.time_value,
          timeUnit: process.time_unit,
          costPerHour: preferred(process.cost_per_hour, process.cost_per_hour_mn),
          totalCost: preferred(process.total_cost, process.total_cost_mn),
          setupTimeValue: process.setup_time_value,
          setupTimeUnit: process.setup_time_unit,
          timePerKgValue: process.time_per_kg_value,
          notes: process.notes
        })
    ),
    packagingItems: record.packaging_items.map(
      (item) =>
        new PackagingItem({
          name: item.name,
          quantityPerPack: item.quantity_per_pack,
          unitCost: preferred(item.unit_cost, item.unit_cost_mn),
          unitCostValue: item.unit_cost_value,
          unitCostCurrencySymbol: item.unit_cost_currency_symbol,
          notes: item.notes
        })
    ),
    currencyRates
  });
}

// ============================================================================
// FOOD LOOKUP → FOOD
// ============================================================================

/**
 * Normalize a food lookup payload into an immutable Food. Missing units are
 * inferred first; rows still without a unit or an amount are dropped. The
 * payload's ranks and section headers are recorded on `ordering`.
 */
export function foodFromLookup(payload: unknown, ordering: NutrientOrdering = new NutrientOrdering()): Food {
  const parsed = foodLookupSchema.safeParse(payload);
  if (!parsed.success) throw invalidRecord("food lookup payload", parsed.error);
  const lookup: FoodLookup = parsed.data;
  ordering.recordReference(lookup);

  const rows = nutrientRowsFromLookup(lookup.foodNutrients).map((row) => ({
    ...row,
    unit: canonicalUnit(row.unit || ordering.inferUnit(row))
  }));

  const nutrients: Nutrient[] = [];
  let dropped = 0;
  for (const row of normalizeNutrients(rows, lookup.dataType)) {
    if (row.amount === null || row.amount.lt(0) || !row.unit) {
      dropped += 1;
      continue;
    }
    nutrients.push(
      new Nutrient({
        name: row.name,
        unit: row.unit,
        amount: row.amount,
        sourceId: row.sourceId,
        sourceNumber: row.sourceNumber
      })
    );
  }
  if (dropped > 0) {
    console.warn(`[formulation-mapper] Dropped ${dropped} nutrient row(s) without an amount or unit for food ${lookup.fdcId}`);
  }

  return new Food({
    fdcId: lookup.fdcId,
    description: lookup.description,
    dataType: lookup.dataType,
    brandOwner: lookup.brandOwner,
    nutrients
  });
}

export function addIngredientFromLookup(
  formulation: Formulation,
  payload: unknown,
  amountG: DecimalValue,
  ordering?: NutrientOrdering
): Ingredient {
  const ingredient = new Ingredient({ food: foodFromLookup(payload, ordering), amountG });
  formulation.addIngredient(ingredient);
  return ingredient;
}
