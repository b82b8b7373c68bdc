import { z } from "zod";
import { quantityModes } from "./nutrients.js";

/**
 * Decimals travel as strings so no precision is lost on disk; numbers are
 * accepted on input for hand-written files.
 */
export const decimalValueSchema = z.union([z.string(), z.number().finite()]);

const optionalDecimal = decimalValueSchema.nullable().optional();
const optionalText = z.string().nullable().optional();

// ============================================================================
// FOOD LOOKUP PAYLOAD (food database detail response)
// ============================================================================

export const lookupNutrientSchema = z.object({
  name: z.string().nullable().optional(),
  unitName: z.string().nullable().optional(),
  id: z.number().int().nullable().optional(),
  number: z.union([z.string(), z.number()]).nullable().optional(),
  rank: z.number().nullable().optional()
});

export const lookupFoodNutrientSchema = z.object({
  nutrient: lookupNutrientSchema.default({}),
  amount: decimalValueSchema.nullable().optional()
});

export const foodLookupSchema = z.object({
  fdcId: z.number().int(),
  description: z.string().default(""),
  dataType: z.string().default(""),
  brandOwner: z.string().nullable().optional(),
  foodNutrients: z.array(lookupFoodNutrientSchema).default([])
});

// ============================================================================
// FORMULATION RECORD (persistence contract)
// ============================================================================

export const nutrientRecordSchema = z.object({
  name: z.string().min(1),
  unit: z.string().min(1),
  amount: decimalValueSchema,
  nutrient_id: z.number().int().nullable().optional(),
  nutrient_number: z.string().nullable().optional()
});

export const ingredientRecordSchema = z.object({
  fdc_id: z.number().int(),
  description: z.string().min(1),
  data_type: z.string().min(1),
  brand_owner: z.string().nullable().optional(),
  amount_g: decimalValueSchema,
  locked: z.boolean().default(false),
  cost_pack_amount: optionalDecimal,
  cost_pack_unit: optionalText,
  cost_value: optionalDecimal,
  cost_currency_symbol: optionalText,
  cost_per_g: optionalDecimal,
  /** Older files name the base-currency fields with an `_mn` suffix. */
  cost_per_g_mn: optionalDecimal,
  nutrients: z.array(nutrientRecordSchema).default([])
});

export const processCostRecordSchema = z.object({
  name: z.string(),
  scale_type: z.string(),
  time_value: optionalDecimal,
  time_unit: optionalText,
  cost_per_hour: optionalDecimal,
  cost_per_hour_mn: optionalDecimal,
  total_cost: optionalDecimal,
  total_cost_mn: optionalDecimal,
  setup_time_value: optionalDecimal,
  setup_time_unit: optionalText,
  time_per_kg_value: optionalDecimal,
  notes: optionalText
});

export const packagingItemRecordSchema = z.object({
  name: z.string(),
  quantity_per_pack: decimalValueSchema,
  unit_cost: optionalDecimal,
  unit_cost_mn: optionalDecimal,
  unit_cost_value: optionalDecimal,
  unit_cost_currency_symbol: optionalText,
  notes: optionalText
});

export const currencyRateRecordSchema = z.object({
  name: z.string().default(""),
  symbol: z.string(),
  rate_to_base: optionalDecimal,
  rate_to_mn: optionalDecimal
});

export const formulationRecordSchema = z.object({
  name: z.string().min(1),
  quantity_mode: z.enum(quantityModes).default("g"),
  yield_percent: optionalDecimal,
  cost_target_mass_value: optionalDecimal,
  cost_target_mass_unit: optionalText,
  ingredients: z.array(ingredientRecordSchema).default([]),
  process_costs: z.array(processCostRecordSchema).default([]),
  packaging_items: z.array(packagingItemRecordSchema).default([]),
  currency_rates: z.array(currencyRateRecordSchema).default([])
});

export type DecimalValue = z.infer<typeof decimalValueSchema>;
export type LookupNutrient = z.infer<typeof lookupNutrientSchema>;
export type LookupFoodNutrient = z.infer<typeof lookupFoodNutrientSchema>;
export type FoodLookup = z.infer<typeof foodLookupSchema>;
export type NutrientRecord = z.infer<typeof nutrientRecordSchema>;
export type IngredientRecord = z.infer<typeof ingredientRecordSchema>;
export type ProcessCostRecord = z.infer<typeof processCostRecordSchema>;
export type PackagingItemRecord = z.infer<typeof packagingItemRecordSchema>;
export type CurrencyRateRecord = z.infer<typeof currencyRateRecordSchema>;
export type FormulationRecord = z.infer<typeof formulationRecordSchema>;
/** Shape accepted before zod applies defaults. */
export type FormulationRecordInput = z.input<typeof formulationRecordSchema>;
