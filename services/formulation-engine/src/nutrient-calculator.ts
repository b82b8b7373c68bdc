/**
 * Nutrient Calculator
 *
 * Aggregates ingredient nutrients (per 100 g of each food) into totals per
 * 100 g of the finished formulation.
 */

import { HUNDRED, ZERO, type Decimal } from "./decimal.js";
import type { Formulation, Ingredient, Nutrient } from "./models.js";
import type { NutrientTotal } from "./nutrient-ordering.js";
import { atwaterEnergy } from "./nutrient-normalizer.js";

/**
 * Totals key. Energy is reported in two units under one name, so its rows are
 * keyed per unit ("Energy (kcal)", "Energy (kJ)") instead of being summed.
 */
export function totalsKey(nutrient: Pick<Nutrient, "name" | "unit">): string {
  return nutrient.name.trim().toLowerCase() === "energy" ? `${nutrient.name} (${nutrient.unit})` : nutrient.name;
}

function scaledContribution(ingredient: Ingredient, nutrient: Nutrient): Decimal {
  return nutrient.amount.times(ingredient.amountG.div(HUNDRED));
}

/** Per-100 g totals with their units, in first-seen order. */
export function calculateTotalRows(formulation: Formulation): NutrientTotal[] {
  const totalWeight = formulation.totalWeight;
  if (formulation.isEmpty() || totalWeight.isZero()) return [];

  const sums = new Map<string, NutrientTotal>();
  for (const ingredient of formulation.ingredients) {
    for (const nutrient of ingredient.food.nutrients) {
      const key = totalsKey(nutrient);
      const amount = scaledContribution(ingredient, nutrient);
      const existing = sums.get(key);
      if (existing) existing.amount = existing.amount.plus(amount);
      else sums.set(key, { name: nutrient.name, unit: nutrient.unit, amount });
    }
  }

  const factor = HUNDRED.div(totalWeight);
  return [...sums.values()].map((row) => ({ ...row, amount: row.amount.times(factor) }));
}

export function calculateTotalsPer100g(formulation: Formulation): Map<string, Decimal> {
  return new Map(calculateTotalRows(formulation).map((row) => [totalsKey(row), row.amount]));
}

/** Absolute (not normalized) nutrient amounts contributed by each ingredient. */
export function calculatePerIngredient(formulation: Formulation): Array<Map<string, Decimal>> {
  return formulation.ingredients.map((ingredient) => {
    const amounts = new Map<string, Decimal>();
    for (const nutrient of ingredient.food.nutrients) {
      amounts.set(totalsKey(nutrient), scaledContribution(ingredient, nutrient));
    }
    return amounts;
  });
}

export function calculateEnergy(protein: Decimal, carbs: Decimal, fat: Decimal): { kcal: Decimal; kj: Decimal } {
  return atwaterEnergy(protein, carbs, fat);
}

/** Case-insensitive lookup; 0 when absent. */
export function nutrientValue(totals: ReadonlyMap<string, Decimal>, name: string): Decimal {
  const lower = name.toLowerCase();
  for (const [key, amount] of totals) {
    if (key.toLowerCase() === lower) return amount;
  }
  return ZERO;
}
