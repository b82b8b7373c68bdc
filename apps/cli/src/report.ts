/**
 * Formulation Report
 *
 * Plain-text summary of one formulation record: per-100 g nutrient totals in
 * catalog order, batch cost with completeness, and unit economics for a pack
 * mass. Pure; the entry point owns all I/O.
 */

import { BASE_CURRENCY_SYMBOL } from "@formulator/contracts";
import {
  NutrientOrdering,
  calculateTotalRows,
  formulationFromRecord,
  ingredientCostCompleteness,
  processCostCompleteness,
  totalBatchCost,
  totalIngredientsCostBatch,
  totalProcessCostBatch,
  unitCostsForTargetMass,
  type Completeness,
  type Decimal,
  type Formulation
} from "@formulator/formulation-engine";
import type { MassTarget } from "./config.js";

export type ReportOptions = {
  /** Takes precedence over the record's own cost target. */
  target?: MassTarget;
  fallbackTarget: MassTarget;
  decimals: number;
};

function recordTarget(formulation: Formulation): MassTarget | undefined {
  const value = formulation.costTargetMassValue;
  const unit = formulation.costTargetMassUnit;
  if (value === null || !unit) return undefined;
  return { value: value.toString(), unit };
}

function coverage(result: Completeness, label: string, decimals: number): string {
  const total = result.defined + result.missing;
  return `${result.defined}/${total} ${label}, ${result.percent.toFixed(decimals)}%`;
}

export function buildReport(record: unknown, options: ReportOptions, ordering = new NutrientOrdering()): string {
  const formulation = formulationFromRecord(record);
  const amount = (value: Decimal): string => value.toFixed(options.decimals);
  const money = (value: Decimal): string => `${BASE_CURRENCY_SYMBOL}${amount(value)}`;

  const lines = [
    `Formulation: ${formulation.name}`,
    `Batch: ${amount(formulation.totalWeight)} g, ${formulation.ingredientCount} ingredient(s), yield ${amount(formulation.yieldPercent)}%`,
    "",
    "Nutrients per 100 g"
  ];

  const totals = [...ordering.normalizeTotalsByHeaderKey(calculateTotalRows(formulation)).values()];
  if (totals.length === 0) lines.push("  (no nutrient data)");
  for (const group of ordering.groupForDisplay(totals)) {
    lines.push(`  ${group.category}`);
    for (const row of group.rows) lines.push(`    ${row.name}: ${amount(row.amount)} ${row.unit}`);
  }

  const ingredients = totalIngredientsCostBatch(formulation);
  const processes = totalProcessCostBatch(formulation);
  lines.push(
    "",
    "Batch cost",
    `  Ingredients: ${money(ingredients.total)} (${coverage(ingredientCostCompleteness(formulation), "priced", options.decimals)})`,
    `  Processes: ${money(processes.total)} (${coverage(processCostCompleteness(formulation), "complete", options.decimals)})`,
    `  Total: ${money(totalBatchCost(formulation))}`
  );

  const target = options.target ?? recordTarget(formulation) ?? options.fallbackTarget;
  const unit = unitCostsForTargetMass(formulation, target.value, target.unit);
  lines.push(
    "",
    `Unit economics (${target.value} ${target.unit} per unit)`,
    `  Sellable mass: ${amount(unit.sellableMassG)} g`,
    `  Units: ${amount(unit.unitsCount)}`,
    `  Ingredients per unit: ${money(unit.ingredientsCostPerUnit)}`,
    `  Processes per unit: ${money(unit.processCostPerUnit)}`,
    `  Packaging per pack: ${money(unit.packagingCostPerPack)}`,
    `  Total per pack: ${money(unit.totalPackCost)}`
  );

  return lines.join("\n");
}
