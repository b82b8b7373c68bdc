import type { FormulationMassUnit } from "@formulator/contracts";
import { Decimal, type DecimalValue } from "./decimal.js";

export const MICROGRAM = "μg";

const microAliases = new Set(["ug", "mcg", "µg", "μg", "æg"]);

const massUnitAliases: Record<string, string> = {
  g: "g",
  gram: "g",
  grams: "g",
  gramo: "g",
  gramos: "g",
  kg: "kg",
  kilogram: "kg",
  kilograms: "kg",
  kilogramo: "kg",
  kilogramos: "kg",
  t: "ton",
  tn: "ton",
  ton: "ton",
  tonne: "ton",
  tonnes: "ton",
  tonelada: "ton",
  toneladas: "ton",
  lb: "lb",
  lbs: "lb",
  libra: "lb",
  libras: "lb",
  pound: "lb",
  pounds: "lb",
  oz: "oz",
  onza: "oz",
  onzas: "oz",
  ounce: "oz",
  ounces: "oz",
  mg: "mg"
};

/** Gram equivalents of every mass unit the engine converts between. */
const gramsPerUnit: Record<string, Decimal> = {
  [MICROGRAM]: new Decimal("0.000001"),
  mg: new Decimal("0.001"),
  g: new Decimal(1),
  kg: new Decimal(1000),
  ton: new Decimal(1_000_000),
  lb: new Decimal("453.59237"),
  oz: new Decimal("28.349523125")
};

const formulationMassUnits = new Set<string>(["g", "kg", "ton", "lb", "oz"]);

export const KCAL_TO_KJ = new Decimal("4.184");

/**
 * Map case and alias variants of a unit to one representative string.
 * Unknown tokens pass through lower-cased; blank input yields "".
 */
export function canonicalUnit(unit: string | null | undefined): string {
  const cleaned = (unit ?? "").trim();
  if (!cleaned) return "";

  const lower = cleaned.toLowerCase();
  if (microAliases.has(lower)) return MICROGRAM;
  if (lower === "kj" || lower === "kilojoule" || lower === "kilojoules") return "kJ";
  if (lower === "kcal" || lower === "kilocalorie" || lower === "kilocalories") return "kcal";
  if (lower === "iu") return "iu";
  return massUnitAliases[lower] ?? lower;
}

/** Narrow a unit to the mass units a formulation or pack may use, else "". */
export function normalizeMassUnit(unit: string | null | undefined): FormulationMassUnit | "" {
  const canonical = massUnitAliases[(unit ?? "").trim().toLowerCase()];
  if (canonical && isFormulationMassUnit(canonical)) return canonical;
  return "";
}

function isFormulationMassUnit(unit: string): unit is FormulationMassUnit {
  return formulationMassUnits.has(unit);
}

export function convertMass(value: DecimalValue, fromUnit: string, toUnit: string): Decimal | null {
  const source = canonicalUnit(fromUnit);
  const target = canonicalUnit(toUnit);
  if (!source || !target) return null;
  if (source === target) return new Decimal(value);

  const sourceFactor = gramsPerUnit[source];
  const targetFactor = gramsPerUnit[target];
  if (!sourceFactor || !targetFactor) return null;
  return new Decimal(value).times(sourceFactor).div(targetFactor);
}

export function convertEnergy(value: DecimalValue, fromUnit: string, toUnit: string): Decimal | null {
  const source = canonicalUnit(fromUnit);
  const target = canonicalUnit(toUnit);
  if (source !== "kcal" && source !== "kJ") return null;
  if (target !== "kcal" && target !== "kJ") return null;
  if (source === target) return new Decimal(value);
  return source === "kcal" ? new Decimal(value).times(KCAL_TO_KJ) : new Decimal(value).div(KCAL_TO_KJ);
}

/** Convert between compatible units, mass or energy. */
export function convertAmount(value: DecimalValue, fromUnit: string, toUnit: string): Decimal | null {
  return convertMass(value, fromUnit, toUnit) ?? convertEnergy(value, fromUnit, toUnit);
}

export function massToG(value: DecimalValue, unit: string): Decimal | null {
  return convertMass(value, unit, "g");
}

export function massToKg(value: DecimalValue, unit: string): Decimal | null {
  return convertMass(value, unit, "kg");
}
