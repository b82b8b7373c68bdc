export const nutrientCategories = [
  "Proximates",
  "Carbohydrates",
  "Minerals",
  "Vitamins and Other Components",
  "Lipids",
  "Amino acids",
  "Phytosterols",
  "Organic acids",
  "Oligosaccharides",
  "Isoflavones"
] as const;

export type NutrientCategory = (typeof nutrientCategories)[number];

/** Bucket for nutrients that match neither the catalog nor any inference rule. */
export const FALLBACK_NUTRIENT_CATEGORY = "Other";

export const quantityModes = ["g", "%"] as const;

export type QuantityMode = (typeof quantityModes)[number];

export const scaleTypes = ["FIXED", "VARIABLE_PER_KG", "MIXED"] as const;

export type ScaleType = (typeof scaleTypes)[number];

export const timeUnits = ["min", "h"] as const;

export type TimeUnit = (typeof timeUnits)[number];

/** Mass units a formulation (or an ingredient pack) may be expressed in. */
export const formulationMassUnits = ["g", "kg", "ton", "lb", "oz"] as const;

export type FormulationMassUnit = (typeof formulationMassUnits)[number];

export const BASE_CURRENCY_SYMBOL = "$";
export const BASE_CURRENCY_NAME = "Base currency";

/** Provenance label for foods entered by hand rather than looked up. */
export const MANUAL_DATA_TYPE = "Manual";
