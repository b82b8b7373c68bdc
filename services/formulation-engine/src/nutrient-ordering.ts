/**
 * Nutrient Ordering & Categorization
 *
 * Stable identity keys, display order and category assignment for nutrient
 * rows coming from different sources, so that merged tables and exports never
 * show the same nutrient twice.
 */

import { FALLBACK_NUTRIENT_CATEGORY, type FoodLookup, type NutrientCategory } from "@formulator/contracts";
import catalogData from "./nutrient-catalog.json" with { type: "json" };
import type { Decimal } from "./decimal.js";
import { canonicalAliasName } from "./nutrient-normalizer.js";
import { canonicalUnit } from "./units.js";

export type NutrientCatalog = Array<{ name: string; nutrients: string[] }>;

/** Any nutrient-shaped value: normalizer rows, entity nutrients, lookup entries. */
export type NutrientRef = {
  name?: string | null;
  unit?: string | null;
  sourceId?: number | null;
  sourceNumber?: string | null;
  rank?: number | null;
};

export type ReferenceInfo = {
  rank: number | null;
  category: string | null;
  unit: string | null;
};

export type HeaderKey = {
  key: string;
  name: string;
  unit: string;
};

export type NutrientTotal = {
  name: string;
  unit: string;
  amount: Decimal;
};

export type CategoryGroup<T> = {
  category: string;
  rows: T[];
};

const inference = catalogData.inference;
const aminoAcids = new Set(inference.aminoAcids);
const organicAcids = new Set(inference.organicAcids);
const oligosaccharides = new Set(inference.oligosaccharides);
const isoflavones = new Set(inference.isoflavones);
const simpleSugars = new Set(inference.simpleSugars);
const lipidNames = new Set(["cholesterol", "total lipid (fat)", "total fat (nlea)"]);
const defaultUnitsByNumber: Record<string, string> = catalogData.defaultUnitsByNumber;

/**
 * Priority used when two alias spellings land on the same header key.
 * Kept exactly as observed; extending it is a product decision.
 */
const aliasPriority: Record<string, number> = {
  "carbohydrate, by difference": 2,
  "carbohydrate, by summation": 1,
  "carbohydrate by summation": 1,
  "sugars, total": 2,
  "total sugars": 1
};

type CategoryRule = {
  category: NutrientCategory;
  matches: (lower: string) => boolean;
};

/** Ordered rules for names the catalog does not list; first match wins. */
const categoryRules: CategoryRule[] = [
  {
    category: "Vitamins and Other Components",
    matches: (lower) =>
      lower.startsWith("vitamin ") || inference.vitaminLikeFragments.some((fragment) => lower.includes(fragment))
  },
  { category: "Amino acids", matches: (lower) => aminoAcids.has(lower) },
  {
    category: "Lipids",
    matches: (lower) =>
      lower.includes("fatty acids") ||
      lower.startsWith("sfa ") ||
      lower.startsWith("mufa ") ||
      lower.startsWith("pufa ") ||
      lipidNames.has(lower)
  },
  { category: "Phytosterols", matches: (lower) => lower.includes("sterol") },
  {
    category: "Organic acids",
    matches: (lower) => organicAcids.has(lower) || (lower.endsWith("acid") && !aminoAcids.has(lower))
  },
  { category: "Oligosaccharides", matches: (lower) => oligosaccharides.has(lower) },
  { category: "Isoflavones", matches: (lower) => isoflavones.has(lower) }
];

export function defaultNutrientCatalog(): NutrientCatalog {
  return catalogData.categories.map((category) => ({ name: category.name, nutrients: [...category.nutrients] }));
}

function buildUnitMap(): Map<string, string> {
  const map = new Map<string, string>();
  const unitsByName: Record<string, string[]> = catalogData.unitsByName;
  for (const [unit, names] of Object.entries(unitsByName)) {
    for (const name of names) map.set(name.trim().toLowerCase(), unit);
  }
  return map;
}

function lowerName(ref: NutrientRef): string {
  return (ref.name ?? "").trim().toLowerCase();
}

export class NutrientOrdering {
  readonly catalog: NutrientCatalog;
  private readonly orderMap = new Map<string, number>();
  private readonly categoryMap = new Map<string, string>();
  private readonly unitMap = buildUnitMap();
  private readonly referenceMap = new Map<string, ReferenceInfo>();

  constructor(catalog: NutrientCatalog = defaultNutrientCatalog()) {
    this.catalog = catalog;
    catalog.forEach((category, categoryIndex) => {
      category.nutrients.forEach((name, offset) => {
        const key = name.trim().toLowerCase();
        this.orderMap.set(key, categoryIndex * 1000 + offset);
        this.categoryMap.set(key, category.name);
      });
    });
  }

  orderForName(name: string): number | null {
    return this.orderMap.get(name.trim().toLowerCase()) ?? null;
  }

  /**
   * Identity key of a nutrient row, in priority order: energy per unit, water
   * per unit, source id, source number, name. "" means the row cannot be merged.
   */
  nutrientKey(ref: NutrientRef): string {
    const name = lowerName(ref);
    const unit = (ref.unit ?? "").trim().toLowerCase();
    if (name === "energy" && unit) return `energy:${unit}`;
    if (name === "water") return `water|${unit}`;
    if (ref.sourceId !== null && ref.sourceId !== undefined) return `id:${ref.sourceId}`;
    if (ref.sourceNumber) return `num:${ref.sourceNumber}`;
    return name ? `name:${name}` : "";
  }

  /** Column identity `canonical_name|canonical_unit` used to deduplicate export headers. */
  headerKey(ref: NutrientRef): HeaderKey {
    const name = canonicalAliasName(ref.name ?? "");
    const unit = canonicalUnit(ref.unit || this.inferUnit(ref));
    const unitPart = unit.trim().toLowerCase();
    const namePart = name.trim().toLowerCase();
    if (namePart) return { key: `${namePart}|${unitPart}`, name, unit };

    const baseKey = this.nutrientKey(ref);
    if (!baseKey) return { key: "", name, unit };
    return { key: `${baseKey}|${unitPart}`, name, unit };
  }

  /**
   * Re-key totals by header key. When two spellings collide, the alias
   * priority decides; otherwise the later entry wins.
   */
  normalizeTotalsByHeaderKey(totals: Iterable<NutrientTotal>): Map<string, NutrientTotal> {
    const normalized = new Map<string, NutrientTotal>();
    const bestPriority = new Map<string, number>();

    for (const entry of totals) {
      const header = this.headerKey({ name: entry.name, unit: entry.unit });
      if (!header.key) continue;
      const priority = aliasPriority[entry.name.trim().toLowerCase()] ?? 0;
      if (priority < (bestPriority.get(header.key) ?? -1)) continue;
      bestPriority.set(header.key, priority);
      normalized.set(header.key, {
        name: header.name || entry.name,
        unit: header.unit || entry.unit,
        amount: entry.amount
      });
    }
    return normalized;
  }

  inferUnit(ref: NutrientRef): string {
    if (ref.unit) return ref.unit;

    const number = (ref.sourceNumber ?? "").trim();
    const byNumber = defaultUnitsByNumber[number];
    if (byNumber) return byNumber;

    const name = lowerName(ref);
    if (name.includes("energy") && name.includes("kcal")) return "kcal";
    if (name.includes("energy") && name.includes("kj")) return "kJ";
    if (inference.macroUnitHints.some((hint) => name.includes(hint)) || name.includes(":")) return "g";
    if (aminoAcids.has(name) || simpleSugars.has(name)) return "g";
    if (name === "alcohol, ethyl") return "g";
    return "";
  }

  unitForName(name: string): string {
    const lower = name.trim().toLowerCase();
    if (!lower) return "";
    const mapped = this.unitMap.get(lower);
    if (mapped) return mapped;
    const inferred = this.inferUnit({ name });
    return canonicalUnit(inferred) || inferred;
  }

  categoryFor(name: string, ref?: NutrientRef): string {
    const lower = name.trim().toLowerCase();
    const catalogued = this.categoryMap.get(lower);
    if (catalogued) return catalogued;

    const rule = categoryRules.find((candidate) => candidate.matches(lower));
    if (rule) return rule.category;

    if (ref) {
      const hint = this.referenceInfo(ref).category;
      if (hint) return hint;
    }
    return FALLBACK_NUTRIENT_CATEGORY;
  }

  /** Explicit rank, then a learned reference rank, then catalog order, else `fallback`. */
  orderFor(ref: NutrientRef, fallback: number): number {
    if (typeof ref.rank === "number") return ref.rank;
    const referenceRank = this.referenceInfo(ref).rank;
    if (referenceRank !== null) return referenceRank;
    return this.orderMap.get(lowerName(ref)) ?? fallback;
  }

  sortForDisplay<T extends NutrientRef>(rows: T[]): T[] {
    return rows
      .map((row, index) => ({ row, index, order: this.orderFor(row, index + 10000) }))
      .sort((a, b) => a.order - b.order || a.index - b.index)
      .map((entry) => entry.row);
  }

  /** Sorted rows grouped by category, groups in first-appearance order. */
  groupForDisplay<T extends NutrientRef>(rows: T[]): CategoryGroup<T>[] {
    const groups = new Map<string, T[]>();
    for (const row of this.sortForDisplay(rows)) {
      const category = this.categoryFor(row.name ?? "", row);
      const bucket = groups.get(category);
      if (bucket) bucket.push(row);
      else groups.set(category, [row]);
    }
    return [...groups.entries()].map(([category, grouped]) => ({ category, rows: grouped }));
  }

  referenceInfo(ref: NutrientRef): ReferenceInfo {
    return this.referenceMap.get(this.nutrientKey(ref)) ?? { rank: null, category: null, unit: null };
  }

  /**
   * Learn rank, category and unit hints from a food lookup payload. Entries
   * without an amount are section headers and name the category of the rows
   * that follow them.
   */
  recordReference(lookup: Pick<FoodLookup, "foodNutrients">): void {
    let currentCategory: string | null = null;
    for (const entry of lookup.foodNutrients) {
      const nutrient = entry.nutrient;
      const number = nutrient.number;
      const ref: NutrientRef = {
        name: nutrient.name,
        unit: nutrient.unitName,
        sourceId: nutrient.id,
        sourceNumber: number === null || number === undefined ? null : String(number)
      };
      const key = this.nutrientKey(ref);
      if (!key) continue;

      const info: ReferenceInfo = {
        rank: nutrient.rank ?? null,
        category: currentCategory,
        unit: nutrient.unitName ?? null
      };
      if (entry.amount === null || entry.amount === undefined) {
        currentCategory = (nutrient.name ?? "").trim() || currentCategory;
        if (!this.referenceMap.has(key)) this.referenceMap.set(key, { ...info, category: currentCategory });
        continue;
      }
      this.referenceMap.set(key, info);
    }
  }
}

