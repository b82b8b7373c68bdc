/**
 * Entity Model
 *
 * Nutrient and Food are immutable values from the food database. Ingredients,
 * cost rows and the Formulation itself are mutable and owned by one
 * formulation; the redistribution service and cost engine mutate them in place.
 */

import {
  BASE_CURRENCY_NAME,
  BASE_CURRENCY_SYMBOL,
  MANUAL_DATA_TYPE,
  quantityModes,
  type QuantityMode
} from "@formulator/contracts";
import { HUNDRED, ONE, ZERO, sumDecimals, type Decimal, type DecimalValue } from "./decimal.js";
import { ErrorCode, FormulationError, invalidEntity } from "./errors.js";
import { parseUserNumber } from "./number-parser.js";

function requireAmount(value: DecimalValue, field: string): Decimal {
  const parsed = parseUserNumber(value);
  if (parsed === null) throw invalidEntity(`${field} is not a number: ${String(value)}`, { field });
  if (parsed.lt(0)) {
    throw invalidEntity(`${field} cannot be negative: ${parsed.toString()}`, { field });
  }
  return parsed;
}

function optionalAmount(value: DecimalValue | null | undefined): Decimal | null {
  return parseUserNumber(value);
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = (value ?? "").trim();
  return trimmed ? trimmed : null;
}

// ============================================================================
// NUTRIENT / FOOD
// ============================================================================

export interface NutrientInit {
  name: string;
  unit: string;
  amount: DecimalValue;
  sourceId?: number | null;
  sourceNumber?: string | null;
}

export class Nutrient {
  readonly name: string;
  readonly unit: string;
  /** Per 100 g of the food. */
  readonly amount: Decimal;
  readonly sourceId: number | null;
  readonly sourceNumber: string | null;

  constructor(init: NutrientInit) {
    if (!init.name.trim()) throw invalidEntity("Nutrient name cannot be empty");
    if (!init.unit.trim()) throw invalidEntity(`Nutrient unit cannot be empty: ${init.name}`);
    this.name = init.name;
    this.unit = init.unit;
    this.amount = requireAmount(init.amount, `Nutrient amount (${init.name})`);
    this.sourceId = init.sourceId ?? null;
    this.sourceNumber = init.sourceNumber ?? null;
    Object.freeze(this);
  }

  scale(factor: DecimalValue): Nutrient {
    return new Nutrient({
      name: this.name,
      unit: this.unit,
      amount: this.amount.times(factor),
      sourceId: this.sourceId,
      sourceNumber: this.sourceNumber
    });
  }
}

export interface FoodInit {
  fdcId: number;
  description: string;
  dataType: string;
  brandOwner?: string | null;
  nutrients?: Iterable<Nutrient>;
}

export class Food {
  readonly fdcId: number;
  readonly description: string;
  readonly dataType: string;
  readonly brandOwner: string;
  readonly nutrients: readonly Nutrient[];

  constructor(init: FoodInit) {
    const isManual = init.dataType.trim().toLowerCase() === MANUAL_DATA_TYPE.toLowerCase();
    if (!Number.isInteger(init.fdcId) || (init.fdcId <= 0 && !isManual)) {
      throw invalidEntity(`Invalid FDC ID: ${init.fdcId}`, { fdcId: init.fdcId });
    }
    if (!init.description.trim()) throw invalidEntity("Food description cannot be empty");
    if (!init.dataType.trim()) throw invalidEntity("Food data type cannot be empty");

    this.fdcId = init.fdcId;
    this.description = init.description;
    this.dataType = init.dataType;
    this.brandOwner = init.brandOwner ?? "";
    this.nutrients = Object.freeze([...(init.nutrients ?? [])]);
    Object.freeze(this);
  }

  /** Case-insensitive; first match wins. */
  getNutrient(name: string): Nutrient | null {
    const lower = name.toLowerCase();
    return this.nutrients.find((nutrient) => nutrient.name.toLowerCase() === lower) ?? null;
  }

  hasNutrient(name: string): boolean {
    return this.getNutrient(name) !== null;
  }
}

// ============================================================================
// INGREDIENT
// ============================================================================

export interface IngredientCostInit {
  costPackAmount?: DecimalValue | null;
  costPackUnit?: string | null;
  costValue?: DecimalValue | null;
  costCurrencySymbol?: string | null;
  costPerGBase?: DecimalValue | null;
}

export interface IngredientInit extends IngredientCostInit {
  food: Food;
  amountG: DecimalValue;
  locked?: boolean;
}

export class Ingredient {
  readonly food: Food;
  amountG: Decimal;
  locked: boolean;
  costPackAmount: Decimal | null;
  costPackUnit: string | null;
  costValue: Decimal | null;
  costCurrencySymbol: string | null;
  /** Derived by the cost engine: base-currency cost of one gram. */
  costPerGBase: Decimal | null;

  constructor(init: IngredientInit) {
    this.food = init.food;
    this.amountG = requireAmount(init.amountG, `Ingredient amount (${init.food.description})`);
    this.locked = init.locked ?? false;
    this.costPackAmount = optionalAmount(init.costPackAmount);
    this.costPackUnit = optionalText(init.costPackUnit);
    this.costValue = optionalAmount(init.costValue);
    this.costCurrencySymbol = optionalText(init.costCurrencySymbol);
    this.costPerGBase = optionalAmount(init.costPerGBase);
  }

  get fdcId(): number {
    return this.food.fdcId;
  }

  get description(): string {
    return this.food.description;
  }

  percentageOf(totalWeight: Decimal): Decimal {
    if (totalWeight.isZero()) return ZERO;
    return this.amountG.div(totalWeight).times(HUNDRED);
  }

  /** Absolute amount this ingredient contributes (source values are per 100 g). */
  nutrientAmount(name: string): Decimal {
    const nutrient = this.food.getNutrient(name);
    if (!nutrient) return ZERO;
    return nutrient.amount.times(this.amountG.div(HUNDRED));
  }
}

// ============================================================================
// COST ROWS
// ============================================================================

export interface ProcessCostInit {
  name: string;
  scaleType: string;
  timeValue?: DecimalValue | null;
  timeUnit?: string | null;
  costPerHour?: DecimalValue | null;
  totalCost?: DecimalValue | null;
  setupTimeValue?: DecimalValue | null;
  setupTimeUnit?: string | null;
  timePerKgValue?: DecimalValue | null;
  notes?: string | null;
}

/** Every numeric field is optional: cost entry is incremental. */
export class ProcessCost {
  name: string;
  /** FIXED, VARIABLE_PER_KG or MIXED; anything else never resolves to a cost. */
  scaleType: string;
  timeValue: Decimal | null;
  timeUnit: string | null;
  costPerHour: Decimal | null;
  totalCost: Decimal | null;
  setupTimeValue: Decimal | null;
  setupTimeUnit: string | null;
  timePerKgValue: Decimal | null;
  notes: string | null;

  constructor(init: ProcessCostInit) {
    this.name = init.name;
    this.scaleType = init.scaleType;
    this.timeValue = optionalAmount(init.timeValue);
    this.timeUnit = optionalText(init.timeUnit);
    this.costPerHour = optionalAmount(init.costPerHour);
    this.totalCost = optionalAmount(init.totalCost);
    this.setupTimeValue = optionalAmount(init.setupTimeValue);
    this.setupTimeUnit = optionalText(init.setupTimeUnit);
    this.timePerKgValue = optionalAmount(init.timePerKgValue);
    this.notes = init.notes ?? null;
  }
}

export interface PackagingItemInit {
  name: string;
  quantityPerPack: DecimalValue;
  /** Unit cost already in base currency. */
  unitCost?: DecimalValue | null;
  /** Unit cost in `unitCostCurrencySymbol`; takes precedence over `unitCost`. */
  unitCostValue?: DecimalValue | null;
  unitCostCurrencySymbol?: string | null;
  notes?: string | null;
}

export class PackagingItem {
  name: string;
  quantityPerPack: Decimal;
  unitCost: Decimal | null;
  unitCostValue: Decimal | null;
  unitCostCurrencySymbol: string | null;
  notes: string | null;

  constructor(init: PackagingItemInit) {
    this.name = init.name;
    this.quantityPerPack = requireAmount(init.quantityPerPack, `Packaging quantity (${init.name})`);
    this.unitCost = optionalAmount(init.unitCost);
    this.unitCostValue = optionalAmount(init.unitCostValue);
    this.unitCostCurrencySymbol = optionalText(init.unitCostCurrencySymbol);
    this.notes = init.notes ?? null;
  }
}

export interface CurrencyRateInit {
  name?: string;
  symbol: string;
  rateToBase: DecimalValue;
}

export class CurrencyRate {
  name: string;
  symbol: string;
  /** Base-currency units per one unit of this currency. */
  rateToBase: Decimal;

  constructor(init: CurrencyRateInit) {
    this.name = init.name ?? "";
    this.symbol = init.symbol;
    this.rateToBase = parseUserNumber(init.rateToBase) ?? ZERO;
  }

  static base(): CurrencyRate {
    return new CurrencyRate({ name: BASE_CURRENCY_NAME, symbol: BASE_CURRENCY_SYMBOL, rateToBase: ONE });
  }
}

// ============================================================================
// FORMULATION
// ============================================================================

export interface FormulationInit {
  name: string;
  ingredients?: Ingredient[];
  quantityMode?: string;
  yieldPercent?: DecimalValue | null;
  processCosts?: ProcessCost[];
  packagingItems?: PackagingItem[];
  currencyRates?: CurrencyRate[];
  costTargetMassValue?: DecimalValue | null;
  costTargetMassUnit?: string | null;
}

function isQuantityMode(value: string): value is QuantityMode {
  return quantityModes.some((mode) => mode === value);
}

export class Formulation {
  name: string;
  readonly ingredients: Ingredient[];
  readonly processCosts: ProcessCost[];
  readonly packagingItems: PackagingItem[];
  costTargetMassValue: Decimal | null;
  costTargetMassUnit: string | null;
  private mode: QuantityMode = "g";
  private yieldValue: Decimal = HUNDRED;
  private rates: CurrencyRate[] = [];

  constructor(init: FormulationInit) {
    if (!init.name.trim()) throw invalidEntity("Formulation name cannot be empty");
    this.name = init.name;
    this.ingredients = [...(init.ingredients ?? [])];
    this.processCosts = [...(init.processCosts ?? [])];
    this.packagingItems = [...(init.packagingItems ?? [])];
    this.quantityMode = init.quantityMode ?? "g";
    this.yieldPercent = init.yieldPercent ?? null;
    this.currencyRates = init.currencyRates ?? [];
    this.costTargetMassValue = optionalAmount(init.costTargetMassValue);
    this.costTargetMassUnit = optionalText(init.costTargetMassUnit);
  }

  get quantityMode(): QuantityMode {
    return this.mode;
  }

  set quantityMode(value: string) {
    if (!isQuantityMode(value)) throw invalidEntity(`Invalid quantity mode: ${value}`, { quantityMode: value });
    this.mode = value;
  }

  get yieldPercent(): Decimal {
    return this.yieldValue;
  }

  /** Anything outside (0, 100], or unparseable, resets to 100. */
  set yieldPercent(value: DecimalValue | null) {
    const parsed = parseUserNumber(value);
    this.yieldValue = parsed === null || parsed.lte(0) || parsed.gt(HUNDRED) ? HUNDRED : parsed;
  }

  get currencyRates(): readonly CurrencyRate[] {
    return this.rates;
  }

  set currencyRates(rates: readonly CurrencyRate[]) {
    this.rates = [...rates];
    this.ensureCurrencyRates();
  }

  addCurrencyRate(rate: CurrencyRate): void {
    this.rates.push(rate);
    this.ensureCurrencyRates();
  }

  removeCurrencyRate(symbol: string): void {
    this.rates = this.rates.filter((rate) => rate.symbol.trim() !== symbol.trim());
    this.ensureCurrencyRates();
  }

  /**
   * Restore the base-currency invariant: blank symbols dropped, "$" pinned to
   * rate 1, duplicate symbols dropped (first wins), "$" first when missing.
   */
  ensureCurrencyRates(): void {
    const seen = new Set<string>();
    const cleaned: CurrencyRate[] = [];
    for (const rate of this.rates) {
      const symbol = rate.symbol.trim();
      if (!symbol || seen.has(symbol)) continue;
      rate.symbol = symbol;
      if (symbol === BASE_CURRENCY_SYMBOL) {
        rate.name = BASE_CURRENCY_NAME;
        rate.rateToBase = ONE;
      }
      cleaned.push(rate);
      seen.add(symbol);
    }
    if (!seen.has(BASE_CURRENCY_SYMBOL)) cleaned.unshift(CurrencyRate.base());
    this.rates = cleaned;
  }

  get totalWeight(): Decimal {
    return sumDecimals(this.ingredients.map((ingredient) => ingredient.amountG));
  }

  get lockedWeight(): Decimal {
    return sumDecimals(this.lockedIngredients().map(([, ingredient]) => ingredient.amountG));
  }

  get ingredientCount(): number {
    return this.ingredients.length;
  }

  lockedIngredients(): Array<[number, Ingredient]> {
    return this.ingredients.flatMap((ingredient, index): Array<[number, Ingredient]> =>
      ingredient.locked ? [[index, ingredient]] : []
    );
  }

  unlockedIngredients(): Array<[number, Ingredient]> {
    return this.ingredients.flatMap((ingredient, index): Array<[number, Ingredient]> =>
      ingredient.locked ? [] : [[index, ingredient]]
    );
  }

  addIngredient(ingredient: Ingredient): void {
    this.ingredients.push(ingredient);
  }

  removeIngredient(index: number): Ingredient {
    const ingredient = this.ingredientAt(index);
    this.ingredients.splice(index, 1);
    return ingredient;
  }

  ingredientAt(index: number): Ingredient {
    const ingredient = Number.isInteger(index) ? this.ingredients[index] : undefined;
    if (!ingredient) {
      throw new FormulationError(`Invalid ingredient index: ${index}`, ErrorCode.INGREDIENT_NOT_FOUND, { index });
    }
    return ingredient;
  }

  clear(): void {
    this.ingredients.length = 0;
  }

  isEmpty(): boolean {
    return this.ingredients.length === 0;
  }
}
