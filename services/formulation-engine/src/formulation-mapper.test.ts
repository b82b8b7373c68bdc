import { afterEach, describe, expect, it, vi } from "vitest";
import { isFormulationError } from "./errors.js";
import {
  addIngredientFromLookup,
  foodFromLookup,
  formulationFromRecord,
  formulationToRecord,
} from "./formulation-mapper.js";
import {
  CurrencyRate,
  Food,
  Formulation,
  Ingredient,
  Nutrient,
  PackagingItem,
  ProcessCost,
} from "./models.js";
import { NutrientOrdering } from "./nutrient-ordering.js";

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isFormulationError(error) ? error.code : "not-a-formulation-error";
  }
  return undefined;
}

function granola(): Formulation {
  const oats = new Food({
    fdcId: 10,
    description: "Oats",
    dataType: "Foundation",
    nutrients: [new Nutrient({ name: "Protein", unit: "g", amount: "13.5", sourceId: 1003, sourceNumber: "203" })],
  });
  return new Formulation({
    name: "Granola",
    quantityMode: "%",
    yieldPercent: "90",
    costTargetMassValue: "250",
    costTargetMassUnit: "g",
    ingredients: [
      new Ingredient({
        food: oats,
        amountG: "40",
        locked: true,
        costPackAmount: "1",
        costPackUnit: "kg",
        costValue: "3",
        costCurrencySymbol: "$",
      }),
    ],
    processCosts: [new ProcessCost({ name: "Bake", scaleType: "FIXED", timeValue: "45", timeUnit: "min", costPerHour: "12" })],
    packagingItems: [
      new PackagingItem({ name: "Bag", quantityPerPack: "1", unitCostValue: "0.02", unitCostCurrencySymbol: "€" }),
    ],
    currencyRates: [new CurrencyRate({ name: "Euro", symbol: "€", rateToBase: "20" })],
  });
}

describe("formulationToRecord", () => {
  it("writes decimals as strings and the base currency first", () => {
    const record = formulationToRecord(granola());
    expect(record.quantity_mode).toBe("%");
    expect(record.yield_percent).toBe("90");
    expect(record.cost_target_mass_value).toBe("250");
    expect(record.currency_rates).toEqual([
      { name: "Base currency", symbol: "$", rate_to_base: "1" },
      { name: "Euro", symbol: "€", rate_to_base: "20" },
    ]);
    expect(record.ingredients[0]).toEqual({
      fdc_id: 10,
      description: "Oats",
      data_type: "Foundation",
      brand_owner: "",
      amount_g: "40",
      locked: true,
      cost_pack_amount: "1",
      cost_pack_unit: "kg",
      cost_value: "3",
      cost_currency_symbol: "$",
      cost_per_g: null,
      nutrients: [{ name: "Protein", unit: "g", amount: "13.5", nutrient_id: 1003, nutrient_number: "203" }],
    });
    expect(record.process_costs[0]).toMatchObject({ scale_type: "FIXED", time_value: "45", cost_per_hour: "12", total_cost: null });
  });

  it("survives a JSON round trip unchanged", () => {
    const record = formulationToRecord(granola());
    const restored = formulationFromRecord(JSON.parse(JSON.stringify(record)));
    expect(formulationToRecord(restored)).toEqual(record);
  });
});

describe("formulationFromRecord", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects records that break the schema", () => {
    expect(errorCode(() => formulationFromRecord({ name: "" }))).toBe("INVALID_RECORD");
    expect(() => formulationFromRecord({ name: "" })).toThrow(/^Invalid formulation record: name: /);
    expect(errorCode(() => formulationFromRecord("not a record"))).toBe("INVALID_RECORD");
  });

  it("reports entity violations as INVALID_ENTITY", () => {
    const record = {
      name: "Broken",
      ingredients: [{ fdc_id: 10, description: "Oats", data_type: "Foundation", amount_g: "-5" }],
    };
    expect(errorCode(() => formulationFromRecord(record))).toBe("INVALID_ENTITY");
  });

  it("reads legacy base-currency keys", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const formulation = formulationFromRecord({
      name: "Legacy",
      ingredients: [{ fdc_id: 10, description: "Oats", data_type: "Foundation", amount_g: 40, cost_per_g_mn: "0.003" }],
      process_costs: [{ name: "Mix", scale_type: "FIXED", total_cost_mn: "12", cost_per_hour_mn: 6 }],
      packaging_items: [{ name: "Bag", quantity_per_pack: 1, unit_cost_mn: "0.4" }],
      currency_rates: [{ symbol: "€", rate_to_mn: "20" }, { symbol: "£" }],
    });

    expect(formulation.ingredients[0]?.costPerGBase?.toString()).toBe("0.003");
    expect(formulation.processCosts[0]?.totalCost?.toString()).toBe("12");
    expect(formulation.processCosts[0]?.costPerHour?.toString()).toBe("6");
    expect(formulation.packagingItems[0]?.unitCost?.toString()).toBe("0.4");
    expect(formulation.currencyRates.map((rate) => [rate.symbol, rate.rateToBase.toString()])).toEqual([
      ["$", "1"],
      ["€", "20"],
    ]);
    expect(warn).toHaveBeenCalledWith('[formulation-mapper] Dropped currency rate "£" without a numeric rate');
  });

  it("prefers current keys over legacy ones", () => {
    const formulation = formulationFromRecord({
      name: "Both",
      ingredients: [
        {
          fdc_id: 10,
          description: "Oats",
          data_type: "Foundation",
          amount_g: 40,
          cost_per_g: "0.004",
          cost_per_g_mn: "0.003",
        },
      ],
    });
    expect(formulation.ingredients[0]?.costPerGBase?.toString()).toBe("0.004");
    expect(formulation.quantityMode).toBe("g");
    expect(formulation.yieldPercent.toString()).toBe("100");
  });
});

describe("foodFromLookup", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const peanutButter = {
    fdcId: 1001,
    description: "Peanut butter",
    dataType: "Branded",
    brandOwner: "Test Foods",
    foodNutrients: [
      { nutrient: { name: "Protein", unitName: "G", id: 1003, number: "203", rank: 600 }, amount: 25 },
      { nutrient: { name: "Total lipid (fat)", unitName: "g", id: 1004, number: 204 }, amount: 50 },
      { nutrient: { name: "Carbohydrate, by difference", unitName: "g" }, amount: "20" },
      { nutrient: { name: "Sodium, Na", unitName: "MG" }, amount: null },
      { nutrient: { name: "Fiber, total dietary" }, amount: 3 },
      { nutrient: { name: "Mystery compound" }, amount: 1 },
    ],
  };

  it("normalizes the nutrient list", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const food = foodFromLookup(peanutButter);

    expect(food.fdcId).toBe(1001);
    expect(food.brandOwner).toBe("Test Foods");
    expect(food.nutrients.map((n) => `${n.name}|${n.unit}|${n.amount.toString()}`)).toEqual([
      "Nitrogen|g|4",
      "Water|g|2",
      "Energy|kcal|630",
      "Energy|kJ|2635.92",
      "Protein|g|25",
      "Total lipid (fat)|g|50",
      "Total fat (NLEA)|g|50",
      "Carbohydrate, by difference|g|20",
      "Fiber, total dietary|g|3",
    ]);
  });

  it("keeps source ids on looked-up rows only", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const food = foodFromLookup(peanutButter);
    const lipid = food.getNutrient("Total lipid (fat)");
    const nlea = food.getNutrient("Total fat (NLEA)");
    expect([lipid?.sourceId, lipid?.sourceNumber]).toEqual([1004, "204"]);
    expect([nlea?.sourceId, nlea?.sourceNumber]).toEqual([null, null]);
  });

  it("warns about rows it drops", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    foodFromLookup(peanutButter);
    expect(warn).toHaveBeenCalledWith(
      "[formulation-mapper] Dropped 2 nutrient row(s) without an amount or unit for food 1001"
    );
  });

  it("records payload ranks on the ordering", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const ordering = new NutrientOrdering();
    foodFromLookup(peanutButter, ordering);
    expect(ordering.orderFor({ name: "Protein", sourceId: 1003 }, 0)).toBe(600);
  });

  it("rejects malformed payloads", () => {
    expect(errorCode(() => foodFromLookup({ description: "No id" }))).toBe("INVALID_RECORD");
    expect(errorCode(() => foodFromLookup({ fdcId: 5, description: "", dataType: "Foundation" }))).toBe(
      "INVALID_ENTITY"
    );
  });
});

describe("addIngredientFromLookup", () => {
  it("appends an unlocked ingredient with the looked-up food", () => {
    const formulation = new Formulation({ name: "Batch" });
    const ingredient = addIngredientFromLookup(
      formulation,
      {
        fdcId: 2002,
        description: "Rolled oats",
        dataType: "Foundation",
        foodNutrients: [{ nutrient: { name: "Protein", unitName: "g" }, amount: 13 }],
      },
      "150"
    );

    expect(formulation.ingredients).toEqual([ingredient]);
    expect(ingredient.locked).toBe(false);
    expect(ingredient.amountG.toString()).toBe("150");
    expect(ingredient.nutrientAmount("Protein").toString()).toBe("19.5");
  });
});
