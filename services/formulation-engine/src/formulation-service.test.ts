import { describe, expect, it } from "vitest";
import { Decimal } from "./decimal.js";
import { isFormulationError } from "./errors.js";
import { FormulationService, withLockOverride } from "./formulation-service.js";
import { Food, Formulation, Ingredient } from "./models.js";

const service = new FormulationService();

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isFormulationError(error) ? error.code : "not-a-formulation-error";
  }
  return undefined;
}

function formulation(...amounts: Array<string | [string, "locked"]>): Formulation {
  return new Formulation({
    name: "Batch",
    ingredients: amounts.map((entry, index) => {
      const [amountG, locked]: [string, boolean] = typeof entry === "string" ? [entry, false] : [entry[0], true];
      return new Ingredient({
        food: new Food({ fdcId: index + 1, description: `Food ${index + 1}`, dataType: "Foundation" }),
        amountG,
        locked,
      });
    }),
  });
}

function amounts(f: Formulation): string[] {
  return f.ingredients.map((ingredient) => ingredient.amountG.toString());
}

describe("adjustToTargetWeight", () => {
  it("scales unlocked ingredients around locked ones", () => {
    const f = formulation(["50", "locked"], "30", "20");
    service.adjustToTargetWeight(f, "150");
    expect(amounts(f)).toEqual(["50", "60", "40"]);
  });

  it("hits the target exactly", () => {
    const f = formulation("1", "1", "1");
    service.adjustToTargetWeight(f, 100);
    expect(f.totalWeight.eq(100)).toBe(true);

    const g = formulation(["12.5", "locked"], "7", "3", "11");
    service.adjustToTargetWeight(g, "1000");
    expect(g.totalWeight.toString()).toBe("1000");
    expect(g.ingredients[0]?.amountG.toString()).toBe("12.5");
  });

  it("rejects a non-positive target without mutating", () => {
    const f = formulation("50", "50");
    expect(errorCode(() => service.adjustToTargetWeight(f, 0))).toBe("TARGET_NOT_POSITIVE");
    expect(errorCode(() => service.adjustToTargetWeight(f, "-5"))).toBe("TARGET_NOT_POSITIVE");
    expect(amounts(f)).toEqual(["50", "50"]);
  });

  it("rejects targets below the locked weight", () => {
    const f = formulation(["50", "locked"], "50");
    expect(errorCode(() => service.adjustToTargetWeight(f, 40))).toBe("LOCKED_EXCEEDS_TARGET");
    expect(amounts(f)).toEqual(["50", "50"]);
  });

  it("accepts an all-locked formulation only at its current total", () => {
    const f = formulation(["60", "locked"], ["40", "locked"]);
    expect(() => service.adjustToTargetWeight(f, 100)).not.toThrow();
    expect(errorCode(() => service.adjustToTargetWeight(f, 120))).toBe("ALL_LOCKED");
  });

  it("rejects weightless unlocked ingredients", () => {
    const f = formulation(["50", "locked"], "0");
    expect(errorCode(() => service.adjustToTargetWeight(f, 80))).toBe("UNLOCKED_ZERO_WEIGHT");
  });

  it("rejects unparseable targets", () => {
    expect(errorCode(() => service.adjustToTargetWeight(formulation("1"), "lots"))).toBe("INVALID_ENTITY");
  });
});

describe("setIngredientAmount", () => {
  it("keeps the total by adjusting the other unlocked ingredients", () => {
    const f = formulation("50", "30", "20");
    service.setIngredientAmount(f, 0, "60");
    expect(amounts(f)).toEqual(["60", "24", "16"]);
    expect(f.ingredients[0]?.locked).toBe(false);
  });

  it("leaves other locked ingredients alone", () => {
    const f = formulation("50", ["30", "locked"], "20");
    service.setIngredientAmount(f, 0, 60);
    expect(amounts(f)).toEqual(["60", "30", "10"]);
  });

  it("restores the amount and lock state on failure", () => {
    const f = formulation("50", ["30", "locked"], ["20", "locked"]);
    expect(errorCode(() => service.setIngredientAmount(f, 0, "60"))).toBe("ALL_LOCKED");
    expect(amounts(f)).toEqual(["50", "30", "20"]);
    expect(f.ingredients[0]?.locked).toBe(false);
  });

  it("keeps a locked ingredient locked", () => {
    const f = formulation(["50", "locked"], "50");
    service.setIngredientAmount(f, 0, "70");
    expect(amounts(f)).toEqual(["70", "30"]);
    expect(f.ingredients[0]?.locked).toBe(true);
  });

  it("sets the amount directly without maintaining the total", () => {
    const f = formulation("50", "30", "20");
    service.setIngredientAmount(f, 0, "70", false);
    expect(amounts(f)).toEqual(["70", "30", "20"]);
    expect(f.totalWeight.toString()).toBe("120");
  });

  it("rejects negative amounts and unknown rows", () => {
    const f = formulation("50", "50");
    expect(errorCode(() => service.setIngredientAmount(f, 0, "-1"))).toBe("NEGATIVE_AMOUNT");
    expect(errorCode(() => service.setIngredientAmount(f, 9, "1"))).toBe("INGREDIENT_NOT_FOUND");
    expect(amounts(f)).toEqual(["50", "50"]);
  });
});

describe("withLockOverride", () => {
  it("restores the lock after a throw", () => {
    const [ingredient] = formulation("10").ingredients;
    if (!ingredient) throw new Error("fixture");
    expect(() =>
      withLockOverride(ingredient, true, () => {
        expect(ingredient.locked).toBe(true);
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(ingredient.locked).toBe(false);
    expect(withLockOverride(ingredient, true, () => "done")).toBe("done");
  });
});

describe("applyPercentEdit", () => {
  it("rescales free ingredients to fill the remaining budget", () => {
    const f = formulation("50", "30", "20");
    service.applyPercentEdit(f, 0, "60");
    expect(amounts(f)).toEqual(["60", "24", "16"]);
  });

  it("recomputes amounts against the current total", () => {
    const f = formulation("100", "60", "40");
    service.applyPercentEdit(f, 2, 50);
    expect(amounts(f)).toEqual(["62.5", "37.5", "100"]);
  });

  it("keeps other locked ingredients' share", () => {
    const f = formulation(["50", "locked"], "30", "20");
    service.applyPercentEdit(f, 1, "40");
    expect(amounts(f)).toEqual(["50", "40", "10"]);
  });

  it("gives the whole budget to the first free ingredient when free shares are zero", () => {
    const f = formulation("100", "0", "0");
    service.applyPercentEdit(f, 0, "40");
    expect(amounts(f)).toEqual(["40", "60", "0"]);
  });

  it("uses a 100 g base for an empty batch", () => {
    const f = formulation("0", "0");
    service.applyPercentEdit(f, 0, "25");
    expect(amounts(f)).toEqual(["25", "75"]);
  });

  it("fails atomically on budget violations", () => {
    const f = formulation(["50", "locked"], "30", "20");
    expect(errorCode(() => service.applyPercentEdit(f, 1, "101"))).toBe("PERCENT_OUT_OF_RANGE");
    expect(errorCode(() => service.applyPercentEdit(f, 1, "-1"))).toBe("PERCENT_OUT_OF_RANGE");
    expect(errorCode(() => service.applyPercentEdit(f, 5, "10"))).toBe("INGREDIENT_NOT_FOUND");
    expect(errorCode(() => service.applyPercentEdit(f, 1, "60"))).toBe("PERCENT_BUDGET_NEGATIVE");
    expect(amounts(f)).toEqual(["50", "30", "20"]);
  });

  it("fails when nothing can absorb the remainder", () => {
    const f = formulation(["50", "locked"], "50");
    expect(errorCode(() => service.applyPercentEdit(f, 1, "40"))).toBe("NO_FREE_INGREDIENTS");
    expect(amounts(f)).toEqual(["50", "50"]);
  });
});

describe("normalizeTo100g", () => {
  it("scales everything, locked or not", () => {
    const f = formulation(["50", "locked"], "150");
    service.normalizeTo100g(f);
    expect(amounts(f)).toEqual(["25", "75"]);
  });

  it("is a no-op for empty batches", () => {
    const f = formulation("0", "0");
    service.normalizeTo100g(f);
    expect(amounts(f)).toEqual(["0", "0"]);
  });
});

describe("distributePercentages", () => {
  it("re-expresses proportions over a new total", () => {
    const f = formulation("1", "3");
    service.distributePercentages(f, "200");
    expect(amounts(f)).toEqual(["50", "150"]);
    service.distributePercentages(f);
    expect(amounts(f)).toEqual(["25", "75"]);
  });
});

describe("locking", () => {
  it("locks and unlocks by index", () => {
    const f = formulation("10", "20");
    service.lockIngredient(f, 1);
    expect(f.lockedWeight.toString()).toBe("20");
    service.unlockIngredient(f, 1);
    expect(f.lockedWeight.toString()).toBe("0");
    expect(errorCode(() => service.lockIngredient(f, 2))).toBe("INGREDIENT_NOT_FOUND");
  });
});

describe("scaleAll", () => {
  it("round-trips within decimal tolerance", () => {
    const f = formulation("50", ["30", "locked"], "20");
    const before = f.ingredients.map((ingredient) => ingredient.amountG);
    service.scaleAll(f, 3);
    expect(amounts(f)).toEqual(["150", "90", "60"]);
    service.scaleAll(f, new Decimal(1).div(3));
    f.ingredients.forEach((ingredient, index) => {
      const original = before[index] ?? new Decimal(0);
      expect(ingredient.amountG.minus(original).abs().lt("1e-30")).toBe(true);
    });
  });

  it("rejects non-positive factors", () => {
    expect(errorCode(() => service.scaleAll(formulation("1"), 0))).toBe("TARGET_NOT_POSITIVE");
  });
});
