/**
 * Formulation Redistribution Service
 *
 * Lock-aware proportional scaling of ingredient amounts. Locked ingredients
 * keep their absolute weight; unlocked ones absorb every change in proportion
 * to their current share. Each operation validates before it mutates, so a
 * failure leaves the formulation as it was.
 */

import { HUNDRED, ZERO, sumDecimals, type Decimal, type DecimalValue } from "./decimal.js";
import { ErrorCode, FormulationError } from "./errors.js";
import type { Formulation, Ingredient } from "./models.js";
import { parseUserNumber } from "./number-parser.js";

function requireNumber(value: DecimalValue, label: string): Decimal {
  const parsed = parseUserNumber(value);
  if (parsed === null) {
    throw new FormulationError(`${label} is not a number: ${String(value)}`, ErrorCode.INVALID_ENTITY, { value });
  }
  return parsed;
}

/**
 * Run `fn` with the ingredient's lock forced to `locked`; the original state is
 * restored on every exit path.
 */
export function withLockOverride<T>(ingredient: Ingredient, locked: boolean, fn: () => T): T {
  const wasLocked = ingredient.locked;
  ingredient.locked = locked;
  try {
    return fn();
  } finally {
    ingredient.locked = wasLocked;
  }
}

export class FormulationService {
  /**
   * Scale unlocked ingredients so the total weight equals `target`.
   * Postcondition: `totalWeight == target` exactly and locked amounts are unchanged.
   */
  adjustToTargetWeight(formulation: Formulation, target: DecimalValue): void {
    const targetWeight = requireNumber(target, "Target weight");
    if (targetWeight.lte(0)) {
      throw new FormulationError(
        `Target weight must be positive: ${targetWeight.toString()}`,
        ErrorCode.TARGET_NOT_POSITIVE,
        { target: targetWeight.toString() }
      );
    }

    const lockedWeight = formulation.lockedWeight;
    if (lockedWeight.gt(targetWeight)) {
      throw new FormulationError(
        `Locked weight (${lockedWeight.toString()} g) exceeds target (${targetWeight.toString()} g)`,
        ErrorCode.LOCKED_EXCEEDS_TARGET,
        { lockedWeight: lockedWeight.toString(), target: targetWeight.toString() }
      );
    }

    const unlocked = formulation.unlockedIngredients();
    if (unlocked.length === 0) {
      if (!formulation.totalWeight.eq(targetWeight)) {
        throw new FormulationError("All ingredients locked, cannot reach target weight", ErrorCode.ALL_LOCKED, {
          target: targetWeight.toString()
        });
      }
      return;
    }

    const unlockedWeight = sumDecimals(unlocked.map(([, ingredient]) => ingredient.amountG));
    if (unlockedWeight.isZero()) {
      throw new FormulationError("Unlocked ingredients have zero weight", ErrorCode.UNLOCKED_ZERO_WEIGHT);
    }

    const available = targetWeight.minus(lockedWeight);
    const scale = available.div(unlockedWeight);
    // rounding residue goes to the largest unlocked ingredient so the total is exact
    const [, largest] = unlocked.reduce((best, entry) => (entry[1].amountG.gt(best[1].amountG) ? entry : best));
    let assigned = ZERO;
    for (const [, ingredient] of unlocked) {
      if (ingredient === largest) continue;
      ingredient.amountG = ingredient.amountG.times(scale);
      assigned = assigned.plus(ingredient.amountG);
    }
    largest.amountG = available.minus(assigned);
  }

  /**
   * Set one ingredient's amount. With `maintainTotal`, the other unlocked
   * ingredients absorb the difference so the total weight stays where it was.
   */
  setIngredientAmount(formulation: Formulation, index: number, amount: DecimalValue, maintainTotal = true): void {
    const newAmount = requireNumber(amount, "Amount");
    if (newAmount.lt(0)) {
      throw new FormulationError(`Amount cannot be negative: ${newAmount.toString()}`, ErrorCode.NEGATIVE_AMOUNT, {
        index
      });
    }

    const ingredient = formulation.ingredientAt(index);
    if (!maintainTotal) {
      ingredient.amountG = newAmount;
      return;
    }

    const oldAmount = ingredient.amountG;
    const targetTotal = formulation.totalWeight;
    ingredient.amountG = newAmount;
    try {
      withLockOverride(ingredient, true, () => this.adjustToTargetWeight(formulation, targetTotal));
    } catch (error) {
      ingredient.amountG = oldAmount;
      throw error;
    }
  }

  /**
   * Percent-mode edit: give ingredient `index` exactly `targetPercent` of the
   * batch, keep every other locked ingredient's share, and rescale the free
   * ingredients to fill what is left. Amounts are recomputed against the
   * current total (100 g for an empty batch). Atomic.
   */
  applyPercentEdit(formulation: Formulation, index: number, targetPercent: DecimalValue): void {
    const target = requireNumber(targetPercent, "Percent");
    if (target.lt(0) || target.gt(HUNDRED)) {
      throw new FormulationError(
        `Percent must be between 0 and 100: ${target.toString()}`,
        ErrorCode.PERCENT_OUT_OF_RANGE,
        { index, percent: target.toString() }
      );
    }
    formulation.ingredientAt(index);

    const currentTotal = formulation.totalWeight;
    const baseTotal = currentTotal.isZero() ? HUNDRED : currentTotal;
    const percents = formulation.ingredients.map((ingredient) => ingredient.amountG.div(baseTotal).times(HUNDRED));

    const otherLocked: number[] = [];
    const free: number[] = [];
    formulation.ingredients.forEach((ingredient, position) => {
      if (position === index) return;
      (ingredient.locked ? otherLocked : free).push(position);
    });

    const lockedSum = sumDecimals(otherLocked.map((position) => percents[position] ?? ZERO));
    if (lockedSum.gt(HUNDRED)) {
      throw new FormulationError(
        `Locked ingredients already take ${lockedSum.toString()}%`,
        ErrorCode.LOCKED_PERCENT_EXCEEDED,
        { lockedPercent: lockedSum.toString() }
      );
    }

    const remaining = HUNDRED.minus(lockedSum).minus(target);
    if (remaining.lt(0)) {
      throw new FormulationError(
        `Not enough percent left for ${target.toString()}%: locked ingredients take ${lockedSum.toString()}%`,
        ErrorCode.PERCENT_BUDGET_NEGATIVE,
        { index, percent: target.toString(), lockedPercent: lockedSum.toString() }
      );
    }
    const firstFree = free[0];
    if (!remaining.isZero() && firstFree === undefined) {
      throw new FormulationError(
        `No unlocked ingredient can absorb the remaining ${remaining.toString()}%`,
        ErrorCode.NO_FREE_INGREDIENTS,
        { remainingPercent: remaining.toString() }
      );
    }

    const next = [...percents];
    next[index] = target;
    const freeSum = sumDecimals(free.map((position) => percents[position] ?? ZERO));
    if (freeSum.isZero()) {
      for (const position of free) next[position] = ZERO;
      if (firstFree !== undefined) next[firstFree] = remaining;
    } else {
      for (const position of free) {
        next[position] = (percents[position] ?? ZERO).div(freeSum).times(remaining);
      }
    }

    const negative = next.findIndex((percent) => percent.lt(0));
    if (negative !== -1) {
      throw new FormulationError("Percent edit would produce a negative amount", ErrorCode.NEGATIVE_PERCENT, {
        index: negative
      });
    }

    formulation.ingredients.forEach((ingredient, position) => {
      ingredient.amountG = (next[position] ?? ZERO).times(baseTotal).div(HUNDRED);
    });
  }

  /** Scale every ingredient, locked or not, so the total is 100 g. */
  normalizeTo100g(formulation: Formulation): void {
    const currentWeight = formulation.totalWeight;
    if (currentWeight.isZero() || currentWeight.eq(HUNDRED)) return;
    this.scaleAll(formulation, HUNDRED.div(currentWeight));
  }

  /** Re-express the current proportions over `targetTotal` grams, ignoring locks. */
  distributePercentages(formulation: Formulation, targetTotal: DecimalValue = HUNDRED): void {
    if (formulation.isEmpty()) return;
    const total = requireNumber(targetTotal, "Target total");
    const currentWeight = formulation.totalWeight;
    for (const ingredient of formulation.ingredients) {
      ingredient.amountG = ingredient.percentageOf(currentWeight).div(HUNDRED).times(total);
    }
  }

  lockIngredient(formulation: Formulation, index: number): void {
    formulation.ingredientAt(index).locked = true;
  }

  unlockIngredient(formulation: Formulation, index: number): void {
    formulation.ingredientAt(index).locked = false;
  }

  /** Multiply every amount by `factor`, ignoring locks. */
  scaleAll(formulation: Formulation, factor: DecimalValue): void {
    const scale = requireNumber(factor, "Scale factor");
    if (scale.lte(0)) {
      throw new FormulationError(`Scale factor must be positive: ${scale.toString()}`, ErrorCode.TARGET_NOT_POSITIVE, {
        factor: scale.toString()
      });
    }
    for (const ingredient of formulation.ingredients) {
      ingredient.amountG = ingredient.amountG.times(scale);
    }
  }
}
