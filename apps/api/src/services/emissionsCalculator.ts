import { EMISSIONS_UNIT, type ActivityInput, type EmissionFactor, type EmissionsResult, type FactorTable } from "../types.js";
import { InvalidCategoryError, InvalidQuantityError } from "../errors.js";

const OVERFLOW = "overflows the emissions total";

export class EmissionsCalculator {
  constructor(private readonly table: FactorTable) {}

  /**
   * Multiplies each quantity by its category factor and sums the results.
   * Entries are validated in input order before anything is computed; the first
   * bad entry throws InvalidCategoryError or InvalidQuantityError. A quantity
   * whose amount, or the running total, leaves the finite range throws
   * InvalidQuantityError for that category.
   */
  compute(input: ActivityInput): EmissionsResult {
    const entries: Array<{ factor: EmissionFactor; quantity: number }> = [];
    for (const [category, value] of Object.entries(input)) {
      const factor = this.table.factors.get(category);
      if (!factor) throw new InvalidCategoryError(category);
      if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
        throw new InvalidQuantityError(category, value);
      }
      entries.push({ factor, quantity: value });
    }

    const breakdown: Record<string, number> = {};
    let total = 0;
    for (const { factor, quantity } of entries) {
      // -0 reports as 0
      const amount = quantity === 0 ? 0 : quantity * factor.kgCO2ePerUnit;
      total += amount;
      if (!Number.isFinite(total)) {
        throw new InvalidQuantityError(factor.key, quantity, OVERFLOW);
      }
      breakdown[factor.key] = amount;
    }

    return { breakdown, total, unit: EMISSIONS_UNIT, factorTableVersion: this.table.version };
  }
}
