import type { EmissionsResult, FactorTable } from "../types.js";
import { CALCULATOR } from "../config.js";

export type CategoryRow = {
  category: string;
  label: string;
  group: string;
  unit: string;
  kgCO2e: number;
};

export type GroupRow = {
  group: string;
  label: string;
  kgCO2e: number;
  share: number; // 0..1 of the total
};

export type EmissionsSummary = {
  total: number;
  unit: EmissionsResult["unit"];
  categories: CategoryRow[];
  groups: GroupRow[];
};

export function roundKg(kg: number, decimals: number = CALCULATOR.DISPLAY_DECIMALS): number {
  const f = 10 ** decimals;
  return Math.round(kg * f) / f;
}

const byKgThenName = <T extends { kgCO2e: number }>(name: (row: T) => string) => (a: T, b: T) =>
  b.kgCO2e - a.kgCO2e || name(a).localeCompare(name(b));

// Chart-ready rows; values are rounded for display, shares come from the raw amounts
export function summarize(table: FactorTable, result: EmissionsResult): EmissionsSummary {
  const rawByGroup = new Map<string, number>();
  const categories: CategoryRow[] = [];

  for (const [category, kg] of Object.entries(result.breakdown)) {
    const factor = table.factors.get(category);
    if (!factor) continue; // result was computed against another table
    rawByGroup.set(factor.group, (rawByGroup.get(factor.group) ?? 0) + kg);
    categories.push({
      category,
      label: factor.label,
      group: factor.group,
      unit: factor.unit,
      kgCO2e: kg,
    });
  }

  const groups: GroupRow[] = table.groups
    .filter((g) => rawByGroup.has(g.id))
    .map((g) => {
      const kg = rawByGroup.get(g.id) ?? 0;
      return {
        group: g.id,
        label: g.label,
        kgCO2e: kg,
        share: result.total > 0 ? roundKg(kg / result.total, 4) : 0,
      };
    });

  categories.sort(byKgThenName<CategoryRow>((r) => r.category));
  groups.sort(byKgThenName<GroupRow>((r) => r.group));

  return {
    total: roundKg(result.total),
    unit: result.unit,
    categories: categories.map((r) => ({ ...r, kgCO2e: roundKg(r.kgCO2e) })),
    groups: groups.map((r) => ({ ...r, kgCO2e: roundKg(r.kgCO2e) })),
  };
}

/** Sum of the raw breakdown amounts for one factor group. */
export function groupTotal(table: FactorTable, result: EmissionsResult, groupId: string): number {
  let sum = 0;
  for (const [category, kg] of Object.entries(result.breakdown)) {
    if (table.factors.get(category)?.group === groupId) sum += kg;
  }
  return sum;
}
