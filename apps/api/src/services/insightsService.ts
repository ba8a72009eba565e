import type { EmissionsResult, FactorTable } from "../types.js";
import { CALCULATOR } from "../config.js";
import { groupTotal } from "./summaryService.js";

export const STARTER_TIPS = [
  "Start tracking your activities to get personalized tips!",
  "Consider walking or biking for short trips instead of driving.",
  "Try incorporating more plant-based meals into your diet.",
] as const;

export const GENERAL_TIPS = [
  "Turn off lights when leaving a room to save energy.",
  "Reduce, reuse, and recycle whenever possible.",
  "Every small action counts towards a more sustainable future!",
] as const;

export const TIPS = {
  gasolineCar:
    "Consider using public transportation, electric vehicles, or carpooling to reduce your gasoline car usage.",
  publicTransport:
    "Try using public transportation or walking/biking for short trips - it's great for your health and the environment!",
  lessMeat:
    "Consider reducing meat consumption - even switching to a vegetarian or vegan diet makes a significant difference!",
  plantBased: "Try incorporating more plant-based meals - they have a much lower carbon footprint!",
  homeEnergy: "Consider energy-saving measures like LED bulbs, better insulation, and unplugging unused electronics.",
} as const;

// Upper bounds (exclusive, kg CO2e) for the everyday comparisons
const EQUIVALENTS: Array<[number, string]> = [
  [1, "That's about the same as charging your phone 120 times!"],
  [5, "That's about the same as charging your phone over 200 times!"],
  [10, "That's about the same as watching 15 hours of HD video streaming."],
  [20, "That's over 3× the weight of a newborn baby — in carbon!"],
  [50, "That's about the same emissions as a short domestic flight."],
];
const LARGEST_EQUIVALENT = "That's roughly equivalent to driving a car for over 100 miles!";

export function describeEquivalent(totalKg: number): string {
  const hit = EQUIVALENTS.find(([limit]) => totalKg < limit);
  return hit ? hit[1] : LARGEST_EQUIVALENT;
}

export type TargetProgress = {
  targetKg: number;
  totalKg: number;
  fraction: number; // capped at 1
  exceeded: boolean;
};

export function dailyTargetProgress(totalKg: number, targetKg: number = CALCULATOR.DAILY_TARGET_KG): TargetProgress {
  return {
    targetKg,
    totalKg,
    fraction: Math.min(totalKg / targetKg, 1),
    exceeded: totalKg > targetKg,
  };
}

const kgOf = (result: EmissionsResult, ...categories: string[]) =>
  categories.reduce((s, c) => s + (result.breakdown[c] ?? 0), 0);

export function generateTips(table: FactorTable, result: EmissionsResult): string[] {
  if (result.total <= 0) return [...STARTER_TIPS];

  const tips: string[] = [];

  const transport = groupTotal(table, result, "transportation");
  if (transport > 0) {
    if (kgOf(result, "car_miles") > transport * CALCULATOR.GASOLINE_SHARE_THR) tips.push(TIPS.gasolineCar);
    if (kgOf(result, "bus_miles", "train_miles") === 0) tips.push(TIPS.publicTransport);
  }

  const food = groupTotal(table, result, "food");
  if (food > 0) {
    if (kgOf(result, "heavy_meat_meals", "moderate_meat_meals") > food * CALCULATOR.MEAT_SHARE_THR) {
      tips.push(TIPS.lessMeat);
    }
    if (kgOf(result, "vegetarian_meals", "vegan_meals") === 0) tips.push(TIPS.plantBased);
  }

  if (groupTotal(table, result, "home_energy") > CALCULATOR.HOME_ENERGY_KG_THR) tips.push(TIPS.homeEnergy);

  return [...tips, ...GENERAL_TIPS].slice(0, CALCULATOR.MAX_TIPS);
}

export type Insights = {
  equivalent: string;
  target: TargetProgress;
  tips: string[];
};

export function buildInsights(table: FactorTable, result: EmissionsResult, targetKg?: number): Insights {
  return {
    equivalent: describeEquivalent(result.total),
    target: dailyTargetProgress(result.total, targetKg),
    tips: generateTips(table, result),
  };
}
