import { parseFactorTable } from "../src/repo/factorsRepo.js";
import type { FactorTableFile } from "../src/types.js";

export function exampleTableFile(): FactorTableFile {
  return {
    version: "test-1",
    source: "test factors",
    groups: [
      { id: "transportation", label: "Transportation", unit: "kg CO2e per mile", inputLabel: "miles", formula: "miles × factor" },
      { id: "home_energy", label: "Home Energy", unit: "kg CO2e per kWh", inputLabel: "kWh", formula: "kWh × factor" },
    ],
    factors: [
      { key: "car_miles", group: "transportation", label: "Car", unit: "mile", kgCO2ePerUnit: 0.404 },
      { key: "electricity_kwh", group: "home_energy", label: "Electricity", unit: "kWh", kgCO2ePerUnit: 0.433 },
    ],
  };
}

export const exampleTable = () => parseFactorTable(exampleTableFile());

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected function to throw");
}
