import { z } from "zod";

// Domain types
export type FactorGroup = {
  id: string;
  label: string;
  unit: string; // e.g. "kg CO2e per mile"
  inputLabel: string; // form prompt, e.g. "miles travelled today"
  formula: string;
};

export type EmissionFactor = {
  key: string; // category key, e.g. "car_miles"
  group: string;
  label: string;
  unit: string; // unit of the activity quantity: mile, hour, meal...
  kgCO2ePerUnit: number;
};

export type FactorTable = {
  readonly version: string;
  readonly source: string;
  readonly groups: readonly FactorGroup[];
  readonly factors: ReadonlyMap<string, EmissionFactor>;
};

/** Category key → quantity, as handed over by the UI layer. Values are checked by the calculator. */
export type ActivityInput = Readonly<Record<string, unknown>>;

export const EMISSIONS_UNIT = "kg CO2e";

export type EmissionsResult = {
  breakdown: Record<string, number>; // kg CO2e per category present in the input
  total: number;
  unit: typeof EMISSIONS_UNIT;
  factorTableVersion: string;
};

// Zod schemas
export const FactorGroupSchema = z
  .object({
    id: z.string().min(1),
    label: z.string().min(1),
    unit: z.string().min(1),
    inputLabel: z.string().min(1),
    formula: z.string().min(1),
  })
  .strict();

export const EmissionFactorSchema = z
  .object({
    key: z.string().regex(/^[a-z][a-z0-9_]*$/, "category keys are lower_snake_case"),
    group: z.string().min(1),
    label: z.string().min(1),
    unit: z.string().min(1),
    kgCO2ePerUnit: z.number().positive().finite(),
  })
  .strict();

export const FactorTableFileSchema = z
  .object({
    version: z.string().min(1),
    source: z.string().min(1),
    groups: z.array(FactorGroupSchema).min(1),
    factors: z.array(EmissionFactorSchema).min(1),
  })
  .strict();

export type FactorTableFile = z.infer<typeof FactorTableFileSchema>;

// Form values arrive as numbers, strings or null depending on the client
export const FormValueSchema = z.union([z.number(), z.string(), z.null()]);

export const ComputeRequestSchema = z
  .object({
    activities: z.record(z.string(), FormValueSchema),
    insights: z.boolean().default(true),
  })
  .strict();

export type ComputeRequest = z.infer<typeof ComputeRequestSchema>;
