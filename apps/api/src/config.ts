import { z } from "zod";

export const CALCULATOR = {
  DAILY_TARGET_KG: 16,
  DISPLAY_DECIMALS: 2,
  MAX_TIPS: 5,
  GASOLINE_SHARE_THR: 0.7, // of transportation emissions
  MEAT_SHARE_THR: 0.5, // of food emissions
  HOME_ENERGY_KG_THR: 5,
} as const;

// Remote factor table download (FACTORS_URL)
export const FACTORS_FETCH = {
  ATTEMPTS: 3,
  BACKOFF_MS: 300,
  TIMEOUT_MS: 8000,
} as const;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  FACTORS_PATH: z.string().min(1).optional(),
  FACTORS_URL: z.string().url().optional(),
  DAILY_TARGET_KG: z.coerce.number().positive().default(CALCULATOR.DAILY_TARGET_KG),
});

export type ServerConfig = z.infer<typeof EnvSchema>;

export function readServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Blank values in .env mean "unset"
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${msg}`);
  }
  return parsed.data;
}

export function publicConfig(dailyTargetKg: number = CALCULATOR.DAILY_TARGET_KG) {
  return {
    CALCULATOR: { ...CALCULATOR, DAILY_TARGET_KG: dailyTargetKg },
  } as const;
}
