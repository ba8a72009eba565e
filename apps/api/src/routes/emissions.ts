import { Router } from "express";
import { z } from "zod";
import { ComputeRequestSchema, FormValueSchema, type FactorTable } from "../types.js";
import { EmissionsCalculator } from "../services/emissionsCalculator.js";
import { InvalidCategoryError } from "../errors.js";
import { summarize } from "../services/summaryService.js";
import { buildInsights } from "../services/insightsService.js";

type FormValue = z.infer<typeof FormValueSchema>;

// Form fields come in as text; a blank field means "none today"
export function toQuantity(value: FormValue): number {
  if (value === null) return 0;
  if (typeof value === "number") return value;
  const trimmed = value.trim();
  return trimmed === "" ? 0 : Number(trimmed);
}

export function toActivityInput(activities: Record<string, FormValue>): Record<string, number> {
  return Object.fromEntries(Object.entries(activities).map(([k, v]) => [k, toQuantity(v)]));
}

// zod's record parse skips "__proto__", so compare against the raw body's own keys
function droppedCategory(body: unknown, parsed: Record<string, FormValue>): string | undefined {
  if (typeof body !== "object" || body === null || !("activities" in body)) return undefined;
  const { activities } = body;
  if (typeof activities !== "object" || activities === null) return undefined;
  return Object.keys(activities).find((key) => !Object.hasOwn(parsed, key));
}

export function emissions(table: FactorTable, opts: { dailyTargetKg?: number } = {}) {
  const calculator = new EmissionsCalculator(table);
  const router = Router();

  router.post("/", (req, res) => {
    const p = ComputeRequestSchema.safeParse(req.body);
    if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });

    const dropped = droppedCategory(req.body, p.data.activities);
    if (dropped !== undefined) throw new InvalidCategoryError(dropped);

    // InvalidCategory / InvalidQuantity propagate to the error handler
    const result = calculator.compute(toActivityInput(p.data.activities));
    const summary = summarize(table, result);
    if (!p.data.insights) return res.json({ result, summary });

    const insights = buildInsights(table, result, opts.dailyTargetKg);
    return res.json({ result, summary, insights });
  });

  return router;
}
