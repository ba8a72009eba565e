import { Router } from "express";
import { EMISSIONS_UNIT, type FactorTable } from "../types.js";
import { factorsByGroup } from "../repo/factorsRepo.js";

// Catalog for building the input form
export function factors(table: FactorTable) {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      version: table.version,
      source: table.source,
      unit: EMISSIONS_UNIT,
      groups: factorsByGroup(table).map((g) => ({
        ...g,
        factors: g.factors.map(({ key, label, unit, kgCO2ePerUnit }) => ({ key, label, unit, kgCO2ePerUnit })),
      })),
    });
  });

  router.get("/:key", (req, res) => {
    const f = table.factors.get(req.params.key);
    if (!f) return res.status(404).json({ error: "NOT_FOUND" });
    return res.json(f);
  });

  return router;
}
