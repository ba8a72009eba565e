import { Router } from "express";
import { publicConfig } from "../config.js";
import type { FactorTable } from "../types.js";

export function admin(table: FactorTable, dailyTargetKg?: number) {
  const router = Router();

  router.get("/config", (_req, res) => {
    const cfg = publicConfig(dailyTargetKg);
    res.json({
      CALCULATOR: cfg.CALCULATOR,
      factorTable: { version: table.version, source: table.source, categories: table.factors.size },
      ts: Date.now(),
    });
  });

  return router;
}
