import { Router } from "express";
export const health = Router().get("/", (_req, res) =>
  res.json({ ok: true, service: "carbon-counter-api", uptimeS: Math.round(process.uptime()), ts: Date.now() }),
);
