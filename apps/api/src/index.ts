import "dotenv/config";
import { readServerConfig } from "./config.js";
import { fetchFactorTable, loadFactorTable } from "./repo/factorsRepo.js";
import { createApp, listen } from "./app.js";

async function main(): Promise<void> {
  const cfg = readServerConfig();
  // Loaded once; every request reads the same frozen table
  const table = cfg.FACTORS_URL ? await fetchFactorTable(cfg.FACTORS_URL) : loadFactorTable(cfg.FACTORS_PATH);

  const app = createApp({ table, dailyTargetKg: cfg.DAILY_TARGET_KG });
  const server = await listen(app, cfg.PORT);
  console.log(`[api] listening on :${cfg.PORT}`);

  server.on("error", (err) => {
    console.error("[api] server error:", err);
    process.exit(1);
  });
}

main().catch((err) => {
  console.error("[api] failed to start:", err);
  process.exit(1);
});
