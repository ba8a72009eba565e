import type { Server } from "http";
import express, { type Express } from "express";
import cors from "cors";
import type { FactorTable } from "./types.js";
import { health } from "./routes/health.js";
import { factors } from "./routes/factors.js";
import { emissions } from "./routes/emissions.js";
import { admin } from "./routes/admin.js";
import { errorHandler, notFound } from "./middleware/errorHandler.js";

export type AppOptions = {
  table: FactorTable;
  dailyTargetKg?: number;
};

export function createApp({ table, dailyTargetKg }: AppOptions) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use("/health", health);
  app.use("/factors", factors(table));
  app.use("/emissions", emissions(table, { dailyTargetKg }));
  app.use("/admin", admin(table, dailyTargetKg));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}

/** Resolves once the server is bound; bind failures such as EADDRINUSE reject. */
export function listen(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}

export { EmissionsCalculator } from "./services/emissionsCalculator.js";
export { loadFactorTable, fetchFactorTable, parseFactorTable } from "./repo/factorsRepo.js";
export { CalculatorError, InvalidCategoryError, InvalidQuantityError, FactorTableError } from "./errors.js";
export type { ActivityInput, EmissionsResult, EmissionFactor, FactorGroup, FactorTable } from "./types.js";
