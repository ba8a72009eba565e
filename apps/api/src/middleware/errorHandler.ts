import type { NextFunction, Request, Response } from "express";
import { CalculatorError } from "../errors.js";

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: "NOT_FOUND" });
}

// express.json() failures carry a `type` such as "entity.too.large" and a 4xx status
type BodyError = { type: string; status: number };

const BODY_ERRORS: Record<string, string> = {
  "entity.parse.failed": "bad-json",
  "entity.too.large": "too-large",
};

function asBodyError(err: unknown): BodyError | undefined {
  if (!(err instanceof Error) || !("type" in err) || typeof err.type !== "string") return undefined;
  const status =
    "status" in err && typeof err.status === "number"
      ? err.status
      : "statusCode" in err && typeof err.statusCode === "number"
        ? err.statusCode
        : undefined;
  if (status === undefined || status < 400 || status > 499) return undefined;
  return { type: err.type, status };
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof CalculatorError) {
    res.status(400).json({ error: err.code, message: err.message, category: err.category });
    return;
  }

  const bodyErr = asBodyError(err);
  if (bodyErr) {
    res.status(bodyErr.status).json({ error: BODY_ERRORS[bodyErr.type] ?? "bad-body", type: bodyErr.type });
    return;
  }

  const message = err instanceof Error ? err.message : "Internal server error";
  console.error("[api] unhandled error", err);
  res.status(500).json({ error: "internal_error", message });
}
