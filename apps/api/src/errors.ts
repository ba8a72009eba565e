export type CalculatorErrorCode = "INVALID_CATEGORY" | "INVALID_QUANTITY";

export class CalculatorError extends Error {
  constructor(
    readonly code: CalculatorErrorCode,
    readonly category: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCategoryError extends CalculatorError {
  constructor(category: string) {
    super("INVALID_CATEGORY", category, `Unknown activity category "${category}"`);
  }
}

export class InvalidQuantityError extends CalculatorError {
  constructor(
    category: string,
    readonly value: unknown,
    problem = "must be a finite number >= 0",
  ) {
    super("INVALID_QUANTITY", category, `Quantity for "${category}" ${problem}, got ${describe(value)}`);
  }
}

/** Raised while loading the factor table; fatal at start-up. */
export class FactorTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FactorTableError";
  }
}

function describe(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean" || value === null || value === undefined) {
    return String(value);
  }
  return typeof value;
}
