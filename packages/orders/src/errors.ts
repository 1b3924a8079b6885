export type OrderErrorCode = "SCHEMA_MISSING_COLUMNS" | "ORDER_VALIDATION_FAILED";

/**
 * One or more required columns are absent from the input as a whole.
 * `missing` is complete and sorted.
 */
export class SchemaError extends Error {
  readonly code: OrderErrorCode = "SCHEMA_MISSING_COLUMNS";
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`SCHEMA_MISSING_COLUMNS: ${missing.join(", ")}`);
    this.name = "SchemaError";
    this.missing = missing;
  }
}

export class OrderValidationError extends Error {
  readonly code: OrderErrorCode = "ORDER_VALIDATION_FAILED";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`ORDER_VALIDATION_FAILED: ${issues.join("; ")}`);
    this.name = "OrderValidationError";
    this.issues = issues;
  }
}
