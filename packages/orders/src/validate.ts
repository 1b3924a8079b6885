import { z } from "zod";
import { REQUIRED_ORDER_COLUMNS, type OrderRecord } from "./schema.js";
import { OrderValidationError, SchemaError } from "./errors.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const FiniteNumber = z
  .number()
  .refine(Number.isFinite, "Must be a finite number");

const Label = z.string().trim().min(1);

/* ------------------------------------------------------------------ */
/*                                Order                               */
/* ------------------------------------------------------------------ */

// Extra columns (date, quantity, ...) are stripped.
export const OrderRecordSchema = z.object({
  product: Label,
  channel: Label,
  region: Label,
  unit_price: FiniteNumber.refine((v) => v > 0, "Must be positive"),
  discount_pct: FiniteNumber.refine((v) => v >= 0 && v < 1, "Must be in [0, 1)"),
  revenue: FiniteNumber.refine((v) => v >= 0, "Must be non-negative"),
  cost: FiniteNumber.refine((v) => v >= 0, "Must be non-negative"),
});

export type ParsedOrder = z.infer<typeof OrderRecordSchema>;

const RowsSchema = z.array(z.record(z.string(), z.unknown()));

/* ------------------------------------------------------------------ */
/*                            Column check                            */
/* ------------------------------------------------------------------ */

/**
 * Structural check over the whole input: a column is missing if any row
 * lacks the key. Runs once, before any row is looked at in detail.
 */
export function findMissingColumns(rows: readonly object[]): string[] {
  const missing = new Set<string>();
  for (const row of rows) {
    for (const col of REQUIRED_ORDER_COLUMNS) {
      if (!(col in row)) missing.add(col);
    }
    if (missing.size === REQUIRED_ORDER_COLUMNS.length) break;
  }
  return [...missing].sort();
}

export function assertRequiredColumns(rows: readonly object[]): void {
  const missing = findMissingColumns(rows);
  if (missing.length) throw new SchemaError(missing);
}

/* ------------------------------------------------------------------ */
/*                                Parse                               */
/* ------------------------------------------------------------------ */

export function parseOrders(input: unknown): OrderRecord[] {
  const shape = RowsSchema.safeParse(input);
  if (!shape.success) {
    throw new OrderValidationError(shape.error.issues.map(formatIssue));
  }

  assertRequiredColumns(shape.data);

  const parsed = z.array(OrderRecordSchema).safeParse(shape.data);
  if (!parsed.success) {
    throw new OrderValidationError(parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
}

function formatIssue(issue: { path: readonly PropertyKey[]; message: string }): string {
  const path = issue.path.map((p) => String(p)).join("/");
  return `/${path}: ${issue.message}`;
}
