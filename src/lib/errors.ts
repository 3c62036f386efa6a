// src/lib/errors.ts
// Error taxonomy shared by every component. Boundaries return Result values
// instead of throwing, so callers always get { ok, error } like the API routes.

export type ErrorContext = {
  /** 0-based row index within a batch or record set */
  row?: number;
  field?: string;
};

export type InvoiceErrorKind = "schema" | "computation" | "conversion" | "render" | "asset";

export abstract class InvoiceError extends Error {
  abstract readonly kind: InvoiceErrorKind;
  context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }

  /** Re-anchors the error at a row of the caller's dataset. */
  atRow(row: number): this {
    this.context = { ...this.context, row };
    return this;
  }
}

export type SchemaIssue = {
  /** record set / sheet name, when the input has several */
  sheet?: string;
  row?: number;
  field: string;
  message: string;
};

export class SchemaError extends InvoiceError {
  readonly kind = "schema" as const;
  readonly issues: SchemaIssue[];

  constructor(issues: SchemaIssue[]) {
    const first = issues[0];
    super(
      issues.length === 1 && first
        ? formatIssue(first)
        : `${issues.length} problems found in input: ${issues.map(formatIssue).join("; ")}`,
      first ? { row: first.row, field: first.field } : {},
    );
    this.issues = issues;
  }
}

export class ComputationError extends InvoiceError {
  readonly kind = "computation" as const;
}

export class ConversionError extends InvoiceError {
  readonly kind = "conversion" as const;
}

export class RenderError extends InvoiceError {
  readonly kind = "render" as const;
}

/** Recoverable: the renderer falls back to a layout without the asset. */
export class AssetError extends InvoiceError {
  readonly kind = "asset" as const;
}

export type Result<T, E = InvoiceError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

function formatIssue(i: SchemaIssue): string {
  const where = [
    i.sheet ? `sheet ${i.sheet}` : undefined,
    typeof i.row === "number" ? `row ${i.row + 1}` : undefined,
    i.field ? `"${i.field}"` : undefined,
  ].filter(Boolean);
  return where.length ? `${where.join(", ")}: ${i.message}` : i.message;
}

/** One-line message suitable for showing to whoever supplied the data. */
export function describeError(e: InvoiceError): string {
  if (e instanceof SchemaError) return e.message;
  const where = [
    typeof e.context.row === "number" ? `Row ${e.context.row + 1}` : undefined,
    e.context.field ? `field "${e.context.field}"` : undefined,
  ].filter(Boolean);
  return where.length ? `${where.join(", ")}: ${e.message}` : e.message;
}

/** Wraps anything thrown by a third-party library into the taxonomy. */
export function toRenderError(e: unknown, context: ErrorContext = {}): RenderError {
  if (e instanceof RenderError) return e;
  const msg = e instanceof Error ? e.message : String(e);
  return new RenderError(`render failed: ${msg}`, context);
}
