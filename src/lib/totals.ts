// src/lib/totals.ts
import { ComputationError, err, ok, type Result } from "./errors";
import type { LineItem, TaxConfig, TemplateVariant } from "./invoice-types";

export type TaxLine = { label: string; rate: number; amount: number };

export type Totals = {
  /** amount per input line, same order */
  lines: number[];
  subtotal: number;
  taxes: TaxLine[];
  grandTotal: number;
};

function badNumber(v: unknown): boolean {
  return typeof v !== "number" || !Number.isFinite(v) || v < 0;
}

function lineAmount(item: LineItem, row: number): Result<number, ComputationError> {
  const quantity = item.quantity ?? 1;
  if (badNumber(quantity)) {
    return err(new ComputationError(`quantity must be a non-negative number, got ${quantity}`, { row, field: "quantity" }));
  }
  if (item.unitPrice !== undefined) {
    if (badNumber(item.unitPrice)) {
      return err(new ComputationError(`unit price must be a non-negative number, got ${item.unitPrice}`, { row, field: "unitPrice" }));
    }
    return ok(quantity * item.unitPrice);
  }
  if (item.amount === undefined) {
    return err(new ComputationError("line has neither a unit price nor an amount", { row, field: "unitPrice" }));
  }
  if (badNumber(item.amount)) {
    return err(new ComputationError(`amount must be a non-negative number, got ${item.amount}`, { row, field: "amount" }));
  }
  return ok(item.amount);
}

/** Label/rate pairs for a tax configuration, before amounts are known. */
export function taxComponents(tax: TaxConfig, variant: TemplateVariant = "simple"): Array<{ label: string; rate: number }> {
  switch (tax.kind) {
    case "none":
      return [];
    case "single":
      return [{ label: tax.label ?? (variant === "gst" ? "IGST" : "Tax"), rate: tax.rate }];
    case "dual":
      return [
        { label: tax.labelA ?? "CGST", rate: tax.rateA },
        { label: tax.labelB ?? "SGST", rate: tax.rateB },
      ];
  }
}

export function computeTotals(
  items: readonly LineItem[],
  tax: TaxConfig,
  variant: TemplateVariant = "simple",
): Result<Totals, ComputationError> {
  if (items.length === 0) return err(new ComputationError("invoice has no line items", { field: "items" }));

  const lines: number[] = [];
  for (let i = 0; i < items.length; i++) {
    const a = lineAmount(items[i], i);
    if (!a.ok) return a;
    lines.push(a.value);
  }
  const subtotal = lines.reduce((s, a) => s + a, 0);

  const taxes: TaxLine[] = [];
  for (const c of taxComponents(tax, variant)) {
    if (badNumber(c.rate)) {
      return err(new ComputationError(`${c.label} rate must be a non-negative number, got ${c.rate}`, { field: "tax" }));
    }
    taxes.push({ ...c, amount: (subtotal * c.rate) / 100 });
  }

  const grandTotal = subtotal + taxes.reduce((s, t) => s + t.amount, 0);
  return ok({ lines, subtotal, taxes, grandTotal });
}
