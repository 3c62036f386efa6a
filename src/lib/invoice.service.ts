// src/lib/invoice.service.ts
import { describeError, type InvoiceError, type Result } from "./errors";
import type { RenderedDocument, TemplateVariant, PartyInfo } from "./invoice-types";
import { renderInvoice, type LogoInput } from "./invoice-pdf";
import { parseInvoiceRecord, parseInvoiceSheets, type RawRow } from "./records";
import type { StyleConfig } from "./style";

/**
 * Single-invoice entry:
 *  1) validates the input (every missing sheet/field reported together)
 *  2) builds the PDF
 *
 * Nothing is rendered when validation fails.
 */
export async function createInvoiceFromSheets(
  sheets: Record<string, readonly RawRow[]>,
  style: StyleConfig,
  opts: { from?: PartyInfo; variant?: TemplateVariant; logo?: LogoInput } = {},
): Promise<Result<RenderedDocument, InvoiceError>> {
  const record = parseInvoiceSheets(sheets, { from: opts.from, variant: opts.variant });
  if (!record.ok) {
    console.error(`[invoice] rejected workbook: ${describeError(record.error)}`);
    return record;
  }
  return logged(await renderInvoice(record.value, style, opts.logo));
}

/** Same as above for an already structured record (e.g. a JSON file). */
export async function createInvoice(
  input: unknown,
  style: StyleConfig,
  logo?: LogoInput,
): Promise<Result<RenderedDocument, InvoiceError>> {
  const record = parseInvoiceRecord(input);
  if (!record.ok) {
    console.error(`[invoice] rejected record: ${describeError(record.error)}`);
    return record;
  }
  return logged(await renderInvoice(record.value, style, logo));
}

function logged(res: Result<RenderedDocument, InvoiceError>) {
  if (res.ok) console.log(`[invoice] ${res.value.filename} (${res.value.bytes.length} bytes)`);
  else console.error(`[invoice] ${describeError(res.error)}`);
  return res;
}
