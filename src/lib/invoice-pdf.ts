// src/lib/invoice-pdf.ts
// One invoice record in, one PDF out. No file or network access here: the
// logo arrives as bytes, the caller decides where the PDF goes.

import { rupeesInWords } from "./amount-in-words";
import { AssetError, err, ok, SchemaError, toRenderError, type InvoiceError, type Result } from "./errors";
import { buildInvoiceBlocks, type InvoiceFigures } from "./invoice-blocks";
import type { InvoiceRecord, RenderedDocument } from "./invoice-types";
import { layoutDocument, planLayout } from "./layout-engine";
import type { Block, PagePlan, TextMeasurer } from "./layout-types";
import { createMeasurer } from "./pdf";
import type { StyleConfig } from "./style";
import { computeTotals } from "./totals";

export type LogoInput = Buffer | Uint8Array | null | undefined;

const PNG = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG = [0xff, 0xd8, 0xff];

export function invoiceFilename(invoiceNumber: string): string {
  return `Invoice_${invoiceNumber}.pdf`;
}

/** null when no logo was given; AssetError when the bytes are not an image pdfkit can embed. */
export function inspectLogo(logo: LogoInput): Result<Buffer | null, AssetError> {
  if (logo == null) return ok(null);
  if (logo.length === 0) return err(new AssetError("logo is empty", { field: "logo" }));
  const b = Buffer.isBuffer(logo) ? logo : Buffer.from(logo);
  const starts = (sig: number[]) => sig.every((v, i) => b[i] === v);
  if (!starts(PNG) && !starts(JPEG)) return err(new AssetError("logo is neither PNG nor JPEG", { field: "logo" }));
  return ok(b);
}

export function invoiceFigures(record: InvoiceRecord): Result<InvoiceFigures, InvoiceError> {
  const totals = computeTotals(record.items, record.meta.tax, record.variant);
  if (!totals.ok) return totals;
  // whole rupees of the total as printed (2 decimals), not of the raw float
  const words = rupeesInWords(Math.floor(Math.round(totals.value.grandTotal * 100) / 100));
  if (!words.ok) return words;
  return ok({ totals: totals.value, words: words.value });
}

type Prepared = { blocks: Block[]; figures: InvoiceFigures; warnings: string[] };

function prepare(record: InvoiceRecord, style: StyleConfig, logo: LogoInput): Result<Prepared, InvoiceError> {
  if (!record.meta.invoiceNumber.trim()) {
    return err(new SchemaError([{ field: "invoiceNumber", message: "is required" }]));
  }
  const figures = invoiceFigures(record);
  if (!figures.ok) return figures;

  const warnings: string[] = [];
  const checked = inspectLogo(logo);
  let logoBytes: Buffer | null = null;
  if (checked.ok) {
    logoBytes = checked.value;
  } else {
    warnings.push(checked.error.message);
    console.warn(`[invoice-pdf] ${record.meta.invoiceNumber}: ${checked.error.message}, rendering without logo`);
  }

  return ok({ blocks: buildInvoiceBlocks(record, figures.value, style, logoBytes), figures: figures.value, warnings });
}

/** Page plan for a record, for previews and layout checks. */
export function planInvoice(record: InvoiceRecord, style: StyleConfig, logo?: LogoInput): Result<PagePlan, InvoiceError> {
  const prepared = prepare(record, style, logo);
  if (!prepared.ok) return prepared;
  let measurer: TextMeasurer;
  try {
    measurer = createMeasurer(style);
  } catch (e) {
    return err(toRenderError(e, { field: "fonts" }));
  }
  return planLayout(prepared.value.blocks, style, measurer);
}

export async function renderInvoice(
  record: InvoiceRecord,
  style: StyleConfig,
  logo?: LogoInput,
): Promise<Result<RenderedDocument, InvoiceError>> {
  const prepared = prepare(record, style, logo);
  if (!prepared.ok) return prepared;

  const laid = await layoutDocument(prepared.value.blocks, style);
  if (!laid.ok) return laid;

  return ok({
    filename: invoiceFilename(record.meta.invoiceNumber),
    bytes: laid.value.bytes,
    contentType: "application/pdf",
    total: prepared.value.figures.totals.grandTotal,
    pages: laid.value.pages,
    warnings: [...prepared.value.warnings, ...laid.value.warnings],
  });
}
