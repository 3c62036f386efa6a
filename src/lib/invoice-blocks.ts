// src/lib/invoice-blocks.ts
// The standard invoice page as layout blocks. One builder serves every
// template variant; the variant only switches optional content on and off.

import type { InvoiceRecord, PartyInfo, TemplateVariant } from "./invoice-types";
import type { Block, Cell, ItemTableBlock, SummaryRow, TableColumn, TextBlock, TextLine } from "./layout-types";
import { money, percent, qty } from "./money";
import { pageBox, type StyleConfig } from "./style";
import type { Totals } from "./totals";

export type InvoiceFigures = { totals: Totals; words: string };

export const AMOUNT_PAYABLE = "Amount Payable";
export const AMOUNT_IN_WORDS = "Amount in Words:";

type ColumnSpec = Omit<TableColumn, "width"> & { share: number; cell: (ctx: RowCtx) => string };
type RowCtx = { record: InvoiceRecord; index: number; amount: number; style: StyleConfig };

const COLUMNS: Record<TemplateVariant, ColumnSpec[]> = {
  simple: [
    { header: "#", kind: "index", share: 0.07, cell: (c) => String(c.index + 1) },
    { header: "Description", kind: "text", share: 0.41, cell: (c) => c.record.items[c.index].description },
    { header: "Quantity", kind: "number", share: 0.14, cell: (c) => qty(c.record.items[c.index].quantity ?? 1) },
    { header: "Unit Price", kind: "currency", share: 0.18, cell: unitPrice },
    { header: "Amount", kind: "currency", share: 0.2, cell: (c) => money(c.amount, c.style) },
  ],
  gst: [
    { header: "#", kind: "index", share: 0.06, cell: (c) => String(c.index + 1) },
    { header: "Description", kind: "text", share: 0.34, cell: (c) => c.record.items[c.index].description },
    { header: "HSN/SAC", kind: "text", share: 0.12, cell: (c) => c.record.items[c.index].code ?? "" },
    { header: "Qty", kind: "number", share: 0.1, cell: (c) => qty(c.record.items[c.index].quantity ?? 1) },
    { header: "Rate", kind: "currency", share: 0.18, cell: unitPrice },
    { header: "Amount", kind: "currency", share: 0.2, cell: (c) => money(c.amount, c.style) },
  ],
  bulk: [
    { header: "#", kind: "index", share: 0.08, cell: (c) => String(c.index + 1) },
    { header: "Description", kind: "text", share: 0.62, cell: (c) => c.record.items[c.index].description },
    { header: "Amount", kind: "currency", share: 0.3, cell: (c) => money(c.amount, c.style) },
  ],
};

function unitPrice(c: RowCtx): string {
  const p = c.record.items[c.index].unitPrice;
  return p === undefined ? "" : money(p, c.style);
}

const line = (text: string, bold = false): TextLine => [{ text, bold }];
const labelled = (label: string, value: string): TextLine => [{ text: `${label} `, bold: true }, { text: value }];

function splitLines(text: string | undefined): TextLine[] {
  if (!text) return [];
  return text
    .replace(/\\n/g, "\n")
    .split("\n")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => line(s));
}

function partyLines(p: Readonly<PartyInfo>, variant: TemplateVariant, showIds: boolean): TextLine[] {
  return [
    ...splitLines(p.address),
    ...(p.email ? [labelled("Email:", p.email)] : []),
    ...(p.phone ? [labelled(variant === "bulk" ? "Mobile:" : "Phone:", p.phone)] : []),
    ...(showIds && p.gstin ? [labelled("GSTIN:", p.gstin)] : []),
    ...(showIds && p.pan ? [labelled("PAN:", p.pan)] : []),
  ];
}

export function itemTable(record: InvoiceRecord, figures: InvoiceFigures, style: StyleConfig): ItemTableBlock {
  const { contentWidth } = pageBox(style);
  const specs = COLUMNS[record.variant];
  const { totals } = figures;

  const rows = record.items.map((_, index) =>
    specs.map((s) => s.cell({ record, index, amount: totals.lines[index], style })),
  );

  const summary: SummaryRow[] = [{ kind: "amount", label: "Subtotal", value: money(totals.subtotal, style) }];
  for (const t of totals.taxes) {
    // a zero rate gets no row at all
    if (t.rate === 0) continue;
    summary.push({ kind: "amount", label: `${t.label} (${percent(t.rate)})`, value: money(t.amount, style) });
  }
  summary.push({
    kind: "amount",
    label: AMOUNT_PAYABLE,
    value: money(totals.grandTotal, style),
    emphasis: true,
    ruleAbove: true,
  });
  summary.push({ kind: "words", label: AMOUNT_IN_WORDS, text: figures.words });

  return {
    kind: "table",
    columns: specs.map(({ header, kind, share }) => ({ header, kind, width: share * contentWidth })),
    rows,
    summary,
  };
}

export function buildInvoiceBlocks(
  record: InvoiceRecord,
  figures: InvoiceFigures,
  style: StyleConfig,
  logo: Buffer | null,
): Block[] {
  const { contentWidth } = pageBox(style);
  const { variant, from, billTo, meta } = record;
  const pad = style.cellPadding;

  const fromBlock: TextBlock = {
    kind: "text",
    align: "right",
    lines: [line(from.name, true), ...partyLines(from, variant, variant !== "simple")],
  };
  const header: Block = {
    kind: "columns",
    widths: [contentWidth * 0.45, contentWidth * 0.55],
    valign: ["middle", "top"],
    rows: [[{ kind: "image", data: logo, width: style.logo.width, height: style.logo.height }, fromBlock]],
    // fixed by the logo box so an absent logo moves nothing below it
    minRowHeight: style.logo.height + 2 * pad,
  };

  const title: TextBlock = {
    kind: "text",
    lines: [line(variant === "gst" ? "TAX INVOICE" : "INVOICE", true)],
    size: style.fontSize.title,
    color: style.colors.primary,
  };

  const billing: Block = {
    kind: "columns",
    widths: [contentWidth * 0.6, contentWidth * 0.4],
    valign: ["top", "top"],
    rows: [
      [
        { kind: "text", lines: [line("Bill To:", true), line(billTo.name), ...partyLines(billTo, "simple", variant !== "simple")] },
        {
          kind: "text",
          align: "right",
          lines: [
            labelled("Invoice #:", meta.invoiceNumber),
            labelled("Date:", meta.issueDate),
            labelled("Due Date:", meta.dueDate),
          ],
        },
      ],
    ],
  };

  const blocks: Block[] = [header, title, billing, itemTable(record, figures, style)];

  if (meta.notes) blocks.push({ kind: "text", lines: [line("Notes:", true), ...splitLines(meta.notes)] });
  if (meta.paymentTerms) {
    blocks.push({ kind: "text", lines: [line("Payment Terms:", true), ...splitLines(meta.paymentTerms)] });
  }

  const bank = from.bank;
  const bankCell: Cell = bank
    ? {
        kind: "text",
        lines: [
          line("Bank Details", true),
          ...(bank.bankName ? [labelled("Bank:", bank.bankName)] : []),
          labelled("Account Holder:", bank.accountHolder ?? from.name),
          labelled("A/C No:", bank.accountNumber),
          labelled("IFSC:", bank.ifsc),
          ...(bank.branch ? [labelled("Branch:", bank.branch)] : []),
        ],
      }
    : null;
  blocks.push({
    kind: "columns",
    widths: [contentWidth * 0.55, contentWidth * 0.45],
    valign: ["top", "bottom"],
    rows: [
      [
        bankCell,
        { kind: "text", align: "right", lines: [line(`For ${from.name}`, true), line(""), line(""), line("Authorised Signatory")] },
      ],
    ],
  });

  return blocks;
}
