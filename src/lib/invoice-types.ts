// Shared invoice types used by the records boundary, services and PDF builder
// src/lib/invoice-types.ts

export type BankDetails = {
  bankName?: string;
  accountHolder?: string;
  accountNumber: string;
  /** IFSC / routing code */
  ifsc: string;
  branch?: string;
};

export type PartyInfo = {
  name: string;
  /** may contain newlines */
  address?: string;
  email?: string;
  phone?: string;
  pan?: string;
  gstin?: string;
  bank?: BankDetails;
};

export type TaxConfig =
  | { kind: "none" }
  | { kind: "single"; rate: number; label?: string }
  /** two components applied on the same subtotal, e.g. CGST + SGST */
  | { kind: "dual"; rateA: number; rateB: number; labelA?: string; labelB?: string };

export type InvoiceMeta = {
  /** used verbatim in the output filename */
  invoiceNumber: string;
  issueDate: string;
  dueDate: string;
  tax: TaxConfig;
  notes?: string;
  paymentTerms?: string;
};

export type LineItem = {
  description: string;
  /** HSN / SAC classification */
  code?: string;
  /** defaults to 1 */
  quantity?: number;
  unitPrice?: number;
  /** precomputed amount, used when there is no unit price (bulk rows) */
  amount?: number;
};

export type TemplateVariant = "simple" | "gst" | "bulk";

export type InvoiceRecord = {
  readonly variant: TemplateVariant;
  readonly from: Readonly<PartyInfo>;
  readonly billTo: Readonly<PartyInfo>;
  readonly meta: Readonly<InvoiceMeta>;
  readonly items: readonly LineItem[];
};

export type RenderedDocument = {
  readonly filename: string;
  readonly bytes: Buffer;
  readonly contentType: "application/pdf" | "application/zip";
  /** grand total of the invoice; sum of the grand totals for an archive */
  readonly total: number;
  readonly pages: number;
  /** recoverable problems, e.g. a logo that could not be embedded */
  readonly warnings: readonly string[];
};

/** Fields that differ per row of a bulk dataset. */
export type BatchRow = {
  fromName: string;
  pan: string;
  mobile: string;
  invoiceNumber: string;
  description: string;
  amount: number;
  accountNumber: string;
  ifsc: string;
  accountHolder?: string;
  email?: string;
  address?: string;
  invoiceDate?: string;
  dueDate?: string;
};

/** Fields every row of a bulk dataset shares. */
export type BatchShared = {
  email?: string;
  address?: string;
  bankName?: string;
  branch?: string;
  tax?: TaxConfig;
  notes?: string;
  paymentTerms?: string;
};

export type BatchJob = {
  billTo: PartyInfo;
  shared: BatchShared;
  rows: BatchRow[];
};
