// src/lib/records.ts
// Boundary between loosely typed tabular input and the typed invoice records.
// Everything wrong with the input is reported at once, before any rendering.
import { z } from "zod";

import aliases from "./column-aliases.json";
import { err, ok, SchemaError, type Result, type SchemaIssue } from "./errors";
import type { BatchJob, BatchRow, InvoiceRecord, PartyInfo, TaxConfig, TemplateVariant } from "./invoice-types";

export type RawRow = Record<string, unknown>;
type ColumnSpec = { label: string; aliases: string[] };

/** "Invoice No." → "invoiceno" */
export function normalizeColumnName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

// ---- cell coercion ----

const blank = (v: unknown) => v === undefined || v === null || (typeof v === "string" && v.trim() === "");

const toText = (v: unknown) => (blank(v) ? undefined : typeof v === "number" ? String(v) : typeof v === "string" ? v.trim() : v);

const requiredText = z.preprocess(toText, z.string({ required_error: "is required", invalid_type_error: "must be text" }));
const optionalText = z.preprocess(toText, z.string({ invalid_type_error: "must be text" }).optional());

const toNumber = (v: unknown) => (blank(v) ? undefined : typeof v === "string" ? Number(v.replace(/[,\s]/g, "")) : v);
const number = (o: { required_error?: string }) =>
  z.number({ ...o, invalid_type_error: "must be a number" }).finite("must be a number").nonnegative("must not be negative");
const requiredNumber = z.preprocess(toNumber, number({ required_error: "is required" }));
const optionalNumber = z.preprocess(toNumber, number({}).optional());

const toDateText = (v: unknown) => {
  if (blank(v)) return undefined;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? v : v.toLocaleDateString("en-GB");
  return toText(v);
};
const requiredDate = z.preprocess(toDateText, z.string({ required_error: "is required", invalid_type_error: "must be a date" }));
const optionalDate = z.preprocess(toDateText, z.string({ invalid_type_error: "must be a date" }).optional());

// ---- generic table handling ----

/** field → original column key, for the columns the rows actually have */
function resolveColumns(rows: readonly RawRow[], specs: Record<string, ColumnSpec>, fields: string[]): Map<string, string> {
  const byName = new Map<string, string>();
  for (const r of rows) {
    for (const k of Object.keys(r)) {
      const n = normalizeColumnName(k);
      if (!byName.has(n)) byName.set(n, k);
    }
  }
  const out = new Map<string, string>();
  for (const field of fields) {
    const names = specs[field]?.aliases ?? [field];
    for (const a of names) {
      const key = byName.get(normalizeColumnName(a));
      if (key !== undefined) {
        out.set(field, key);
        break;
      }
    }
  }
  return out;
}

type Table<S extends z.ZodRawShape> = {
  sheet?: string;
  rows: readonly RawRow[];
  schema: z.ZodObject<S>;
  specs: Record<string, ColumnSpec>;
  columns: Map<string, string>;
};

function table<S extends z.ZodRawShape>(
  rows: readonly RawRow[],
  schema: z.ZodObject<S>,
  specs: Record<string, ColumnSpec>,
  sheet?: string,
): Table<S> {
  return { sheet, rows, schema, specs, columns: resolveColumns(rows, specs, Object.keys(schema.shape)) };
}

const label = (t: { specs: Record<string, ColumnSpec> }, field: string) => t.specs[field]?.label ?? field;

function missingColumns<S extends z.ZodRawShape>(t: Table<S>): SchemaIssue[] {
  if (t.rows.length === 0) return [{ sheet: t.sheet, field: "", message: t.sheet ? "has no rows" : "dataset has no rows" }];
  const shape: z.ZodRawShape = t.schema.shape;
  return Object.keys(shape)
    .filter((field) => !shape[field].isOptional() && !t.columns.has(field))
    .map((field) => ({ sheet: t.sheet, field: label(t, field), message: "column is missing" }));
}

function parseRows<S extends z.ZodRawShape>(t: Table<S>): { values: Array<z.output<z.ZodObject<S>>>; issues: SchemaIssue[] } {
  const values: Array<z.output<z.ZodObject<S>>> = [];
  const issues: SchemaIssue[] = [];
  t.rows.forEach((row, i) => {
    const picked: RawRow = {};
    for (const [field, key] of t.columns) picked[field] = row[key];
    const res = t.schema.safeParse(picked);
    if (res.success) values.push(res.data);
    else {
      for (const issue of res.error.issues) {
        issues.push({ sheet: t.sheet, row: i, field: label(t, String(issue.path[0] ?? "")), message: issue.message });
      }
    }
  });
  return { values, issues };
}

// ---- bulk dataset ----

const batchRowSchema = z.object({
  fromName: requiredText,
  pan: requiredText,
  mobile: requiredText,
  invoiceNumber: requiredText,
  description: requiredText,
  amount: requiredNumber,
  accountNumber: requiredText,
  ifsc: requiredText,
  accountHolder: optionalText,
  email: optionalText,
  address: optionalText,
  invoiceDate: optionalDate,
  dueDate: optionalDate,
});

export function parseBatchRows(rows: readonly RawRow[]): Result<BatchRow[], SchemaError> {
  const t = table(rows, batchRowSchema, aliases.batch);
  const missing = missingColumns(t);
  if (missing.length) return err(new SchemaError(missing));
  const { values, issues } = parseRows(t);
  return issues.length ? err(new SchemaError(issues)) : ok(values);
}

// ---- workbook with separate record sets ----

const invoiceInfoSchema = z.object({
  invoiceNumber: requiredText,
  date: requiredDate,
  dueDate: requiredDate,
  taxRate: optionalNumber,
  cgstRate: optionalNumber,
  sgstRate: optionalNumber,
  notes: optionalText,
  paymentTerms: optionalText,
});

const clientInfoSchema = z.object({
  name: requiredText,
  address: requiredText,
  email: requiredText,
  phone: optionalText,
  gstin: optionalText,
  pan: optionalText,
});

const vendorInfoSchema = clientInfoSchema.extend({
  bankName: optionalText,
  accountHolder: optionalText,
  accountNumber: optionalText,
  ifsc: optionalText,
  branch: optionalText,
});

const itemSchema = z.object({
  description: requiredText,
  code: optionalText,
  // defaults to 1 in computeTotals
  quantity: optionalNumber,
  unitPrice: requiredNumber,
});

export const SHEETS = ["Invoice_Info", "Client_Info", "Items", "Vendor_Info"] as const;
export type SheetName = (typeof SHEETS)[number];

export type SheetOptions = {
  /** issuing party when the workbook has no Vendor_Info sheet */
  from?: PartyInfo;
  /** defaults to "gst" when a GSTIN or dual rate is present */
  variant?: TemplateVariant;
};

function findSheet(sheets: Record<string, readonly RawRow[]>, name: SheetName): readonly RawRow[] | undefined {
  const wanted = normalizeColumnName(name);
  const key = Object.keys(sheets).find((k) => normalizeColumnName(k) === wanted);
  return key === undefined ? undefined : sheets[key];
}

function taxFrom(info: z.output<typeof invoiceInfoSchema>): TaxConfig {
  if (info.cgstRate !== undefined || info.sgstRate !== undefined) {
    return { kind: "dual", rateA: info.cgstRate ?? 0, rateB: info.sgstRate ?? 0 };
  }
  if (info.taxRate !== undefined) return { kind: "single", rate: info.taxRate };
  return { kind: "none" };
}

function vendorParty(v: z.output<typeof vendorInfoSchema>): PartyInfo {
  const { bankName, accountHolder, accountNumber, ifsc, branch, ...party } = v;
  return accountNumber && ifsc ? { ...party, bank: { bankName, accountHolder, accountNumber, ifsc, branch } } : party;
}

/**
 * Builds one invoice from the record sets of a workbook. Missing sheets and
 * missing columns of every sheet are reported together; cell problems next.
 */
export function parseInvoiceSheets(
  sheets: Record<string, readonly RawRow[]>,
  options: SheetOptions = {},
): Result<InvoiceRecord, SchemaError> {
  const required: SheetName[] = options.from ? ["Invoice_Info", "Client_Info", "Items"] : [...SHEETS];
  const found = new Map<SheetName, readonly RawRow[]>();
  const issues: SchemaIssue[] = [];
  for (const name of SHEETS) {
    const rows = findSheet(sheets, name);
    if (rows) found.set(name, rows);
    else if (required.includes(name)) issues.push({ sheet: name, field: "", message: "is missing" });
  }

  const sheetRows = (name: SheetName) => found.get(name) ?? [];
  const info = table(sheetRows("Invoice_Info"), invoiceInfoSchema, aliases.sheets.Invoice_Info, "Invoice_Info");
  const client = table(sheetRows("Client_Info"), clientInfoSchema, aliases.sheets.Client_Info, "Client_Info");
  const items = table(sheetRows("Items"), itemSchema, aliases.sheets.Items, "Items");
  const vendor = found.has("Vendor_Info")
    ? table(sheetRows("Vendor_Info"), vendorInfoSchema, aliases.sheets.Vendor_Info, "Vendor_Info")
    : null;

  if (found.has("Invoice_Info")) issues.push(...missingColumns(info));
  if (found.has("Client_Info")) issues.push(...missingColumns(client));
  if (found.has("Items")) issues.push(...missingColumns(items));
  if (vendor) issues.push(...missingColumns(vendor));
  if (issues.length) return err(new SchemaError(issues));

  // single-record sheets use their first row
  const first = <S extends z.ZodRawShape>(t: Table<S>) => parseRows({ ...t, rows: t.rows.slice(0, 1) });
  const infoRes = first(info);
  const clientRes = first(client);
  const itemsRes = parseRows(items);
  const vendorRes = vendor ? first(vendor) : null;
  issues.push(...infoRes.issues, ...clientRes.issues, ...itemsRes.issues, ...(vendorRes?.issues ?? []));
  if (issues.length) return err(new SchemaError(issues));

  const meta = infoRes.values[0];
  const billTo: PartyInfo = clientRes.values[0];
  const vendorRow = vendorRes?.values[0];
  const from = vendorRow ? vendorParty(vendorRow) : options.from;
  if (!meta || !from) return err(new SchemaError([{ sheet: "Vendor_Info", field: "", message: "is missing" }]));

  const tax = taxFrom(meta);
  const variant = options.variant ?? (tax.kind === "dual" || from.gstin || billTo.gstin ? "gst" : "simple");

  return ok({
    variant,
    from,
    billTo,
    meta: {
      invoiceNumber: meta.invoiceNumber,
      issueDate: meta.date,
      dueDate: meta.dueDate,
      tax,
      notes: meta.notes,
      paymentTerms: meta.paymentTerms,
    },
    items: itemsRes.values,
  });
}

// ---- JSON documents (CLI input) ----

const opt = z.string().optional();
const nonNegative = z.number().finite().nonnegative();

const bankSchema = z.object({
  bankName: opt,
  accountHolder: opt,
  accountNumber: z.string().min(1),
  ifsc: z.string().min(1),
  branch: opt,
});

export const partySchema = z.object({
  name: z.string().min(1),
  address: opt,
  email: opt,
  phone: opt,
  pan: opt,
  gstin: opt,
  bank: bankSchema.optional(),
});

export const taxSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("none") }),
  z.object({ kind: z.literal("single"), rate: nonNegative, label: opt }),
  z.object({ kind: z.literal("dual"), rateA: nonNegative, rateB: nonNegative, labelA: opt, labelB: opt }),
]);

const lineItemSchema = z
  .object({
    description: z.string().min(1),
    code: opt,
    quantity: nonNegative.optional(),
    unitPrice: nonNegative.optional(),
    amount: nonNegative.optional(),
  })
  .refine((i) => i.unitPrice !== undefined || i.amount !== undefined, {
    message: "needs a unitPrice or an amount",
    path: ["unitPrice"],
  });

export const invoiceRecordSchema = z.object({
  variant: z.enum(["simple", "gst", "bulk"]).default("simple"),
  from: partySchema,
  billTo: partySchema,
  meta: z.object({
    invoiceNumber: z.string().min(1),
    issueDate: z.string(),
    dueDate: z.string(),
    tax: taxSchema.default({ kind: "none" }),
    notes: opt,
    paymentTerms: opt,
  }),
  items: z.array(lineItemSchema).min(1),
});

const batchJobSchema = z.object({
  billTo: partySchema,
  shared: z
    .object({
      email: opt,
      address: opt,
      bankName: opt,
      branch: opt,
      tax: taxSchema.optional(),
      notes: opt,
      paymentTerms: opt,
    })
    .default({}),
  rows: z.array(z.record(z.unknown())),
});

function zodIssues(e: z.ZodError): SchemaIssue[] {
  return e.issues.map((i) => ({
    row: i.path[0] === "items" || i.path[0] === "rows" ? Number(i.path[1]) : undefined,
    field: i.path.join("."),
    message: i.message,
  }));
}

export function parseInvoiceRecord(input: unknown): Result<InvoiceRecord, SchemaError> {
  const res = invoiceRecordSchema.safeParse(input);
  return res.success ? ok(res.data) : err(new SchemaError(zodIssues(res.error)));
}

/** Job document whose `rows` are raw dataset rows (any column spelling). */
export function parseBatchJob(input: unknown): Result<BatchJob, SchemaError> {
  const res = batchJobSchema.safeParse(input);
  if (!res.success) return err(new SchemaError(zodIssues(res.error)));
  const rows = parseBatchRows(res.data.rows);
  if (!rows.ok) return rows;
  return ok({ billTo: res.data.billTo, shared: res.data.shared, rows: rows.value });
}
