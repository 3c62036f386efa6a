// src/lib/batch.service.ts
// Renders one invoice per dataset row and packages the PDFs.
import JSZip from "jszip";

import { describeError, err, toRenderError, type InvoiceError, type Result } from "./errors";
import type { BatchJob, BatchRow, InvoiceRecord, RenderedDocument } from "./invoice-types";
import { renderInvoice, type LogoInput } from "./invoice-pdf";
import type { StyleConfig } from "./style";

export type FailureMode = "abort" | "collect";
export type DeliveryMode = "archive" | "files";

export type BatchProgress = { completed: number; total: number; fraction: number };

export type RowFailure = {
  /** 0-based position in job.rows */
  row: number;
  invoiceNumber: string;
  error: InvoiceError;
  message: string;
};

export type BatchOptions = {
  /** parallel renders; defaults to 1 */
  concurrency?: number;
  /** abort: first failing row discards the whole batch; collect: keep going */
  failureMode?: FailureMode;
  delivery?: DeliveryMode;
  /** fills missing invoice/due dates and stamps archive entries */
  runDate?: Date;
  /** called once per processed row, in increasing order of `completed` */
  onProgress?: (p: BatchProgress) => void;
  /** stops scheduling further rows; rows already rendering finish */
  signal?: AbortSignal;
};

export type BatchResult = {
  status: "completed" | "aborted" | "cancelled";
  /** successful documents in input row order */
  documents: RenderedDocument[];
  /** set for delivery "archive" when the batch completed */
  archive: RenderedDocument | null;
  succeeded: number;
  /** sorted by row */
  failures: RowFailure[];
  firstFailure: RowFailure | null;
};

export function formatRunDate(d: Date): string {
  return d.toLocaleDateString("en-GB");
}

function isoDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${mm}-${dd}`;
}

/** Merges the job's constant parties with one row's own fields. */
export function rowToRecord(job: BatchJob, row: BatchRow, runDate: Date): InvoiceRecord {
  const { shared } = job;
  const today = formatRunDate(runDate);
  return {
    variant: "bulk",
    from: {
      name: row.fromName,
      address: row.address ?? shared.address,
      email: row.email ?? shared.email,
      phone: row.mobile,
      pan: row.pan,
      bank: {
        bankName: shared.bankName,
        branch: shared.branch,
        accountHolder: row.accountHolder ?? row.fromName,
        accountNumber: row.accountNumber,
        ifsc: row.ifsc,
      },
    },
    billTo: job.billTo,
    meta: {
      invoiceNumber: row.invoiceNumber,
      issueDate: row.invoiceDate || today,
      dueDate: row.dueDate || today,
      tax: shared.tax ?? { kind: "none" },
      notes: shared.notes,
      paymentTerms: shared.paymentTerms,
    },
    items: [{ description: row.description, amount: row.amount }],
  };
}

/** Zip-safe, unique entry name: path separators become "-", repeats get _2, _3... */
export function archiveEntryName(filename: string, used: Set<string>): string {
  const safe = filename.replace(/[\\/]/g, "-");
  const dot = safe.lastIndexOf(".");
  const [stem, ext] = dot > 0 ? [safe.slice(0, dot), safe.slice(dot)] : [safe, ""];
  let name = safe;
  for (let n = 2; used.has(name); n++) name = `${stem}_${n}${ext}`;
  used.add(name);
  return name;
}

export async function packageArchive(docs: readonly RenderedDocument[], runDate: Date): Promise<RenderedDocument> {
  const zip = new JSZip();
  const used = new Set<string>();
  for (const d of docs) {
    const name = archiveEntryName(d.filename, used);
    if (name !== d.filename) console.warn(`[batch] ${d.filename} stored as ${name}`);
    // fixed timestamp keeps the archive byte-identical for the same input
    zip.file(name, d.bytes, { binary: true, date: runDate });
  }
  const bytes = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  return {
    filename: `Invoices_${isoDate(runDate)}.zip`,
    bytes,
    contentType: "application/zip",
    total: docs.reduce((s, d) => s + d.total, 0),
    pages: docs.reduce((s, d) => s + d.pages, 0),
    warnings: docs.flatMap((d) => d.warnings.map((w) => `${d.filename}: ${w}`)),
  };
}

export async function runBatch(
  job: BatchJob,
  style: StyleConfig,
  logo?: LogoInput,
  options: BatchOptions = {},
): Promise<BatchResult> {
  const total = job.rows.length;
  const mode = options.failureMode ?? "abort";
  const runDate = options.runDate ?? new Date();
  const lanes = Math.floor(options.concurrency ?? 1);
  const concurrency = Number.isFinite(lanes) && lanes >= 1 ? lanes : 1;

  // indexed by row, so completion order never changes output order
  const slots: Array<RenderedDocument | undefined> = new Array(total);
  const failures: RowFailure[] = [];
  let next = 0;
  let completed = 0;
  let stop = false;

  const renderRow = async (i: number): Promise<Result<RenderedDocument, InvoiceError>> => {
    try {
      return await renderInvoice(rowToRecord(job, job.rows[i], runDate), style, logo);
    } catch (e) {
      return err(toRenderError(e));
    }
  };

  const lane = async () => {
    while (!stop && next < total) {
      if (options.signal?.aborted) {
        stop = true;
        break;
      }
      const i = next++;
      const res = await renderRow(i);
      if (res.ok) {
        slots[i] = res.value;
      } else {
        const error = res.error.atRow(i);
        const invoiceNumber = job.rows[i].invoiceNumber;
        failures.push({ row: i, invoiceNumber, error, message: describeError(error) });
        console.error(`[batch] row ${i + 1} (${invoiceNumber}) failed: ${error.message}`);
        if (mode === "abort") stop = true;
      }
      completed += 1;
      options.onProgress?.({ completed, total, fraction: completed / total });
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, total) }, lane));

  failures.sort((a, b) => a.row - b.row);
  const firstFailure = failures[0] ?? null;

  if (mode === "abort" && firstFailure) {
    console.error(`[batch] aborted: ${firstFailure.message}`);
    return { status: "aborted", documents: [], archive: null, succeeded: 0, failures: [firstFailure], firstFailure };
  }

  const documents = slots.filter((d): d is RenderedDocument => d !== undefined);
  if (options.signal?.aborted && completed < total) {
    console.warn(`[batch] cancelled after ${completed}/${total} rows`);
    return { status: "cancelled", documents, archive: null, succeeded: documents.length, failures, firstFailure };
  }

  console.log(`[batch] rendered ${documents.length}/${total} invoices`);
  const archive = (options.delivery ?? "archive") === "archive" && total > 0 ? await packageArchive(documents, runDate) : null;
  return { status: "completed", documents, archive, succeeded: documents.length, failures, firstFailure };
}
