import type { BatchJob, BatchRow, InvoiceRecord } from "../invoice-types";
import type { TextMeasurer } from "../layout-types";

/** every line is exactly as tall as its font size */
export const flatMeasurer: TextMeasurer = {
  height: (_text, o) => o.size,
};

export function createTestRecord(overrides: Partial<InvoiceRecord> = {}): InvoiceRecord {
  return {
    variant: "simple",
    from: {
      name: "Acme Studio",
      address: "12 Park Street\\nKolkata",
      email: "billing@acme.test",
      gstin: "GSTIN-TEST-1",
    },
    billTo: { name: "Client Co", address: "1 Main Road" },
    meta: {
      invoiceNumber: "INV-001",
      issueDate: "01/02/2024",
      dueDate: "15/02/2024",
      tax: { kind: "dual", rateA: 0, rateB: 5 },
    },
    items: [{ description: "Design", quantity: 2, unitPrice: 500 }],
    ...overrides,
  };
}

export function createTestRow(overrides: Partial<BatchRow> = {}): BatchRow {
  return {
    fromName: "Asha Rao",
    pan: "TESTP0000A",
    mobile: "9000000000",
    invoiceNumber: "A-1",
    description: "Launch reel",
    amount: 1500,
    accountNumber: "000111222",
    ifsc: "TEST0000001",
    ...overrides,
  };
}

export function createTestJob(rows: BatchRow[]): BatchJob {
  return {
    billTo: { name: "Brand House", address: "5 Market Lane" },
    shared: { bankName: "Test Bank" },
    rows,
  };
}

/** PNG signature followed by bytes no decoder accepts */
export const brokenPng = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 0, 0, 0, 0, 0]);
