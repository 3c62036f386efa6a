import { describe, expect, it } from "vitest";

import type { SchemaError } from "./errors";
import { normalizeColumnName, parseBatchJob, parseBatchRows, parseInvoiceRecord, parseInvoiceSheets } from "./records";

function issuesOf(res: { ok: true } | { ok: false; error: SchemaError }) {
  if (res.ok) throw new Error("expected a schema error");
  return res.error.issues;
}

const bulkRow = {
  "Creator Name": "Asha Rao",
  "PAN No": "TESTP0000A",
  "Mobile Number": "9000000000",
  "Invoice No": "A-1",
  Campaign: "Launch reel",
  "Total Amount": "1,500",
  "Account No": "000111222",
  "IFSC Code": "TEST0000001",
};

describe("normalizeColumnName", () => {
  it("ignores case, spaces and punctuation", () => {
    expect(normalizeColumnName("Invoice No.")).toBe("invoiceno");
    expect(normalizeColumnName("unit_price")).toBe("unitprice");
  });
});

describe("parseBatchRows", () => {
  it("resolves column aliases and coerces cells", () => {
    const res = parseBatchRows([bulkRow]);
    expect(res).toEqual({
      ok: true,
      value: [
        {
          fromName: "Asha Rao",
          pan: "TESTP0000A",
          mobile: "9000000000",
          invoiceNumber: "A-1",
          description: "Launch reel",
          amount: 1500,
          accountNumber: "000111222",
          ifsc: "TEST0000001",
        },
      ],
    });
  });

  it("lists every missing column at once", () => {
    const issues = issuesOf(parseBatchRows([{ "Creator Name": "Asha Rao", Amount: 10 }]));
    expect(issues.map((i) => i.field)).toEqual(["PAN", "Mobile", "Invoice Number", "Description", "Account Number", "IFSC"]);
    expect(new Set(issues.map((i) => i.message))).toEqual(new Set(["column is missing"]));
  });

  it("rejects an empty dataset", () => {
    expect(issuesOf(parseBatchRows([]))).toEqual([{ sheet: undefined, field: "", message: "dataset has no rows" }]);
  });

  it("reports bad cells by row and column label", () => {
    const res = parseBatchRows([bulkRow, { ...bulkRow, "Total Amount": "abc", "Invoice No": "" }]);
    if (res.ok) throw new Error("expected a schema error");
    expect(res.error.issues).toEqual([
      { sheet: undefined, row: 1, field: "Invoice Number", message: "is required" },
      { sheet: undefined, row: 1, field: "Amount", message: "must be a number" },
    ]);
    expect(res.error.message).toBe(
      '2 problems found in input: row 2, "Invoice Number": is required; row 2, "Amount": must be a number',
    );
  });
});

const workbook = () => ({
  Invoice_Info: [{ invoice_number: "INV-7", date: "01/04/2024", due_date: "30/04/2024", cgst_rate: 9, sgst_rate: 9 }],
  Client_Info: [{ name: "Client Co", address: "1 Main Road", email: "ap@client.test" }],
  Items: [{ Description: "Audit", "HSN/SAC": "998222", Quantity: 1, Unit_Price: "10,000" }],
  Vendor_Info: [
    {
      name: "Acme Studio",
      address: "12 Park Street",
      email: "billing@acme.test",
      gstin: "GSTIN-TEST-1",
      bank_name: "Test Bank",
      account_number: "000111",
      ifsc: "TEST0001",
    },
  ],
});

describe("parseInvoiceSheets", () => {
  it("builds one record from the four sheets", () => {
    const res = parseInvoiceSheets(workbook());
    if (!res.ok) throw res.error;
    expect(res.value.variant).toBe("gst");
    expect(res.value.meta).toEqual({
      invoiceNumber: "INV-7",
      issueDate: "01/04/2024",
      dueDate: "30/04/2024",
      tax: { kind: "dual", rateA: 9, rateB: 9 },
    });
    expect(res.value.items).toEqual([{ description: "Audit", code: "998222", quantity: 1, unitPrice: 10000 }]);
    expect(res.value.from.bank).toEqual({ bankName: "Test Bank", accountNumber: "000111", ifsc: "TEST0001" });
  });

  it("reports missing sheets and columns together", () => {
    const issues = issuesOf(
      parseInvoiceSheets({ Invoice_Info: [{ invoice_number: "X" }], Items: [{ Description: "a" }] }),
    );
    expect(issues).toEqual([
      { sheet: "Client_Info", field: "", message: "is missing" },
      { sheet: "Vendor_Info", field: "", message: "is missing" },
      { sheet: "Invoice_Info", field: "date", message: "column is missing" },
      { sheet: "Invoice_Info", field: "due_date", message: "column is missing" },
      { sheet: "Items", field: "Unit_Price", message: "column is missing" },
    ]);
  });

  it("takes the issuer from options when there is no vendor sheet", () => {
    const { Vendor_Info: _vendor, ...sheets } = workbook();
    const res = parseInvoiceSheets(
      { ...sheets, Invoice_Info: [{ invoice_number: "INV-8", date: "01/04/2024", due_date: "30/04/2024", tax_rate: 18 }] },
      { from: { name: "Solo Trader" } },
    );
    if (!res.ok) throw res.error;
    expect(res.value.from).toEqual({ name: "Solo Trader" });
    expect(res.value.meta.tax).toEqual({ kind: "single", rate: 18 });
    expect(res.value.variant).toBe("simple");
  });

  it("leaves quantity unset when the Items sheet has no Quantity column", () => {
    const res = parseInvoiceSheets({ ...workbook(), Items: [{ Description: "Audit", Unit_Price: 1000 }] });
    if (!res.ok) throw res.error;
    expect(res.value.items).toEqual([{ description: "Audit", unitPrice: 1000 }]);
  });

  it("accepts a blank quantity cell", () => {
    const res = parseInvoiceSheets({ ...workbook(), Items: [{ Description: "Audit", Quantity: "", Unit_Price: 1000 }] });
    if (!res.ok) throw res.error;
    expect(res.value.items[0].quantity).toBeUndefined();
  });

  it("matches sheet names loosely", () => {
    const { Invoice_Info, ...rest } = workbook();
    expect(parseInvoiceSheets({ ...rest, "invoice info": Invoice_Info }).ok).toBe(true);
  });
});

describe("parseInvoiceRecord", () => {
  const record = {
    from: { name: "Acme Studio" },
    billTo: { name: "Client Co" },
    meta: { invoiceNumber: "INV-1", issueDate: "01/02/2024", dueDate: "15/02/2024" },
    items: [{ description: "Design", unitPrice: 500 }],
  };

  it("fills defaults", () => {
    const res = parseInvoiceRecord(record);
    if (!res.ok) throw res.error;
    expect(res.value.variant).toBe("simple");
    expect(res.value.meta.tax).toEqual({ kind: "none" });
  });

  it("names the offending path", () => {
    const issues = issuesOf(parseInvoiceRecord({ ...record, items: [{ description: "Design" }] }));
    expect(issues).toEqual([{ row: 0, field: "items.0.unitPrice", message: "needs a unitPrice or an amount" }]);
  });
});

describe("parseBatchJob", () => {
  it("validates the job and its raw rows", () => {
    const res = parseBatchJob({ billTo: { name: "Brand House" }, rows: [bulkRow] });
    if (!res.ok) throw res.error;
    expect(res.value.shared).toEqual({});
    expect(res.value.rows[0].amount).toBe(1500);
  });
});
