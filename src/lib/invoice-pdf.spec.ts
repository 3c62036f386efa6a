import { describe, expect, it } from "vitest";

import { brokenPng, createTestRecord } from "./fixtures/invoices";
import { itemTable } from "./invoice-blocks";
import { inspectLogo, invoiceFigures, invoiceFilename, planInvoice, renderInvoice } from "./invoice-pdf";
import type { PagePlan } from "./layout-types";
import { defaultStyle } from "./style";

function planOf(logo?: Buffer): PagePlan {
  const res = planInvoice(createTestRecord(), defaultStyle, logo);
  if (!res.ok) throw res.error;
  return res.value;
}

describe("invoiceFilename", () => {
  it("uses the invoice number verbatim", () => {
    expect(invoiceFilename("INV-001")).toBe("Invoice_INV-001.pdf");
  });
});

describe("inspectLogo", () => {
  it("accepts no logo", () => {
    expect(inspectLogo(undefined)).toEqual({ ok: true, value: null });
  });

  it("accepts PNG bytes by signature", () => {
    const res = inspectLogo(new Uint8Array(brokenPng));
    expect(res.ok && res.value?.equals(brokenPng)).toBe(true);
  });

  it("rejects empty or unknown bytes", () => {
    const empty = inspectLogo(Buffer.alloc(0));
    const text = inspectLogo(Buffer.from("not an image"));
    expect(!empty.ok && empty.error.message).toBe("logo is empty");
    expect(!text.ok && text.error.kind).toBe("asset");
    expect(!text.ok && text.error.message).toBe("logo is neither PNG nor JPEG");
  });
});

describe("invoiceFigures", () => {
  it("spells the same whole rupees the payable row prints", () => {
    const base = createTestRecord();
    const record = createTestRecord({
      items: [{ description: "Pens", quantity: 100, unitPrice: 19.99 }],
      meta: { ...base.meta, tax: { kind: "none" } },
    });
    const figures = invoiceFigures(record);
    if (!figures.ok) throw figures.error;
    expect(figures.value.words).toBe("One Thousand Nine Hundred Ninety Nine Rupees Only");
    const payable = itemTable(record, figures.value, defaultStyle).summary.find((s) => s.label === "Amount Payable");
    expect(payable).toMatchObject({ value: "Rs. 1999.00" });
  });

  it("still drops the paise", () => {
    const record = createTestRecord({ items: [{ description: "Tea", quantity: 1, unitPrice: 99.99 }] });
    const figures = invoiceFigures(record);
    if (!figures.ok) throw figures.error;
    // 99.99 + 5% SGST = 104.9895, printed 104.99
    expect(figures.value.words).toBe("One Hundred Four Rupees Only");
  });
});

describe("planInvoice", () => {
  it("moves nothing when the logo is left out", () => {
    const without = planOf();
    const withLogo = planOf(brokenPng);
    const images = withLogo.ops.filter((o) => o.op === "image");
    expect(images).toHaveLength(1);
    expect(images[0]).toMatchObject({ x: 41, width: 156, height: 42 });
    expect(withLogo.ops.filter((o) => o.op !== "image")).toEqual(without.ops);
    expect(withLogo.contentBottom).toBe(without.contentBottom);
  });
});

describe("renderInvoice", () => {
  it("renders a PDF with totals", async () => {
    const res = await renderInvoice(createTestRecord(), defaultStyle);
    if (!res.ok) throw res.error;
    expect(res.value.filename).toBe("Invoice_INV-001.pdf");
    expect(res.value.contentType).toBe("application/pdf");
    expect(res.value.total).toBe(1050);
    expect(res.value.pages).toBe(1);
    expect(res.value.bytes.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(res.value.warnings).toEqual([]);
  });

  it("falls back to no logo for bytes that are not an image", async () => {
    const res = await renderInvoice(createTestRecord(), defaultStyle, Buffer.from("not an image"));
    if (!res.ok) throw res.error;
    expect(res.value.warnings).toEqual(["logo is neither PNG nor JPEG"]);
  });

  it("keeps going when the image decoder rejects the logo", async () => {
    const res = await renderInvoice(createTestRecord(), defaultStyle, brokenPng);
    if (!res.ok) throw res.error;
    expect(res.value.warnings).toHaveLength(1);
    expect(res.value.warnings[0]).toMatch(/^logo could not be embedded: /);
  });

  it("requires an invoice number", async () => {
    const record = createTestRecord();
    const res = await renderInvoice({ ...record, meta: { ...record.meta, invoiceNumber: "  " } }, defaultStyle);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe("schema");
  });

  it("reports computation errors before rendering", async () => {
    const res = await renderInvoice(createTestRecord({ items: [] }), defaultStyle);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe("computation");
  });
});
