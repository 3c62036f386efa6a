// src/lib/pdf.ts
// pdfkit side of the layout engine: font setup, text measurement, painting a plan.
import PDFDocument from "pdfkit";

import type { PagePlan, TextMeasurer } from "./layout-types";
import { PAGE_SIZES, type StyleConfig } from "./style";

const REGULAR = "body";
const BOLD = "body-bold";

function createPdf(style: StyleConfig, autoFirstPage: boolean): PDFKit.PDFDocument {
  const { width, height } = PAGE_SIZES[style.pageSize];
  const doc = new PDFDocument({
    size: [width, height],
    margin: 0,
    autoFirstPage,
    bufferPages: true,
    info: { Producer: "invoicesmith", Creator: "invoicesmith" },
  });
  doc.registerFont(REGULAR, style.fonts.regular);
  doc.registerFont(BOLD, style.fonts.bold);
  doc.font(REGULAR);
  return doc;
}

/** Measures against a scratch document that is never written out. */
export function createMeasurer(style: StyleConfig): TextMeasurer {
  const doc = createPdf(style, true);
  doc.font(BOLD); // surfaces a bad bold font source here rather than mid-plan
  return {
    height(text, { size, bold, width }) {
      doc.font(bold ? BOLD : REGULAR).fontSize(size);
      return doc.heightOfString(text, { width });
    },
  };
}

export type PaintedPdf = { bytes: Buffer; pages: number; warnings: string[] };

export async function paintPlan(plan: PagePlan, style: StyleConfig): Promise<PaintedPdf> {
  const doc = createPdf(style, false);
  const chunks: Buffer[] = [];
  const warnings: string[] = [];
  doc.on("data", (c: Buffer) => chunks.push(c));
  const done = new Promise<void>((resolve, reject) => {
    doc.on("end", resolve);
    doc.on("error", reject);
  });

  doc.addPage({ size: [plan.width, plan.height], margin: 0 });

  for (const op of plan.ops) {
    switch (op.op) {
      case "rect": {
        const lw = op.lineWidth ?? 1;
        if (op.fill && op.stroke) doc.lineWidth(lw).rect(op.x, op.y, op.width, op.height).fillAndStroke(op.fill, op.stroke);
        else if (op.fill) doc.rect(op.x, op.y, op.width, op.height).fill(op.fill);
        else if (op.stroke) doc.lineWidth(lw).rect(op.x, op.y, op.width, op.height).stroke(op.stroke);
        break;
      }
      case "line":
        doc.moveTo(op.x1, op.y1).lineTo(op.x2, op.y2).lineWidth(op.lineWidth).strokeColor(op.color).stroke();
        break;
      case "image":
        try {
          doc.image(op.data, op.x, op.y, { fit: [op.width, op.height] });
        } catch (e) {
          // the cell keeps its reserved box, nothing else moves
          const msg = e instanceof Error ? e.message : String(e);
          warnings.push(`logo could not be embedded: ${msg}`);
          console.warn(`[pdf] skipping image: ${msg}`);
        }
        break;
      case "text":
        doc.fillColor(op.color).fontSize(op.size);
        op.runs.forEach((r, i) => {
          const continued = i < op.runs.length - 1;
          doc.font(r.bold ? BOLD : REGULAR);
          if (i === 0) doc.text(r.text, op.x, op.y, { width: op.width, align: op.align, continued });
          else doc.text(r.text, { continued });
        });
        break;
    }
  }

  const pages = doc.bufferedPageRange().count;
  doc.end();
  await done;
  return { bytes: Buffer.concat(chunks), pages, warnings };
}
