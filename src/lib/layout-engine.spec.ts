import { describe, expect, it } from "vitest";

import { flatMeasurer } from "./fixtures/invoices";
import { columnAlign, layoutDocument, planLayout } from "./layout-engine";
import type { Block, DrawOp, ItemTableBlock, PagePlan, TextRole } from "./layout-types";
import { defaultStyle, makeStyle } from "./style";

type TextOp = Extract<DrawOp, { op: "text" }>;
type RectOp = Extract<DrawOp, { op: "rect" }>;

const texts = (plan: PagePlan, role: TextRole) =>
  plan.ops.filter((o): o is TextOp => o.op === "text" && o.role === role);
const rects = (plan: PagePlan) => plan.ops.filter((o): o is RectOp => o.op === "rect");

function plan(blocks: Block[], style = defaultStyle): PagePlan {
  const res = planLayout(blocks, style, flatMeasurer);
  if (!res.ok) throw res.error;
  return res.value;
}

const table: ItemTableBlock = {
  kind: "table",
  columns: [
    { header: "#", width: 50, kind: "index" },
    { header: "Description", width: 200, kind: "text" },
    { header: "Qty", width: 60, kind: "number" },
    { header: "Amount", width: 100, kind: "currency" },
  ],
  rows: [["1", "Widget", "2", "Rs. 10.00"]],
  summary: [
    { kind: "amount", label: "Subtotal", value: "Rs. 10.00" },
    { kind: "amount", label: "Amount Payable", value: "Rs. 10.00", emphasis: true, ruleAbove: true },
    { kind: "words", label: "Amount in Words:", text: "Ten Rupees Only" },
  ],
};

describe("columnAlign", () => {
  it("aligns by content kind", () => {
    expect(columnAlign("currency")).toBe("right");
    expect(columnAlign("number")).toBe("center");
    expect(columnAlign("index")).toBe("center");
    expect(columnAlign("text")).toBe("left");
  });
});

describe("item table", () => {
  const p = plan([table]);

  it("fills the header row with the primary colour", () => {
    expect(p.ops[0]).toEqual({ op: "rect", x: 36, y: 36, width: 410, height: 21, fill: "#2E4057" });
    const th = texts(p, "th");
    expect(th.map((t) => t.runs)).toEqual([
      [{ text: "#", bold: true }],
      [{ text: "Description", bold: true }],
      [{ text: "Qty", bold: true }],
      [{ text: "Amount", bold: true }],
    ]);
    expect(new Set(th.map((t) => t.align))).toEqual(new Set(["center"]));
    expect(new Set(th.map((t) => t.color))).toEqual(new Set(["#F5F5F5"]));
  });

  it("grids the header and item rows only", () => {
    const grid = rects(p).filter((r) => r.stroke);
    expect(grid).toHaveLength(8);
    expect(grid.every((r) => r.y < 77)).toBe(true);
    expect(rects(p).filter((r) => r.fill === "#F5F5DC")).toEqual([
      { op: "rect", x: 36, y: 57, width: 410, height: 20, fill: "#F5F5DC" },
    ]);
  });

  it("aligns item cells by column kind", () => {
    const td = texts(p, "td");
    expect(td.map((t) => t.align)).toEqual(["center", "left", "center", "right"]);
    expect(td.map((t) => t.y)).toEqual([62, 62, 62, 62]);
  });

  it("places summary labels over the numeric columns and values in the last one", () => {
    const labels = texts(p, "summary-label");
    const values = texts(p, "summary-value");
    expect(labels.map((l) => [l.x, l.y, l.width, l.align])).toEqual([
      [291, 82, 50, "right"],
      [291, 102, 50, "right"],
    ]);
    expect(values.map((v) => [v.x, v.y, v.width])).toEqual([
      [351, 82, 90],
      [351, 102, 90],
    ]);
    expect(labels[1].runs).toEqual([{ text: "Amount Payable", bold: true }]);
    expect(labels[0].runs).toEqual([{ text: "Subtotal", bold: false }]);
  });

  it("rules the top of the payable row", () => {
    expect(p.ops.filter((o) => o.op === "line")).toEqual([
      { op: "line", x1: 286, y1: 97, x2: 446, y2: 97, color: "#000000", lineWidth: 1 },
    ]);
  });

  it("writes the amount in words small, across the leading columns", () => {
    expect(texts(p, "words")).toEqual([
      {
        op: "text",
        role: "words",
        x: 41,
        y: 122,
        width: 240,
        runs: [{ text: "Amount in Words: ", bold: true }, { text: "Ten Rupees Only" }],
        size: 8,
        align: "left",
        color: "#444444",
      },
    ]);
    expect(p.contentBottom).toBe(135);
    expect(p.overflow).toBe(false);
    expect(p.height).toBe(841.89);
  });

  it("rejects a table wider than the content area", () => {
    const res = planLayout(
      [{ ...table, columns: [{ header: "a", width: 300, kind: "text" }, { header: "b", width: 300, kind: "currency" }], rows: [] }],
      defaultStyle,
      flatMeasurer,
    );
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("render");
      expect(res.error.message).toBe("block 1: item table is 600.0pt wide, content width is 523.3pt");
    }
  });

  it("rejects rows with the wrong number of cells", () => {
    const res = planLayout([{ ...table, rows: [["1"]] }], defaultStyle, flatMeasurer);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe("block 1: item row 1 has 1 cells, expected 4");
  });

  it("needs at least two columns", () => {
    const res = planLayout([{ ...table, columns: [table.columns[0]], rows: [] }], defaultStyle, flatMeasurer);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe("block 1: item table needs at least 2 columns");
  });
});

describe("flow", () => {
  it("gives an absent image no space", () => {
    const p = plan([
      { kind: "image", data: null, width: 100, height: 40 },
      { kind: "text", lines: [[{ text: "first" }]] },
    ]);
    expect(texts(p, "text")[0].y).toBe(36);
  });

  it("keeps a two-column row at its minimum height", () => {
    const p = plan([
      {
        kind: "columns",
        widths: [200, 300],
        valign: ["middle", "top"],
        rows: [[{ kind: "image", data: null, width: 156, height: 42 }, { kind: "text", lines: [[{ text: "a" }], [{ text: "b" }]] }]],
        minRowHeight: 52,
      },
      { kind: "text", lines: [[{ text: "below" }]] },
    ]);
    expect(texts(p, "cell").map((t) => [t.x, t.y])).toEqual([
      [241, 41],
      [241, 51],
    ]);
    expect(texts(p, "text")[0].y).toBe(36 + 52 + 14);
  });

  it("bottom-aligns a shorter cell", () => {
    const p = plan([
      {
        kind: "columns",
        widths: [200, 300],
        valign: ["bottom", "top"],
        rows: [[{ kind: "text", lines: [[{ text: "x" }]] }, { kind: "text", lines: [[{ text: "1" }], [{ text: "2" }], [{ text: "3" }]] }]],
      },
    ]);
    expect(texts(p, "cell")[0].y).toBe(61);
  });

  it("rejects two columns wider than the page", () => {
    const res = planLayout(
      [{ kind: "columns", widths: [400, 200], valign: ["top", "top"], rows: [] }],
      defaultStyle,
      flatMeasurer,
    );
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toMatch(/^block 1: column widths 400 \+ 200 do not fit content width/);
  });

  it("lengthens the page instead of dropping content", () => {
    const lines = Array.from({ length: 100 }, (_, i) => [{ text: `line ${i}` }]);
    const p = plan([{ kind: "text", lines }]);
    expect(p.overflow).toBe(true);
    expect(p.contentBottom).toBe(1036);
    expect(p.height).toBe(1072);
    expect(texts(p, "text")).toHaveLength(100);
  });

  it("refuses an invalid style", () => {
    const res = planLayout([], makeStyle({ colors: { primary: "navy" } }), flatMeasurer);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('color primary must be a hex value, got "navy"');
  });
});

describe("layoutDocument", () => {
  it("paints a single-page PDF", async () => {
    const res = await layoutDocument([{ kind: "text", lines: [[{ text: "Hello", bold: true }, { text: " world" }]] }, table], defaultStyle);
    if (!res.ok) throw res.error;
    expect(res.value.bytes.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(res.value.pages).toBe(1);
    expect(res.value.warnings).toEqual([]);
  });
});
