// src/lib/layout-engine.ts
// Lays an ordered list of blocks onto one page, top to bottom, in a single flow.
// Planning is separate from painting so the placement rules can be checked
// without decoding a PDF.

import { err, ok, RenderError, toRenderError, type Result } from "./errors";
import type {
  Align,
  Block,
  Cell,
  ColumnKind,
  DrawOp,
  ImageBlock,
  ItemTableBlock,
  PagePlan,
  TextBlock,
  TextMeasurer,
  TextRole,
  TwoColumnBlock,
} from "./layout-types";
import { createMeasurer, paintPlan } from "./pdf";
import { pageBox, validateStyle, type StyleConfig } from "./style";

// tolerance for widths that were computed from fractions
const EPS = 0.5;

export function columnAlign(kind: ColumnKind): Align {
  switch (kind) {
    case "currency":
      return "right";
    case "index":
    case "number":
      return "center";
    case "text":
      return "left";
  }
}

const isNumeric = (kind: ColumnKind) => kind === "number" || kind === "currency";

class Planner {
  private readonly ops: DrawOp[] = [];
  private readonly box: ReturnType<typeof pageBox>;
  private y: number;

  constructor(
    private readonly style: StyleConfig,
    private readonly measure: TextMeasurer,
  ) {
    this.box = pageBox(style);
    this.y = style.margins.top;
  }

  run(blocks: readonly Block[]): PagePlan {
    let contentBottom = this.y;
    blocks.forEach((b, i) => {
      if (!this.place(b, i)) return;
      contentBottom = this.y;
      this.y += b.kind === "text" && b.spaceAfter !== undefined ? b.spaceAfter : this.style.blockGap;
    });

    const needed = contentBottom + this.style.margins.bottom;
    const overflow = needed > this.box.height;
    return {
      width: this.box.width,
      height: overflow ? Math.ceil(needed) : this.box.height,
      contentBottom,
      overflow,
      ops: this.ops,
    };
  }

  /** false when the block takes no space (absent image) */
  private place(b: Block, index: number): boolean {
    const x = this.box.contentX;
    const w = this.box.contentWidth;
    switch (b.kind) {
      case "text":
        this.y += this.drawText(b, x, this.y, w, "text");
        return true;
      case "image":
        if (!b.data) return false;
        this.drawImage(b, x, this.y, w);
        this.y += b.height;
        return true;
      case "columns":
        this.placeColumns(b, index);
        return true;
      case "table":
        this.placeTable(b, index);
        return true;
    }
  }

  // ---- text ----

  private lineHeight(text: string, size: number, bold: boolean, width: number): number {
    return this.measure.height(text || " ", { size, bold, width: Math.max(1, width) });
  }

  private textHeight(t: TextBlock, width: number): number {
    const size = t.size ?? this.style.fontSize.base;
    return t.lines.reduce((h, line) => {
      const text = line.map((r) => r.text).join("");
      return h + this.lineHeight(text, size, line.some((r) => r.bold), width);
    }, 0);
  }

  private drawText(t: TextBlock, x: number, y: number, width: number, role: TextRole): number {
    const size = t.size ?? this.style.fontSize.base;
    let yy = y;
    for (const line of t.lines) {
      const runs = line.filter((r) => r.text.length > 0);
      const text = runs.map((r) => r.text).join("");
      if (runs.length) {
        this.ops.push({
          op: "text",
          role,
          x,
          y: yy,
          width,
          runs,
          size,
          align: t.align ?? "left",
          color: t.color ?? this.style.colors.text,
        });
      }
      yy += this.lineHeight(text, size, runs.some((r) => r.bold), width);
    }
    return yy - y;
  }

  private drawImage(b: ImageBlock, x: number, y: number, width: number) {
    if (!b.data) return;
    const w = Math.min(b.width, width);
    const align = b.align ?? "left";
    const ix = align === "left" ? x : align === "right" ? x + width - w : x + (width - w) / 2;
    this.ops.push({ op: "image", x: ix, y, width: w, height: b.height, data: b.data });
  }

  // ---- two-column block ----

  private cellHeight(c: Cell, width: number): number {
    if (!c) return 0;
    if (c.kind === "image") return c.data ? c.height : 0;
    return this.textHeight(c, width);
  }

  private placeColumns(b: TwoColumnBlock, index: number) {
    const [w0, w1] = b.widths;
    if (w0 <= 0 || w1 <= 0 || w0 + w1 > this.box.contentWidth + EPS) {
      throw new RenderError(
        `block ${index + 1}: column widths ${w0} + ${w1} do not fit content width ${this.box.contentWidth}`,
        { field: "widths" },
      );
    }
    const p = this.style.cellPadding;
    const inner = [w0 - 2 * p, w1 - 2 * p];
    const xs = [this.box.contentX + p, this.box.contentX + w0 + p];

    for (const row of b.rows) {
      const hs = row.map((c, i) => this.cellHeight(c, inner[i]));
      const rowH = Math.max(b.minRowHeight ?? 0, ...hs.map((h) => (h > 0 ? h + 2 * p : 0)));
      row.forEach((c, i) => {
        if (!c) return;
        const free = Math.max(0, rowH - 2 * p - hs[i]);
        const va = b.valign[i];
        const top = this.y + p + (va === "top" ? 0 : va === "middle" ? free / 2 : free);
        if (c.kind === "image") this.drawImage(c, xs[i], top, inner[i]);
        else this.drawText(c, xs[i], top, inner[i], "cell");
      });
      this.y += rowH;
    }
  }

  // ---- item table ----

  private placeTable(b: ItemTableBlock, index: number) {
    const { columns, rows, summary } = b;
    const n = columns.length;
    const where = `block ${index + 1}`;
    if (n < 2) throw new RenderError(`${where}: item table needs at least 2 columns`, { field: "columns" });
    if (columns.some((c) => !(c.width > 0))) {
      throw new RenderError(`${where}: column widths must be positive`, { field: "columns" });
    }
    const total = columns.reduce((s, c) => s + c.width, 0);
    if (total > this.box.contentWidth + EPS) {
      throw new RenderError(
        `${where}: item table is ${total.toFixed(1)}pt wide, content width is ${this.box.contentWidth.toFixed(1)}pt`,
        { field: "columns" },
      );
    }
    rows.forEach((r, ri) => {
      if (r.length !== n) {
        throw new RenderError(`${where}: item row ${ri + 1} has ${r.length} cells, expected ${n}`, { row: ri });
      }
    });

    const { colors, fontSize } = this.style;
    const p = this.style.cellPadding;
    const x0 = this.box.contentX;
    const xs: number[] = [];
    let cx = x0;
    for (const c of columns) {
      xs.push(cx);
      cx += c.width;
    }

    // header row: dark fill, light bold centered text, grid
    const hh = Math.max(...columns.map((c) => this.lineHeight(c.header, fontSize.tableHeader, true, c.width - 2 * p))) + 2 * p;
    this.ops.push({ op: "rect", x: x0, y: this.y, width: total, height: hh, fill: colors.primary });
    columns.forEach((c, i) => {
      this.ops.push({ op: "rect", x: xs[i], y: this.y, width: c.width, height: hh, stroke: colors.grid, lineWidth: 1 });
      this.ops.push({
        op: "text",
        role: "th",
        x: xs[i] + p,
        y: this.y + p,
        width: c.width - 2 * p,
        runs: [{ text: c.header, bold: true }],
        size: fontSize.tableHeader,
        align: "center",
        color: colors.headerText,
      });
    });
    this.y += hh;

    // item rows: filled, gridded
    for (const r of rows) {
      const rh = Math.max(...r.map((v, i) => this.lineHeight(v, fontSize.base, false, columns[i].width - 2 * p))) + 2 * p;
      this.ops.push({ op: "rect", x: x0, y: this.y, width: total, height: rh, fill: colors.rowFill });
      columns.forEach((c, i) => {
        this.ops.push({ op: "rect", x: xs[i], y: this.y, width: c.width, height: rh, stroke: colors.grid, lineWidth: 1 });
        if (!r[i]) return;
        this.ops.push({
          op: "text",
          role: "td",
          x: xs[i] + p,
          y: this.y + p,
          width: c.width - 2 * p,
          runs: [{ text: r[i] }],
          size: fontSize.base,
          align: columnAlign(c.kind),
          color: colors.text,
        });
      });
      this.y += rh;
    }

    // summary rows: no grid; label over the numeric columns, value in the last one
    const last = n - 1;
    const firstNumeric = columns.findIndex((c) => isNumeric(c.kind));
    const labelStart = firstNumeric >= 0 && firstNumeric < last ? firstNumeric : last - 1;
    const labelX = xs[labelStart];
    const labelW = xs[last] - labelX;
    const valueX = xs[last];
    const valueW = columns[last].width;
    const wordsW = firstNumeric > 0 ? xs[firstNumeric] - x0 : total;

    for (const s of summary) {
      if (s.kind === "words") {
        const runs = [{ text: `${s.label} `, bold: true }, { text: s.text }];
        const h = this.lineHeight(runs.map((r) => r.text).join(""), fontSize.small, true, wordsW - 2 * p) + 2 * p;
        this.ops.push({
          op: "text",
          role: "words",
          x: x0 + p,
          y: this.y + p,
          width: wordsW - 2 * p,
          runs,
          size: fontSize.small,
          align: "left",
          color: colors.text,
        });
        this.y += h;
        continue;
      }

      const bold = s.emphasis === true;
      const h =
        Math.max(
          this.lineHeight(s.label, fontSize.base, bold, labelW - 2 * p),
          this.lineHeight(s.value, fontSize.base, bold, valueW - 2 * p),
        ) + 2 * p;
      if (s.ruleAbove) {
        this.ops.push({ op: "line", x1: labelX, y1: this.y, x2: x0 + total, y2: this.y, color: colors.grid, lineWidth: 1 });
      }
      this.ops.push({
        op: "text",
        role: "summary-label",
        x: labelX + p,
        y: this.y + p,
        width: labelW - 2 * p,
        runs: [{ text: s.label, bold }],
        size: fontSize.base,
        align: "right",
        color: colors.text,
      });
      this.ops.push({
        op: "text",
        role: "summary-value",
        x: valueX + p,
        y: this.y + p,
        width: valueW - 2 * p,
        runs: [{ text: s.value, bold }],
        size: fontSize.base,
        align: "right",
        color: colors.text,
      });
      this.y += h;
    }
  }
}

/** Positions every block; does not touch pdfkit beyond the measurer. */
export function planLayout(
  blocks: readonly Block[],
  style: StyleConfig,
  measure: TextMeasurer,
): Result<PagePlan, RenderError> {
  const checked = validateStyle(style);
  if (!checked.ok) return checked;
  try {
    return ok(new Planner(style, measure).run(blocks));
  } catch (e) {
    return err(toRenderError(e));
  }
}

export type LaidOutDocument = {
  bytes: Buffer;
  pages: number;
  plan: PagePlan;
  warnings: string[];
};

export async function layoutDocument(blocks: readonly Block[], style: StyleConfig): Promise<Result<LaidOutDocument, RenderError>> {
  const checked = validateStyle(style);
  if (!checked.ok) return checked;

  let measurer: TextMeasurer;
  try {
    measurer = createMeasurer(style);
  } catch (e) {
    return err(toRenderError(e, { field: "fonts" }));
  }

  const plan = planLayout(blocks, style, measurer);
  if (!plan.ok) return plan;
  if (plan.value.overflow) {
    console.warn(
      `[layout] content needs ${plan.value.height}pt, more than one ${style.pageSize} page; page lengthened to fit`,
    );
  }

  try {
    const painted = await paintPlan(plan.value, style);
    return ok({ ...painted, plan: plan.value });
  } catch (e) {
    return err(toRenderError(e));
  }
}
