// src/lib/layout-types.ts
// Blocks go into the layout engine; positioned draw ops come out.

export type Align = "left" | "center" | "right";
export type VAlign = "top" | "middle" | "bottom";

export type TextRun = { text: string; bold?: boolean };
/** one visual line (may still wrap inside its box) */
export type TextLine = TextRun[];

export type TextBlock = {
  kind: "text";
  lines: TextLine[];
  /** defaults to style.fontSize.base */
  size?: number;
  align?: Align;
  color?: string;
  /** overrides style.blockGap below a top-level block */
  spaceAfter?: number;
};

export type ImageBlock = {
  kind: "image";
  /** absent → nothing is drawn */
  data: Buffer | null;
  width: number;
  height: number;
  align?: Align;
};

export type Cell = TextBlock | ImageBlock | null;

export type TwoColumnBlock = {
  kind: "columns";
  widths: [number, number];
  valign: [VAlign, VAlign];
  rows: Array<[Cell, Cell]>;
  /** rows are never shorter than this, whatever the cells hold */
  minRowHeight?: number;
};

export type ColumnKind = "text" | "index" | "number" | "currency";

export type TableColumn = {
  header: string;
  width: number;
  kind: ColumnKind;
};

export type SummaryRow =
  | { kind: "amount"; label: string; value: string; emphasis?: boolean; ruleAbove?: boolean }
  | { kind: "words"; label: string; text: string };

export type ItemTableBlock = {
  kind: "table";
  columns: TableColumn[];
  rows: string[][];
  summary: SummaryRow[];
};

export type Block = TextBlock | ImageBlock | TwoColumnBlock | ItemTableBlock;

/** where a text op came from, so a plan can be inspected */
export type TextRole = "text" | "cell" | "th" | "td" | "summary-label" | "summary-value" | "words";

export type DrawOp =
  | {
      op: "text";
      role: TextRole;
      x: number;
      y: number;
      width: number;
      runs: TextRun[];
      size: number;
      align: Align;
      color: string;
    }
  | { op: "rect"; x: number; y: number; width: number; height: number; fill?: string; stroke?: string; lineWidth?: number }
  | { op: "line"; x1: number; y1: number; x2: number; y2: number; color: string; lineWidth: number }
  | { op: "image"; x: number; y: number; width: number; height: number; data: Buffer };

export type PagePlan = {
  width: number;
  height: number;
  /** bottom of the last block, before the bottom margin */
  contentBottom: number;
  /** content did not fit the nominal page height and the page was lengthened */
  overflow: boolean;
  ops: DrawOp[];
};

export interface TextMeasurer {
  /** height of `text` wrapped at `width` */
  height(text: string, o: { size: number; bold: boolean; width: number }): number;
}
