// src/lib/style.ts
import { err, ok, RenderError, type Result } from "./errors";
import type { MoneyFormat } from "./money";

export type PageSize = "A4" | "LETTER";

/** PDF points */
export const PAGE_SIZES: Record<PageSize, { width: number; height: number }> = {
  A4: { width: 595.28, height: 841.89 },
  LETTER: { width: 612, height: 792 },
};

/** Standard PDF font name, path to a TTF/OTF file, or the font bytes. */
export type FontSource = string | Buffer;

export type StyleConfig = MoneyFormat & {
  readonly pageSize: PageSize;
  readonly margins: { top: number; right: number; bottom: number; left: number };
  readonly fonts: { regular: FontSource; bold: FontSource };
  readonly fontSize: { base: number; small: number; tableHeader: number; title: number };
  readonly colors: {
    primary: string;
    headerText: string;
    text: string;
    muted: string;
    grid: string;
    rowFill: string;
  };
  readonly cellPadding: number;
  readonly blockGap: number;
  readonly logo: { width: number; height: number };
};

export const defaultStyle: StyleConfig = {
  pageSize: "A4",
  margins: { top: 36, right: 36, bottom: 36, left: 36 },
  fonts: { regular: "Helvetica", bold: "Helvetica-Bold" },
  fontSize: { base: 10, small: 8, tableHeader: 11, title: 24 },
  colors: {
    primary: "#2E4057",
    headerText: "#F5F5F5",
    text: "#444444",
    muted: "#6B7280",
    grid: "#000000",
    rowFill: "#F5F5DC",
  },
  cellPadding: 5,
  blockGap: 14,
  logo: { width: 156, height: 42 },
  // the standard fonts have no ₹ glyph; pass a TTF in `fonts` to use it
  currencySymbol: "Rs.",
  thousandsSeparator: false,
};

export type StyleOverrides = Partial<Omit<StyleConfig, "margins" | "fonts" | "fontSize" | "colors" | "logo">> & {
  margins?: Partial<StyleConfig["margins"]>;
  fonts?: Partial<StyleConfig["fonts"]>;
  fontSize?: Partial<StyleConfig["fontSize"]>;
  colors?: Partial<StyleConfig["colors"]>;
  logo?: Partial<StyleConfig["logo"]>;
};

export function makeStyle(o: StyleOverrides = {}, base: StyleConfig = defaultStyle): StyleConfig {
  return {
    ...base,
    ...o,
    margins: { ...base.margins, ...o.margins },
    fonts: { ...base.fonts, ...o.fonts },
    fontSize: { ...base.fontSize, ...o.fontSize },
    colors: { ...base.colors, ...o.colors },
    logo: { ...base.logo, ...o.logo },
  };
}

const HEX = /^#(?:[0-9a-fA-F]{3}){1,2}$/;

export function pageBox(style: StyleConfig) {
  const { width, height } = PAGE_SIZES[style.pageSize];
  const m = style.margins;
  return { width, height, contentX: m.left, contentWidth: width - m.left - m.right };
}

/** Rejects configurations the layout engine cannot place anything with. */
export function validateStyle(style: StyleConfig): Result<StyleConfig, RenderError> {
  if (!(style.pageSize in PAGE_SIZES)) {
    return err(new RenderError(`unknown page size "${style.pageSize}"`, { field: "pageSize" }));
  }
  for (const [k, v] of Object.entries(style.margins)) {
    if (!Number.isFinite(v) || v < 0) return err(new RenderError(`margin ${k} must be >= 0`, { field: `margins.${k}` }));
  }
  for (const [k, v] of Object.entries(style.fontSize)) {
    if (!Number.isFinite(v) || v <= 0) return err(new RenderError(`font size ${k} must be > 0`, { field: `fontSize.${k}` }));
  }
  for (const [k, v] of Object.entries(style.colors)) {
    if (!HEX.test(v)) return err(new RenderError(`color ${k} must be a hex value, got "${v}"`, { field: `colors.${k}` }));
  }
  if (!Number.isFinite(style.cellPadding) || style.cellPadding < 0) {
    return err(new RenderError("cellPadding must be >= 0", { field: "cellPadding" }));
  }
  if (!Number.isFinite(style.blockGap) || style.blockGap < 0) {
    return err(new RenderError("blockGap must be >= 0", { field: "blockGap" }));
  }
  const { contentWidth, height } = pageBox(style);
  if (contentWidth <= 0 || style.margins.top + style.margins.bottom >= height) {
    return err(new RenderError("margins leave no room for content", { field: "margins" }));
  }
  if (style.logo.width <= 0 || style.logo.height <= 0) {
    return err(new RenderError("logo box must have a positive size", { field: "logo" }));
  }
  return ok(style);
}
