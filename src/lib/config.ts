// src/lib/config.ts
// Deployment settings come from the environment, with the same defaults the
// library uses when nothing is set.
import type { DeliveryMode, FailureMode } from "./batch.service";
import { defaultStyle, makeStyle, type StyleConfig, type StyleOverrides } from "./style";

export type AppConfig = {
  style: StyleConfig;
  batch: { concurrency: number; failureMode: FailureMode; delivery: DeliveryMode };
};

/** null unless `raw` is a whole number >= 1 */
export function parseConcurrency(raw: string | undefined): number | null {
  if (!raw || !/^\s*\d+\s*$/.test(raw)) return null;
  const v = parseInt(raw, 10);
  return v >= 1 ? v : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fonts: StyleOverrides["fonts"] = {};
  if (env.INVOICE_FONT_REGULAR) fonts.regular = env.INVOICE_FONT_REGULAR;
  if (env.INVOICE_FONT_BOLD) fonts.bold = env.INVOICE_FONT_BOLD;

  const style = makeStyle({
    pageSize: (env.INVOICE_PAGE_SIZE || "").toUpperCase() === "LETTER" ? "LETTER" : "A4",
    currencySymbol: env.INVOICE_CURRENCY_SYMBOL ?? defaultStyle.currencySymbol,
    thousandsSeparator: env.INVOICE_THOUSANDS_SEPARATOR === "true",
    fonts,
    colors: env.INVOICE_PRIMARY_COLOR ? { primary: env.INVOICE_PRIMARY_COLOR } : {},
  });

  return {
    style,
    batch: {
      concurrency: parseConcurrency(env.BATCH_CONCURRENCY) ?? 4,
      failureMode: env.BATCH_FAILURE_MODE === "collect" ? "collect" : "abort",
      delivery: env.BATCH_DELIVERY === "files" ? "files" : "archive",
    },
  };
}
