// src/lib/money.ts
// Display formatting only; amounts are never rounded before this point.

export type MoneyFormat = { currencySymbol: string; thousandsSeparator: boolean };

const grouped = new Intl.NumberFormat("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function money(v: number, f: MoneyFormat): string {
  const digits = f.thousandsSeparator ? grouped.format(v) : v.toFixed(2);
  if (!f.currencySymbol) return digits;
  // "Rs." reads better with a space, glyphs like ₹ or $ without
  const gap = /[A-Za-z.]$/.test(f.currencySymbol) ? " " : "";
  return `${f.currencySymbol}${gap}${digits}`;
}

export function qty(v: number): string {
  return new Intl.NumberFormat("en-GB", { maximumFractionDigits: 2 }).format(v);
}

export function percent(rate: number): string {
  return `${qty(rate)}%`;
}
