// src/lib/amount-in-words.ts
// Indian numbering system: crore (10^7), lakh (10^5), thousand, then 0-999.

import { ConversionError, err, ok, type Result } from "./errors";

const ONES = ["", "One", "Two", "Three", "Four", "Five", "Six", "Seven", "Eight", "Nine"];
const TEENS = [
  "Ten", "Eleven", "Twelve", "Thirteen", "Fourteen",
  "Fifteen", "Sixteen", "Seventeen", "Eighteen", "Nineteen",
];
const TENS = ["", "", "Twenty", "Thirty", "Forty", "Fifty", "Sixty", "Seventy", "Eighty", "Ninety"];

const SCALES: ReadonlyArray<[number, string]> = [
  [10_000_000, "Crore"],
  [100_000, "Lakh"],
  [1_000, "Thousand"],
];

/** 1..999 → words; 0 → "" */
function underThousand(n: number): string {
  if (n === 0) return "";
  if (n < 10) return ONES[n];
  if (n < 20) return TEENS[n - 10];
  if (n < 100) {
    const rest = n % 10;
    return rest ? `${TENS[Math.floor(n / 10)]} ${ONES[rest]}` : TENS[Math.floor(n / 10)];
  }
  const rest = underThousand(n % 100);
  return rest ? `${ONES[Math.floor(n / 100)]} Hundred ${rest}` : `${ONES[Math.floor(n / 100)]} Hundred`;
}

function indian(n: number): string {
  const parts: string[] = [];
  let rem = n;
  for (const [size, suffix] of SCALES) {
    const count = Math.floor(rem / size);
    rem %= size;
    if (count === 0) continue;
    // crore count can exceed 999, spell it in the same system
    parts.push(`${count < 1000 ? underThousand(count) : indian(count)} ${suffix}`);
  }
  if (rem) parts.push(underThousand(rem));
  return parts.join(" ");
}

/** Bare words for a non-negative integer, e.g. 1005 → "One Thousand Five". */
export function integerInWords(n: number): Result<string, ConversionError> {
  if (!Number.isSafeInteger(n)) {
    return err(new ConversionError(`expected a whole number, got ${n}`, { field: "amount" }));
  }
  if (n < 0) return err(new ConversionError(`cannot convert negative amount ${n}`, { field: "amount" }));
  return ok(n === 0 ? "Zero" : indian(n));
}

/**
 * Amount line printed under the item table.
 *
 * @example
 * rupeesInWords(110000) // ok("One Lakh Ten Thousand Rupees Only")
 * rupeesInWords(0)      // ok("Zero Rupees Only")
 */
export function rupeesInWords(n: number): Result<string, ConversionError> {
  const words = integerInWords(n);
  return words.ok ? ok(`${words.value} Rupees Only`) : words;
}
