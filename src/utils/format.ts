/**
 * Number formatting shared by the report. Everything is rendered with the
 * en-US locale so output does not depend on the machine it runs on.
 */

/**
 * Format a currency value into a US dollar string with no fractional
 * digits, e.g. 14449961.2 → "$14,449,961". Null or NaN values are rendered
 * as an em dash.
 */
export function formatCurrency(value: number | null | undefined): string {
  if (value == null || Number.isNaN(value)) return "—";
  return value.toLocaleString("en-US", {
    style: "currency",
    currency: "USD",
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  });
}

// Plain number with thousands separators and a fixed number of decimals.
export function formatNumber(
  value: number | null | undefined,
  fractionDigits = 2
): string {
  if (value == null || Number.isNaN(value)) return "—";
  return value.toLocaleString("en-US", {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
}

// Format a decimal ratio (0–1) into a percentage string with two
// fractional digits.
export function formatPercent(value: number | null | undefined): string {
  if (value == null || Number.isNaN(value)) return "—";
  return `${(value * 100).toFixed(2)}%`;
}
