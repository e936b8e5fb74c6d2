// src/report.ts
//
// Plain-text report for a rent vs buy result, one string per line.

import type { RentVsBuyResult } from "./domain/rentVsBuy";
import { formatCurrency, formatNumber } from "./utils/format";

export function formatVerdict(netAdvantageBuy: number): string {
  if (netAdvantageBuy === 0) {
    return "TIE: both strategies end with the same net worth";
  }
  const label = netAdvantageBuy > 0 ? "BUY better by" : "RENT better by";
  return `${label}: ${formatCurrency(Math.abs(netAdvantageBuy))}`;
}

export function buildReport(result: RentVsBuyResult): string[] {
  const lines: string[] = [];

  lines.push("--- Parameters ---");
  for (const [key, value] of Object.entries(result.params)) {
    lines.push(`${key}: ${String(value)}`);
  }

  lines.push("");
  lines.push(`--- Results (end of horizon, ${result.months} months) ---`);
  lines.push(`Buy net worth:   ${formatCurrency(result.buyNetWorth)}`);
  lines.push(`Rent net worth:  ${formatCurrency(result.rentNetWorth)}`);
  lines.push(formatVerdict(result.netAdvantageBuy));

  lines.push("");
  lines.push("--- Details ---");
  for (const [key, value] of Object.entries(result.details)) {
    lines.push(`${key}: ${formatNumber(value)}`);
  }

  return lines;
}
