import { describe, it, expect } from "vitest";
import { formatCurrency, formatNumber, formatPercent } from "./format";

describe("format helpers", () => {
  it("formats currency without cents", () => {
    expect(formatCurrency(14_449_961.2146)).toBe("$14,449,961");
    expect(formatCurrency(0)).toBe("$0");
    expect(formatCurrency(-2500.4)).toBe("-$2,500");
  });

  it("formats numbers with two decimals by default", () => {
    expect(formatNumber(31_218.91725)).toBe("31,218.92");
    expect(formatNumber(0)).toBe("0.00");
    expect(formatNumber(1234.5, 0)).toBe("1,235");
  });

  it("formats fractions as percentages", () => {
    expect(formatPercent(0.035)).toBe("3.50%");
  });

  it("renders missing values as an em dash", () => {
    expect(formatCurrency(null)).toBe("—");
    expect(formatNumber(Number.NaN)).toBe("—");
    expect(formatPercent(undefined)).toBe("—");
  });
});
