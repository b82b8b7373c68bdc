import { Decimal as DecimalJs } from "decimal.js";
import { Decimal } from "./decimal.js";

/**
 * Parse a user-typed or externally sourced number.
 *
 * Accepts both decimal conventions: when a comma is present, periods are
 * thousands separators and the last comma is the decimal point ("1.234,5");
 * otherwise the period is the decimal point ("1234.5").
 * Returns null for empty or unparseable input.
 */
export function parseUserNumber(value: unknown): Decimal | null {
  if (value === null || value === undefined) return null;
  if (DecimalJs.isDecimal(value)) return value.isFinite() ? new Decimal(value) : null;
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Decimal(String(value)) : null;
  }
  if (typeof value !== "string") return null;

  let cleaned = value.trim().replace(/\s+/g, "");
  if (!cleaned) return null;

  if (cleaned.includes(",")) {
    cleaned = cleaned.replace(/\./g, "");
    const decimalComma = cleaned.lastIndexOf(",");
    cleaned = `${cleaned.slice(0, decimalComma).replace(/,/g, "")}.${cleaned.slice(decimalComma + 1)}`;
  }

  // decimal.js also takes hex/binary literals and "Infinity"
  if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(cleaned)) return null;

  return new Decimal(cleaned);
}
