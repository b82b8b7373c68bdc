import { describe, expect, it } from "vitest";
import { Decimal } from "./decimal.js";
import { parseUserNumber } from "./number-parser.js";

describe("parseUserNumber", () => {
  it("parses plain decimals", () => {
    expect(parseUserNumber("12.5")?.toString()).toBe("12.5");
    expect(parseUserNumber("  -3 ")?.toString()).toBe("-3");
    expect(parseUserNumber(".5")?.toString()).toBe("0.5");
  });

  it("treats the last comma as the decimal point and periods as thousands", () => {
    expect(parseUserNumber("1.234,5")?.toString()).toBe("1234.5");
    expect(parseUserNumber("0,25")?.toString()).toBe("0.25");
    expect(parseUserNumber("1,2,3")?.toString()).toBe("12.3");
  });

  it("removes inner whitespace", () => {
    expect(parseUserNumber("1 000,5")?.toString()).toBe("1000.5");
  });

  it("accepts finite numbers and decimals", () => {
    expect(parseUserNumber(0.1)?.toString()).toBe("0.1");
    expect(parseUserNumber(new Decimal("7.25"))?.toString()).toBe("7.25");
  });

  it("returns null for empty or unparseable input", () => {
    expect(parseUserNumber("")).toBeNull();
    expect(parseUserNumber("   ")).toBeNull();
    expect(parseUserNumber("abc")).toBeNull();
    expect(parseUserNumber("1.2.3")).toBeNull();
    expect(parseUserNumber("Infinity")).toBeNull();
    expect(parseUserNumber("0x10")).toBeNull();
    expect(parseUserNumber(null)).toBeNull();
    expect(parseUserNumber(undefined)).toBeNull();
    expect(parseUserNumber(Number.NaN)).toBeNull();
    expect(parseUserNumber(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseUserNumber({})).toBeNull();
  });
});
