import { describe, expect, it } from "vitest";
import { quote } from "../test/fixtures";
import { formatPct, formatPrice, formatQuoteTable } from "./format";
import { formatDateForFilename, formatDisplayDate, shortTimestamp } from "./time";

describe("formatPrice", () => {
  it("uses thousands separators and two decimals", () => {
    expect(formatPrice(1450)).toBe("$1,450.00");
    expect(formatPrice(1591.666)).toBe("$1,591.67");
  });
});

describe("formatPct", () => {
  it("signs positive values only", () => {
    expect(formatPct(1.234)).toBe("+1.23%");
    expect(formatPct(-0.69)).toBe("-0.69%");
    expect(formatPct(0)).toBe("0.00%");
  });
});

describe("formatQuoteTable", () => {
  it("aligns one row per quote", () => {
    const lines = formatQuoteTable([quote("oficial", 1400, 1450, "Oficial")]).split("\n");

    expect(lines).toHaveLength(7);
    expect(lines[1]).toBe("COTIZACIONES DEL DÓLAR - ARGENTINA");
    expect(lines[5]).toBe(
      `${"Oficial".padEnd(26)}${"1400.00".padEnd(12)}${"1450.00".padEnd(12)}2026-10-19 14:05`
    );
  });
});

describe("time helpers", () => {
  const date = new Date(2026, 0, 5, 9, 7, 3);

  it("formats sortable filename stamps", () => {
    expect(formatDateForFilename(date)).toBe("2026-01-05_09-07-03");
  });

  it("formats display dates", () => {
    expect(formatDisplayDate(date)).toBe("05/01/2026 09:07");
  });

  it("shortens ISO timestamps to the minute", () => {
    expect(shortTimestamp("2026-10-19T14:05:59.000Z")).toBe("2026-10-19 14:05");
  });
});
