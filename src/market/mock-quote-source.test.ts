import { describe, expect, it } from "vitest";
import { MockQuoteSource } from "./mock-quote-source";

const NOW = new Date("2026-10-19T14:05:00.000Z");

describe("MockQuoteSource", () => {
  it("returns the base prices when the drift is zero", async () => {
    const source = new MockQuoteSource({ random: () => 0.5, now: () => NOW });

    const quotes = await source.fetchQuotes();

    expect(source.name).toBe("MockData");
    expect(quotes).toHaveLength(7);
    expect(quotes[0]).toEqual({
      currency: "USD",
      houseType: "oficial",
      displayName: "Oficial",
      buyPrice: 1400,
      sellPrice: 1450,
      updatedAt: "2026-10-19T14:05:00.000Z",
    });
  });

  it("moves every price by at most the configured drift", async () => {
    const high = await new MockQuoteSource({ random: () => 1, maxDrift: 0.02 }).fetchQuotes();
    const low = await new MockQuoteSource({ random: () => 0, maxDrift: 0.02 }).fetchQuotes();

    expect(high[0].buyPrice).toBe(1428);
    expect(high[0].sellPrice).toBe(1479);
    expect(low[0].buyPrice).toBe(1372);
    expect(low[0].sellPrice).toBe(1421);
  });

  it("never lists a sell price under the buy price", async () => {
    let i = 0;
    const random = () => (i++ % 3) / 2;
    const quotes = await new MockQuoteSource({ random, maxDrift: 0.1 }).fetchQuotes();

    for (const q of quotes) {
      expect(q.sellPrice).toBeGreaterThanOrEqual(q.buyPrice);
      expect(q.buyPrice).toBeGreaterThan(0);
    }
  });
});
