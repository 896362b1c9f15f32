import type { QuoteRecord } from "../types";
import type { QuoteSource } from "./quote-source";

interface MockHouse {
  houseType: string;
  displayName: string;
  buy: number;
  sell: number;
}

const BASE_HOUSES: MockHouse[] = [
  { houseType: "oficial", displayName: "Oficial", buy: 1400, sell: 1450 },
  { houseType: "blue", displayName: "Blue", buy: 1420, sell: 1440 },
  { houseType: "bolsa", displayName: "Bolsa", buy: 1445.3, sell: 1452.1 },
  { houseType: "contadoconliqui", displayName: "Contado con liquidación", buy: 1463.4, sell: 1471.8 },
  { houseType: "mayorista", displayName: "Mayorista", buy: 1420.5, sell: 1429.5 },
  { houseType: "cripto", displayName: "Cripto", buy: 1468.2, sell: 1472.9 },
  { houseType: "tarjeta", displayName: "Tarjeta", buy: 1820, sell: 1885 },
];

export interface MockQuoteSourceOptions {
  /** Max relative drift applied to the base prices, e.g. 0.02 for ±2%. */
  maxDrift?: number;
  random?: () => number;
  now?: () => Date;
}

/**
 * Offline quote source: the usual houses around fixed base prices with a
 * bounded random drift. Sell never ends below buy.
 */
export class MockQuoteSource implements QuoteSource {
  public readonly name = "MockData";
  private maxDrift: number;
  private random: () => number;
  private now: () => Date;

  constructor(options: MockQuoteSourceOptions = {}) {
    this.maxDrift = options.maxDrift ?? 0.02;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  public async fetchQuotes(): Promise<QuoteRecord[]> {
    const updatedAt = this.now().toISOString();

    return BASE_HOUSES.map(house => {
      const factor = 1 + (this.random() * 2 - 1) * this.maxDrift;
      const buy = roundPrice(house.buy * factor);
      const sell = Math.max(buy, roundPrice(house.sell * factor));
      return {
        currency: "USD",
        houseType: house.houseType,
        displayName: house.displayName,
        buyPrice: buy,
        sellPrice: sell,
        updatedAt,
      };
    });
  }
}

function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}
