import axios, { type AxiosInstance } from "axios";
import type { QuoteRecord } from "../types";
import {
  dolarApiResponseSchema,
  formatZodIssues,
  type DolarApiQuote,
} from "../types/schemas";
import { QuoteFetchError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface QuoteSource {
  readonly name: string;
  /** Returns the quotes in the order the source lists them. */
  fetchQuotes(): Promise<QuoteRecord[]>;
}

export interface DolarApiSourceOptions {
  url: string;
  timeoutMs: number;
  userAgent: string;
  /** Pre-built client; tests pass one with an in-process adapter. */
  http?: AxiosInstance;
}

export function toQuoteRecord(raw: DolarApiQuote): QuoteRecord {
  return {
    currency: raw.moneda,
    houseType: raw.casa,
    displayName: raw.nombre,
    buyPrice: raw.compra,
    sellPrice: raw.venta,
    updatedAt: raw.fechaActualizacion,
  };
}

/**
 * DolarAPI client: one GET returning every house's current quote.
 */
export class DolarApiSource implements QuoteSource {
  public readonly name = "DolarAPI";
  private http: AxiosInstance;

  constructor(private options: DolarApiSourceOptions) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs,
        headers: { "User-Agent": options.userAgent },
      });
  }

  public async fetchQuotes(): Promise<QuoteRecord[]> {
    logger.info(`[Fuente] Consultando ${this.options.url}`);

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(this.options.url, {
        timeout: this.options.timeoutMs,
      });
      body = response.data;
    } catch (error) {
      throw new QuoteFetchError(
        `No se pudo consultar ${this.options.url}: ${describeHttpError(error)}`,
        { cause: error }
      );
    }

    const parsed = dolarApiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new QuoteFetchError(
        `Respuesta con formato inesperado de ${this.name}: ${formatZodIssues(parsed.error)}`
      );
    }

    logger.info(`[Fuente] ${parsed.data.length} cotizaciones recibidas`);
    return parsed.data.map(toQuoteRecord);
  }
}

function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status} ${error.response.statusText}`.trim();
    }
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return "tiempo de espera agotado";
    }
    return error.code ? `${error.code} ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
