/**
 * open-nof1.ai - AI 加密货币自动交易系统
 * Copyright (C) 2025 195440
 * 
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 * 
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 * 
 * You should have received a copy of the GNU Affero General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import { createLogger } from "../../utils/loggerUtils";
import {
  describeError,
  isTransientFailure,
  requestText,
  withLinearRetry,
} from "../../utils/httpRetry";
import type { MoveAlertConfig } from "../../config/moveAlert";
import type { Candle } from "../../types/moveAlert";
import { type MarketDataClient, UniverseFetchError } from "./marketData";

const logger = createLogger({ name: "binance-futures" });

/** 418: IP 被封禁, 429: 超出权重限制, 451: 地区受限 */
const RATE_LIMIT_STATUSES = [418, 429, 451];
const SERVER_ERROR_STATUSES = [500, 502, 503, 504];
const RETRY_STATUSES: ReadonlySet<number> = new Set([
  ...RATE_LIMIT_STATUSES,
  ...SERVER_ERROR_STATUSES,
]);

const MAX_ATTEMPTS = 3;

interface ExchangeInfoSymbol {
  symbol?: string;
  status?: string;
  contractType?: string;
  quoteAsset?: string;
}

export type BinanceFuturesClientOptions = Pick<
  MoveAlertConfig,
  "binanceBaseUrl" | "quote" | "excluded" | "requestTimeoutMs"
> & {
  backoffUnitMs?: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toExchangeInfoSymbols(data: unknown): ExchangeInfoSymbol[] {
  if (!isRecord(data) || !Array.isArray(data.symbols)) {
    throw new Error("exchangeInfo response has no symbols array");
  }
  return data.symbols.filter(isRecord).map((item) => ({
    symbol: typeof item.symbol === "string" ? item.symbol : undefined,
    status: typeof item.status === "string" ? item.status : undefined,
    contractType:
      typeof item.contractType === "string" ? item.contractType : undefined,
    quoteAsset: typeof item.quoteAsset === "string" ? item.quoteAsset : undefined,
  }));
}

/**
 * Kline 行格式: [openTime, open, high, low, close, volume, closeTime, ...]
 */
export function parseKlineRow(row: unknown): Candle | null {
  if (!Array.isArray(row) || row.length < 7) {
    return null;
  }
  const candle: Candle = {
    openTime: Number(row[0]),
    open: Number.parseFloat(String(row[1])),
    high: Number.parseFloat(String(row[2])),
    low: Number.parseFloat(String(row[3])),
    close: Number.parseFloat(String(row[4])),
    closeTime: Number(row[6]),
  };
  const valid =
    Number.isInteger(candle.openTime) &&
    Number.isInteger(candle.closeTime) &&
    Number.isFinite(candle.open) &&
    Number.isFinite(candle.high) &&
    Number.isFinite(candle.low) &&
    Number.isFinite(candle.close);
  return valid ? candle : null;
}

export class BinanceFuturesClient implements MarketDataClient {
  private readonly baseUrl: string;
  private readonly quote: string;
  private readonly excluded: ReadonlySet<string>;
  private readonly timeoutMs: number;
  private readonly backoffUnitMs: number;

  constructor(options: BinanceFuturesClientOptions) {
    this.baseUrl = options.binanceBaseUrl;
    this.quote = options.quote.toUpperCase();
    this.excluded = options.excluded;
    this.timeoutMs = options.requestTimeoutMs;
    this.backoffUnitMs = options.backoffUnitMs ?? 1000;
  }

  private buildUrl(
    path: string,
    params?: Record<string, string | number | undefined>,
  ): string {
    const searchParams = new URLSearchParams();
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value === undefined) continue;
        searchParams.append(key, String(value));
      }
    }
    const qs = searchParams.toString();
    return `${this.baseUrl}${path}${qs ? `?${qs}` : ""}`;
  }

  private async getJson(
    path: string,
    params?: Record<string, string | number | undefined>,
  ): Promise<unknown> {
    const { body } = await requestText(
      this.buildUrl(path, params),
      { method: "GET" },
      this.timeoutMs,
    );
    return JSON.parse(body);
  }

  async listSymbols(): Promise<string[]> {
    let entries: ExchangeInfoSymbol[];
    try {
      entries = toExchangeInfoSymbols(await this.getJson("/fapi/v1/exchangeInfo"));
    } catch (error) {
      throw new UniverseFetchError(
        `Failed to fetch futures exchangeInfo: ${describeError(error)}`,
        { cause: error },
      );
    }

    const symbols: string[] = [];
    for (const entry of entries) {
      if (entry.status !== "TRADING") continue;
      if (entry.contractType !== "PERPETUAL") continue;
      if (entry.quoteAsset !== this.quote) continue;
      if (!entry.symbol || this.excluded.has(entry.symbol.toUpperCase())) continue;
      symbols.push(entry.symbol);
    }
    return symbols;
  }

  async latestCandle(symbol: string, interval: string): Promise<Candle | null> {
    let rows: unknown;
    try {
      rows = await withLinearRetry(
        () => this.getJson("/fapi/v1/klines", { symbol, interval, limit: 1 }),
        {
          maxAttempts: MAX_ATTEMPTS,
          backoffUnitMs: this.backoffUnitMs,
          isRetryable: (error) => isTransientFailure(error, RETRY_STATUSES),
          onRetry: (error, attempt, waitMs) => {
            logger.warn(
              `${symbol} kline request failed (${describeError(error)}), retrying in ${waitMs}ms (${attempt + 1}/${MAX_ATTEMPTS})`,
            );
          },
        },
      );
    } catch (error) {
      logger.warn(`Giving up on ${symbol} kline: ${describeError(error)}`);
      return null;
    }

    if (!Array.isArray(rows) || rows.length === 0) {
      return null;
    }
    const candle = parseKlineRow(rows[0]);
    if (!candle) {
      logger.warn(`Malformed kline row for ${symbol}`);
    }
    return candle;
  }
}
