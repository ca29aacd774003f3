import type { Candle } from "../../types/moveAlert";

export interface MarketDataClient {
  /** 当前可交易的永续合约列表，失败时抛出 UniverseFetchError */
  listSymbols(): Promise<string[]>;
  /** 最新一根 K 线；无数据或重试耗尽时返回 null */
  latestCandle(symbol: string, interval: string): Promise<Candle | null>;
}

export class UniverseFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UniverseFetchError";
  }
}
