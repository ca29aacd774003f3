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

/**
 * 单轮扫描：获取合约列表 -> 限流并发拉取最新 K 线 -> 阈值判断 -> 去重 -> 推送 -> 记录
 */
import { createLogger } from "../utils/loggerUtils";
import { describeError } from "../utils/httpRetry";
import { runWithConcurrency } from "../utils/concurrency";
import { computeMovePercent, formatMoveAlert } from "../utils/moveAlertUtils";
import type { MoveAlertConfig } from "../config/moveAlert";
import type { AlertStore } from "../database/alertStore";
import type { ScanResult } from "../types/moveAlert";
import type { MarketDataClient } from "./exchanges/marketData";
import type { Notifier } from "./telegramNotifier";

const logger = createLogger({ name: "move-scanner" });

export type AlertLedger = Pick<AlertStore, "exists" | "record">;

export interface MoveScannerDeps {
  config: Pick<MoveAlertConfig, "interval" | "thresholdPercent" | "concurrency">;
  marketData: MarketDataClient;
  alerts: AlertLedger;
  notifier: Notifier;
}

export class MoveScanner {
  constructor(private readonly deps: MoveScannerDeps) {}

  /**
   * 合约列表获取失败会直接抛出，由调度器记录并等待下一轮
   */
  async runScanCycle(): Promise<ScanResult> {
    const { config, marketData } = this.deps;
    const symbols = await marketData.listSymbols();
    const result: ScanResult = {
      alerts: [],
      symbolsScanned: symbols.length,
      candlesMissing: 0,
      alreadyAlerted: 0,
      sendFailures: 0,
    };

    await runWithConcurrency(
      symbols,
      config.concurrency,
      (symbol) => this.evaluateSymbol(symbol, result),
      (symbol, error) => {
        logger.warn(`Evaluation of ${symbol} failed: ${describeError(error)}`);
      },
    );

    logger.debug(
      `Scanned ${result.symbolsScanned} symbols: ${result.alerts.length} sent, ` +
        `${result.alreadyAlerted} already alerted, ${result.candlesMissing} without data, ` +
        `${result.sendFailures} send failures`,
    );
    return result;
  }

  private async evaluateSymbol(symbol: string, result: ScanResult): Promise<void> {
    const { config, marketData, alerts, notifier } = this.deps;

    const candle = await marketData.latestCandle(symbol, config.interval);
    if (!candle) {
      result.candlesMissing++;
      return;
    }

    const percentChange = computeMovePercent(candle);
    if (percentChange === null) {
      logger.debug(`Skipping ${symbol}: open price is zero`);
      return;
    }
    if (Math.abs(percentChange) < config.thresholdPercent) {
      return;
    }

    const key = { symbol, openTime: candle.openTime };
    if (await alerts.exists(key)) {
      result.alreadyAlerted++;
      return;
    }

    const delivered = await notifier.send(
      formatMoveAlert(symbol, candle, percentChange, config.interval),
    );
    if (!delivered) {
      // 不记录，K 线仍为最新时下一轮会再次尝试
      result.sendFailures++;
      return;
    }

    await alerts.record(key);
    result.alerts.push({ symbol, percentChange });
  }
}
