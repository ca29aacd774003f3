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

import "dotenv/config";
import { createLogger } from "./utils/loggerUtils";
import { describeError } from "./utils/httpRetry";
import { ConfigError, type MoveAlertConfig, loadMoveAlertConfig } from "./config/moveAlert";
import { AlertStore } from "./database/alertStore";
import { BinanceFuturesClient } from "./services/exchanges/binanceFuturesClient";
import { TelegramNotifier } from "./services/telegramNotifier";
import { MoveScanner } from "./services/moveScanner";
import { startScanLoop, stopScanLoop } from "./scheduler/scanLoop";

const logger = createLogger({ name: "move-alert" });

let alertStore: AlertStore | null = null;

function loadConfigOrExit(): MoveAlertConfig {
  try {
    return loadMoveAlertConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(
        `${error.message}. Set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID in your environment or .env file.`,
      );
    } else {
      logger.error(`Failed to load configuration: ${describeError(error)}`);
    }
    process.exit(1);
  }
}

/**
 * 主函数
 */
async function main() {
  const config = loadConfigOrExit();

  alertStore = new AlertStore(config.databaseUrl);
  await alertStore.init();
  logger.info(`Alert store ready (${await alertStore.count()} alerts recorded)`);

  const scanner = new MoveScanner({
    config,
    marketData: new BinanceFuturesClient(config),
    alerts: alertStore,
    notifier: new TelegramNotifier(config),
  });

  const excluded = config.excluded.size > 0 ? [...config.excluded].join(",") : "none";
  logger.info(
    `Starting watcher: interval=${config.interval}, threshold=${config.thresholdPercent}%, ` +
      `poll=${config.pollSeconds}s, quote=${config.quote}, concurrency=${config.concurrency}, excluded=${excluded}`,
  );
  logger.info("Press Ctrl+C to stop");

  startScanLoop(scanner, { pollSeconds: config.pollSeconds });
}

process.on("uncaughtException", (error) => {
  logger.error(`Uncaught exception: ${describeError(error)}`);
  process.exit(1);
});

process.on("unhandledRejection", (reason: unknown) => {
  logger.error(`Unhandled promise rejection: ${describeError(reason)}`);
});

function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down`);
  stopScanLoop();
  alertStore?.close();
  logger.info("Bye");
  process.exit(0);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

await main();
