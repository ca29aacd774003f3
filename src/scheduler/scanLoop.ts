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
 * 扫描调度器 - 固定节奏循环执行扫描
 *
 * 每轮结束后按本轮耗时补偿等待时间：sleep = max(0, POLL - elapsed)。
 * 轮次严格串行，单轮抛出的异常在这里兜底，不会终止进程。
 */
import { createLogger } from "../utils/loggerUtils";
import { describeError } from "../utils/httpRetry";
import { formatCycleSummary } from "../utils/moveAlertUtils";
import type { MoveScanner } from "../services/moveScanner";
import type { ScanResult } from "../types/moveAlert";

const logger = createLogger({ name: "scan-loop" });

export type CycleRunner = Pick<MoveScanner, "runScanCycle">;

export interface ScanLoopOptions {
  pollSeconds: number;
  now?: () => number;
}

let loopTimer: NodeJS.Timeout | null = null;
let isRunning = false;
let loopGeneration = 0;

export function computeNextDelayMs(pollSeconds: number, elapsedMs: number): number {
  return Math.max(0, pollSeconds * 1000 - elapsedMs);
}

/**
 * 执行一轮并输出汇总；异常只记录日志，返回 null
 */
export async function runScheduledCycle(
  scanner: CycleRunner,
): Promise<ScanResult | null> {
  try {
    const result = await scanner.runScanCycle();
    logger.info(formatCycleSummary(result));
    return result;
  } catch (error) {
    logger.error(`Error in cycle: ${describeError(error)}`);
    return null;
  }
}

export function startScanLoop(scanner: CycleRunner, options: ScanLoopOptions) {
  if (isRunning) {
    logger.warn("Scan loop already running");
    return;
  }
  const now = options.now ?? Date.now;
  isRunning = true;
  const generation = ++loopGeneration;

  const scheduleNextTick = (delayMs: number) => {
    if (!isRunning || generation !== loopGeneration) {
      return;
    }
    loopTimer = setTimeout(() => {
      const startedAt = now();
      runScheduledCycle(scanner)
        .catch((error: unknown) => {
          logger.error(`Scan loop tick failed: ${describeError(error)}`);
        })
        .finally(() => {
          const elapsed = now() - startedAt;
          scheduleNextTick(computeNextDelayMs(options.pollSeconds, elapsed));
        });
    }, delayMs);
  };

  logger.info(`Scan loop started, cadence ${options.pollSeconds}s`);
  scheduleNextTick(0);
}

/**
 * 停止调度；正在执行的一轮不会被等待
 */
export function stopScanLoop() {
  isRunning = false;
  if (loopTimer) {
    clearTimeout(loopTimer);
    loopTimer = null;
  }
}

export function isScanLoopRunning(): boolean {
  return isRunning;
}
