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

import { createPinoLogger } from "@voltagent/logger";
import type { LevelWithSilent } from "pino";

const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLogLevel(value: string): value is LevelWithSilent {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * 读取 LOG_LEVEL，非法值回退到 fallback
 */
export function resolveLogLevel(
  raw: string | undefined = process.env.LOG_LEVEL,
  fallback: LevelWithSilent = "info",
): LevelWithSilent {
  const value = raw?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : fallback;
}

export function createLogger(options: { name: string; level?: LevelWithSilent }) {
  return createPinoLogger({
    name: options.name,
    level: options.level ?? resolveLogLevel(),
  });
}
