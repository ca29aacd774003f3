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
 * 告警去重存储 - 记录已成功推送的 (symbol, open_time)
 *
 * 主键约束 + INSERT OR IGNORE 保证并发写入时同一根 K 线最多一条记录，
 * 进程重启后依旧生效。
 */
import { type Client, createClient } from "@libsql/client";
import { createLogger } from "../utils/loggerUtils";
import { describeError } from "../utils/httpRetry";
import { getUtcTimeISO } from "../utils/timeUtils";
import type { AlertKey } from "../types/moveAlert";

const logger = createLogger({ name: "alert-store" });

const CREATE_ALERTS_TABLE = `
  CREATE TABLE IF NOT EXISTS alerts (
    symbol TEXT NOT NULL,
    open_time INTEGER NOT NULL,
    alerted_at TEXT NOT NULL,
    PRIMARY KEY (symbol, open_time)
  )
`;

export class AlertStore {
  private readonly client: Client;

  constructor(url: string) {
    this.client = createClient({ url });
  }

  async init(): Promise<void> {
    await this.client.execute(CREATE_ALERTS_TABLE);
  }

  /**
   * 查询失败（库损坏/不可读）时按"不存在"处理，宁可重复告警也不能全部静默
   */
  async exists(key: AlertKey): Promise<boolean> {
    try {
      const result = await this.client.execute({
        sql: "SELECT 1 FROM alerts WHERE symbol = ? AND open_time = ? LIMIT 1",
        args: [key.symbol, key.openTime],
      });
      return result.rows.length > 0;
    } catch (error) {
      logger.error(
        `Alert lookup failed for ${key.symbol}@${key.openTime}, treating as not alerted: ${describeError(error)}`,
      );
      return false;
    }
  }

  /**
   * 幂等写入；返回是否新插入了一行
   */
  async record(key: AlertKey): Promise<boolean> {
    const result = await this.client.execute({
      sql: "INSERT OR IGNORE INTO alerts (symbol, open_time, alerted_at) VALUES (?, ?, ?)",
      args: [key.symbol, key.openTime, getUtcTimeISO()],
    });
    return result.rowsAffected > 0;
  }

  async count(): Promise<number> {
    const result = await this.client.execute("SELECT COUNT(*) AS total FROM alerts");
    return Number(result.rows[0]?.total ?? 0);
  }

  close(): void {
    this.client.close();
  }
}
