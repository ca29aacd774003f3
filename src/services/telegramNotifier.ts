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

import { createLogger } from "../utils/loggerUtils";
import {
  describeError,
  isTransientFailure,
  requestText,
  withLinearRetry,
} from "../utils/httpRetry";
import type { MoveAlertConfig } from "../config/moveAlert";

const logger = createLogger({ name: "telegram-notifier" });

const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);
const MAX_ATTEMPTS = 3;

export interface Notifier {
  /** 投递成功返回 true；重试耗尽返回 false，不抛异常 */
  send(message: string): Promise<boolean>;
}

export type TelegramNotifierOptions = Pick<
  MoveAlertConfig,
  "telegramApiUrl" | "telegramBotToken" | "telegramChatId" | "telegramTimeoutMs"
> & {
  backoffUnitMs?: number;
};

type TelegramResponse = {
  ok?: boolean;
  description?: string;
};

export class TelegramRejectedError extends Error {
  constructor(description: string) {
    super(`Telegram rejected message: ${description}`);
    this.name = "TelegramRejectedError";
  }
}

function parseTelegramResponse(body: string): TelegramResponse {
  try {
    const data: unknown = JSON.parse(body);
    if (typeof data === "object" && data !== null) {
      const ok = "ok" in data ? data.ok : undefined;
      const description = "description" in data ? data.description : undefined;
      return {
        ok: typeof ok === "boolean" ? ok : undefined,
        description: typeof description === "string" ? description : undefined,
      };
    }
  } catch {
    // 非 JSON 响应体，按 HTTP 状态码处理
  }
  return {};
}

export class TelegramNotifier implements Notifier {
  private readonly endpoint: string;
  private readonly chatId: string;
  private readonly timeoutMs: number;
  private readonly backoffUnitMs: number;

  constructor(options: TelegramNotifierOptions) {
    this.endpoint = `${options.telegramApiUrl}/bot${options.telegramBotToken}/sendMessage`;
    this.chatId = options.telegramChatId;
    this.timeoutMs = options.telegramTimeoutMs;
    this.backoffUnitMs = options.backoffUnitMs ?? 1000;
  }

  private async postMessage(text: string): Promise<void> {
    const { body } = await requestText(
      this.endpoint,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: this.chatId,
          text,
          parse_mode: "HTML",
          disable_web_page_preview: true,
        }),
      },
      this.timeoutMs,
    );
    const data = parseTelegramResponse(body);
    if (data.ok === false) {
      throw new TelegramRejectedError(data.description ?? "unknown reason");
    }
  }

  async send(message: string): Promise<boolean> {
    try {
      await withLinearRetry(() => this.postMessage(message), {
        maxAttempts: MAX_ATTEMPTS,
        backoffUnitMs: this.backoffUnitMs,
        isRetryable: (error) => isTransientFailure(error, RETRY_STATUSES),
        onRetry: (error, attempt, waitMs) => {
          logger.warn(
            `Telegram sendMessage failed (${this.redact(describeError(error))}), retrying in ${waitMs}ms (${attempt + 1}/${MAX_ATTEMPTS})`,
          );
        },
      });
      return true;
    } catch (error) {
      logger.error(`Telegram sendMessage gave up: ${this.redact(describeError(error))}`);
      return false;
    }
  }

  /** 错误信息里的 URL 带有 bot token，打日志前替换掉 */
  private redact(text: string): string {
    return text.split(this.endpoint).join("<telegram sendMessage>");
  }
}
