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
 * HTTP 请求工具：超时控制 + 线性退避重试
 */
import { delay } from "./timeUtils";

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string,
  ) {
    super(`HTTP ${status} from ${url}${body ? `: ${body.slice(0, 200)}` : ""}`);
    this.name = "HttpStatusError";
  }
}

/** 网络层失败（连接错误或超时） */
export class TransportError extends Error {
  constructor(
    readonly url: string,
    readonly timedOut: boolean,
    options?: { cause?: unknown },
  ) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(timedOut ? `Request to ${url} timed out` : `Request to ${url} failed: ${reason}`, options);
    this.name = "TransportError";
  }
}

export interface HttpTextResponse {
  status: number;
  body: string;
}

export async function requestText(
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<HttpTextResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  let response: Response;
  let body: string;
  try {
    response = await fetch(url, { ...init, signal: controller.signal });
    body = await response.text();
  } catch (error) {
    throw new TransportError(url, controller.signal.aborted, { cause: error });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new HttpStatusError(response.status, url, body);
  }
  return { status: response.status, body };
}

/**
 * 第 attempt 次失败后的等待时间：unit * (1 + 2 * attempt)，即 1s、3s、5s…
 */
export function linearBackoffMs(attempt: number, unitMs: number): number {
  return unitMs * (1 + 2 * attempt);
}

export function isTransientFailure(
  error: unknown,
  retryStatuses: ReadonlySet<number>,
): boolean {
  if (error instanceof TransportError) return true;
  if (error instanceof HttpStatusError) return retryStatuses.has(error.status);
  return false;
}

export interface RetryOptions {
  maxAttempts: number;
  backoffUnitMs: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

export async function withLinearRetry<T>(
  operation: (attempt: number) => Promise<T>,
  { maxAttempts, backoffUnitMs, isRetryable, onRetry }: RetryOptions,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      const isLastAttempt = attempt >= maxAttempts - 1;
      if (isLastAttempt || !isRetryable(error)) {
        break;
      }
      const waitMs = linearBackoffMs(attempt, backoffUnitMs);
      onRetry?.(error, attempt, waitMs);
      await delay(waitMs);
    }
  }
  throw lastError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
