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

import { z } from "zod";

export interface MoveAlertConfig {
	interval: string;
	/** 涨跌幅阈值（百分比） */
	thresholdPercent: number;
	pollSeconds: number;
	quote: string;
	excluded: ReadonlySet<string>;
	databaseUrl: string;
	concurrency: number;
	requestTimeoutMs: number;
	telegramTimeoutMs: number;
	binanceBaseUrl: string;
	telegramApiUrl: string;
	telegramBotToken: string;
	telegramChatId: string;
}

export class ConfigError extends Error {
	constructor(readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
		this.name = "ConfigError";
	}
}

const blankToUndefined = (value: unknown) =>
	typeof value === "string" && value.trim() === "" ? undefined : value;

const numberVar = (fallback: number) =>
	z.preprocess(blankToUndefined, z.coerce.number().finite().default(fallback));

const stringVar = (fallback: string) =>
	z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const requiredVar = z.preprocess(
	(value) => (typeof value === "string" ? value.trim() : value),
	z.string({ required_error: "is required" }).min(1, "is required"),
);

const envSchema = z.object({
	INTERVAL: stringVar("15m"),
	THRESHOLD: numberVar(6).pipe(z.number().positive()),
	POLL_SECONDS: numberVar(60).pipe(z.number().min(1)),
	QUOTE: stringVar("USDT").transform((value) => value.toUpperCase()),
	EXCLUDED: z.string().optional(),
	DB_PATH: stringVar("alerts.db"),
	DATABASE_URL: z.preprocess(blankToUndefined, z.string().trim().optional()),
	CONCURRENCY: numberVar(50).pipe(z.number().int().min(1)),
	REQUEST_TIMEOUT_MS: numberVar(30_000).pipe(z.number().int().positive()),
	TELEGRAM_TIMEOUT_MS: numberVar(20_000).pipe(z.number().int().positive()),
	BINANCE_FAPI_URL: stringVar("https://fapi.binance.com"),
	TELEGRAM_API_URL: stringVar("https://api.telegram.org"),
	TELEGRAM_BOT_TOKEN: requiredVar,
	TELEGRAM_CHAT_ID: requiredVar,
});

export function parseSymbolList(value?: string | null): Set<string> {
	if (!value) return new Set();
	return new Set(
		value
			.split(",")
			.map((item) => item.trim().toUpperCase())
			.filter((item) => item.length > 0),
	);
}

function stripTrailingSlash(url: string): string {
	return url.replace(/\/+$/, "");
}

/**
 * 启动时读取一次环境变量，生成不可变配置
 */
export function loadMoveAlertConfig(
	env: NodeJS.ProcessEnv = process.env,
): MoveAlertConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".")} ${issue.message}`,
			),
		);
	}
	const vars = parsed.data;

	return Object.freeze({
		interval: vars.INTERVAL,
		thresholdPercent: vars.THRESHOLD,
		pollSeconds: vars.POLL_SECONDS,
		quote: vars.QUOTE,
		excluded: parseSymbolList(vars.EXCLUDED),
		databaseUrl: vars.DATABASE_URL ?? `file:${vars.DB_PATH}`,
		concurrency: vars.CONCURRENCY,
		requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
		telegramTimeoutMs: vars.TELEGRAM_TIMEOUT_MS,
		binanceBaseUrl: stripTrailingSlash(vars.BINANCE_FAPI_URL),
		telegramApiUrl: stripTrailingSlash(vars.TELEGRAM_API_URL),
		telegramBotToken: vars.TELEGRAM_BOT_TOKEN,
		telegramChatId: vars.TELEGRAM_CHAT_ID,
	});
}
