import { describe, it, expect } from "vitest";

import { ConfigError, loadMoveAlertConfig, parseSymbolList } from "../src/config/moveAlert";

const CREDENTIALS = {
	TELEGRAM_BOT_TOKEN: "test-token",
	TELEGRAM_CHAT_ID: "12345",
};

function captureConfigError(env: Record<string, string>): ConfigError {
	try {
		loadMoveAlertConfig(env);
	} catch (error) {
		if (error instanceof ConfigError) return error;
		throw error;
	}
	throw new Error("expected loadMoveAlertConfig to throw");
}

describe("loadMoveAlertConfig", () => {
	it("applies defaults when only credentials are set", () => {
		const config = loadMoveAlertConfig({ ...CREDENTIALS });

		expect(config.interval).toBe("15m");
		expect(config.thresholdPercent).toBe(6);
		expect(config.pollSeconds).toBe(60);
		expect(config.quote).toBe("USDT");
		expect(config.excluded.size).toBe(0);
		expect(config.databaseUrl).toBe("file:alerts.db");
		expect(config.concurrency).toBe(50);
		expect(config.requestTimeoutMs).toBe(30_000);
		expect(config.telegramTimeoutMs).toBe(20_000);
		expect(config.binanceBaseUrl).toBe("https://fapi.binance.com");
		expect(config.telegramApiUrl).toBe("https://api.telegram.org");
		expect(config.telegramBotToken).toBe("test-token");
		expect(config.telegramChatId).toBe("12345");
	});

	it("parses overrides", () => {
		const config = loadMoveAlertConfig({
			...CREDENTIALS,
			INTERVAL: "5m",
			THRESHOLD: "4.5",
			POLL_SECONDS: "30",
			QUOTE: "usdc",
			EXCLUDED: " btcusdt, ethusdt ,,",
			DB_PATH: "/tmp/move-alerts.db",
			CONCURRENCY: "8",
			BINANCE_FAPI_URL: "http://localhost:9000/",
		});

		expect(config.interval).toBe("5m");
		expect(config.thresholdPercent).toBe(4.5);
		expect(config.pollSeconds).toBe(30);
		expect(config.quote).toBe("USDC");
		expect([...config.excluded]).toEqual(["BTCUSDT", "ETHUSDT"]);
		expect(config.databaseUrl).toBe("file:/tmp/move-alerts.db");
		expect(config.concurrency).toBe(8);
		expect(config.binanceBaseUrl).toBe("http://localhost:9000");
	});

	it("prefers DATABASE_URL over DB_PATH", () => {
		const config = loadMoveAlertConfig({
			...CREDENTIALS,
			DB_PATH: "ignored.db",
			DATABASE_URL: "file:./data/alerts.db",
		});
		expect(config.databaseUrl).toBe("file:./data/alerts.db");
	});

	it("treats blank optional values as unset", () => {
		const config = loadMoveAlertConfig({ ...CREDENTIALS, THRESHOLD: "", QUOTE: " " });
		expect(config.thresholdPercent).toBe(6);
		expect(config.quote).toBe("USDT");
	});

	it("returns a frozen object", () => {
		expect(Object.isFrozen(loadMoveAlertConfig({ ...CREDENTIALS }))).toBe(true);
	});

	it("rejects missing credentials", () => {
		const error = captureConfigError({});
		expect(error.issues).toEqual(
			expect.arrayContaining([
				"TELEGRAM_BOT_TOKEN is required",
				"TELEGRAM_CHAT_ID is required",
			]),
		);
	});

	it("rejects blank credentials", () => {
		const error = captureConfigError({ TELEGRAM_BOT_TOKEN: "   ", TELEGRAM_CHAT_ID: "12345" });
		expect(error.issues).toEqual(["TELEGRAM_BOT_TOKEN is required"]);
	});

	it("rejects non-numeric and out-of-range numbers", () => {
		const error = captureConfigError({ ...CREDENTIALS, THRESHOLD: "abc", CONCURRENCY: "0" });
		expect(error.issues.map((issue) => issue.split(" ")[0])).toEqual(["THRESHOLD", "CONCURRENCY"]);
	});
});

describe("parseSymbolList", () => {
	it("returns an empty set for missing input", () => {
		expect(parseSymbolList(undefined).size).toBe(0);
		expect(parseSymbolList("").size).toBe(0);
	});
});
