import type { Candle, MoveDirection, ScanResult } from "../types/moveAlert";
import { formatUtcTime } from "./timeUtils";

function escapeHtml(value: string): string {
	return value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;");
}

/**
 * (close - open) / open * 100；open 为 0 或结果非有限数时返回 null
 */
export function computeMovePercent(candle: Pick<Candle, "open" | "close">): number | null {
	if (candle.open === 0) {
		return null;
	}
	const percent = ((candle.close - candle.open) / candle.open) * 100;
	return Number.isFinite(percent) ? percent : null;
}

export function getMoveDirection(candle: Pick<Candle, "open" | "close">): MoveDirection {
	return candle.close >= candle.open ? "up" : "down";
}

export function formatPercent(value: number): string {
	return `${value.toFixed(2)}%`;
}

export function formatMoveAlert(
	symbol: string,
	candle: Candle,
	percentChange: number,
	interval: string,
): string {
	const direction = getMoveDirection(candle) === "up" ? "▲ UP" : "▼ DOWN";
	return [
		`<b>${escapeHtml(symbol)}</b> ${direction}`,
		`Interval: ${escapeHtml(interval)} | Move: <b>${formatPercent(Math.abs(percentChange))}</b>`,
		`Open: ${candle.open.toFixed(6)} | Close: ${candle.close.toFixed(6)}`,
		`High: ${candle.high.toFixed(6)} | Low: ${candle.low.toFixed(6)}`,
		`Open Time: ${formatUtcTime(candle.openTime)} UTC`,
	].join("\n");
}

export function formatCycleSummary(result: ScanResult): string {
	if (result.alerts.length === 0) {
		return "No new alerts this cycle.";
	}
	const parts = result.alerts.map(
		(alert) => `${alert.symbol}:${formatPercent(Math.abs(alert.percentChange))}`,
	);
	return `Sent ${result.alerts.length} alerts: ${parts.join(", ")}`;
}
