export type MoveDirection = "up" | "down";

export interface Candle {
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
}

/**
 * 去重主键：某个合约在某根 K 线（按开盘时间）上的告警
 */
export interface AlertKey {
	symbol: string;
	openTime: number;
}

export interface MoveAlert {
	symbol: string;
	percentChange: number;
}

export interface ScanResult {
	alerts: MoveAlert[];
	symbolsScanned: number;
	candlesMissing: number;
	alreadyAlerted: number;
	sendFailures: number;
}
