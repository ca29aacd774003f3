import { describe, it, expect, vi, afterEach } from "vitest";

import {
	computeNextDelayMs,
	isScanLoopRunning,
	runScheduledCycle,
	startScanLoop,
	stopScanLoop,
} from "../src/scheduler/scanLoop";
import { UniverseFetchError } from "../src/services/exchanges/marketData";
import type { ScanResult } from "../src/types/moveAlert";

const emptyResult: ScanResult = {
	alerts: [],
	symbolsScanned: 0,
	candlesMissing: 0,
	alreadyAlerted: 0,
	sendFailures: 0,
};

const flushPromises = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("computeNextDelayMs", () => {
	it("subtracts the cycle duration from the cadence", () => {
		expect(computeNextDelayMs(60, 15_000)).toBe(45_000);
	});

	it("never goes negative", () => {
		expect(computeNextDelayMs(60, 75_000)).toBe(0);
	});
});

describe("runScheduledCycle", () => {
	it("returns the cycle result", async () => {
		const runScanCycle = vi.fn(async () => emptyResult);
		expect(await runScheduledCycle({ runScanCycle })).toBe(emptyResult);
	});

	it("contains a failing cycle", async () => {
		const runScanCycle = vi.fn(async (): Promise<ScanResult> => {
			throw new UniverseFetchError("network down");
		});
		expect(await runScheduledCycle({ runScanCycle })).toBeNull();
	});
});

describe("startScanLoop", () => {
	afterEach(() => {
		stopScanLoop();
		vi.useRealTimers();
	});

	it("waits out the rest of the cadence after each cycle", async () => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
		let clock = 0;
		const runScanCycle = vi.fn(async () => {
			clock += 15_000;
			return emptyResult;
		});

		startScanLoop({ runScanCycle }, { pollSeconds: 60, now: () => clock });
		expect(isScanLoopRunning()).toBe(true);

		vi.advanceTimersByTime(0);
		await flushPromises();
		expect(runScanCycle).toHaveBeenCalledTimes(1);

		vi.advanceTimersByTime(44_999);
		await flushPromises();
		expect(runScanCycle).toHaveBeenCalledTimes(1);

		vi.advanceTimersByTime(1);
		await flushPromises();
		expect(runScanCycle).toHaveBeenCalledTimes(2);
	});

	it("keeps running after a cycle throws", async () => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
		let clock = 0;
		const runScanCycle = vi
			.fn(async (): Promise<ScanResult> => emptyResult)
			.mockRejectedValueOnce(new UniverseFetchError("network down"));

		startScanLoop({ runScanCycle }, { pollSeconds: 10, now: () => clock });

		vi.advanceTimersByTime(0);
		await flushPromises();
		expect(runScanCycle).toHaveBeenCalledTimes(1);

		clock = 10_000;
		vi.advanceTimersByTime(10_000);
		await flushPromises();
		expect(runScanCycle).toHaveBeenCalledTimes(2);
		expect(isScanLoopRunning()).toBe(true);
	});

	it("stops scheduling once stopped", async () => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
		const runScanCycle = vi.fn(async () => emptyResult);

		startScanLoop({ runScanCycle }, { pollSeconds: 5, now: () => 0 });
		vi.advanceTimersByTime(0);
		await flushPromises();
		stopScanLoop();

		vi.advanceTimersByTime(60_000);
		await flushPromises();
		expect(runScanCycle).toHaveBeenCalledTimes(1);
		expect(isScanLoopRunning()).toBe(false);
	});
});
