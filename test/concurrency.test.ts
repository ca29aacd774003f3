import { describe, it, expect, vi } from "vitest";

import { runWithConcurrency } from "../src/utils/concurrency";

describe("runWithConcurrency", () => {
	it("processes every item", async () => {
		const seen: number[] = [];
		await runWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
			seen.push(item);
		});
		expect(seen.sort()).toEqual([1, 2, 3, 4, 5]);
	});

	it("reports failures without stopping siblings", async () => {
		const onError = vi.fn();
		const done: string[] = [];

		await runWithConcurrency(
			["a", "b", "c"],
			1,
			async (item) => {
				if (item === "b") throw new Error("boom");
				done.push(item);
			},
			onError,
		);

		expect(done).toEqual(["a", "c"]);
		expect(onError).toHaveBeenCalledTimes(1);
		expect(onError.mock.calls[0][0]).toBe("b");
	});

	it("handles an empty list", async () => {
		const fn = vi.fn(async () => {});
		await runWithConcurrency([], 4, fn);
		expect(fn).not.toHaveBeenCalled();
	});
});
