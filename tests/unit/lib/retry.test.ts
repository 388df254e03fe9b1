/* 中文注释：共享重试策略测试 */
import { describe, it, expect, vi } from "vitest";
import { RetryPolicy, backoffDelay, withRetry } from "../../../src/lib/retry.js";
import { TransientError } from "../../../src/core/errors/TransientError.js";
import { NotFoundError } from "../../../src/core/errors/NotFoundError.js";
import { instantSleep } from "../../helpers/fakes.js";

describe("withRetry", () => {
	it("瞬态错误重试后成功，并按固定间隔等待", async () => {
		const waits: number[] = [];
		const fn = vi.fn(async (attempt: number) => {
			if (attempt < 2) throw new TransientError("blip");
			return "ok";
		});
		const onRetry = vi.fn();
		await expect(withRetry(fn, { attempts: 3, baseMs: 1000, sleep: instantSleep(waits), onRetry })).resolves.toBe("ok");
		expect(fn).toHaveBeenCalledTimes(3);
		expect(waits).toEqual([1000, 1000]);
		expect(onRetry).toHaveBeenCalledTimes(2);
		expect(onRetry.mock.calls[0][1]).toBe(0);
	});

	it("尝试耗尽后抛出最后一次的错误", async () => {
		let n = 0;
		const run = withRetry(
			async () => {
				n++;
				throw new TransientError(`fail-${n}`);
			},
			{ attempts: 3, sleep: instantSleep() },
		);
		await expect(run).rejects.toThrow("fail-3");
		expect(n).toBe(3);
	});

	it("不可重试的错误立即抛出", async () => {
		const fn = vi.fn(async () => {
			throw new NotFoundError("gone");
		});
		await expect(withRetry(fn, { attempts: 5, sleep: instantSleep() })).rejects.toBeInstanceOf(NotFoundError);
		expect(fn).toHaveBeenCalledTimes(1);
	});

	it("未知异常默认可重试", async () => {
		const fn = vi.fn(async (attempt: number) => {
			if (attempt === 0) throw new Error("boom");
			return 1;
		});
		await expect(withRetry(fn, { sleep: instantSleep() })).resolves.toBe(1);
	});

	it("shouldRetry 可以覆盖默认判断", async () => {
		const fn = vi.fn(async () => {
			throw new TransientError("blip");
		});
		await expect(withRetry(fn, { attempts: 3, shouldRetry: () => false, sleep: instantSleep() })).rejects.toThrow("blip");
		expect(fn).toHaveBeenCalledTimes(1);
	});
});

describe("backoffDelay", () => {
	it("fixed 返回基数，exponential 按 2^n 增长并受上限约束", () => {
		expect(backoffDelay(3, { baseMs: 500 })).toBe(500);
		expect(backoffDelay(0, { baseMs: 100, wait: "exponential" })).toBe(100);
		expect(backoffDelay(2, { baseMs: 100, wait: "exponential" })).toBe(400);
		expect(backoffDelay(10, { baseMs: 100, maxMs: 1000, wait: "exponential" })).toBe(1000);
	});

	it("抖动落在 [0.5, 1.5) 倍区间", () => {
		for (let i = 0; i < 50; i++) {
			const d = backoffDelay(0, { baseMs: 1000, jitter: true });
			expect(d).toBeGreaterThanOrEqual(500);
			expect(d).toBeLessThanOrEqual(1500);
		}
	});
});

describe("RetryPolicy", () => {
	it("execute 使用预置参数，with 派生新策略", async () => {
		const waits: number[] = [];
		const policy = new RetryPolicy({ attempts: 2, baseMs: 10, sleep: instantSleep(waits) });
		expect(policy.attempts).toBe(2);
		const fn = vi.fn(async () => {
			throw new TransientError("blip");
		});
		await expect(policy.execute(fn)).rejects.toThrow("blip");
		expect(fn).toHaveBeenCalledTimes(2);
		expect(waits).toEqual([10]);

		const longer = policy.with({ attempts: 4 });
		expect(longer.attempts).toBe(4);
		expect(policy.attempts).toBe(2);
	});
});
