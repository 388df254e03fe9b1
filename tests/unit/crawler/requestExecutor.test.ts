/* 中文注释：请求执行器（任务内代理租约）测试 */
import { describe, it, expect } from "vitest";
import { RequestExecutor, type LeaseSource } from "../../../src/crawler/RequestExecutor.js";
import { BlockedError } from "../../../src/core/errors/BlockedError.js";
import { CancelledError } from "../../../src/core/errors/CancelledError.js";
import { NotFoundError } from "../../../src/core/errors/NotFoundError.js";
import { PoolExhaustedError, ProviderUnavailableError } from "../../../src/core/errors/ProxyErrors.js";
import { TransientError } from "../../../src/core/errors/TransientError.js";
import { RetryPolicy } from "../../../src/lib/retry.js";
import { SessionState } from "../../../src/login/SessionState.js";
import { ProxyIpPool } from "../../../src/proxy/ProxyIpPool.js";
import type { ProxyLease } from "../../../src/proxy/types.js";
import { FakeProvider, instantSleep, lease } from "../../helpers/fakes.js";
import { MemoryLogger } from "../../helpers/memoryLogger.js";

class SequenceLeases implements LeaseSource {
	private n = 0;

	async acquire(): Promise<ProxyLease> {
		this.n++;
		return lease(`10.0.0.${this.n}`);
	}
}

function setup(signal?: AbortSignal) {
	const discarded: string[] = [];
	const logger = new MemoryLogger();
	const executor = new RequestExecutor({
		platform: "xhs",
		retry: new RetryPolicy({ attempts: 3, baseMs: 0, sleep: instantSleep() }),
		session: () => new SessionState("xhs", { cookies: "a1=x" }).snapshot(),
		leases: new SequenceLeases(),
		signal,
		onDiscard: async (l) => {
			discarded.push(l.ip);
		},
		logger,
	});
	return { executor, discarded, logger };
}

describe("RequestExecutor", () => {
	it("同一任务内复用租约", async () => {
		const { executor } = setup();
		const scope = executor.scope("detail:n1");
		const seen: Array<string | undefined> = [];
		await scope.run("a", async (ctx) => seen.push(ctx.lease?.ip));
		await scope.run("b", async (ctx) => seen.push(ctx.lease?.ip));
		expect(seen).toEqual(["10.0.0.1", "10.0.0.1"]);
		expect(scope.leasesUsed).toHaveLength(1);
	});

	it("风控拦截时丢弃租约，下一次尝试换新租约", async () => {
		const { executor, discarded, logger } = setup();
		const scope = executor.scope("detail:n1");
		const seen: string[] = [];
		const result = await scope.run("detail", async (ctx) => {
			seen.push(ctx.lease?.ip ?? "none");
			if (seen.length === 1) throw new BlockedError();
			return "ok";
		});
		expect(result).toBe("ok");
		expect(seen).toEqual(["10.0.0.1", "10.0.0.2"]);
		expect(discarded).toEqual(["10.0.0.1"]);
		expect(logger.at("info")[0]).toMatchObject({ msg: "丢弃代理租约", obj: { proxy: "10.0.0.1:8000", reason: "blocked" } });

		await scope.dispose();
		expect(discarded).toEqual(["10.0.0.1", "10.0.0.2"]);
	});

	it("瞬态错误在同一租约上重试", async () => {
		const { executor, logger } = setup();
		const scope = executor.scope("detail:n1");
		let calls = 0;
		await scope.run("detail", async () => {
			calls++;
			if (calls < 3) throw new TransientError("blip");
			return calls;
		});
		expect(calls).toBe(3);
		expect(scope.leasesUsed).toHaveLength(1);
		expect(logger.at("warn").map((e) => e.obj.attempt)).toEqual([1, 2]);
	});

	it("NotFound 不重试", async () => {
		const { executor } = setup();
		let calls = 0;
		const run = executor.run("detail:gone", async () => {
			calls++;
			throw new NotFoundError();
		});
		await expect(run).rejects.toBeInstanceOf(NotFoundError);
		expect(calls).toBe(1);
	});

	it("过期租约在下一次请求前更换", async () => {
		const discarded: string[] = [];
		let n = 0;
		const executor = new RequestExecutor({
			platform: "xhs",
			retry: new RetryPolicy({ attempts: 1 }),
			session: () => new SessionState("xhs").snapshot(),
			leases: {
				acquire: async () => {
					n++;
					return lease(`10.1.0.${n}`, 8000, n === 1 ? { expiresAt: 1 } : {});
				},
			},
			onDiscard: async (l) => {
				discarded.push(l.ip);
			},
		});
		const scope = executor.scope("detail:n1");
		const seen: Array<string | undefined> = [];
		await scope.run("a", async (ctx) => seen.push(ctx.lease?.ip));
		await scope.run("b", async (ctx) => seen.push(ctx.lease?.ip));
		expect(seen).toEqual(["10.1.0.1", "10.1.0.2"]);
		expect(discarded).toEqual(["10.1.0.1"]);
	});

	it("未启用代理时上下文不带租约", async () => {
		const executor = new RequestExecutor({
			platform: "xhs",
			retry: new RetryPolicy({ attempts: 1 }),
			session: () => new SessionState("xhs").snapshot(),
		});
		await expect(executor.run("x", async (ctx) => ctx.lease)).resolves.toBeUndefined();
	});

	it("取消后不再发起请求", async () => {
		const controller = new AbortController();
		controller.abort();
		const { executor } = setup(controller.signal);
		let calls = 0;
		await expect(
			executor.run("x", async () => {
				calls++;
			}),
		).rejects.toBeInstanceOf(CancelledError);
		expect(calls).toBe(0);
	});

	it("代理池有界重试用尽后不再由请求重试放大供应商调用", async () => {
		const provider = new FakeProvider([new ProviderUnavailableError("down")]);
		const retry = new RetryPolicy({ attempts: 3, baseMs: 0, sleep: instantSleep() });
		const executor = new RequestExecutor({
			platform: "xhs",
			retry,
			session: () => new SessionState("xhs").snapshot(),
			leases: new ProxyIpPool({ poolSize: 2, provider, retry }),
			onDiscard: async () => undefined,
		});
		let calls = 0;
		await expect(
			executor.run("detail:n1", async () => {
				calls++;
				return "ok";
			}),
		).rejects.toBeInstanceOf(PoolExhaustedError);
		expect(provider.calls).toHaveLength(3);
		expect(calls).toBe(0);
	});
});
