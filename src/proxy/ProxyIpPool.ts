/* 中文注释：代理 IP 池（随机取出、取出即移除、空池惰性重载、可选回显校验） */
import PQueue from "p-queue";
import type { ILogger } from "../contracts/ILogger.js";
import type { IProxyProvider } from "../contracts/IProxyProvider.js";
import { BaseError } from "../core/errors/BaseError.js";
import { PoolExhaustedError, ProviderUnavailableError, ProxyValidationError } from "../core/errors/ProxyErrors.js";
import { errorMessage } from "../core/errors/classify.js";
import { RetryPolicy } from "../lib/retry.js";
import { isExpired, leaseKey, type ProxyLease } from "./types.js";
import type { LeaseValidator } from "./validator.js";

export interface ProxyIpPoolOptions {
	/** 每次重载拉取的数量 N */
	poolSize: number;
	provider: IProxyProvider;
	/** 为空时不校验 */
	validator?: LeaseValidator;
	/** acquire 的有界重试（默认 3 次、固定 1 秒） */
	retry?: RetryPolicy;
	logger?: ILogger;
	random?: () => number;
	nowSec?: () => number;
}

/**
 * 代理 IP 池
 *
 * @remarks
 * - 只在池空时整批重载，不做主动补充
 * - 均匀随机选取，避免供应商侧按顺序关联
 * - 取出的租约立即出池并通知供应商剔除；校验失败的租约直接丢弃，不回池
 * - 取出与重载在单并发队列内串行，并发 acquire 不会拿到同一租约
 */
export class ProxyIpPool {
	private leases: ProxyLease[] = [];
	private readonly lock = new PQueue({ concurrency: 1 });
	private readonly retry: RetryPolicy;
	private readonly random: () => number;
	private readonly nowSec: () => number;
	private reloadCount = 0;
	private log?: ILogger;

	constructor(private opts: ProxyIpPoolOptions) {
		if (opts.poolSize < 1) throw new RangeError("poolSize 必须 >= 1");
		this.retry = opts.retry ?? new RetryPolicy({ attempts: 3, baseMs: 1000, wait: "fixed" });
		this.random = opts.random ?? Math.random;
		this.nowSec = opts.nowSec ?? (() => Math.floor(Date.now() / 1000));
		this.log = opts.logger?.child({ module: "proxyPool", provider: opts.provider.name });
	}

	/** 创建并预加载 */
	static async create(opts: ProxyIpPoolOptions): Promise<ProxyIpPool> {
		const pool = new ProxyIpPool(opts);
		await pool.load();
		return pool;
	}

	/** 当前池内可用数量 */
	get size(): number {
		return this.leases.length;
	}

	/** 向供应商拉取的次数 */
	get reloads(): number {
		return this.reloadCount;
	}

	/** 丢弃现有租约并整批重载 */
	async load(): Promise<void> {
		await this.lock.add(() => this.reload(), { throwOnTimeout: true });
	}

	/**
	 * 取出一个租约
	 *
	 * 供应商失败、空列表与校验失败都计入同一组有界重试；用尽后以不可重试的
	 * PoolExhaustedError 结束，上层的请求重试与任务重试不会再次触发供应商调用。
	 *
	 * @throws PoolExhaustedError 有界重试后仍无可用代理（context.causeCode 为最后一次失败的错误代码）
	 */
	async acquire(): Promise<ProxyLease> {
		try {
			return await this.retry.execute((attempt) => this.acquireOnce(attempt), {
				onRetry: (err, attempt, waitMs) =>
					this.log?.warn({ attempt: attempt + 1, waitMs, error: errorMessage(err) }, "获取代理失败，稍后重试"),
			});
		} catch (err) {
			this.log?.error({ err, attempts: this.retry.attempts }, "代理池耗尽");
			throw new PoolExhaustedError("有界重试后仍无可用代理", {
				attempts: this.retry.attempts,
				cause: errorMessage(err),
				causeCode: err instanceof BaseError ? err.code : undefined,
			});
		}
	}

	private async acquireOnce(attempt: number): Promise<ProxyLease> {
		const lease = await this.lock.add(() => this.take(), { throwOnTimeout: true });
		if (this.opts.validator) {
			const ok = await this.opts.validator(lease);
			if (!ok) {
				this.log?.warn({ proxy: leaseKey(lease), attempt: attempt + 1 }, "代理校验失败，已丢弃");
				throw new ProxyValidationError("代理 IP 校验失败", { proxy: leaseKey(lease) });
			}
		}
		this.log?.debug({ proxy: leaseKey(lease), remaining: this.leases.length }, "取出代理");
		return lease;
	}

	private async take(): Promise<ProxyLease> {
		this.dropExpired();
		if (this.leases.length === 0) {
			await this.reload();
			this.dropExpired();
		}
		if (this.leases.length === 0) {
			throw new ProviderUnavailableError("供应商未返回可用代理", { provider: this.opts.provider.name });
		}
		const index = Math.min(this.leases.length - 1, Math.floor(this.random() * this.leases.length));
		const [lease] = this.leases.splice(index, 1);
		this.opts.provider.evict?.(lease);
		return lease;
	}

	private async reload(): Promise<void> {
		this.leases = [];
		this.reloadCount++;
		const fetched = await this.opts.provider.fetchLeases(this.opts.poolSize);
		// 同一批次内去重，避免一次重载里出现重复 IP:端口
		const seen = new Set<string>();
		this.leases = fetched.filter((l) => {
			const key = leaseKey(l);
			if (seen.has(key)) return false;
			seen.add(key);
			return true;
		});
		this.log?.info({ requested: this.opts.poolSize, loaded: this.leases.length }, "代理池已重载");
	}

	private dropExpired(): void {
		const now = this.nowSec();
		const before = this.leases.length;
		this.leases = this.leases.filter((l) => !isExpired(l, now));
		if (this.leases.length < before) this.log?.debug({ dropped: before - this.leases.length }, "丢弃过期代理");
	}
}
