/* 中文注释：单次平台调用的执行器：按任务持有代理租约，风控时剔除租约并换新重试 */
import type { ILogger } from "../contracts/ILogger.js";
import type { RequestContext } from "../contracts/IPlatformClient.js";
import { BlockedError } from "../core/errors/BlockedError.js";
import { CancelledError } from "../core/errors/CancelledError.js";
import { NotFoundError } from "../core/errors/NotFoundError.js";
import { errorMessage, isRetryable } from "../core/errors/classify.js";
import { releaseDispatcher } from "../lib/http.js";
import type { RetryPolicy } from "../lib/retry.js";
import type { SessionSnapshot } from "../login/SessionState.js";
import { isExpired, leaseKey, type ProxyLease } from "../proxy/types.js";

/** 租约来源（通常是 ProxyIpPool） */
export interface LeaseSource {
	acquire(): Promise<ProxyLease>;
}

/** 发起平台请求的最小接口，评论抓取器等只依赖它 */
export interface RequestRunner {
	run<T>(label: string, fn: (ctx: RequestContext) => Promise<T>): Promise<T>;
}

export interface RequestExecutorOptions {
	platform: string;
	retry: RetryPolicy;
	/** 每次请求读取最新的会话快照 */
	session: () => SessionSnapshot;
	/** 未开启代理时为空 */
	leases?: LeaseSource;
	signal?: AbortSignal;
	/** 租约被丢弃时调用，默认关闭对应的代理连接 */
	onDiscard?: (lease: ProxyLease) => Promise<void>;
	logger?: ILogger;
}

/**
 * 请求执行器
 *
 * scope(task) 为一个任务创建 TaskScope；租约只属于该任务，任务之间不共享。
 */
export class RequestExecutor implements RequestRunner {
	constructor(private opts: RequestExecutorOptions) {}

	get platform(): string {
		return this.opts.platform;
	}

	scope(task: string): TaskScope {
		return new TaskScope(task, this.opts);
	}

	/** 一次性任务：执行完即丢弃租约 */
	async run<T>(label: string, fn: (ctx: RequestContext) => Promise<T>): Promise<T> {
		const scope = this.scope(label);
		try {
			return await scope.run(label, fn);
		} finally {
			await scope.dispose();
		}
	}
}

/**
 * 单个任务的请求作用域
 *
 * @remarks
 * - 首次请求时取租约，之后同一任务内复用
 * - BlockedError：丢弃当前租约，下一次尝试前重新取一个
 * - NotFoundError / 不可重试错误：直接抛出，不重试
 * - 租约过期时在下一次请求前更换
 */
export class TaskScope implements RequestRunner {
	private lease?: ProxyLease;
	private readonly used: ProxyLease[] = [];
	private log?: ILogger;

	constructor(
		readonly task: string,
		private opts: RequestExecutorOptions,
	) {
		this.log = opts.logger?.child({ module: "executor", platform: opts.platform, task });
	}

	/** 本任务用过的租约（按取用顺序） */
	get leasesUsed(): readonly ProxyLease[] {
		return this.used;
	}

	async run<T>(label: string, fn: (ctx: RequestContext) => Promise<T>): Promise<T> {
		const { signal } = this.opts;
		return this.opts.retry.execute(
			async () => {
				if (signal?.aborted) throw new CancelledError();
				const lease = await this.currentLease();
				try {
					return await fn({ lease, signal, session: this.opts.session() });
				} catch (err) {
					if (err instanceof BlockedError && lease) await this.discard(lease, "blocked");
					throw err;
				}
			},
			{
				signal,
				shouldRetry: (err) => !(err instanceof NotFoundError) && !(err instanceof CancelledError) && isRetryable(err),
				onRetry: (err, attempt, waitMs) =>
					this.log?.warn({ label, attempt: attempt + 1, waitMs, error: errorMessage(err) }, "请求失败，准备重试"),
			},
		);
	}

	/** 任务结束：租约不归还，直接丢弃 */
	async dispose(): Promise<void> {
		if (this.lease) await this.discard(this.lease, "task-finished");
	}

	private async currentLease(): Promise<ProxyLease | undefined> {
		if (!this.opts.leases) return undefined;
		if (this.lease && isExpired(this.lease)) await this.discard(this.lease, "expired");
		if (!this.lease) {
			this.lease = await this.opts.leases.acquire();
			this.used.push(this.lease);
		}
		return this.lease;
	}

	private async discard(lease: ProxyLease, reason: string): Promise<void> {
		if (this.lease === lease) this.lease = undefined;
		if (reason !== "task-finished") this.log?.info({ proxy: leaseKey(lease), reason }, "丢弃代理租约");
		await (this.opts.onDiscard ?? releaseDispatcher)(lease);
	}
}
