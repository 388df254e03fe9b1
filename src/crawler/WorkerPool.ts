/* 中文注释：有界并发的工作池（信号量语义），单项失败互不影响，取消后不再出队 */
import PQueue from "p-queue";
import type { ILogger } from "../contracts/ILogger.js";

export interface WorkerFailure<T> {
	item: T;
	error: unknown;
}

export interface WorkerPoolResult<T, R> {
	succeeded: Array<{ item: T; result: R }>;
	failed: Array<WorkerFailure<T>>;
	/** 因取消而未开始的项 */
	skipped: T[];
}

export interface WorkerPoolOptions {
	concurrency: number;
	signal?: AbortSignal;
	logger?: ILogger;
}

export class WorkerPool {
	readonly concurrency: number;

	constructor(private opts: WorkerPoolOptions) {
		this.concurrency = Math.max(1, Math.floor(opts.concurrency));
	}

	/**
	 * 并发处理 items
	 *
	 * 不会抛出：每一项的异常都收集在 failed 中，由调用方决定如何记录。
	 * 取消信号到达后，已开始的项允许执行完，未开始的项计入 skipped。
	 */
	async map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<WorkerPoolResult<T, R>> {
		const result: WorkerPoolResult<T, R> = { succeeded: [], failed: [], skipped: [] };
		const started = new Set<number>();
		const { signal } = this.opts;
		const queue = new PQueue({ concurrency: this.concurrency });
		const onAbort = () => {
			queue.clear();
			this.opts.logger?.info({ pending: items.length - started.size }, "收到取消信号，停止出队");
		};
		signal?.addEventListener("abort", onAbort, { once: true });

		try {
			if (!signal?.aborted) {
				items.forEach((item, index) => {
					void queue.add(async () => {
						if (signal?.aborted) return;
						started.add(index);
						try {
							result.succeeded.push({ item, result: await fn(item, index) });
						} catch (error) {
							result.failed.push({ item, error });
						}
					});
				});
			}
			await queue.onIdle();
		} finally {
			signal?.removeEventListener("abort", onAbort);
		}
		items.forEach((item, index) => {
			if (!started.has(index)) result.skipped.push(item);
		});
		return result;
	}
}
