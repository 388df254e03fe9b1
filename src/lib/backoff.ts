/* 中文注释：请求间固定间隔（crawl_interval）+ 可取消睡眠 */
import { setTimeout as delay } from "node:timers/promises";
import { CancelledError } from "../core/errors/CancelledError.js";
import type { ILogger } from "../contracts/ILogger.js";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * 可被 AbortSignal 打断的睡眠；被打断时抛出 CancelledError
 */
export const sleep: SleepFn = async (ms, signal) => {
	if (signal?.aborted) throw new CancelledError();
	if (ms <= 0) return;
	try {
		await delay(ms, undefined, { signal });
	} catch (err) {
		if (signal?.aborted) throw new CancelledError();
		throw err;
	}
};

export interface BackoffOptions {
	/** 基础间隔（毫秒），即 crawl_interval */
	intervalMs: number;
	/** 间隔上的随机抖动比例（0..1），默认 0 */
	jitterRatio?: number;
	signal?: AbortSignal;
	sleep?: SleepFn;
	logger?: ILogger;
}

/**
 * 请求节奏调度器
 *
 * 每次翻页（外层、内层评论分页、搜索页、创作者作品页）之后调用 pause()，
 * 这是除信号量等待外唯一的刻意阻塞点。
 */
export class BackoffScheduler {
	private readonly jitterRatio: number;
	private readonly sleepFn: SleepFn;
	private paused = 0;

	constructor(private opts: BackoffOptions) {
		this.jitterRatio = Math.min(1, Math.max(0, opts.jitterRatio ?? 0));
		this.sleepFn = opts.sleep ?? sleep;
	}

	get intervalMs(): number {
		return this.opts.intervalMs;
	}

	/** 已执行的 pause 次数 */
	get pauses(): number {
		return this.paused;
	}

	/** 下一次等待时长（带抖动） */
	nextDelay(): number {
		const base = Math.max(0, this.opts.intervalMs);
		if (this.jitterRatio === 0 || base === 0) return base;
		const spread = base * this.jitterRatio;
		return Math.round(base - spread + Math.random() * spread * 2);
	}

	/**
	 * 等待一个间隔
	 * @throws CancelledError 运行已被取消
	 */
	async pause(reason?: string): Promise<void> {
		const ms = this.nextDelay();
		this.paused++;
		if (reason) this.opts.logger?.debug({ ms, reason }, "请求间隔等待");
		await this.sleepFn(ms, this.opts.signal);
	}

	/** 绑定到另一个取消信号（每次平台运行各自一个） */
	withSignal(signal: AbortSignal | undefined): BackoffScheduler {
		return new BackoffScheduler({ ...this.opts, signal });
	}
}
