/* 中文注释：共享重试策略（固定/指数退避 + 抖动），所有发起网络请求的组件共用 */
import { isRetryable } from "../core/errors/classify.js";
import { sleep as defaultSleep, type SleepFn } from "./backoff.js";

export type WaitStrategy = "fixed" | "exponential";

export interface RetryOptions {
	/** 最大尝试次数（含首次），默认 3 */
	attempts?: number;
	/** 固定等待时长，或指数退避的基数（毫秒），默认 1000 */
	baseMs?: number;
	/** 指数退避上限，默认 8000 */
	maxMs?: number;
	wait?: WaitStrategy;
	jitter?: boolean;
	/** 是否继续重试；默认看错误的 retryable 标记 */
	shouldRetry?: (err: unknown, attempt: number) => boolean;
	/** 每次决定重试、开始等待前回调 */
	onRetry?: (err: unknown, attempt: number, waitMs: number) => void;
	signal?: AbortSignal;
	sleep?: SleepFn;
}

export function backoffDelay(attempt: number, opts: RetryOptions): number {
	const base = opts.baseMs ?? 1000;
	const max = opts.maxMs ?? 8000;
	const raw = (opts.wait ?? "fixed") === "fixed" ? base : Math.min(max, base * 2 ** attempt);
	return opts.jitter ? Math.round(raw * (0.5 + Math.random())) : raw;
}

/**
 * 通用重试
 *
 * fn 收到从 0 开始的尝试序号。不可重试的错误立即抛出；尝试耗尽后抛出最后一次的错误。
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
	const attempts = Math.max(1, opts.attempts ?? 3);
	const shouldRetry = opts.shouldRetry ?? ((err: unknown) => isRetryable(err));
	const sleep = opts.sleep ?? defaultSleep;
	let lastErr: unknown;
	for (let i = 0; i < attempts; i++) {
		try {
			return await fn(i);
		} catch (e) {
			lastErr = e;
			if (i >= attempts - 1 || !shouldRetry(e, i)) throw e;
			const waitMs = backoffDelay(i, opts);
			opts.onRetry?.(e, i, waitMs);
			await sleep(waitMs, opts.signal);
		}
	}
	throw lastErr;
}

/**
 * 预置参数的重试策略对象，便于在容器里构造一次、各组件共享
 */
export class RetryPolicy {
	constructor(private readonly defaults: RetryOptions = {}) {}

	get attempts(): number {
		return Math.max(1, this.defaults.attempts ?? 3);
	}

	execute<T>(fn: (attempt: number) => Promise<T>, overrides: RetryOptions = {}): Promise<T> {
		return withRetry(fn, { ...this.defaults, ...overrides });
	}

	with(overrides: RetryOptions): RetryPolicy {
		return new RetryPolicy({ ...this.defaults, ...overrides });
	}
}
