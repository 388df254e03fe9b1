import { BaseError } from "./BaseError.js";

/**
 * 瞬态网络错误
 *
 * 连接中断、超时、5xx 等“稍后再试可能就好”的失败。
 * 由共享 RetryPolicy 按有限次数重试，不触发代理剔除。
 *
 * @example
 * ```typescript
 * throw new TransientError("HTTP 502", { status: 502, url: "https://edith.example.com/api" });
 * ```
 */
export class TransientError extends BaseError {
	readonly code = "TRANSIENT";
	readonly retryable = true;

	/** HTTP 状态码（传输层失败时为空） */
	readonly status?: number;

	constructor(message: string, context?: Record<string, unknown> & { status?: number }) {
		super(message, context);
		this.status = context?.status;
	}
}
