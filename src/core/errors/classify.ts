import { BaseError } from "./BaseError.js";
import { BlockedError } from "./BlockedError.js";
import { CancelledError } from "./CancelledError.js";
import { LoginFailedError } from "./LoginFailedError.js";
import { NotFoundError } from "./NotFoundError.js";
import { PoolExhaustedError } from "./ProxyErrors.js";

export type ErrorKind = "transient" | "blocked" | "not-found" | "login-failed" | "pool-exhausted" | "cancelled" | "permanent";

/**
 * 把任意异常映射到错误分类
 *
 * 未知异常（第三方库抛出的 Error、字符串等）按瞬态处理，交给重试策略兜底。
 */
export function classifyError(err: unknown): ErrorKind {
	if (err instanceof BlockedError) return "blocked";
	if (err instanceof NotFoundError) return "not-found";
	if (err instanceof LoginFailedError) return "login-failed";
	if (err instanceof PoolExhaustedError) return "pool-exhausted";
	if (err instanceof CancelledError) return "cancelled";
	if (err instanceof BaseError) return err.retryable ? "transient" : "permanent";
	return "transient";
}

/** 默认的可重试判断：BaseError 看 retryable，未知异常视为可重试 */
export function isRetryable(err: unknown): boolean {
	if (err instanceof BaseError) return err.retryable;
	return true;
}

/** 提取可读的错误消息 */
export function errorMessage(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
