import { BaseError } from "./BaseError.js";

/**
 * 代理池耗尽
 *
 * 在有限次数的供应商重载后仍取不到可用代理。对当前任务致命，向上抛出供运维感知。
 */
export class PoolExhaustedError extends BaseError {
	readonly code = "POOL_EXHAUSTED";
	readonly retryable = false;

	constructor(message = "代理池已耗尽", context?: Record<string, unknown>) {
		super(message, context);
	}
}

/**
 * 代理供应商不可用
 *
 * 供应商接口返回错误码或网络失败。只在代理池 acquire 的有界重试内重试，用尽后转为 PoolExhaustedError。
 */
export class ProviderUnavailableError extends BaseError {
	readonly code = "PROVIDER_UNAVAILABLE";
	readonly retryable = true;

	constructor(message = "代理供应商不可用", context?: Record<string, unknown>) {
		super(message, context);
	}
}

/**
 * 代理校验失败
 *
 * 租约经回显地址探测不可用；该租约已从池中移除且不会归还，调用方重新 acquire 即可。
 */
export class ProxyValidationError extends BaseError {
	readonly code = "PROXY_INVALID";
	readonly retryable = true;

	constructor(message = "代理 IP 校验失败", context?: Record<string, unknown>) {
		super(message, context);
	}
}
