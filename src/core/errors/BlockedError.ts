import { BusinessError } from "./BusinessError.js";

/**
 * 平台风控错误
 *
 * 平台返回限流、封禁或验证码拦截信号。与 TransientError 的区别在于：
 * 调用方必须先剔除当前代理租约、换新租约后再重试，而不是原样重试。
 *
 * @example
 * ```typescript
 * throw new BlockedError("触发风控", { status: 461, verifyType: "slider" });
 * ```
 */
export class BlockedError extends BusinessError {
	readonly code = "BLOCKED";
	readonly retryable = true;

	constructor(message = "请求被平台拦截（风控/限流）", context?: Record<string, unknown>) {
		super(message, context);
	}
}
