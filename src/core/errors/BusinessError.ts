import { BaseError } from "./BaseError.js";

/**
 * 平台业务错误基类
 *
 * 平台侧语义上的失败（内容不存在、登录失败等），默认不可重试。
 * 子类可覆盖 retryable。
 */
export abstract class BusinessError extends BaseError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, context);
	}
}
