import { BaseError } from "./BaseError.js";

/**
 * 输入/配置验证错误
 *
 * 参数缺失、格式错误、取值越界等需要修正输入才能解决的问题，不可重试。
 *
 * @example
 * ```typescript
 * throw new ValidationError("未知平台", { field: "platform", value: "foo" });
 * ```
 */
export class ValidationError extends BaseError {
	readonly code = "VALIDATION_ERROR";
	readonly retryable = false;

	/** 验证失败的字段名 */
	readonly field?: string;

	constructor(message: string, context?: Record<string, unknown> & { field?: string }) {
		super(message, context);
		this.field = context?.field;
	}
}
