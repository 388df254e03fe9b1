import { BusinessError } from "./BusinessError.js";

/**
 * 内容不存在
 *
 * 单条内容永久性失败：记录日志并跳过，从不重试。
 */
export class NotFoundError extends BusinessError {
	readonly code: string = "NOT_FOUND";
	readonly retryable = false;

	/** 对应的内容/创作者标识 */
	readonly itemId?: string;

	constructor(message = "内容不存在", context?: Record<string, unknown> & { itemId?: string }) {
		super(message, context);
		this.itemId = context?.itemId;
	}
}

/**
 * 内容已下架/被删除
 *
 * 与 NotFoundError 同属永久失败，单独区分便于统计下架率。
 */
export class ItemWithdrawnError extends NotFoundError {
	override readonly code = "ITEM_WITHDRAWN";

	constructor(message = "内容已下架", context?: Record<string, unknown> & { itemId?: string }) {
		super(message, context);
	}
}
