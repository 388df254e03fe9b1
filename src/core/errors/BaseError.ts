/**
 * 爬取错误基类
 *
 * 所有爬取相关错误的抽象基类，统一携带错误代码、可重试标记与上下文。
 *
 * @remarks
 * - code：错误类别的唯一标识，日志检索与分类依赖它
 * - retryable：重试包装器据此决定是否再次尝试
 * - context：平台、任务标识、尝试次数等排障信息
 *
 * @example
 * ```typescript
 * class MyError extends BaseError {
 *   readonly code = "MY_ERROR";
 *   readonly retryable = false;
 * }
 *
 * throw new MyError("发生错误", { platform: "xhs", noteId: "n1" });
 * ```
 */
export abstract class BaseError extends Error {
	/** 错误代码（唯一标识） */
	abstract readonly code: string;

	/** 是否可重试 */
	abstract readonly retryable: boolean;

	/**
	 * @param message 错误消息
	 * @param context 上下文信息（用于排障与日志）
	 */
	constructor(
		message: string,
		public readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = this.constructor.name;
		Error.captureStackTrace?.(this, this.constructor);
	}

	/** 序列化为 JSON（pino 会调用它输出结构化错误） */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			retryable: this.retryable,
			context: this.context,
			stack: this.stack,
		};
	}
}
