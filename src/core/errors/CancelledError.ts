import { BaseError } from "./BaseError.js";

/** 协作式取消：收到取消信号后不再出队新任务 */
export class CancelledError extends BaseError {
	readonly code = "CANCELLED";
	readonly retryable = false;

	constructor(message = "任务已取消", context?: Record<string, unknown>) {
		super(message, context);
	}
}
