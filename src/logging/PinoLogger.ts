import type { Logger } from "pino";
import type { ILogger } from "../contracts/ILogger.js";
import { BaseError } from "../core/errors/BaseError.js";

/**
 * Pino 日志记录器实现
 *
 * 封装 pino 实例实现 ILogger。error 级别会把 err/error 字段里的异常
 * 展开为 { name, message, stack }，爬取错误额外带上 code 与 context。
 *
 * @example
 * ```typescript
 * const logger = new PinoLogger(pino());
 * logger.child({ platform: "xhs" }).warn({ keyword: "咖啡", page: 2 }, "搜索页为空");
 * ```
 */
export class PinoLogger implements ILogger {
	constructor(private pino: Logger) {}

	debug(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.debug(obj);
		} else {
			this.pino.debug({ ...obj }, msg);
		}
	}

	info(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.info(obj);
		} else {
			this.pino.info({ ...obj }, msg);
		}
	}

	warn(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.warn(obj);
		} else {
			this.pino.warn({ ...obj }, msg);
		}
	}

	error(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.error(obj);
			return;
		}
		const sanitized: Record<string, unknown> = { ...obj };
		const raw = obj.err instanceof Error ? obj.err : obj.error instanceof Error ? obj.error : undefined;
		if (raw) {
			sanitized.err = serializeError(raw);
			if (obj.error instanceof Error) delete sanitized.error;
		}
		this.pino.error(sanitized, msg);
	}

	child(bindings: Record<string, unknown>): ILogger {
		return new PinoLogger(this.pino.child(bindings));
	}
}

function serializeError(err: Error): Record<string, unknown> {
	const base: Record<string, unknown> = { name: err.name, message: err.message, stack: err.stack };
	if (err instanceof BaseError) {
		base.code = err.code;
		base.retryable = err.retryable;
		if (err.context) base.context = err.context;
	}
	return base;
}
