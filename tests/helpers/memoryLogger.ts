/* 中文注释：测试用内存日志，记录每条日志的级别、合并后的绑定字段与消息 */
import type { ILogger } from "../../src/contracts/ILogger.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
	level: LogLevel;
	obj: Record<string, unknown>;
	msg?: string;
}

export class MemoryLogger implements ILogger {
	constructor(
		readonly entries: LogEntry[] = [],
		private bindings: Record<string, unknown> = {},
	) {}

	debug(obj: Record<string, unknown> | string, msg?: string): void {
		this.push("debug", obj, msg);
	}

	info(obj: Record<string, unknown> | string, msg?: string): void {
		this.push("info", obj, msg);
	}

	warn(obj: Record<string, unknown> | string, msg?: string): void {
		this.push("warn", obj, msg);
	}

	error(obj: Record<string, unknown> | string, msg?: string): void {
		this.push("error", obj, msg);
	}

	child(bindings: Record<string, unknown>): ILogger {
		return new MemoryLogger(this.entries, { ...this.bindings, ...bindings });
	}

	/** 指定级别的日志 */
	at(...levels: LogLevel[]): LogEntry[] {
		return this.entries.filter((e) => levels.includes(e.level));
	}

	private push(level: LogLevel, obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.entries.push({ level, obj: { ...this.bindings }, msg: obj });
		} else {
			this.entries.push({ level, obj: { ...this.bindings, ...obj }, msg });
		}
	}
}
