import pino, { type LoggerOptions } from "pino";
import { PinoLogger } from "./PinoLogger.js";
import type { ILogger } from "../contracts/ILogger.js";

/** 需要脱敏的字段：代理凭据、Cookie、登录手机号、供应商密钥 */
export const REDACT_PATHS = [
	"lease.password",
	"proxy.password",
	"password",
	"cookie",
	"cookies",
	"headers.Cookie",
	"headers.cookie",
	"phone",
	"providerKey",
];

export interface CreateLoggerOptions {
	/** 完全静默（测试或嵌入调用方时使用） */
	useSilent?: boolean;
	/** 非 pretty 模式下输出到 stderr（fd=2） */
	toStderr?: boolean;
	/** 覆盖 LOG_LEVEL */
	level?: string;
}

/**
 * 创建日志记录器
 *
 * @remarks
 * 环境变量：
 * - LOG_LEVEL: debug/info/warn/error，默认 info
 * - LOG_PRETTY: true 时使用 pino-pretty 彩色输出，否则 JSON 行
 * - LOG_STDERR: true 时 JSON 输出改到 stderr
 */
export function createLogger(options: CreateLoggerOptions = {}): ILogger {
	if (options.useSilent) {
		return new PinoLogger(pino({ level: "silent" }));
	}

	const pretty = process.env.LOG_PRETTY === "true";
	const base: LoggerOptions = {
		level: options.level ?? process.env.LOG_LEVEL ?? "info",
		redact: { paths: REDACT_PATHS, censor: "[Redacted]" },
	};

	// pretty transport 与自定义 destination 互斥，toStderr 只在 JSON 模式生效
	const toStderr = options.toStderr === true || process.env.LOG_STDERR === "true";
	if (toStderr && !pretty) {
		return new PinoLogger(pino(base, pino.destination(2)));
	}

	return new PinoLogger(
		pino({
			...base,
			transport: pretty
				? { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:standard" } }
				: undefined,
		}),
	);
}
