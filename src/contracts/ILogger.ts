/**
 * 日志记录器接口
 *
 * 爬取核心内所有组件只依赖该接口，默认实现为 PinoLogger。
 * 组件通过 child({ module }) 绑定自身上下文，失败日志额外携带
 * platform、任务标识与 attempt，便于人工续跑。
 *
 * @example
 * ```typescript
 * const log = createLogger().child({ module: "proxyPool" });
 * log.info({ size: 3 }, "代理池已加载");
 * log.error({ err, platform: "xhs", noteId: "n1", attempt: 2 }, "详情抓取失败");
 * ```
 */
export interface ILogger {
	debug(obj: Record<string, unknown>, msg?: string): void;
	debug(msg: string): void;

	info(obj: Record<string, unknown>, msg?: string): void;
	info(msg: string): void;

	warn(obj: Record<string, unknown>, msg?: string): void;
	warn(msg: string): void;

	/**
	 * 错误级别日志
	 * @param obj 结构化数据（err/error 字段为 Error 时自动展开堆栈与错误码）
	 */
	error(obj: Record<string, unknown>, msg?: string): void;
	error(msg: string): void;

	/** 创建子日志记录器（绑定上下文） */
	child(bindings: Record<string, unknown>): ILogger;
}
