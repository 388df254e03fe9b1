/**
 * 依赖注入容器
 *
 * - 单例管理：同一服务多次请求返回同一实例
 * - 延迟初始化：首次使用时创建
 * - 可选静默日志（嵌入调用方或测试时禁止输出）
 */
import type { AppConfig } from "../config/schema.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { IPersistenceSink } from "../contracts/IPersistenceSink.js";
import { ExpiringLocalCache } from "../cache/ExpiringLocalCache.js";
import { createLogger } from "../logging/createLogger.js";
import { PlatformRegistry } from "../platforms/registry.js";
import { JsonLinesSink } from "../store/JsonLinesSink.js";

export class ServiceContainer {
	private logger?: ILogger;
	private sink?: IPersistenceSink;
	private smsCache?: ExpiringLocalCache<string>;
	private registry?: PlatformRegistry;
	private options: { loggerSilent?: boolean };

	constructor(
		private config: AppConfig,
		options?: { loggerSilent?: boolean },
	) {
		this.options = options ?? {};
	}

	// 日志（支持静默/转 stderr）
	createLogger(bindings?: Record<string, unknown>): ILogger {
		this.logger ??= createLogger({ useSilent: this.options.loggerSilent === true });
		return bindings ? this.logger.child(bindings) : this.logger;
	}

	// 持久化回调（单例）：默认写 JSON Lines 到 OUTPUT_DIR
	createSink(): IPersistenceSink {
		this.sink ??= new JsonLinesSink({ outputDir: this.config.outputDir, logger: this.createLogger() });
		return this.sink;
	}

	// 短信验证码缓存（单例），由外部接收端写入 <platform>_<phone>
	createSmsCache(): ExpiringLocalCache<string> {
		this.smsCache ??= new ExpiringLocalCache<string>();
		return this.smsCache;
	}

	// 平台注册中心（单例）
	createRegistry(): PlatformRegistry {
		this.registry ??= new PlatformRegistry();
		return this.registry;
	}

	// 资源清理：停止缓存清扫定时器并清空单例
	async cleanup(): Promise<void> {
		this.smsCache?.close();
		this.smsCache = undefined;
		this.sink = undefined;
		this.registry = undefined;
	}
}
