/* 中文注释：按配置组装代理池 */
import { ExpiringLocalCache } from "../cache/ExpiringLocalCache.js";
import type { AppConfig } from "../config/schema.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { IProxyProvider } from "../contracts/IProxyProvider.js";
import { ValidationError } from "../core/errors/ValidationError.js";
import { ProxyIpPool } from "./ProxyIpPool.js";
import { HttpProxyProvider } from "./providers/HttpProxyProvider.js";
import { StaticProxyProvider } from "./providers/StaticProxyProvider.js";
import type { ProxyLease } from "./types.js";
import { createEchoValidator } from "./validator.js";

export * from "./types.js";
export { ProxyIpPool, type ProxyIpPoolOptions } from "./ProxyIpPool.js";
export { HttpProxyProvider, type HttpProxyProviderOptions } from "./providers/HttpProxyProvider.js";
export { StaticProxyProvider } from "./providers/StaticProxyProvider.js";
export { createEchoValidator, type LeaseValidator } from "./validator.js";

/**
 * 按配置选择供应商：提取接口优先，其次静态列表
 */
export function createProxyProvider(cfg: AppConfig["proxy"], logger?: ILogger): IProxyProvider {
	if (cfg.providerUrl) {
		return new HttpProxyProvider({
			brand: new URL(cfg.providerUrl).hostname,
			url: cfg.providerUrl,
			key: cfg.providerKey,
			cache: new ExpiringLocalCache<ProxyLease>(),
			logger,
		});
	}
	if (cfg.staticList.length > 0) return new StaticProxyProvider(cfg.staticList);
	throw new ValidationError("已开启代理但未配置 IP_PROXY_PROVIDER_URL 或 IP_PROXY_LIST", {
		field: "IP_PROXY_PROVIDER_URL",
	});
}

/**
 * 未开启代理时返回 undefined；否则创建并预加载代理池
 */
export async function createProxyPool(
	cfg: AppConfig["proxy"],
	logger?: ILogger,
	provider?: IProxyProvider,
): Promise<ProxyIpPool | undefined> {
	if (!cfg.enabled) return undefined;
	return ProxyIpPool.create({
		poolSize: cfg.poolSize,
		provider: provider ?? createProxyProvider(cfg, logger),
		validator: cfg.validate ? createEchoValidator(cfg.validateUrl) : undefined,
		logger,
	});
}
