import type { ProxyLease } from "../proxy/types.js";

/**
 * 代理供应商接口
 *
 * 代理池为空时调用 fetchLeases(count) 一次性拉取 count 个租约。
 *
 * @throws ProviderUnavailableError 供应商返回错误码或网络不可达
 */
export interface IProxyProvider {
	/** 供应商名称（日志/缓存键前缀） */
	readonly name: string;
	fetchLeases(count: number): Promise<ProxyLease[]>;
	/** 租约已被代理池发放：之后的 fetchLeases 不得再返回它 */
	evict?(lease: ProxyLease): void;
}
