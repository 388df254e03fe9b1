/* 中文注释：静态代理列表（IP_PROXY_LIST），每次重载都返回同一批 */
import type { IProxyProvider } from "../../contracts/IProxyProvider.js";
import { ProviderUnavailableError } from "../../core/errors/ProxyErrors.js";
import { ValidationError } from "../../core/errors/ValidationError.js";
import { parseProxyString, type ProxyLease } from "../types.js";

export class StaticProxyProvider implements IProxyProvider {
	readonly name = "static";
	private readonly leases: ProxyLease[];

	constructor(entries: string[]) {
		this.leases = entries.map((raw) => {
			const lease = parseProxyString(raw);
			if (!lease) throw new ValidationError(`无法解析代理地址: ${raw}`, { field: "IP_PROXY_LIST" });
			return lease;
		});
	}

	async fetchLeases(count: number): Promise<ProxyLease[]> {
		if (this.leases.length === 0) throw new ProviderUnavailableError("静态代理列表为空", { provider: this.name });
		return this.leases.slice(0, count).map((l) => ({ ...l }));
	}
}
