/* 中文注释：HTTP 提取接口型代理供应商（缓存优先，只拉取缺口） */
import type { ICache } from "../../cache/ExpiringLocalCache.js";
import type { ILogger } from "../../contracts/ILogger.js";
import type { IProxyProvider } from "../../contracts/IProxyProvider.js";
import { ProviderUnavailableError } from "../../core/errors/ProxyErrors.js";
import { errorMessage } from "../../core/errors/classify.js";
import { HttpClient } from "../../lib/http.js";
import type { ProxyLease, ProxyProtocol } from "../types.js";
import { z } from "zod";

/** 提取接口的响应格式：{ code: 0, data: [{ ip, port, user, pass, expire }] } */
const ExtractResponse = z.object({
	code: z.number(),
	msg: z.string().optional(),
	data: z
		.array(
			z.object({
				ip: z.string(),
				port: z.coerce.number().int(),
				user: z.string().optional(),
				pass: z.string().optional(),
				/** 过期时间：Unix 秒 */
				expire: z.coerce.number().int().optional(),
			}),
		)
		.default([]),
});

/** 只需要 GET JSON 的能力，HttpClient 即满足 */
export interface JsonGetter {
	getJson(url: string): Promise<unknown>;
}

export interface HttpProxyProviderOptions {
	/** 品牌名，同时作为缓存键前缀 */
	brand: string;
	/** 提取接口地址，查询参数 num/key 由供应商拼接 */
	url: string;
	key?: string;
	protocol?: ProxyProtocol;
	cache: ICache<ProxyLease>;
	http?: JsonGetter;
	logger?: ILogger;
	nowSec?: () => number;
}

export class HttpProxyProvider implements IProxyProvider {
	readonly name: string;
	private http: JsonGetter;
	private log?: ILogger;
	private nowSec: () => number;

	constructor(private opts: HttpProxyProviderOptions) {
		this.name = opts.brand;
		this.http = opts.http ?? new HttpClient({ timeoutMs: 15_000, logger: opts.logger });
		this.log = opts.logger?.child({ module: "proxyProvider", provider: opts.brand });
		this.nowSec = opts.nowSec ?? (() => Math.floor(Date.now() / 1000));
	}

	async fetchLeases(count: number): Promise<ProxyLease[]> {
		const cached = this.cachedLeases().slice(0, count);
		const need = count - cached.length;
		if (need <= 0) {
			this.log?.debug({ cached: cached.length }, "使用缓存中的代理");
			return cached;
		}
		const fresh = await this.extract(need);
		for (const lease of fresh) this.remember(lease);
		return [...cached, ...fresh];
	}

	/** 已发放的租约移出缓存，不会在下次重载时再次返回 */
	evict(lease: ProxyLease): void {
		this.opts.cache.delete(this.cacheKey(lease));
	}

	private async extract(num: number): Promise<ProxyLease[]> {
		const url = new URL(this.opts.url);
		url.searchParams.set("num", String(num));
		if (this.opts.key) url.searchParams.set("key", this.opts.key);
		let body: unknown;
		try {
			body = await this.http.getJson(url.toString());
		} catch (err) {
			throw new ProviderUnavailableError(`代理提取接口请求失败: ${errorMessage(err)}`, { provider: this.name });
		}
		const parsed = ExtractResponse.safeParse(body);
		if (!parsed.success) {
			throw new ProviderUnavailableError("代理提取接口返回格式不正确", { provider: this.name });
		}
		if (parsed.data.code !== 0) {
			throw new ProviderUnavailableError(`代理提取接口返回错误: ${parsed.data.msg ?? parsed.data.code}`, {
				provider: this.name,
				code: parsed.data.code,
			});
		}
		const protocol = this.opts.protocol ?? "http";
		const leases = parsed.data.data.map(
			(d): ProxyLease => ({
				ip: d.ip,
				port: d.port,
				user: d.user,
				password: d.pass,
				protocol,
				expiresAt: d.expire,
			}),
		);
		this.log?.info({ requested: num, received: leases.length }, "已从供应商提取代理");
		return leases;
	}

	private cacheKey(lease: ProxyLease): string {
		return `${this.opts.brand}_${lease.ip}_${lease.port}_${lease.user ?? ""}`;
	}

	/** 只缓存带过期时间且尚未过期的租约 */
	private remember(lease: ProxyLease): void {
		if (lease.expiresAt === undefined) return;
		const ttl = lease.expiresAt - this.nowSec();
		if (ttl > 0) this.opts.cache.set(this.cacheKey(lease), lease, ttl);
	}

	private cachedLeases(): ProxyLease[] {
		const out: ProxyLease[] = [];
		for (const key of this.opts.cache.keys(`${this.opts.brand}_*`)) {
			const lease = this.opts.cache.get(key);
			if (lease) out.push(lease);
		}
		return out;
	}
}
