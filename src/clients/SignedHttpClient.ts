/* 中文注释：带签名的平台 HTTP 客户端基类：合并会话 Cookie、调用签名器、经租约代理发出、识别风控 */
import type { ILogger } from "../contracts/ILogger.js";
import type { HttpMethod, IPlatformClient, RequestContext } from "../contracts/IPlatformClient.js";
import type { ISigner } from "../contracts/ISigner.js";
import { BlockedError } from "../core/errors/BlockedError.js";
import { TransientError } from "../core/errors/TransientError.js";
import { errorForStatus, HttpClient } from "../lib/http.js";

export interface SignedHttpClientOptions {
	platform: string;
	baseURL: string;
	signer: ISigner;
	headers?: Record<string, string>;
	/** 响应体 code 命中这些值视为风控拦截（如验证码 300012） */
	riskCodes?: number[];
	timeoutMs?: number;
	http?: Pick<HttpClient, "raw">;
	logger?: ILogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SignedHttpClient implements IPlatformClient {
	private http: Pick<HttpClient, "raw">;
	private log?: ILogger;

	constructor(private opts: SignedHttpClientOptions) {
		this.http = opts.http ?? new HttpClient({ baseURL: opts.baseURL, timeoutMs: opts.timeoutMs ?? 60_000, logger: opts.logger });
		this.log = opts.logger?.child({ module: "signedHttp", platform: opts.platform });
	}

	/**
	 * 发起一次平台请求
	 *
	 * @throws BlockedError HTTP 461/471 等或响应 code 命中 riskCodes
	 * @throws NotFoundError HTTP 404
	 * @throws TransientError 传输失败、5xx、success=false
	 */
	async request<T = unknown>(
		method: HttpMethod,
		uri: string,
		payload: Record<string, unknown> | undefined,
		ctx: RequestContext,
	): Promise<T> {
		const path = method === "GET" ? withQuery(uri, payload) : uri;
		const body = method === "POST" ? JSON.stringify(payload ?? {}) : undefined;
		const signed = await this.opts.signer.sign({
			method,
			uri: path,
			payload: method === "POST" ? payload : undefined,
			cookies: ctx.session.cookies,
		});
		const headers: Record<string, string> = {
			...(this.opts.headers ?? {}),
			...signed,
			...(ctx.session.cookieHeader ? { Cookie: ctx.session.cookieHeader } : {}),
			...(method === "POST" ? { "content-type": "application/json;charset=UTF-8" } : {}),
		};

		const res = await this.http.raw(path, { method, headers, body, lease: ctx.lease, signal: ctx.signal });
		if (res.status < 200 || res.status >= 300) {
			throw errorForStatus(res.status, { platform: this.opts.platform, uri, method });
		}

		let parsed: T;
		try {
			parsed = JSON.parse(res.text);
		} catch {
			throw new TransientError("响应不是合法 JSON", { platform: this.opts.platform, uri });
		}
		const envelope: unknown = parsed;
		if (isRecord(envelope)) {
			const code = typeof envelope.code === "number" ? envelope.code : undefined;
			if (code !== undefined && (this.opts.riskCodes ?? []).includes(code)) {
				this.log?.warn({ uri, code }, "命中风控");
				throw new BlockedError(`平台风控拦截（code=${code}）`, { platform: this.opts.platform, uri, code });
			}
			if (envelope.success === false) {
				const msg = typeof envelope.msg === "string" ? envelope.msg : "请求失败";
				throw new TransientError(msg, { platform: this.opts.platform, uri, code });
			}
		}
		return parsed;
	}
}

function withQuery(uri: string, params: Record<string, unknown> | undefined): string {
	if (!params) return uri;
	const qs = new URLSearchParams();
	for (const [key, value] of Object.entries(params)) {
		if (value === undefined || value === null) continue;
		qs.append(key, typeof value === "string" ? value : JSON.stringify(value));
	}
	const query = qs.toString();
	if (!query) return uri;
	return `${uri}${uri.includes("?") ? "&" : "?"}${query}`;
}
