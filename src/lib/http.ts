/* 中文注释：HTTP 客户端封装（undici fetch），按状态码映射到爬取错误分类；重试交给调用方的 RetryPolicy */
import { fetch, ProxyAgent, type Dispatcher, type RequestInit } from "undici";
import type { ILogger } from "../contracts/ILogger.js";
import { BlockedError } from "../core/errors/BlockedError.js";
import { CancelledError } from "../core/errors/CancelledError.js";
import { ItemWithdrawnError, NotFoundError } from "../core/errors/NotFoundError.js";
import { TransientError } from "../core/errors/TransientError.js";
import { ValidationError } from "../core/errors/ValidationError.js";
import { BaseError } from "../core/errors/BaseError.js";
import { toProxyUrl, type ProxyLease } from "../proxy/types.js";

/** 平台风控常见状态码（含验证码拦截 461/471） */
export const BLOCKED_STATUSES = new Set([401, 403, 429, 461, 471]);

/**
 * 把非 2xx 响应映射为错误
 */
export function errorForStatus(status: number, context: Record<string, unknown>): BaseError {
	if (BLOCKED_STATUSES.has(status)) return new BlockedError(`HTTP ${status}: 请求被拦截`, { ...context, status });
	if (status === 404) return new NotFoundError(`HTTP 404`, { ...context, status });
	if (status === 410) return new ItemWithdrawnError(`HTTP 410`, { ...context, status });
	if (status >= 500) return new TransientError(`HTTP ${status}`, { ...context, status });
	return new ValidationError(`HTTP ${status}`, { ...context, status });
}

const agents = new Map<string, ProxyAgent>();

/** 同一租约复用同一个 ProxyAgent */
export function proxyDispatcher(lease: ProxyLease | undefined): Dispatcher | undefined {
	if (!lease) return undefined;
	const url = toProxyUrl(lease);
	let agent = agents.get(url);
	if (!agent) {
		agent = new ProxyAgent(url);
		agents.set(url, agent);
	}
	return agent;
}

/** 租约丢弃后释放对应的连接 */
export async function releaseDispatcher(lease: ProxyLease): Promise<void> {
	const url = toProxyUrl(lease);
	const agent = agents.get(url);
	if (!agent) return;
	agents.delete(url);
	await agent.close();
}

export interface HttpOptions {
	baseURL?: string;
	headers?: Record<string, string>;
	timeoutMs?: number;
	logger?: ILogger;
}

export interface HttpRequestInit {
	method?: string;
	headers?: Record<string, string>;
	body?: string;
	lease?: ProxyLease;
	signal?: AbortSignal;
}

export interface HttpResponse {
	status: number;
	headers: { get(name: string): string | null };
	text: string;
}

/**
 * HTTP 客户端
 *
 * 仅做一次请求与错误映射：传输失败 → TransientError，状态码见 errorForStatus。
 */
export class HttpClient {
	private logger?: ILogger;

	constructor(private opts: HttpOptions = {}) {
		this.logger = opts.logger;
	}

	private url(path: string) {
		return this.opts.baseURL ? new URL(path, this.opts.baseURL).toString() : path;
	}

	/**
	 * 原始请求：返回状态码与文本，不做状态码映射
	 *
	 * init.signal 只在发出前检查；已发出的请求不随取消中断，仅受 timeoutMs 约束。
	 */
	async raw(path: string, init: HttpRequestInit = {}): Promise<HttpResponse> {
		const url = this.url(path);
		const method = init.method ?? "GET";
		if (init.signal?.aborted) throw new CancelledError("请求发出前已取消", { url, method });
		const request: RequestInit = {
			method,
			headers: { ...(this.opts.headers ?? {}), ...(init.headers ?? {}) },
			body: init.body,
			dispatcher: proxyDispatcher(init.lease),
			signal: AbortSignal.timeout(this.opts.timeoutMs ?? 30_000),
		};
		try {
			const res = await fetch(url, request);
			return { status: res.status, headers: res.headers, text: await res.text() };
		} catch (err) {
			this.logger?.warn({ url, method, error: err instanceof Error ? err.message : String(err) }, "网络请求失败");
			throw new TransientError(`网络请求失败: ${err instanceof Error ? err.message : String(err)}`, {
				url,
				method,
			});
		}
	}

	/**
	 * 期望 JSON 响应的请求；非 2xx 按 errorForStatus 抛出
	 */
	async send<T>(path: string, init: HttpRequestInit = {}): Promise<T> {
		const res = await this.raw(path, init);
		const url = this.url(path);
		if (res.status < 200 || res.status >= 300) {
			const error = errorForStatus(res.status, { url, method: init.method ?? "GET", body: res.text.slice(0, 500) });
			this.logger?.warn({ status: res.status, url, code: error.code }, "HTTP 请求失败");
			throw error;
		}
		return parseJson<T>(res.text, url);
	}

	getJson<T>(path: string, init: Omit<HttpRequestInit, "method" | "body"> = {}): Promise<T> {
		return this.send<T>(path, { ...init, method: "GET" });
	}

	postJson<T>(path: string, json: unknown, init: Omit<HttpRequestInit, "method" | "body"> = {}): Promise<T> {
		return this.send<T>(path, {
			...init,
			method: "POST",
			headers: { "content-type": "application/json;charset=UTF-8", ...(init.headers ?? {}) },
			body: JSON.stringify(json ?? {}),
		});
	}
}

function parseJson<T>(text: string, url: string): T {
	try {
		return JSON.parse(text);
	} catch {
		throw new TransientError("响应不是合法 JSON", { url, body: text.slice(0, 200) });
	}
}
