/* 中文注释：单个平台的会话状态（Cookie 罐、登录方式、登录态） */
import type { LoginType } from "../config/schema.js";
import { convertCookies, dictToCookies, parseCookieString, type CookieLike } from "../lib/cookies.js";

export type SessionStatus = "NotLoggedIn" | "AwaitingVerification" | "LoggedIn";

/**
 * 会话只读快照
 *
 * 工作任务只拿到快照；Cookie 变更只发生在登录状态机里，变更后 version 递增。
 */
export interface SessionSnapshot {
	readonly platform: string;
	readonly status: SessionStatus;
	readonly loginMethod?: LoginType;
	readonly cookieHeader: string;
	readonly cookies: Readonly<Record<string, string>>;
	readonly version: number;
	/** 是否在跨次运行间保存登录态（由登录驱动的持久化浏览器目录负责） */
	readonly persistent: boolean;
}

export interface SessionStateOptions {
	persistent?: boolean;
	/** 预置 Cookie 串（a=1; b=2） */
	cookies?: string;
}

export class SessionState {
	private cookieDict: Record<string, string> = {};
	private currentStatus: SessionStatus = "NotLoggedIn";
	private method?: LoginType;
	private version = 0;
	private cached?: SessionSnapshot;
	private readonly persistent: boolean;

	constructor(
		readonly platform: string,
		opts: SessionStateOptions = {},
	) {
		this.persistent = opts.persistent ?? false;
		if (opts.cookies) this.cookieDict = parseCookieString(opts.cookies);
	}

	get status(): SessionStatus {
		return this.currentStatus;
	}

	get loginMethod(): LoginType | undefined {
		return this.method;
	}

	setStatus(status: SessionStatus): void {
		if (status === this.currentStatus) return;
		this.currentStatus = status;
		this.bump();
	}

	/**
	 * 用浏览器读回的 Cookie 替换 Cookie 罐
	 */
	updateCookies(cookies: readonly CookieLike[], method?: LoginType): void {
		this.cookieDict = convertCookies(cookies).cookieDict;
		if (method) this.method = method;
		this.bump();
	}

	cookieList(): CookieLike[] {
		return dictToCookies(this.cookieDict);
	}

	snapshot(): SessionSnapshot {
		if (!this.cached) {
			const cookies = Object.freeze({ ...this.cookieDict });
			this.cached = Object.freeze({
				platform: this.platform,
				status: this.currentStatus,
				loginMethod: this.method,
				cookieHeader: convertCookies(dictToCookies(cookies)).cookieHeader,
				cookies,
				version: this.version,
				persistent: this.persistent,
			});
		}
		return this.cached;
	}

	private bump(): void {
		this.version++;
		this.cached = undefined;
	}
}
