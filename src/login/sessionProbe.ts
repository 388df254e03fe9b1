/* 中文注释：会话存活探测（pong）：先看 Cookie，必要时再发一次轻量的已登录接口请求 */
import type { ILogger } from "../contracts/ILogger.js";
import type { IPlatformAdapter, RequestContext } from "../contracts/IPlatformClient.js";
import { errorMessage } from "../core/errors/classify.js";
import type { SessionSnapshot } from "./SessionState.js";

export interface SessionProbeOptions {
	/** 出现即视为已登录的 Cookie 名（如 web_session、LOGIN_STATUS） */
	loginCookies?: string[];
	adapter?: Pick<IPlatformAdapter, "ping">;
	logger?: ILogger;
}

export type PongSource = "cookie" | "api" | "none";

export interface PongResult {
	alive: boolean;
	source: PongSource;
}

export class SessionProbe {
	private log?: ILogger;

	constructor(private opts: SessionProbeOptions = {}) {
		this.log = opts.logger?.child({ module: "sessionProbe" });
	}

	/**
	 * 判断会话是否仍然有效
	 *
	 * 没有任何 Cookie 时直接判定未登录，不发请求；
	 * 命中登录态 Cookie 直接判定已登录；其余情况交给平台的 ping 接口。
	 */
	async pong(session: SessionSnapshot, ctx: Omit<RequestContext, "session"> = {}): Promise<PongResult> {
		const names = Object.keys(session.cookies);
		if (names.length === 0) return { alive: false, source: "none" };
		const marker = (this.opts.loginCookies ?? []).find((n) => Boolean(session.cookies[n]));
		if (marker) {
			this.log?.debug({ platform: session.platform, cookie: marker }, "登录态 Cookie 命中");
			return { alive: true, source: "cookie" };
		}
		if (!this.opts.adapter) return { alive: false, source: "none" };
		try {
			const alive = await this.opts.adapter.ping({ ...ctx, session });
			return { alive, source: "api" };
		} catch (err) {
			this.log?.warn({ platform: session.platform, error: errorMessage(err) }, "会话探测失败，按未登录处理");
			return { alive: false, source: "api" };
		}
	}
}
