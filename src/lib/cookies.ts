/* 中文注释：Cookie 工具（浏览器 Cookie 列表 ↔ 请求头字符串 ↔ 键值表） */
import type { Cookie } from "playwright-core";

export type CookieLike = Pick<Cookie, "name" | "value">;

/**
 * 浏览器 Cookie 列表转换为请求头与键值表；同名 Cookie 以后出现者为准
 */
export function convertCookies(cookies: readonly CookieLike[] | undefined): {
	cookieHeader: string;
	cookieDict: Record<string, string>;
} {
	const cookieDict: Record<string, string> = {};
	for (const c of cookies ?? []) {
		if (!c.name) continue;
		cookieDict[c.name] = c.value;
	}
	const cookieHeader = Object.entries(cookieDict)
		.map(([k, v]) => `${k}=${v}`)
		.join("; ");
	return { cookieHeader, cookieDict };
}

/** 解析 "a=1; b=2" 形式的 Cookie 串；值中的 "=" 原样保留 */
export function parseCookieString(raw: string): Record<string, string> {
	const out: Record<string, string> = {};
	for (const part of raw.split(";")) {
		const idx = part.indexOf("=");
		if (idx <= 0) continue;
		const name = part.slice(0, idx).trim();
		if (name) out[name] = part.slice(idx + 1).trim();
	}
	return out;
}

export function dictToCookies(dict: Record<string, string>): CookieLike[] {
	return Object.entries(dict).map(([name, value]) => ({ name, value }));
}
