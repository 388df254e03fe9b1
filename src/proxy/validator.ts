/* 中文注释：代理可用性校验（经代理访问回显地址，200 视为可用） */
import { HttpClient, releaseDispatcher } from "../lib/http.js";
import type { ProxyLease } from "./types.js";

export type LeaseValidator = (lease: ProxyLease) => Promise<boolean>;

export function createEchoValidator(validateUrl: string, http: Pick<HttpClient, "raw"> = new HttpClient({ timeoutMs: 10_000 })): LeaseValidator {
	return async (lease) => {
		let ok = false;
		try {
			const res = await http.raw(validateUrl, { method: "GET", lease });
			ok = res.status === 200;
			return ok;
		} finally {
			if (!ok) await releaseDispatcher(lease);
		}
	};
}
