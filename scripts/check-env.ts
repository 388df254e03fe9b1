/* 中文注释：环境自检脚本
 * - 依据 src/config/schema.ts 做 Zod 校验
 * - 输出 JSON 摘要（不含 Cookie、密钥等敏感值），便于管道使用
 */
import { existsSync } from "node:fs";
import { ConfigSchema } from "../src/config/schema.js";
import { loadConfig } from "../src/config/loader.js";
import { errorMessage } from "../src/core/errors/classify.js";

interface Check {
	key: string;
	ok: boolean;
	detail?: unknown;
}

function main() {
	const checks: Check[] = [{ key: "env.dotenv", ok: existsSync(".env") }];

	const parsed = ConfigSchema.safeParse(process.env);
	checks.push({
		key: "env.schema",
		ok: parsed.success,
		detail: parsed.success ? undefined : parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
	});

	try {
		const cfg = loadConfig();
		checks.push({
			key: "config.summary",
			ok: true,
			detail: {
				platforms: cfg.platforms,
				crawlerType: cfg.crawlerType,
				concurrency: cfg.limits.concurrency,
				crawlIntervalMs: cfg.limits.crawlIntervalMs,
				proxy: { enabled: cfg.proxy.enabled, poolSize: cfg.proxy.poolSize, validate: cfg.proxy.validate },
				login: cfg.login.type,
			},
		});
		if (cfg.proxy.enabled && !cfg.proxy.providerUrl && cfg.proxy.staticList.length === 0) {
			checks.push({ key: "proxy.source", ok: false, detail: "已开启代理但未配置 IP_PROXY_PROVIDER_URL 或 IP_PROXY_LIST" });
		}
		if (cfg.login.type === "phone" && !cfg.login.phone) {
			checks.push({ key: "login.phone", ok: false, detail: "手机号登录需要 LOGIN_PHONE" });
		}
	} catch (e) {
		checks.push({ key: "config.load", ok: false, detail: errorMessage(e) });
	}

	const ok = checks.every((c) => c.ok || c.key === "env.dotenv");
	console.log(JSON.stringify({ ok, checks }, null, 2));
	if (!ok) process.exitCode = 1;
}

main();
