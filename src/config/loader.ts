/* 中文注释：从环境变量读取并校验配置，输出强类型 AppConfig */
import "dotenv/config";
import { ConfigSchema, type AppConfig, type ConfigEnv } from "./schema.js";
import { ValidationError } from "../core/errors/ValidationError.js";

export function toAppConfig(env: ConfigEnv): AppConfig {
	return {
		platforms: env.PLATFORMS,
		crawlerType: env.CRAWLER_TYPE,
		targets: {
			keywords: env.KEYWORDS,
			ids: env.SPECIFIED_IDS,
			creators: env.CREATOR_IDS,
			startPage: env.START_PAGE,
		},
		limits: {
			maxNotes: env.CRAWLER_MAX_NOTES_COUNT,
			maxCommentsPerNote: env.CRAWLER_MAX_COMMENTS_COUNT_SINGLENOTES,
			concurrency: env.MAX_CONCURRENCY_NUM,
			crawlIntervalMs: Math.round(env.CRAWLER_MAX_SLEEP_SEC * 1000),
		},
		comments: { enabled: env.ENABLE_GET_COMMENTS, subComments: env.ENABLE_GET_SUB_COMMENTS },
		proxy: {
			enabled: env.ENABLE_IP_PROXY,
			poolSize: env.IP_PROXY_POOL_COUNT,
			validate: env.ENABLE_VALIDATE_IP,
			validateUrl: env.PROXY_VALIDATE_URL,
			providerUrl: env.IP_PROXY_PROVIDER_URL,
			providerKey: env.IP_PROXY_PROVIDER_KEY,
			staticList: env.IP_PROXY_LIST,
		},
		login: {
			type: env.LOGIN_TYPE,
			phone: env.LOGIN_PHONE,
			cookies: env.COOKIES,
			saveState: env.SAVE_LOGIN_STATE,
			maxAttempts: env.LOGIN_MAX_ATTEMPTS,
			pollMs: env.LOGIN_POLL_MS,
			sliderMaxAttempts: env.SLIDER_MAX_ATTEMPTS,
		},
		retry: {
			attempts: env.REQUEST_RETRY_ATTEMPTS,
			waitMs: env.REQUEST_RETRY_WAIT_MS,
			taskMaxRetries: env.TASK_MAX_RETRIES,
		},
		outputDir: env.OUTPUT_DIR,
	};
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const parsed = ConfigSchema.safeParse(env);
	if (!parsed.success) {
		const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
		throw new ValidationError(`配置错误：${msg}`, { issues: parsed.error.issues.length });
	}
	return toAppConfig(parsed.data);
}
