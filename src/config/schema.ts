/* 中文注释：配置 Schema 校验；环境变量均为字符串，这里统一转成强类型 AppConfig */
import { z } from "zod";

/** 缺省或留空时取 def */
const text = (def: string) =>
	z
		.string()
		.default(def)
		.transform((s) => (s.trim() === "" ? def : s));

const bool = (def: "true" | "false") =>
	text(def).transform((s) => ["1", "true", "yes", "on"].includes(s.trim().toLowerCase()));

const int = (def: string, min: number, max = Number.MAX_SAFE_INTEGER) =>
	text(def).transform((s) => {
		const n = Math.floor(Number(s));
		return Number.isFinite(n) ? Math.min(max, Math.max(min, n)) : Number(def);
	});

const list = z
	.string()
	.default("")
	.transform((s) =>
		s
			.split(",")
			.map((x) => x.trim())
			.filter(Boolean),
	);

// .env 中留空的项按未配置处理
const optional = <T extends z.ZodTypeAny>(schema: T) =>
	z.preprocess((v) => (v === "" ? undefined : v), schema.optional());

export const CRAWLER_TYPES = ["search", "detail", "creator"] as const;
export const LOGIN_TYPES = ["qrcode", "phone", "cookie"] as const;
export const PLATFORM_IDS = ["xhs", "dy", "ks", "bili", "wb", "tieba", "zhihu"] as const;

export type CrawlerType = (typeof CRAWLER_TYPES)[number];
export type LoginType = (typeof LOGIN_TYPES)[number];
export type PlatformId = (typeof PLATFORM_IDS)[number];

export const ConfigSchema = z.object({
	PLATFORMS: z
		.string()
		.default("xhs")
		.transform((s) =>
			s
				.split(",")
				.map((x) => x.trim())
				.filter(Boolean),
		)
		.pipe(z.array(z.enum(PLATFORM_IDS)).min(1, "至少指定一个平台")),
	CRAWLER_TYPE: z.enum(CRAWLER_TYPES).default("search"),
	KEYWORDS: list,
	SPECIFIED_IDS: list,
	CREATOR_IDS: list,
	START_PAGE: int("1", 1),

	CRAWLER_MAX_NOTES_COUNT: int("200", 0),
	CRAWLER_MAX_COMMENTS_COUNT_SINGLENOTES: int("10", 0),
	MAX_CONCURRENCY_NUM: int("1", 1, 10),
	CRAWLER_MAX_SLEEP_SEC: text("2").transform((s) => Math.max(0, Number(s) || 0)),
	ENABLE_GET_COMMENTS: bool("true"),
	ENABLE_GET_SUB_COMMENTS: bool("false"),

	ENABLE_IP_PROXY: bool("false"),
	IP_PROXY_POOL_COUNT: int("2", 1),
	ENABLE_VALIDATE_IP: bool("true"),
	IP_PROXY_PROVIDER_URL: optional(z.string().url()),
	IP_PROXY_PROVIDER_KEY: optional(z.string()),
	IP_PROXY_LIST: list,
	PROXY_VALIDATE_URL: z.string().url().default("https://echo.apifox.cn/"),

	LOGIN_TYPE: z.enum(LOGIN_TYPES).default("qrcode"),
	LOGIN_PHONE: z.string().default(""),
	COOKIES: z.string().default(""),
	SAVE_LOGIN_STATE: bool("true"),
	LOGIN_MAX_ATTEMPTS: int("120", 1),
	LOGIN_POLL_MS: int("1000", 0),
	SLIDER_MAX_ATTEMPTS: int("20", 1),

	REQUEST_RETRY_ATTEMPTS: int("3", 1, 10),
	REQUEST_RETRY_WAIT_MS: int("1000", 0),
	TASK_MAX_RETRIES: int("2", 0, 10),

	OUTPUT_DIR: z.string().default("data"),
});

export type ConfigEnv = z.infer<typeof ConfigSchema>;

export interface AppConfig {
	platforms: PlatformId[];
	crawlerType: CrawlerType;
	targets: { keywords: string[]; ids: string[]; creators: string[]; startPage: number };
	limits: {
		maxNotes: number;
		maxCommentsPerNote: number;
		concurrency: number;
		crawlIntervalMs: number;
	};
	comments: { enabled: boolean; subComments: boolean };
	proxy: {
		enabled: boolean;
		poolSize: number;
		validate: boolean;
		validateUrl: string;
		providerUrl?: string;
		providerKey?: string;
		staticList: string[];
	};
	login: {
		type: LoginType;
		phone: string;
		cookies: string;
		saveState: boolean;
		maxAttempts: number;
		pollMs: number;
		sliderMaxAttempts: number;
	};
	retry: { attempts: number; waitMs: number; taskMaxRetries: number };
	outputDir: string;
}
