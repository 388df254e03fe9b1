/* 中文注释：平台常量（标签联合），启动时按平台解析一次，运行期不再按字符串查表 */
import type { PlatformId } from "./schema.js";
import { ValidationError } from "../core/errors/ValidationError.js";

/** 发布时间列的存储单位 */
export type TimeUnit = "ms" | "sec" | "str" | "sec_str";

interface PlatformSearchConfigBase {
	/** 内容记录 data 中的发布时间列及其单位，写入时换算为 publishedAt */
	timeColumn: string;
	timeUnit: TimeUnit;
	/** 搜索每页条数（平台固定） */
	searchPageSize: number;
	/** 子评论每页条数 */
	subCommentPageSize: number;
}

export type PlatformSearchConfig =
	| ({ platform: "xhs"; contentKind: "note" } & PlatformSearchConfigBase)
	| ({ platform: "dy"; contentKind: "video" } & PlatformSearchConfigBase)
	| ({ platform: "ks"; contentKind: "video" } & PlatformSearchConfigBase)
	| ({ platform: "bili"; contentKind: "video" } & PlatformSearchConfigBase)
	| ({ platform: "wb"; contentKind: "note" } & PlatformSearchConfigBase)
	| ({ platform: "tieba"; contentKind: "note" } & PlatformSearchConfigBase)
	| ({ platform: "zhihu"; contentKind: "content" } & PlatformSearchConfigBase);

const CONFIGS: { [P in PlatformId]: Extract<PlatformSearchConfig, { platform: P }> } = {
	xhs: {
		platform: "xhs",
		contentKind: "note",
		timeColumn: "time",
		timeUnit: "ms",
		searchPageSize: 20,
		subCommentPageSize: 10,
	},
	dy: {
		platform: "dy",
		contentKind: "video",
		timeColumn: "create_time",
		timeUnit: "ms",
		searchPageSize: 10,
		subCommentPageSize: 20,
	},
	ks: {
		platform: "ks",
		contentKind: "video",
		timeColumn: "create_time",
		timeUnit: "ms",
		searchPageSize: 20,
		subCommentPageSize: 10,
	},
	bili: {
		platform: "bili",
		contentKind: "video",
		timeColumn: "create_time",
		timeUnit: "sec",
		searchPageSize: 20,
		subCommentPageSize: 10,
	},
	wb: {
		platform: "wb",
		contentKind: "note",
		timeColumn: "create_date_time",
		timeUnit: "str",
		searchPageSize: 10,
		subCommentPageSize: 10,
	},
	tieba: {
		platform: "tieba",
		contentKind: "note",
		timeColumn: "publish_time",
		timeUnit: "str",
		searchPageSize: 10,
		subCommentPageSize: 10,
	},
	zhihu: {
		platform: "zhihu",
		contentKind: "content",
		timeColumn: "created_time",
		timeUnit: "sec_str",
		searchPageSize: 20,
		subCommentPageSize: 10,
	},
};

export function resolvePlatformConfig(platform: string): PlatformSearchConfig {
	if (!isPlatformId(platform)) {
		throw new ValidationError(`未知平台：${platform}`, { field: "platform", value: platform });
	}
	return CONFIGS[platform];
}

function isPlatformId(value: string): value is PlatformId {
	return Object.prototype.hasOwnProperty.call(CONFIGS, value);
}

/**
 * 把发布时间列统一换算为毫秒时间戳；无法解析时返回 undefined
 */
export function toEpochMs(value: unknown, unit: TimeUnit): number | undefined {
	if (value === null || value === undefined || value === "") return undefined;
	switch (unit) {
		case "ms": {
			const n = Number(value);
			return Number.isFinite(n) ? n : undefined;
		}
		case "sec":
		case "sec_str": {
			const n = Number(value);
			return Number.isFinite(n) ? n * 1000 : undefined;
		}
		case "str": {
			const t = Date.parse(String(value));
			return Number.isNaN(t) ? undefined : t;
		}
	}
}
