import type { CrawlRecord } from "../crawler/types.js";

export interface SaveMeta {
	platform: string;
	/** 产生这批记录的来源：关键词、内容 ID 或创作者 ID */
	source?: string;
}

/**
 * 持久化回调
 *
 * 每页调用一次。重试后同一页可能被重复投递（至少一次语义），实现必须幂等。
 */
export interface IPersistenceSink {
	save(items: CrawlRecord[], meta: SaveMeta): Promise<void>;
}
