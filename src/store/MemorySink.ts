/* 中文注释：内存持久化回调，按 (kind, id) 覆盖写入，重复投递不会产生重复记录 */
import type { IPersistenceSink, SaveMeta } from "../contracts/IPersistenceSink.js";
import type { CrawlRecord, RecordKind } from "../crawler/types.js";

export class MemorySink implements IPersistenceSink {
	private records = new Map<string, CrawlRecord>();
	/** save 被调用的次数（含重复投递） */
	deliveries = 0;

	async save(items: CrawlRecord[], _meta: SaveMeta): Promise<void> {
		this.deliveries++;
		for (const item of items) this.records.set(`${item.platform}:${item.kind}:${item.id}`, item);
	}

	all(kind?: RecordKind): CrawlRecord[] {
		const list = [...this.records.values()];
		return kind ? list.filter((r) => r.kind === kind) : list;
	}

	ids(kind: RecordKind): string[] {
		return this.all(kind).map((r) => r.id);
	}

	get size(): number {
		return this.records.size;
	}
}
