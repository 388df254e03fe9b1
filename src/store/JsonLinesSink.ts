/* 中文注释：JSON Lines 文件持久化：每个平台 × 记录类型一个文件，进程内按 id 去重 */
import { promises as fs } from "node:fs";
import { join } from "node:path";
import type { ILogger } from "../contracts/ILogger.js";
import type { IPersistenceSink, SaveMeta } from "../contracts/IPersistenceSink.js";
import type { CrawlRecord } from "../crawler/types.js";
import { SchemaCache } from "../lib/schemaCache.js";

export interface JsonLinesSinkOptions {
	outputDir: string;
	logger?: ILogger;
}

/**
 * 写入 <outputDir>/<platform>_<kind>.jsonl
 *
 * 每个文件第一次写入时从首条记录学习 data 字段顺序（SchemaCache），
 * 之后的记录按该顺序输出，新出现的字段追加在后面。
 */
export class JsonLinesSink implements IPersistenceSink {
	private readonly columns = new SchemaCache<string[]>();
	private readonly written = new Map<string, Set<string>>();
	private dirReady?: Promise<string | undefined>;
	private log?: ILogger;

	constructor(private opts: JsonLinesSinkOptions) {
		this.log = opts.logger?.child({ module: "jsonlSink" });
	}

	fileFor(record: Pick<CrawlRecord, "platform" | "kind">): string {
		return join(this.opts.outputDir, `${record.platform}_${record.kind}.jsonl`);
	}

	/**
	 * 写入失败时本批 id 不计为已写入，重新投递会再次写入
	 */
	async save(items: CrawlRecord[], meta: SaveMeta): Promise<void> {
		if (items.length === 0) return;
		this.dirReady ??= fs.mkdir(this.opts.outputDir, { recursive: true });
		try {
			await this.dirReady;
		} catch (err) {
			this.dirReady = undefined;
			throw err;
		}

		const batches = new Map<string, { ids: Set<string>; lines: string[] }>();
		for (const record of items) {
			const file = this.fileFor(record);
			const batch = batches.get(file) ?? { ids: new Set<string>(), lines: [] };
			batches.set(file, batch);
			if (this.written.get(file)?.has(record.id) || batch.ids.has(record.id)) continue;
			batch.ids.add(record.id);
			batch.lines.push(JSON.stringify(this.toLine(file, record)));
		}
		for (const [file, { ids, lines }] of batches) {
			if (lines.length === 0) continue;
			await fs.appendFile(file, `${lines.join("\n")}\n`, "utf-8");
			const seen = this.written.get(file) ?? new Set<string>();
			for (const id of ids) seen.add(id);
			this.written.set(file, seen);
			this.log?.debug({ file, count: lines.length, source: meta.source }, "已写入记录");
		}
	}

	private toLine(file: string, record: CrawlRecord): Record<string, unknown> {
		const known = this.columns.get(file, () => Object.keys(record.data));
		const data: Record<string, unknown> = {};
		for (const key of known) if (key in record.data) data[key] = record.data[key];
		for (const [key, value] of Object.entries(record.data)) if (!(key in data)) data[key] = value;
		return {
			kind: record.kind,
			id: record.id,
			platform: record.platform,
			...(record.parentId ? { parentId: record.parentId } : {}),
			...(record.publishedAt !== undefined ? { publishedAt: record.publishedAt } : {}),
			data,
		};
	}
}
