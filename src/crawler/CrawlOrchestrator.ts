/* 中文注释：爬取编排器：按模式（搜索/详情/创作者）驱动单个平台的一次运行，单项失败就地隔离 */
import type { AppConfig } from "../config/schema.js";
import type { PlatformSearchConfig } from "../config/platforms.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { IPersistenceSink } from "../contracts/IPersistenceSink.js";
import type { IPlatformAdapter } from "../contracts/IPlatformClient.js";
import { BaseError } from "../core/errors/BaseError.js";
import { CancelledError } from "../core/errors/CancelledError.js";
import { NotFoundError } from "../core/errors/NotFoundError.js";
import { errorMessage, isRetryable } from "../core/errors/classify.js";
import type { BackoffScheduler } from "../lib/backoff.js";
import { CommentTreeFetcher, type CommentPage } from "./CommentTreeFetcher.js";
import type { RequestExecutor, TaskScope } from "./RequestExecutor.js";
import { WorkerPool, type WorkerPoolResult } from "./WorkerPool.js";
import {
	commentRecord,
	contentRecord,
	creatorRecord,
	type ContentItem,
	type ContentRef,
	type CrawlMode,
	type CrawlTask,
	type PageResult,
	type PublishTimeField,
	type TaskKind,
} from "./types.js";

/** 一次运行所需的数值设置（由配置与平台常量合成） */
export interface CrawlSettings {
	startPage: number;
	/** 搜索的条数上限（折算成页数）与每个创作者的作品上限；0 表示不限 */
	maxNotes: number;
	maxCommentsPerNote: number;
	concurrency: number;
	comments: { enabled: boolean; subComments: boolean };
	searchPageSize: number;
	subCommentPageSize: number;
	taskMaxRetries: number;
	/** 为空时内容记录不带 publishedAt */
	publishTime?: PublishTimeField;
}

export function crawlSettings(config: AppConfig, platform: PlatformSearchConfig): CrawlSettings {
	return {
		startPage: config.targets.startPage,
		maxNotes: config.limits.maxNotes,
		maxCommentsPerNote: config.limits.maxCommentsPerNote,
		concurrency: config.limits.concurrency,
		comments: { ...config.comments },
		searchPageSize: platform.searchPageSize,
		subCommentPageSize: platform.subCommentPageSize,
		taskMaxRetries: config.retry.taskMaxRetries,
		publishTime: { column: platform.timeColumn, unit: platform.timeUnit },
	};
}

export interface CrawlTargets {
	keywords: string[];
	ids: string[];
	creators: string[];
}

export interface FailedTask {
	kind: TaskKind;
	target: string;
	code: string;
	message: string;
}

export interface RunReport {
	mode: CrawlMode | "comments";
	/** 已保存的内容条数 */
	items: number;
	/** 已保存的评论条数（一级 + 子评论） */
	comments: number;
	failed: FailedTask[];
	/** 因取消而未处理的单元数 */
	skipped: number;
	cancelled: boolean;
}

export interface CrawlOrchestratorOptions {
	adapter: IPlatformAdapter;
	sink: IPersistenceSink;
	executor: RequestExecutor;
	backoff: BackoffScheduler;
	settings: CrawlSettings;
	signal?: AbortSignal;
	logger?: ILogger;
}

function newReport(mode: RunReport["mode"]): RunReport {
	return { mode, items: 0, comments: 0, failed: [], skipped: 0, cancelled: false };
}

function toRef(value: string | ContentRef): ContentRef {
	return typeof value === "string" ? { id: value } : value;
}

/**
 * 爬取编排器
 *
 * @remarks
 * - 关键词、创作者之间顺序执行；同一关键词/创作者内严格按页序翻页
 * - 详情与评论在有界工作池中并发，单项失败只记录日志，不影响同批其他项
 * - 每个任务最多重试 taskMaxRetries 次；NotFound 与不可重试错误不重试
 * - 任何任务都不会在没有日志的情况下被丢弃
 */
export class CrawlOrchestrator {
	readonly platform: string;
	private readonly pool: WorkerPool;
	private readonly comments: CommentTreeFetcher;
	private log?: ILogger;

	constructor(private opts: CrawlOrchestratorOptions) {
		this.platform = opts.adapter.platform;
		this.log = opts.logger?.child({ module: "orchestrator", platform: this.platform });
		this.pool = new WorkerPool({ concurrency: opts.settings.concurrency, signal: opts.signal, logger: this.log });
		this.comments = new CommentTreeFetcher(
			opts.adapter,
			opts.backoff,
			{
				maxCount: opts.settings.maxCommentsPerNote,
				subComments: opts.settings.comments.subComments,
				subPageSize: opts.settings.subCommentPageSize,
			},
			this.log,
		);
	}

	/** 默认搜索页数：条数上限 / 每页条数（至少 1 页）；上限为 0 时翻到空页为止 */
	get defaultPageLimit(): number {
		const { maxNotes, searchPageSize } = this.opts.settings;
		if (maxNotes <= 0) return Number.POSITIVE_INFINITY;
		return Math.max(1, Math.floor(maxNotes / Math.max(1, searchPageSize)));
	}

	async run(mode: CrawlMode, targets: CrawlTargets): Promise<RunReport> {
		this.log?.info({ mode }, "开始爬取");
		const report =
			mode === "search"
				? await this.runSearch(targets.keywords)
				: mode === "detail"
					? await this.runDetail(targets.ids)
					: await this.runCreator(targets.creators);
		this.log?.info(
			{ mode, items: report.items, comments: report.comments, failed: report.failed.length, cancelled: report.cancelled },
			"爬取结束",
		);
		return report;
	}

	/**
	 * 按关键词逐页搜索，每页结果立即进入详情 + 评论流水线
	 *
	 * 某个关键词某页失败只结束该关键词的翻页，其余关键词照常进行。
	 */
	async runSearch(keywords: string[], pageLimit = this.defaultPageLimit): Promise<RunReport> {
		const report = newReport("search");
		for (const [index, keyword] of keywords.entries()) {
			if (this.opts.signal?.aborted) {
				report.cancelled = true;
				report.skipped += keywords.length - index;
				break;
			}
			try {
				await this.searchKeyword(keyword, pageLimit, report);
			} catch (err) {
				if (!(err instanceof CancelledError)) throw err;
				report.cancelled = true;
				report.skipped += keywords.length - index - 1;
				break;
			}
		}
		return report;
	}

	/**
	 * 按内容 ID 抓取详情，成功的再抓评论
	 */
	async runDetail(ids: Array<string | ContentRef>): Promise<RunReport> {
		const report = newReport("detail");
		await this.processItems(ids.map(toRef), report);
		return report;
	}

	/**
	 * 逐个创作者：先取资料，再翻页获取作品列表（maxNotes 为 0 时不限条数），作品进入详情 + 评论流水线
	 */
	async runCreator(creatorIds: string[]): Promise<RunReport> {
		const report = newReport("creator");
		for (const [index, creatorId] of creatorIds.entries()) {
			if (this.opts.signal?.aborted) {
				report.cancelled = true;
				report.skipped += creatorIds.length - index;
				break;
			}
			try {
				await this.crawlCreator(creatorId, report);
			} catch (err) {
				if (err instanceof CancelledError) {
					report.cancelled = true;
					report.skipped += creatorIds.length - index - 1;
					break;
				}
				const task = this.newTask("creator", "creator", creatorId);
				task.attempts = 1;
				this.logFailure(task, err);
				report.failed.push(this.describe(task, err));
			}
		}
		return report;
	}

	/**
	 * 批量抓取评论树；单个内容失败不会中断整批，也不会向调用方抛出
	 */
	async batchGetComments(ids: Array<string | ContentRef>): Promise<RunReport> {
		const report = newReport("comments");
		await this.batchComments(ids.map(toRef), report);
		return report;
	}

	private async searchKeyword(keyword: string, pageLimit: number, report: RunReport): Promise<void> {
		const scope = this.opts.executor.scope(`search:${keyword}`);
		let cursor: string | undefined;
		try {
			for (let i = 0; i < pageLimit; i++) {
				const page = this.opts.settings.startPage + i;
				if (i > 0) await this.opts.backoff.pause(`search:${keyword}`);
				let result: PageResult<ContentItem>;
				try {
					result = await scope.run(`search:${keyword}:${page}`, (ctx) =>
						this.opts.adapter.searchPage({ keyword, page, cursor }, ctx),
					);
				} catch (err) {
					if (err instanceof CancelledError) throw err;
					const task = { ...this.newTask("search", "search", keyword), page, attempts: 1 };
					this.logFailure(task, err);
					report.failed.push(this.describe(task, err));
					return;
				}
				if (result.items.length === 0) {
					this.log?.info({ keyword, page }, "搜索结果为空，结束该关键词");
					return;
				}
				this.log?.info({ keyword, page, count: result.items.length }, "搜索页完成");
				await this.processItems(
					result.items.map((item) => ({ id: item.id, token: item.token })),
					report,
				);
				if (!result.hasMore) return;
				cursor = result.cursor;
			}
		} finally {
			await scope.dispose();
		}
	}

	private async crawlCreator(creatorId: string, report: RunReport): Promise<void> {
		const { adapter, sink, backoff, settings } = this.opts;
		const scope = this.opts.executor.scope(`creator:${creatorId}`);
		try {
			const profile = await scope.run(`creator:${creatorId}:profile`, (ctx) => adapter.getCreatorProfile(creatorId, ctx));
			await sink.save([creatorRecord(this.platform, profile)], { platform: this.platform, source: creatorId });

			const max = settings.maxNotes;
			let collected = 0;
			let cursor = "";
			let hasMore = true;
			while (hasMore && (max <= 0 || collected < max)) {
				await backoff.pause(`creator:${creatorId}`);
				const page = await scope.run(`creator:${creatorId}:posts`, (ctx) =>
					adapter.getCreatorPostsPage(creatorId, cursor, ctx),
				);
				const items = max > 0 ? page.items.slice(0, max - collected) : page.items;
				collected += items.length;
				this.log?.info({ creatorId, count: items.length, collected }, "创作者作品页完成");
				if (items.length > 0) {
					await this.processItems(
						items.map((item) => ({ id: item.id, token: item.token })),
						report,
					);
				}
				if (page.hasMore && (!page.cursor || page.cursor === cursor)) break;
				hasMore = page.hasMore;
				cursor = page.cursor ?? "";
			}
		} finally {
			await scope.dispose();
		}
	}

	/** 详情并发抓取；成功的内容再交给评论批处理 */
	private async processItems(refs: ContentRef[], report: RunReport): Promise<void> {
		const { adapter, sink, settings } = this.opts;
		const res = await this.pool.map(refs, async (ref) => {
			const item = await this.runTask("detail", ref.id, async (scope) => {
				const detail = await scope.run(`detail:${ref.id}`, (ctx) => adapter.getDetail(ref, ctx));
				await sink.save([contentRecord(this.platform, detail, settings.publishTime)], {
					platform: this.platform,
					source: ref.id,
				});
				return detail;
			});
			await this.pauseAfterSaved(`detail:${ref.id}`);
			return item;
		});
		report.items += res.succeeded.length;
		this.collect(report, "detail", res);

		if (!this.opts.settings.comments.enabled || res.succeeded.length === 0) return;
		await this.batchComments(
			res.succeeded.map(({ item, result }) => ({ id: result.id, token: result.token ?? item.token })),
			report,
		);
	}

	private async batchComments(refs: ContentRef[], report: RunReport): Promise<void> {
		const res = await this.pool.map(refs, (ref) =>
			this.runTask("comments", ref.id, (scope) => this.comments.fetchAll(ref, scope, (page) => this.savePage(page))),
		);
		for (const { result } of res.succeeded) report.comments += result.rootCount + result.subCount;
		this.collect(report, "comments", res);
	}

	private savePage(page: CommentPage): Promise<void> {
		return this.opts.sink.save(
			page.items.map((node) => commentRecord(this.platform, node)),
			{ platform: this.platform, source: page.contentId },
		);
	}

	/**
	 * 以任务为单位执行，失败后按 taskMaxRetries 重新执行；每次执行使用新的 TaskScope（新的代理租约）
	 */
	private async runTask<R>(kind: TaskKind, target: string, fn: (scope: TaskScope) => Promise<R>): Promise<R> {
		const task = this.newTask(this.modeOf(kind), kind, target);
		for (;;) {
			task.attempts++;
			const scope = this.opts.executor.scope(`${kind}:${target}`);
			try {
				return await fn(scope);
			} catch (err) {
				if (err instanceof CancelledError) throw err;
				const permanent = err instanceof NotFoundError || !isRetryable(err);
				if (permanent || task.retriesRemaining <= 0) {
					this.logFailure(task, err);
					throw err;
				}
				task.retriesRemaining--;
				this.log?.warn(
					{ kind, target, attempts: task.attempts, retriesRemaining: task.retriesRemaining, error: errorMessage(err) },
					"任务失败，稍后重试",
				);
			} finally {
				await scope.dispose();
			}
			await this.opts.backoff.pause(`retry:${kind}:${target}`);
		}
	}

	/** 已保存的单元在间隔中被取消时仍计为成功；取消由工作池停止出队体现 */
	private async pauseAfterSaved(reason: string): Promise<void> {
		try {
			await this.opts.backoff.pause(reason);
		} catch (err) {
			if (!(err instanceof CancelledError)) throw err;
			this.log?.debug({ reason }, "间隔等待被取消");
		}
	}

	private collect(report: RunReport, kind: TaskKind, res: WorkerPoolResult<ContentRef, unknown>): void {
		for (const { item, error } of res.failed) {
			if (error instanceof CancelledError) {
				report.cancelled = true;
				report.skipped++;
				continue;
			}
			report.failed.push(this.describe({ kind, target: item.id }, error));
		}
		if (res.skipped.length > 0 || this.opts.signal?.aborted) report.cancelled = true;
		report.skipped += res.skipped.length;
	}

	private newTask(mode: CrawlMode, kind: TaskKind, target: string): CrawlTask {
		return {
			platform: this.platform,
			mode,
			kind,
			target,
			retriesRemaining: this.opts.settings.taskMaxRetries,
			attempts: 0,
		};
	}

	private modeOf(kind: TaskKind): CrawlMode {
		return kind === "comments" ? "detail" : kind;
	}

	private logFailure(task: CrawlTask, err: unknown): void {
		const fields = { kind: task.kind, target: task.target, page: task.page, attempts: task.attempts };
		if (err instanceof NotFoundError) {
			this.log?.warn({ ...fields, code: err.code }, "内容不存在或已下架，跳过");
			return;
		}
		this.log?.error({ ...fields, err }, "任务失败");
	}

	private describe(task: Pick<CrawlTask, "kind" | "target">, err: unknown): FailedTask {
		return {
			kind: task.kind,
			target: task.target,
			code: err instanceof BaseError ? err.code : "UNKNOWN",
			message: errorMessage(err),
		};
	}
}
