/* 中文注释：分页评论树抓取：外层游标遍历一级评论，内层为每条一级评论独立遍历子评论，逐页流式交付 */
import type { ILogger } from "../contracts/ILogger.js";
import type { IPlatformAdapter } from "../contracts/IPlatformClient.js";
import type { BackoffScheduler } from "../lib/backoff.js";
import type { RequestRunner } from "./RequestExecutor.js";
import type { CommentNode, ContentRef } from "./types.js";

export interface CommentPage {
	level: "root" | "sub";
	contentId: string;
	/** 子评论页所属的一级评论 */
	rootId?: string;
	items: CommentNode[];
}

export interface CommentFetchOptions {
	/** 一级评论上限，同时作为每条一级评论下子评论的上限；<= 0 表示不限 */
	maxCount: number;
	/** 关闭时完全不发起子评论请求 */
	subComments: boolean;
	/** 子评论每页条数，决定内层最多请求 ceil(k / subPageSize) 页 */
	subPageSize: number;
}

export interface CommentFetchStats {
	rootCount: number;
	subCount: number;
	requests: number;
}

/**
 * 评论树抓取器
 *
 * @remarks
 * - 每抓到一页立即交付，不在内存中保留整棵树
 * - 外层在平台返回没有更多或一级评论数达到 maxCount 时停止
 * - subCommentCount 为 0 的评论不会发起子评论请求
 * - 每两次分页请求之间（外层与内层一样）都插入一次 crawl_interval 等待
 * - 生成器不可中途恢复，需要重新从头遍历
 */
export class CommentTreeFetcher {
	private log?: ILogger;

	constructor(
		private adapter: Pick<IPlatformAdapter, "getRootComments" | "getSubComments">,
		private backoff: BackoffScheduler,
		private opts: CommentFetchOptions,
		logger?: ILogger,
	) {
		this.log = logger?.child({ module: "comments" });
	}

	/**
	 * 以异步生成器形式逐页产出评论
	 */
	async *walk(ref: ContentRef, runner: RequestRunner, stats: CommentFetchStats = emptyStats()): AsyncGenerator<CommentPage> {
		const max = this.opts.maxCount;
		let cursor = "";
		let hasMore = true;

		while (hasMore && (max <= 0 || stats.rootCount < max)) {
			await this.beforeRequest(stats, `comments:${ref.id}`);
			const page = await runner.run(`comments:${ref.id}`, (ctx) => this.adapter.getRootComments(ref, cursor, ctx));
			const items = max > 0 ? page.items.slice(0, max - stats.rootCount) : page.items;
			stats.rootCount += items.length;
			if (items.length > 0) yield { level: "root", contentId: ref.id, items };

			if (this.opts.subComments) {
				for (const root of items) {
					yield* this.walkReplies(ref, root, runner, stats);
				}
			}

			// 本页的子评论已处理完，再判断游标
			if (page.hasMore && (!page.cursor || page.cursor === cursor)) {
				this.log?.warn({ contentId: ref.id, cursor }, "评论游标未推进，停止翻页");
				break;
			}
			hasMore = page.hasMore;
			cursor = page.cursor ?? "";
		}
		this.log?.debug({ contentId: ref.id, ...stats }, "评论抓取完成");
	}

	/**
	 * 推送式变体：每页交给 onPage，等待其完成后再抓下一页
	 */
	async fetchAll(
		ref: ContentRef,
		runner: RequestRunner,
		onPage: (page: CommentPage) => Promise<void>,
	): Promise<CommentFetchStats> {
		const stats = emptyStats();
		for await (const page of this.walk(ref, runner, stats)) {
			await onPage(page);
		}
		return stats;
	}

	private async *walkReplies(
		ref: ContentRef,
		root: CommentNode,
		runner: RequestRunner,
		stats: CommentFetchStats,
	): AsyncGenerator<CommentPage> {
		if (root.subCommentCount <= 0) return;
		const max = this.opts.maxCount;
		let fetched = 0;

		const inline = (root.inlineReplies ?? []).map((n) => withParent(n, root));
		if (inline.length > 0) {
			const items = max > 0 ? inline.slice(0, max) : inline;
			fetched += items.length;
			stats.subCount += items.length;
			yield { level: "sub", contentId: ref.id, rootId: root.id, items };
		}

		const remaining = root.subCommentCount - inline.length;
		const pageBudget = Math.ceil(Math.max(0, remaining) / Math.max(1, this.opts.subPageSize));
		let cursor = root.subCursor ?? "";
		let pages = 0;
		let hasMore = true;

		while (hasMore && pages < pageBudget && (max <= 0 || fetched < max)) {
			await this.beforeRequest(stats, `sub-comments:${root.id}`);
			const page = await runner.run(`sub-comments:${root.id}`, (ctx) =>
				this.adapter.getSubComments(ref, root, cursor, ctx),
			);
			pages++;
			const all = page.items.map((n) => withParent(n, root));
			const items = max > 0 ? all.slice(0, max - fetched) : all;
			fetched += items.length;
			stats.subCount += items.length;
			if (items.length > 0) yield { level: "sub", contentId: ref.id, rootId: root.id, items };

			if (page.hasMore && (!page.cursor || page.cursor === cursor)) break;
			hasMore = page.hasMore;
			cursor = page.cursor ?? "";
		}
	}

	/** 首个请求之外，每次翻页前等待一个间隔 */
	private async beforeRequest(stats: CommentFetchStats, reason: string): Promise<void> {
		if (stats.requests > 0) await this.backoff.pause(reason);
		stats.requests++;
	}
}

function emptyStats(): CommentFetchStats {
	return { rootCount: 0, subCount: 0, requests: 0 };
}

function withParent(node: CommentNode, root: CommentNode): CommentNode {
	return node.parentId ? node : { ...node, parentId: root.id };
}
