/* 中文注释：爬取核心的数据模型（内容、评论节点、创作者、分页结果、任务） */
import { toEpochMs, type TimeUnit } from "../config/platforms.js";

export type CrawlMode = "search" | "detail" | "creator";

/**
 * 分页结果：没有下一页是数据（hasMore=false），不是异常
 */
export interface PageResult<T> {
	items: T[];
	hasMore: boolean;
	/** 下一页游标；hasMore=false 时可为空 */
	cursor?: string;
}

/** 定位一条内容：ID 加上部分平台要求的访问令牌 */
export interface ContentRef {
	id: string;
	token?: string;
}

export interface ContentItem {
	id: string;
	/** 部分平台需要随 ID 一起传递的访问令牌（如 xsec_token） */
	token?: string;
	creatorId?: string;
	data: Record<string, unknown>;
}

export interface CreatorProfile {
	id: string;
	data: Record<string, unknown>;
}

/**
 * 评论树中的一个节点
 *
 * parentId 为空表示一级评论。subCommentCount 为 0 时不会再为该节点发起子评论请求；
 * subCursor 是该节点子评论分页的起始游标，只在内层游走中推进。
 */
export interface CommentNode {
	id: string;
	contentId: string;
	parentId?: string;
	subCommentCount: number;
	subCursor?: string;
	/** 平台随一级评论内联返回的首批子评论 */
	inlineReplies?: CommentNode[];
	data: Record<string, unknown>;
}

export type RecordKind = "content" | "comment" | "creator";

/** 交给持久化回调的一条记录 */
export interface CrawlRecord {
	kind: RecordKind;
	id: string;
	platform: string;
	parentId?: string;
	/** 发布时间（毫秒时间戳），平台未提供或无法解析时缺省 */
	publishedAt?: number;
	data: Record<string, unknown>;
}

/** 任务类别：三种运行模式之外，评论抓取也是独立的工作单元 */
export type TaskKind = CrawlMode | "comments";

/**
 * 一个工作单元：关键词×页、内容 ID 或创作者 ID
 */
export interface CrawlTask {
	platform: string;
	mode: CrawlMode;
	kind: TaskKind;
	/** 关键词 / 内容 ID / 创作者 ID */
	target: string;
	page?: number;
	cursor?: string;
	retriesRemaining: number;
	/** 已执行次数 */
	attempts: number;
}

/** 内容记录中发布时间所在的列及其单位 */
export interface PublishTimeField {
	column: string;
	unit: TimeUnit;
}

export function contentRecord(platform: string, item: ContentItem, time?: PublishTimeField): CrawlRecord {
	const publishedAt = time ? toEpochMs(item.data[time.column], time.unit) : undefined;
	return { kind: "content", id: item.id, platform, ...(publishedAt !== undefined ? { publishedAt } : {}), data: item.data };
}

export function commentRecord(platform: string, node: CommentNode): CrawlRecord {
	return {
		kind: "comment",
		id: node.id,
		platform,
		parentId: node.parentId ?? node.contentId,
		data: node.data,
	};
}

export function creatorRecord(platform: string, profile: CreatorProfile): CrawlRecord {
	return { kind: "creator", id: profile.id, platform, data: profile.data };
}
