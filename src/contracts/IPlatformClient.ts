import type { ProxyLease } from "../proxy/types.js";
import type { SessionSnapshot } from "../login/SessionState.js";
import type { CommentNode, ContentItem, ContentRef, CreatorProfile, PageResult } from "../crawler/types.js";

export type HttpMethod = "GET" | "POST";

/**
 * 单次请求的上下文：代理租约归属当前任务，会话为只读快照
 */
export interface RequestContext {
	lease?: ProxyLease;
	signal?: AbortSignal;
	session: SessionSnapshot;
}

/**
 * 平台 HTTP 客户端（签名、Cookie 携带与风控识别由实现负责）
 *
 * @throws BlockedError 平台风控/限流（调用方剔除代理后重试）
 * @throws NotFoundError 内容不存在或已下架（永久失败）
 * @throws TransientError 网络抖动/5xx
 */
export interface IPlatformClient {
	request<T = unknown>(
		method: HttpMethod,
		uri: string,
		payload: Record<string, unknown> | undefined,
		ctx: RequestContext,
	): Promise<T>;
}

export interface SearchQuery {
	keyword: string;
	/** 从 1 开始的页码 */
	page: number;
	/** 平台返回的分页游标（如搜索 id），首页为空 */
	cursor?: string;
}

/**
 * 平台适配器：字段抽取与接口拼装属于平台实现，核心只消费下面这些操作。
 * 每个操作都应基于 IPlatformClient 发起请求，并把“没有下一页”表达为 hasMore=false。
 */
export interface IPlatformAdapter {
	readonly platform: string;

	searchPage(query: SearchQuery, ctx: RequestContext): Promise<PageResult<ContentItem>>;
	getDetail(ref: ContentRef, ctx: RequestContext): Promise<ContentItem>;
	getCreatorProfile(creatorId: string, ctx: RequestContext): Promise<CreatorProfile>;
	getCreatorPostsPage(creatorId: string, cursor: string, ctx: RequestContext): Promise<PageResult<ContentItem>>;
	getRootComments(ref: ContentRef, cursor: string, ctx: RequestContext): Promise<PageResult<CommentNode>>;
	getSubComments(
		ref: ContentRef,
		root: CommentNode,
		cursor: string,
		ctx: RequestContext,
	): Promise<PageResult<CommentNode>>;

	/** 轻量的已登录 API 探测（pong） */
	ping(ctx: RequestContext): Promise<boolean>;
}
