/* 中文注释：分页评论树抓取测试 */
import { describe, it, expect } from "vitest";
import { CommentTreeFetcher, type CommentFetchOptions, type CommentPage } from "../../../src/crawler/CommentTreeFetcher.js";
import type { RequestRunner } from "../../../src/crawler/RequestExecutor.js";
import type { CommentNode } from "../../../src/crawler/types.js";
import { BackoffScheduler } from "../../../src/lib/backoff.js";
import { SessionState } from "../../../src/login/SessionState.js";
import { FakeAdapter, comment, instantSleep } from "../../helpers/fakes.js";
import { MemoryLogger } from "../../helpers/memoryLogger.js";

const session = new SessionState("xhs").snapshot();
const direct: RequestRunner = {
	run: (_label, fn) => fn({ session }),
};

/** 每页 size 条子评论、游标递增、永远有下一页 */
function endlessReplies(size: number) {
	return async (root: CommentNode, cursor: string) => {
		const n = Number(cursor || "0");
		const items = Array.from({ length: size }, (_, i) => comment(`${root.id}-${n}-${i}`, root.contentId));
		return { items, hasMore: true, cursor: String(n + 1) };
	};
}

function setup(opts: Partial<CommentFetchOptions> = {}) {
	const adapter = new FakeAdapter();
	const waits: number[] = [];
	const backoff = new BackoffScheduler({ intervalMs: 100, sleep: instantSleep(waits) });
	const logger = new MemoryLogger();
	const fetcher = new CommentTreeFetcher(adapter, backoff, { maxCount: 0, subComments: true, subPageSize: 10, ...opts }, logger);
	return { adapter, waits, fetcher, logger };
}

async function collect(fetcher: CommentTreeFetcher): Promise<CommentPage[]> {
	const pages: CommentPage[] = [];
	await fetcher.fetchAll({ id: "n1" }, direct, async (page) => {
		pages.push(page);
	});
	return pages;
}

describe("CommentTreeFetcher", () => {
	it("子评论最多请求 ceil(k / 每页条数) 页，每两次请求之间等待一次", async () => {
		const { adapter, waits, fetcher } = setup();
		adapter.roots = async () => ({ items: [comment("r1", "n1", 25)], hasMore: false });
		adapter.subs = endlessReplies(10);
		const stats = await fetcher.fetchAll({ id: "n1" }, direct, async () => {});
		expect(adapter.calls).toEqual(["comments:n1:", "sub:r1:", "sub:r1:1", "sub:r1:2"]);
		expect(stats).toEqual({ rootCount: 1, subCount: 30, requests: 4 });
		expect(waits).toEqual([100, 100, 100]);
	});

	it("maxCount 同时限制每条一级评论下的子评论数", async () => {
		const { adapter, fetcher } = setup({ maxCount: 15 });
		adapter.roots = async () => ({ items: [comment("r1", "n1", 25)], hasMore: false });
		adapter.subs = endlessReplies(10);
		const pages = await collect(fetcher);
		expect(adapter.count("sub:")).toBe(2);
		const subs = pages.filter((p) => p.level === "sub");
		expect(subs.map((p) => p.items.length)).toEqual([10, 5]);
	});

	it("关闭子评论时不发起子评论请求", async () => {
		const { adapter, fetcher } = setup({ subComments: false });
		adapter.roots = async () => ({ items: [comment("r1", "n1", 25)], hasMore: false });
		adapter.subs = endlessReplies(10);
		await collect(fetcher);
		expect(adapter.count("sub:")).toBe(0);
	});

	it("子评论数为 0 的一级评论不请求子评论", async () => {
		const { adapter, fetcher } = setup();
		adapter.roots = async () => ({ items: [comment("r1", "n1", 0), comment("r2", "n1", 0)], hasMore: false });
		const pages = await collect(fetcher);
		expect(adapter.calls).toEqual(["comments:n1:"]);
		expect(pages).toHaveLength(1);
	});

	it("内联子评论先交付并计入页数预算，子节点的 parentId 指向一级评论", async () => {
		const { adapter, fetcher } = setup();
		const inline = [comment("s1", "n1"), comment("s2", "n1")];
		adapter.roots = async () => ({
			items: [comment("r1", "n1", 12, { inlineReplies: inline, subCursor: "c0" })],
			hasMore: false,
		});
		adapter.subs = async () => ({ items: [comment("s3", "n1")], hasMore: true, cursor: "c1" });
		const pages = await collect(fetcher);
		expect(adapter.calls).toEqual(["comments:n1:", "sub:r1:c0"]);
		expect(pages.map((p) => p.items.map((n) => n.id))).toEqual([["r1"], ["s1", "s2"], ["s3"]]);
		expect(pages[1]).toMatchObject({ level: "sub", rootId: "r1" });
		expect(pages[1].items.every((n) => n.parentId === "r1")).toBe(true);
		expect(pages[2].items[0].parentId).toBe("r1");
	});

	it("一级评论达到 maxCount 后停止外层翻页", async () => {
		const { adapter, fetcher } = setup({ maxCount: 15, subComments: false });
		adapter.roots = async (_ref, cursor) => {
			const n = Number(cursor || "0");
			const items = Array.from({ length: 10 }, (_, i) => comment(`r${n}-${i}`, "n1"));
			return { items, hasMore: true, cursor: String(n + 1) };
		};
		const pages = await collect(fetcher);
		expect(adapter.calls).toEqual(["comments:n1:", "comments:n1:1"]);
		expect(pages.map((p) => p.items.length)).toEqual([10, 5]);
	});

	it("平台声称还有下一页但游标未推进时停止并告警", async () => {
		const { adapter, fetcher, logger } = setup();
		adapter.roots = async () => ({ items: [comment("r1", "n1")], hasMore: true, cursor: "" });
		await collect(fetcher);
		expect(adapter.count("comments:")).toBe(1);
		expect(logger.at("warn").map((e) => e.msg)).toEqual(["评论游标未推进，停止翻页"]);
	});

	it("游标未推进时仍先抓完本页一级评论的子评论再停止", async () => {
		const { adapter, fetcher, logger } = setup();
		adapter.roots = async () => ({ items: [comment("r1", "n1", 3)], hasMore: true, cursor: "" });
		adapter.subs = async (root) => ({
			items: [0, 1, 2].map((i) => comment(`${root.id}-${i}`, root.contentId)),
			hasMore: false,
		});
		const stats = await fetcher.fetchAll({ id: "n1" }, direct, async () => {});
		expect(adapter.calls).toEqual(["comments:n1:", "sub:r1:"]);
		expect(stats).toEqual({ rootCount: 1, subCount: 3, requests: 2 });
		expect(logger.at("warn").map((e) => e.msg)).toEqual(["评论游标未推进，停止翻页"]);
	});

	it("请求失败时异常从生成器抛出", async () => {
		const { adapter, fetcher } = setup();
		adapter.roots = async () => {
			throw new Error("boom");
		};
		await expect(collect(fetcher)).rejects.toThrow("boom");
	});
});
