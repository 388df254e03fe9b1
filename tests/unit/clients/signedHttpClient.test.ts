/* 中文注释：带签名的平台 HTTP 客户端测试（替换底层 raw 请求） */
import { createServer, type Server } from "node:http";
import { afterEach, describe, it, expect } from "vitest";
import { SignedHttpClient } from "../../../src/clients/SignedHttpClient.js";
import type { SignInput } from "../../../src/contracts/ISigner.js";
import { BlockedError } from "../../../src/core/errors/BlockedError.js";
import { CancelledError } from "../../../src/core/errors/CancelledError.js";
import { NotFoundError } from "../../../src/core/errors/NotFoundError.js";
import { TransientError } from "../../../src/core/errors/TransientError.js";
import type { HttpRequestInit, HttpResponse } from "../../../src/lib/http.js";
import { SessionState } from "../../../src/login/SessionState.js";
import { lease } from "../../helpers/fakes.js";
import { MemoryLogger } from "../../helpers/memoryLogger.js";

function setup(status: number, text: string) {
	const requests: Array<{ path: string; init: HttpRequestInit }> = [];
	const signed: SignInput[] = [];
	const logger = new MemoryLogger();
	const client = new SignedHttpClient({
		platform: "xhs",
		baseURL: "https://api.example.test",
		headers: { "user-agent": "test-agent" },
		riskCodes: [300012],
		signer: {
			sign: async (input) => {
				signed.push(input);
				return { "x-s": "sig" };
			},
		},
		http: {
			raw: async (path: string, init: HttpRequestInit = {}): Promise<HttpResponse> => {
				requests.push({ path, init });
				return { status, headers: { get: () => null }, text };
			},
		},
		logger,
	});
	return { client, requests, signed, logger };
}

const session = new SessionState("xhs", { cookies: "a1=x" }).snapshot();

describe("SignedHttpClient", () => {
	it("GET 参数拼成查询串，签名头与 Cookie 一并发送", async () => {
		const { client, requests, signed } = setup(200, '{"success":true,"data":{"items":[]}}');
		const proxy = lease("10.0.0.1");
		const data = await client.request("GET", "/api/search", { keyword: "咖啡", page: 2, skip: undefined }, { session, lease: proxy });

		expect(data).toEqual({ success: true, data: { items: [] } });
		expect(requests[0].path).toBe("/api/search?keyword=%E5%92%96%E5%95%A1&page=2");
		expect(requests[0].init).toMatchObject({
			method: "GET",
			headers: { "user-agent": "test-agent", "x-s": "sig", Cookie: "a1=x" },
			body: undefined,
			lease: proxy,
		});
		expect(signed[0]).toEqual({
			method: "GET",
			uri: "/api/search?keyword=%E5%92%96%E5%95%A1&page=2",
			payload: undefined,
			cookies: { a1: "x" },
		});
	});

	it("POST 发送 JSON 请求体", async () => {
		const { client, requests } = setup(200, "{}");
		await client.request("POST", "/api/comment", { note_id: "n1" }, { session });
		expect(requests[0].path).toBe("/api/comment");
		expect(requests[0].init.body).toBe('{"note_id":"n1"}');
		expect(requests[0].init.headers).toMatchObject({ "content-type": "application/json;charset=UTF-8" });
	});

	it("状态码映射为错误分类", async () => {
		await expect(setup(461, "").client.request("GET", "/a", undefined, { session })).rejects.toBeInstanceOf(BlockedError);
		await expect(setup(404, "").client.request("GET", "/a", undefined, { session })).rejects.toBeInstanceOf(NotFoundError);
		await expect(setup(502, "").client.request("GET", "/a", undefined, { session })).rejects.toBeInstanceOf(TransientError);
	});

	it("响应 code 命中风控码时抛出 BlockedError 并告警", async () => {
		const { client, logger } = setup(200, '{"code":300012,"success":false}');
		await expect(client.request("GET", "/a", undefined, { session })).rejects.toThrow("平台风控拦截（code=300012）");
		expect(logger.at("warn")[0]).toMatchObject({ msg: "命中风控", obj: { uri: "/a", code: 300012 } });
	});

	it("success=false 视为瞬态失败", async () => {
		const { client } = setup(200, '{"success":false,"msg":"服务繁忙"}');
		const err = await client.request("GET", "/a", undefined, { session }).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(TransientError);
		expect(err).toHaveProperty("message", "服务繁忙");
	});

	it("非 JSON 响应视为瞬态失败", async () => {
		const { client } = setup(200, "<html>");
		await expect(client.request("GET", "/a", undefined, { session })).rejects.toThrow("响应不是合法 JSON");
	});
});

describe("SignedHttpClient 与取消信号", () => {
	let server: Server | undefined;

	afterEach(async () => {
		await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
		server = undefined;
	});

	/** 本进程内的慢响应服务：delayMs 后返回 {"ok":1} */
	async function slowServer(delayMs: number): Promise<{ baseURL: string; hits: () => number }> {
		let count = 0;
		const srv = createServer((_req, res) => {
			count++;
			setTimeout(() => {
				res.setHeader("content-type", "application/json");
				res.end('{"ok":1}');
			}, delayMs);
		});
		server = srv;
		await new Promise<void>((resolve) => srv.listen(0, "127.0.0.1", () => resolve()));
		const address = srv.address();
		if (address === null || typeof address === "string") throw new Error("无法获取监听端口");
		return { baseURL: `http://127.0.0.1:${address.port}`, hits: () => count };
	}

	const signer = { sign: async () => ({}) };

	it("请求已发出后收到取消，仍等待该请求完成", async () => {
		const { baseURL } = await slowServer(150);
		const client = new SignedHttpClient({ platform: "xhs", baseURL, signer });
		const controller = new AbortController();
		setTimeout(() => controller.abort(), 20);

		const data = await client.request("GET", "/slow", undefined, { session, signal: controller.signal });
		expect(data).toEqual({ ok: 1 });
		expect(controller.signal.aborted).toBe(true);
	});

	it("发出前已取消则不发请求，抛出 CancelledError", async () => {
		const { baseURL, hits } = await slowServer(0);
		const client = new SignedHttpClient({ platform: "xhs", baseURL, signer });
		const controller = new AbortController();
		controller.abort();

		await expect(client.request("GET", "/slow", undefined, { session, signal: controller.signal })).rejects.toBeInstanceOf(
			CancelledError,
		);
		expect(hits()).toBe(0);
	});
});
