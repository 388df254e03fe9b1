/* 中文注释：登录状态机测试 */
import { describe, it, expect } from "vitest";
import { LoginStateMachine, type LoginStateMachineOptions } from "../../../src/login/LoginStateMachine.js";
import { SessionState } from "../../../src/login/SessionState.js";
import { SessionProbe } from "../../../src/login/sessionProbe.js";
import { SliderSolver } from "../../../src/login/SliderSolver.js";
import { ExpiringLocalCache } from "../../../src/cache/ExpiringLocalCache.js";
import { LoginFailedError } from "../../../src/core/errors/LoginFailedError.js";
import type { SleepFn } from "../../../src/lib/backoff.js";
import { FakeLoginDriver, instantSleep } from "../../helpers/fakes.js";
import { MemoryLogger } from "../../helpers/memoryLogger.js";

function machine(overrides: Partial<LoginStateMachineOptions> = {}): LoginStateMachine {
	return new LoginStateMachine({
		platform: "xhs",
		method: "qrcode",
		session: new SessionState("xhs"),
		probe: new SessionProbe({ loginCookies: ["web_session"] }),
		pollMs: 500,
		sleep: instantSleep(),
		...overrides,
	});
}

describe("LoginStateMachine", () => {
	it("会话仍有效时跳过登录", async () => {
		const driver = new FakeLoginDriver();
		const session = new SessionState("xhs", { cookies: "web_session=abc" });
		const sm = machine({ driver, session });
		await expect(sm.ensureLoggedIn()).resolves.toBe(false);
		expect(sm.state).toBe("LoggedIn");
		expect(session.status).toBe("LoggedIn");
		expect(driver.calls).toEqual([]);

		// 再次校验：LoggedIn → Unchecked → LoggedIn
		await expect(sm.ensureLoggedIn()).resolves.toBe(false);
		expect(sm.transitions.map((t) => t.to)).toEqual(["LoggedIn", "Unchecked", "LoggedIn"]);
	});

	it("扫码登录轮询到成功后写回 Cookie", async () => {
		const waits: number[] = [];
		const driver = new FakeLoginDriver(3);
		const session = new SessionState("xhs");
		const sm = machine({ driver, session, sleep: instantSleep(waits) });
		await expect(sm.ensureLoggedIn()).resolves.toBe(true);
		expect(driver.calls).toEqual(["showQrCode"]);
		expect(driver.loginChecks).toBe(3);
		expect(waits).toEqual([500, 500]);
		expect(sm.transitions).toEqual([
			{ from: "Unchecked", to: "LoggedOut" },
			{ from: "LoggedOut", to: "AwaitingQRCode" },
			{ from: "AwaitingQRCode", to: "LoggedIn" },
		]);
		const snap = session.snapshot();
		expect(snap.status).toBe("LoggedIn");
		expect(snap.loginMethod).toBe("qrcode");
		expect(snap.cookieHeader).toBe("web_session=test-session");
	});

	it("手机号登录从缓存读取外部写入的验证码", async () => {
		const smsCache = new ExpiringLocalCache<string>(0);
		const waits: number[] = [];
		// 第一次轮询等待时，外部接收端写入验证码
		const sleep: SleepFn = async (ms) => {
			waits.push(ms);
			smsCache.set("dy_13800000000", "654321", 60);
		};
		const driver = new FakeLoginDriver(1);
		const sm = machine({
			platform: "dy",
			method: "phone",
			phone: "13800000000",
			session: new SessionState("dy"),
			driver,
			smsCache,
			sleep,
		});
		await expect(sm.ensureLoggedIn()).resolves.toBe(true);
		expect(driver.calls).toEqual(["requestSmsCode:13800000000", "submitSmsCode:654321"]);
		expect(waits).toEqual([500]);
		expect(sm.state).toBe("LoggedIn");
	});

	it("手机号登录缺少手机号时失败", async () => {
		const sm = machine({ method: "phone", driver: new FakeLoginDriver(), smsCache: new ExpiringLocalCache<string>(0) });
		await expect(sm.ensureLoggedIn()).rejects.toThrow("手机号登录需要配置 LOGIN_PHONE");
		expect(sm.state).toBe("LoginFailed");
	});

	it("Cookie 登录注入解析后的 Cookie", async () => {
		const driver = new FakeLoginDriver(1);
		const sm = machine({ method: "cookie", cookies: "a1=x; token=abc==", driver });
		await expect(sm.ensureLoggedIn()).resolves.toBe(true);
		expect(driver.injected).toEqual([
			{ name: "a1", value: "x" },
			{ name: "token", value: "abc==" },
		]);
		expect(sm.transitions[1]).toEqual({ from: "LoggedOut", to: "AwaitingCookieInjection" });
	});

	it("Cookie 登录没有配置 Cookie 时失败", async () => {
		const sm = machine({ method: "cookie", cookies: "", driver: new FakeLoginDriver() });
		await expect(sm.ensureLoggedIn()).rejects.toThrow("Cookie 登录需要配置 COOKIES");
	});

	it("轮询超时进入 LoginFailed，之后不能再登录", async () => {
		const logger = new MemoryLogger();
		const driver = new FakeLoginDriver(Number.POSITIVE_INFINITY);
		const session = new SessionState("xhs");
		const sm = machine({ driver, session, maxAttempts: 3, logger });
		const err = await sm.ensureLoggedIn().catch((e: unknown) => e);
		expect(err).toBeInstanceOf(LoginFailedError);
		expect(err).toHaveProperty("message", "登录超时：3 次检查后仍未登录");
		expect(driver.loginChecks).toBe(3);
		expect(sm.state).toBe("LoginFailed");
		expect(session.status).toBe("NotLoggedIn");

		const errors = logger.at("error");
		expect(errors).toHaveLength(1);
		expect(errors[0].obj).toEqual({ module: "login", platform: "xhs", method: "qrcode", reason: "登录超时：3 次检查后仍未登录" });

		await expect(sm.ensureLoggedIn()).rejects.toThrow("登录已失败，需要重新创建会话");
	});

	it("会话失效且没有登录驱动时直接失败", async () => {
		const sm = machine();
		await expect(sm.ensureLoggedIn()).rejects.toBeInstanceOf(LoginFailedError);
		expect(sm.transitions.map((t) => t.to)).toEqual(["LoggedOut", "LoginFailed"]);
	});

	it("等待期间出现滑块时先求解，再回到等待状态", async () => {
		const driver = new FakeLoginDriver(1, true, 1);
		const slider = new SliderSolver({ sleep: instantSleep() });
		const sm = machine({ driver, slider });
		await expect(sm.ensureLoggedIn()).resolves.toBe(true);
		expect(sm.transitions.map((t) => t.to)).toEqual(["LoggedOut", "AwaitingQRCode", "SolvingSlider", "AwaitingQRCode", "LoggedIn"]);
		expect(driver.drags).toBe(1);
	});

	it("滑块求解失败导致登录失败", async () => {
		const driver = new FakeLoginDriver(1, true, Number.POSITIVE_INFINITY);
		const slider = new SliderSolver({ maxAttempts: 4, attemptsPerChallenge: 2, sleep: instantSleep() });
		const sm = machine({ driver, slider });
		await expect(sm.ensureLoggedIn()).rejects.toThrow("滑块验证失败（4 次）");
		expect(sm.transitions[sm.transitions.length - 1]).toEqual({ from: "SolvingSlider", to: "LoginFailed" });
	});

	it("出现滑块但没有求解器时失败", async () => {
		const sm = machine({ driver: new FakeLoginDriver(1, true) });
		await expect(sm.ensureLoggedIn()).rejects.toThrow("出现滑块验证但未配置求解器");
	});
});
