/* 中文注释：登录状态机：探测会话 → 选择登录方式 → （可能的滑块验证）→ 轮询登录成功 */
import type { ICache } from "../cache/ExpiringLocalCache.js";
import type { LoginType } from "../config/schema.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { ILoginDriver } from "../contracts/ILoginDriver.js";
import { LoginFailedError } from "../core/errors/LoginFailedError.js";
import { sleep as defaultSleep, type SleepFn } from "../lib/backoff.js";
import { dictToCookies, parseCookieString } from "../lib/cookies.js";
import type { SessionProbe } from "./sessionProbe.js";
import type { SessionState, SessionStatus } from "./SessionState.js";
import type { SliderSolver } from "./SliderSolver.js";

export type LoginState =
	| "Unchecked"
	| "LoggedIn"
	| "LoggedOut"
	| "AwaitingQRCode"
	| "AwaitingSMSCode"
	| "AwaitingCookieInjection"
	| "SolvingSlider"
	| "LoginFailed";

type AwaitingState = "AwaitingQRCode" | "AwaitingSMSCode" | "AwaitingCookieInjection";

const AWAITING_EXITS = ["SolvingSlider", "LoggedIn", "LoginFailed"] as const;

/** 合法迁移表 */
export const LOGIN_TRANSITIONS: Readonly<Record<LoginState, readonly LoginState[]>> = {
	Unchecked: ["LoggedIn", "LoggedOut"],
	LoggedOut: ["AwaitingQRCode", "AwaitingSMSCode", "AwaitingCookieInjection", "LoginFailed"],
	AwaitingQRCode: AWAITING_EXITS,
	AwaitingSMSCode: AWAITING_EXITS,
	AwaitingCookieInjection: AWAITING_EXITS,
	// 滑块通过后回到原来的等待状态继续轮询
	SolvingSlider: ["AwaitingQRCode", "AwaitingSMSCode", "AwaitingCookieInjection", "LoggedIn", "LoginFailed"],
	// 每次平台运行前重新校验
	LoggedIn: ["Unchecked"],
	LoginFailed: [],
};

const METHOD_STATE: Record<LoginType, AwaitingState> = {
	qrcode: "AwaitingQRCode",
	phone: "AwaitingSMSCode",
	cookie: "AwaitingCookieInjection",
};

function sessionStatusOf(state: LoginState): SessionStatus {
	if (state === "LoggedIn") return "LoggedIn";
	if (state.startsWith("Awaiting") || state === "SolvingSlider") return "AwaitingVerification";
	return "NotLoggedIn";
}

export interface LoginStateMachineOptions {
	platform: string;
	method: LoginType;
	session: SessionState;
	probe: SessionProbe;
	/** 未提供时无法交互式登录，会话失效即视为登录失败 */
	driver?: ILoginDriver;
	slider?: SliderSolver;
	/** 手机号登录需要 */
	phone?: string;
	/** Cookie 登录需要（a=1; b=2） */
	cookies?: string;
	/** 短信验证码由外部接收端写入此缓存，键为 <platform>_<phone> */
	smsCache?: ICache<string>;
	/** 登录成功轮询次数上限 */
	maxAttempts?: number;
	pollMs?: number;
	sleep?: SleepFn;
	logger?: ILogger;
}

export interface TransitionRecord {
	from: LoginState;
	to: LoginState;
}

/**
 * 登录状态机
 *
 * @remarks
 * - 只有这里会修改 SessionState（登录成功后写回 Cookie）
 * - 轮询超过 maxAttempts 或滑块求解失败进入 LoginFailed，并抛出 LoginFailedError
 * - LoginFailed 是终态；同一平台需要新的状态机实例才能重试
 */
export class LoginStateMachine {
	private current: LoginState = "Unchecked";
	private readonly history: TransitionRecord[] = [];
	private readonly maxAttempts: number;
	private readonly pollMs: number;
	private readonly sleep: SleepFn;
	private log?: ILogger;

	constructor(private opts: LoginStateMachineOptions) {
		this.maxAttempts = Math.max(1, opts.maxAttempts ?? 120);
		this.pollMs = Math.max(0, opts.pollMs ?? 1000);
		this.sleep = opts.sleep ?? defaultSleep;
		this.log = opts.logger?.child({ module: "login", platform: opts.platform, method: opts.method });
	}

	get state(): LoginState {
		return this.current;
	}

	get transitions(): readonly TransitionRecord[] {
		return this.history;
	}

	/**
	 * 确保会话已登录
	 *
	 * @returns 本次是否执行了交互式登录（会话仍有效时为 false）
	 * @throws LoginFailedError
	 */
	async ensureLoggedIn(signal?: AbortSignal): Promise<boolean> {
		if (this.current === "LoginFailed") {
			throw new LoginFailedError("登录已失败，需要重新创建会话", { platform: this.opts.platform });
		}
		if (this.current === "LoggedIn") this.transition("Unchecked");

		const pong = await this.opts.probe.pong(this.opts.session.snapshot(), { signal });
		if (pong.alive) {
			this.transition("LoggedIn");
			this.log?.info({ source: pong.source }, "会话有效，跳过登录");
			return false;
		}
		this.transition("LoggedOut");
		await this.login(signal);
		return true;
	}

	private async login(signal?: AbortSignal): Promise<void> {
		const driver = this.opts.driver;
		if (!driver) return this.fail("会话已失效且没有可用的登录驱动");
		const awaiting = METHOD_STATE[this.opts.method];
		this.transition(awaiting);
		this.log?.info("开始登录");

		switch (this.opts.method) {
			case "qrcode":
				await driver.showQrCode();
				this.log?.info("请使用 App 扫描二维码登录");
				break;
			case "phone":
				await this.loginByPhone(driver, signal);
				break;
			case "cookie":
				await this.injectCookies(driver);
				break;
		}

		if (await this.waitForLogin(driver, awaiting, signal)) {
			this.opts.session.updateCookies(await driver.readCookies(), this.opts.method);
			this.transition("LoggedIn");
			this.log?.info("登录成功");
			return;
		}
		return this.fail(`登录超时：${this.maxAttempts} 次检查后仍未登录`);
	}

	private async loginByPhone(driver: ILoginDriver, signal?: AbortSignal): Promise<void> {
		const { phone, smsCache } = this.opts;
		if (!phone) return this.fail("手机号登录需要配置 LOGIN_PHONE");
		if (!smsCache) return this.fail("手机号登录需要短信验证码缓存");
		await driver.requestSmsCode(phone);
		const key = `${this.opts.platform}_${phone}`;
		for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
			await this.solveSliderIfPresent(driver, "AwaitingSMSCode", signal);
			const code = smsCache.get(key);
			if (code) {
				this.log?.info({ attempt }, "已获取短信验证码");
				await driver.submitSmsCode(code);
				return;
			}
			await this.sleep(this.pollMs, signal);
		}
		return this.fail(`等待短信验证码超时（${this.maxAttempts} 次）`);
	}

	private async injectCookies(driver: ILoginDriver): Promise<void> {
		const dict = parseCookieString(this.opts.cookies ?? "");
		if (Object.keys(dict).length === 0) return this.fail("Cookie 登录需要配置 COOKIES");
		await driver.injectCookies(dictToCookies(dict));
	}

	private async waitForLogin(driver: ILoginDriver, awaiting: AwaitingState, signal?: AbortSignal): Promise<boolean> {
		for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
			await this.solveSliderIfPresent(driver, awaiting, signal);
			if (await driver.isLoggedIn()) return true;
			this.log?.debug({ attempt }, "尚未登录，继续等待");
			await this.sleep(this.pollMs, signal);
		}
		return false;
	}

	private async solveSliderIfPresent(driver: ILoginDriver, awaiting: AwaitingState, signal?: AbortSignal): Promise<void> {
		if (!(await driver.detectSlider())) return;
		if (!this.opts.slider) return this.fail("出现滑块验证但未配置求解器");
		this.transition("SolvingSlider");
		const outcome = await this.opts.slider.solve(driver, signal);
		if (!outcome.solved) return this.fail(`滑块验证失败（${outcome.attempts} 次）`);
		this.transition(awaiting);
	}

	private transition(to: LoginState): void {
		const from = this.current;
		if (!LOGIN_TRANSITIONS[from].includes(to)) {
			throw new LoginFailedError(`非法的登录状态迁移: ${from} → ${to}`, { platform: this.opts.platform, from, to });
		}
		this.current = to;
		this.history.push({ from, to });
		this.opts.session.setStatus(sessionStatusOf(to));
	}

	private fail(reason: string): never {
		this.transition("LoginFailed");
		this.log?.error({ reason }, "登录失败");
		throw new LoginFailedError(reason, { platform: this.opts.platform, method: this.opts.method });
	}
}
