/* 中文注释：滑块验证求解：按外部给出的缺口距离生成轨迹并回放，失败若干次后换图 */
import type { ILogger } from "../contracts/ILogger.js";
import type { ILoginDriver } from "../contracts/ILoginDriver.js";
import { dragSlider } from "../humanization/actions/slider.js";
import { planSliderTrack } from "../humanization/plans/sliderPlan.js";
import { sleep as defaultSleep, type SleepFn } from "../lib/backoff.js";

export interface SliderSolverOptions {
	/** 总尝试上限 */
	maxAttempts?: number;
	/** 同一张验证图最多尝试几次，超过后请求新图 */
	attemptsPerChallenge?: number;
	/** 松手后等待验证结果的时间 */
	settleMs?: number;
	sleep?: SleepFn;
	logger?: ILogger;
}

export interface SliderOutcome {
	solved: boolean;
	attempts: number;
	refreshes: number;
}

export class SliderSolver {
	private readonly maxAttempts: number;
	private readonly perChallenge: number;
	private readonly settleMs: number;
	private readonly sleep: SleepFn;
	private log?: ILogger;

	constructor(opts: SliderSolverOptions = {}) {
		this.maxAttempts = Math.max(1, opts.maxAttempts ?? 20);
		this.perChallenge = Math.max(1, opts.attemptsPerChallenge ?? 3);
		this.settleMs = opts.settleMs ?? 1000;
		this.sleep = opts.sleep ?? defaultSleep;
		this.log = opts.logger?.child({ module: "slider" });
	}

	async solve(driver: ILoginDriver, signal?: AbortSignal): Promise<SliderOutcome> {
		let attempts = 0;
		let refreshes = 0;
		let onChallenge = 0;
		while (attempts < this.maxAttempts) {
			const challenge = await driver.detectSlider();
			if (!challenge) return { solved: true, attempts, refreshes };
			attempts++;
			onChallenge++;
			// 首次用简单轨迹，之后换成带过冲的困难轨迹
			const track = planSliderTrack(challenge.distance, onChallenge === 1 ? "easy" : "hard");
			await dragSlider(driver.mouse, challenge.handle, track, { sleep: this.sleep, signal });
			await this.sleep(this.settleMs, signal);
			if (await driver.sliderCleared()) {
				this.log?.info({ attempts, refreshes }, "滑块验证通过");
				return { solved: true, attempts, refreshes };
			}
			this.log?.debug({ attempt: attempts, distance: challenge.distance }, "滑块验证未通过");
			if (onChallenge >= this.perChallenge) {
				await driver.refreshSlider();
				refreshes++;
				onChallenge = 0;
				this.log?.info({ attempt: attempts }, "多次未通过，已请求新的验证图");
			}
		}
		this.log?.warn({ attempts, refreshes }, "滑块验证超过尝试上限");
		return { solved: false, attempts, refreshes };
	}
}
