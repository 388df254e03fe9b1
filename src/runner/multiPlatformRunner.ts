/* 中文注释：多平台运行器，并发单位=平台（各自的会话与代理池），单个平台失败不影响其他平台 */
import PQueue from "p-queue";
import type { ICache } from "../cache/ExpiringLocalCache.js";
import { resolvePlatformConfig } from "../config/platforms.js";
import type { AppConfig } from "../config/schema.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { IPersistenceSink } from "../contracts/IPersistenceSink.js";
import { BaseError } from "../core/errors/BaseError.js";
import { errorMessage } from "../core/errors/classify.js";
import { CrawlOrchestrator, crawlSettings, type RunReport } from "../crawler/CrawlOrchestrator.js";
import { RequestExecutor, type LeaseSource } from "../crawler/RequestExecutor.js";
import { BackoffScheduler, type SleepFn } from "../lib/backoff.js";
import { RetryPolicy } from "../lib/retry.js";
import { LoginStateMachine } from "../login/LoginStateMachine.js";
import { SessionProbe } from "../login/sessionProbe.js";
import { SessionState } from "../login/SessionState.js";
import { SliderSolver } from "../login/SliderSolver.js";
import type { PlatformRegistry } from "../platforms/registry.js";
import { createProxyPool } from "../proxy/index.js";

export interface RunnerDeps {
	config: AppConfig;
	registry: PlatformRegistry;
	sink: IPersistenceSink;
	logger: ILogger;
	signal?: AbortSignal;
	/** 短信验证码缓存（手机号登录） */
	smsCache?: ICache<string>;
	/** 每个平台各自的租约来源；默认按配置创建代理池 */
	createLeaseSource?: (platform: string) => Promise<LeaseSource | undefined>;
	/** 同时运行的平台数，默认全部并发 */
	concurrency?: number;
	sleep?: SleepFn;
}

export interface PlatformFailure {
	platform: string;
	code: string;
	error: string;
}

export interface RunResult {
	success: string[];
	failed: PlatformFailure[];
	reports: Record<string, RunReport>;
	durationMs: number;
}

/**
 * 为每个平台执行：会话探测 → 必要时登录 → 按模式爬取
 */
export async function runPlatforms(platforms: string[], deps: RunnerDeps): Promise<RunResult> {
	const start = Date.now();
	const pq = new PQueue({ concurrency: Math.max(1, deps.concurrency ?? platforms.length) });
	const success: string[] = [];
	const failed: PlatformFailure[] = [];
	const reports: Record<string, RunReport> = {};

	await Promise.all(
		platforms.map((platform) =>
			pq.add(async () => {
				const log = deps.logger.child({ platform });
				try {
					reports[platform] = await runPlatform(platform, deps, log);
					success.push(platform);
				} catch (err) {
					failed.push({ platform, code: err instanceof BaseError ? err.code : "UNKNOWN", error: errorMessage(err) });
					log.error({ err }, "平台运行失败");
				}
			}),
		),
	);

	return { success, failed, reports, durationMs: Date.now() - start };
}

async function runPlatform(platform: string, deps: RunnerDeps, log: ILogger): Promise<RunReport> {
	const { config, signal } = deps;
	const search = resolvePlatformConfig(platform);
	const session = new SessionState(platform, {
		persistent: config.login.saveState,
		cookies: config.login.type === "cookie" ? config.login.cookies : undefined,
	});
	const bundle = await deps.registry.resolve(platform)({ platform, config, search, session, logger: log });

	try {
		const login = new LoginStateMachine({
			platform,
			method: config.login.type,
			session,
			probe: new SessionProbe({ loginCookies: bundle.loginCookies, adapter: bundle.adapter, logger: log }),
			driver: bundle.loginDriver,
			slider: new SliderSolver({ maxAttempts: config.login.sliderMaxAttempts, sleep: deps.sleep, logger: log }),
			phone: config.login.phone,
			cookies: config.login.cookies,
			smsCache: deps.smsCache,
			maxAttempts: config.login.maxAttempts,
			pollMs: config.login.pollMs,
			sleep: deps.sleep,
			logger: log,
		});
		await login.ensureLoggedIn(signal);

		const leases = deps.createLeaseSource
			? await deps.createLeaseSource(platform)
			: await createProxyPool(config.proxy, log);
		const retry = new RetryPolicy({
			attempts: config.retry.attempts,
			baseMs: config.retry.waitMs,
			wait: "fixed",
			sleep: deps.sleep,
		});
		const orchestrator = new CrawlOrchestrator({
			adapter: bundle.adapter,
			sink: deps.sink,
			executor: new RequestExecutor({ platform, retry, session: () => session.snapshot(), leases, signal, logger: log }),
			backoff: new BackoffScheduler({ intervalMs: config.limits.crawlIntervalMs, signal, sleep: deps.sleep, logger: log }),
			settings: crawlSettings(config, search),
			signal,
			logger: log,
		});
		return await orchestrator.run(config.crawlerType, {
			keywords: config.targets.keywords,
			ids: config.targets.ids,
			creators: config.targets.creators,
		});
	} finally {
		await bundle.close?.();
	}
}
