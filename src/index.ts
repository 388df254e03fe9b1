/**
 * 多平台爬取编排核心
 *
 * @packageDocumentation
 */

export * from "./contracts/index.js";
export * from "./core/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export { ExpiringLocalCache, type ICache } from "./cache/ExpiringLocalCache.js";
export * from "./proxy/index.js";
export * from "./login/index.js";
export * from "./crawler/types.js";
export { CrawlOrchestrator, crawlSettings } from "./crawler/CrawlOrchestrator.js";
export type { CrawlOrchestratorOptions, CrawlSettings, CrawlTargets, FailedTask, RunReport } from "./crawler/CrawlOrchestrator.js";
export { CommentTreeFetcher } from "./crawler/CommentTreeFetcher.js";
export type { CommentFetchOptions, CommentFetchStats, CommentPage } from "./crawler/CommentTreeFetcher.js";
export { RequestExecutor, TaskScope, type LeaseSource, type RequestRunner } from "./crawler/RequestExecutor.js";
export { WorkerPool, type WorkerPoolResult } from "./crawler/WorkerPool.js";
export { RetryPolicy, withRetry, type RetryOptions } from "./lib/retry.js";
export { BackoffScheduler, sleep, type SleepFn } from "./lib/backoff.js";
export { HttpClient, errorForStatus } from "./lib/http.js";
export { convertCookies, parseCookieString, type CookieLike } from "./lib/cookies.js";
export { SchemaCache } from "./lib/schemaCache.js";
export { planSliderTrack, trackDistance } from "./humanization/plans/sliderPlan.js";
export { dragSlider } from "./humanization/actions/slider.js";
export type { SliderStep, SliderLevel, Box } from "./humanization/types.js";
export { SignedHttpClient, type SignedHttpClientOptions } from "./clients/SignedHttpClient.js";
export * from "./platforms/registry.js";
export { runPlatforms, type RunnerDeps, type RunResult } from "./runner/multiPlatformRunner.js";
export { MemorySink } from "./store/MemorySink.js";
export { JsonLinesSink } from "./store/JsonLinesSink.js";
