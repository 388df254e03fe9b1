#!/usr/bin/env node
/* 中文注释：命令行入口：加载配置与平台适配器，按平台并发运行，SIGINT/SIGTERM 触发协作式取消 */
import { pathToFileURL } from "node:url";
import { resolve } from "node:path";
import { loadConfig } from "./config/loader.js";
import { ServiceContainer } from "./core/container.js";
import { ValidationError } from "./core/errors/ValidationError.js";
import { isAdapterModule, type PlatformRegistry } from "./platforms/registry.js";
import { runPlatforms } from "./runner/multiPlatformRunner.js";
import { argvToEnv, parseFlag, parseList } from "./utils/cliParser.js";

async function loadAdapters(paths: string[], registry: PlatformRegistry): Promise<void> {
	for (const p of paths) {
		const mod: unknown = await import(pathToFileURL(resolve(p)).href);
		if (!isAdapterModule(mod)) {
			throw new ValidationError(`适配器模块未导出 register(registry)：${p}`, { field: "adapter" });
		}
		await mod.register(registry);
	}
}

(async () => {
	const argv = process.argv.slice(2);
	const config = loadConfig({ ...process.env, ...argvToEnv(argv) });
	const container = new ServiceContainer(config);
	const logger = container.createLogger({ module: "cli" });
	const registry = container.createRegistry();

	try {
		await loadAdapters(parseList("adapter", argv) ?? [], registry);

		// 列出已注册平台
		if (parseFlag("list-platforms", argv)) {
			console.log(JSON.stringify(registry.list(), null, 2));
			return;
		}

		const controller = new AbortController();
		const onSignal = (sig: string) => {
			if (controller.signal.aborted) return;
			logger.warn({ sig }, "收到退出信号，当前任务完成后停止");
			controller.abort();
		};
		process.once("SIGINT", () => onSignal("SIGINT"));
		process.once("SIGTERM", () => onSignal("SIGTERM"));

		const res = await runPlatforms(config.platforms, {
			config,
			registry,
			sink: container.createSink(),
			logger,
			signal: controller.signal,
			smsCache: container.createSmsCache(),
		});

		logger.info(
			{ success: res.success, failed: res.failed, durationMs: res.durationMs, total: config.platforms.length },
			"运行完成",
		);
		if (res.failed.length > 0) process.exitCode = 1;
		if (controller.signal.aborted) process.exitCode = 130;
	} catch (err) {
		logger.error({ err }, "CLI 执行失败");
		process.exitCode = 1;
	} finally {
		await container.cleanup();
	}
})().catch((err: unknown) => {
	// 配置加载失败时日志尚未就绪
	console.error(err);
	process.exitCode = 1;
});
