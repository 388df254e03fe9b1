/* 中文注释：平台注册中心，统一工厂签名 (ctx) => PlatformBundle */
import type { AppConfig } from "../config/schema.js";
import type { PlatformSearchConfig } from "../config/platforms.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { ILoginDriver } from "../contracts/ILoginDriver.js";
import type { IPlatformAdapter } from "../contracts/IPlatformClient.js";
import { ValidationError } from "../core/errors/ValidationError.js";
import type { SessionState } from "../login/SessionState.js";

/** 一个平台运行所需的外部协作者 */
export interface PlatformBundle {
	adapter: IPlatformAdapter;
	/** 浏览器登录驱动；纯 HTTP 平台可不提供 */
	loginDriver?: ILoginDriver;
	/** 出现即视为已登录的 Cookie 名 */
	loginCookies?: string[];
	/** 平台运行结束后释放浏览器等资源 */
	close?(): Promise<void>;
}

export interface PlatformFactoryContext {
	platform: string;
	config: AppConfig;
	search: PlatformSearchConfig;
	session: SessionState;
	logger: ILogger;
}

export type PlatformFactory = (ctx: PlatformFactoryContext) => PlatformBundle | Promise<PlatformBundle>;

/** 适配器模块（--adapter 指向的模块需导出 register） */
export interface AdapterModule {
	register(registry: PlatformRegistry): void | Promise<void>;
}

export function isAdapterModule(mod: unknown): mod is AdapterModule {
	return typeof mod === "object" && mod !== null && "register" in mod && typeof mod.register === "function";
}

export class PlatformRegistry {
	private factories = new Map<string, { factory: PlatformFactory; description: string }>();

	register(platform: string, factory: PlatformFactory, description = ""): this {
		if (this.factories.has(platform)) throw new ValidationError(`平台已注册：${platform}`, { field: "platform" });
		this.factories.set(platform, { factory, description });
		return this;
	}

	has(platform: string): boolean {
		return this.factories.has(platform);
	}

	resolve(platform: string): PlatformFactory {
		const entry = this.factories.get(platform);
		if (!entry) throw new ValidationError(`未注册的平台：${platform}`, { field: "platform", value: platform });
		return entry.factory;
	}

	list(): Array<{ platform: string; description: string }> {
		return [...this.factories.entries()].map(([platform, { description }]) => ({ platform, description }));
	}
}
