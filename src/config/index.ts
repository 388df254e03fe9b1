/**
 * 配置模块
 *
 * dotenv 读取 .env，zod 校验并转换为强类型 AppConfig；
 * 平台常量通过 PlatformSearchConfig 在启动时一次性解析。
 *
 * @packageDocumentation
 */

export { loadConfig, toAppConfig } from "./loader.js";
export { resolvePlatformConfig, type PlatformSearchConfig } from "./platforms.js";
export * from "./schema.js";
