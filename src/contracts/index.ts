/**
 * 接口定义层（Contracts）
 *
 * 核心只依赖这些契约：平台客户端与适配器、签名器、登录驱动、代理供应商、持久化回调与日志。
 * 具体实现由平台适配器模块提供。
 *
 * @packageDocumentation
 */

export * from "./ILogger.js";
export * from "./IPlatformClient.js";
export * from "./ISigner.js";
export * from "./ILoginDriver.js";
export * from "./IProxyProvider.js";
export * from "./IPersistenceSink.js";
