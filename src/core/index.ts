/**
 * 核心模块
 *
 * 提供依赖注入容器和错误体系。
 *
 * @packageDocumentation
 */

export { ServiceContainer } from "./container.js";
export * from "./errors/index.js";
