/**
 * 错误体系（Error Hierarchy）
 *
 * @remarks
 * 错误层次：
 * - BaseError: 抽象基类
 *   - TransientError: 瞬态网络错误（可重试）
 *   - ValidationError: 输入/配置错误（不可重试）
 *   - PoolExhaustedError / ProviderUnavailableError / ProxyValidationError: 代理池相关
 *   - CancelledError: 协作式取消
 *   - BusinessError: 平台业务错误基类
 *     - BlockedError: 风控拦截（剔除代理后重试）
 *     - NotFoundError / ItemWithdrawnError: 内容不存在/已下架（永久）
 *     - LoginFailedError: 登录失败（平台级致命）
 *
 * @packageDocumentation
 */

export { BaseError } from "./BaseError.js";
export { BusinessError } from "./BusinessError.js";
export { TransientError } from "./TransientError.js";
export { BlockedError } from "./BlockedError.js";
export { NotFoundError, ItemWithdrawnError } from "./NotFoundError.js";
export { LoginFailedError } from "./LoginFailedError.js";
export { PoolExhaustedError, ProviderUnavailableError, ProxyValidationError } from "./ProxyErrors.js";
export { ValidationError } from "./ValidationError.js";
export { CancelledError } from "./CancelledError.js";
export { classifyError, isRetryable, errorMessage, type ErrorKind } from "./classify.js";
