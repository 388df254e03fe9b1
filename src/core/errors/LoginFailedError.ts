import { BusinessError } from "./BusinessError.js";

/**
 * 登录失败
 *
 * 验证次数耗尽或登录方式不可用。对当前平台的本次运行是致命的，
 * 由多平台运行器在平台粒度捕获，其他平台不受影响。
 */
export class LoginFailedError extends BusinessError {
	readonly code = "LOGIN_FAILED";
	readonly retryable = false;

	constructor(message = "登录失败", context?: Record<string, unknown>) {
		super(message, context);
	}
}
