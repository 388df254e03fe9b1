import type { CookieLike } from "../lib/cookies.js";
import type { Box } from "../humanization/types.js";
import type { SliderMouse } from "../humanization/actions/slider.js";

/**
 * 一次滑块验证
 *
 * distance 由外部的缺口识别能力给出（像素），核心只据此生成拖动轨迹。
 */
export interface SliderChallenge {
	handle: Box;
	distance: number;
}

/**
 * 平台登录驱动（浏览器自动化部分，由平台实现）
 *
 * 登录状态机只通过这些操作推进流程，不关心页面结构。
 */
export interface ILoginDriver {
	readonly mouse: SliderMouse;

	/** 打开登录弹窗并展示二维码 */
	showQrCode(): Promise<void>;
	/** 填写手机号并点击发送验证码 */
	requestSmsCode(phone: string): Promise<void>;
	submitSmsCode(code: string): Promise<void>;
	/** 把 Cookie 写入浏览器上下文 */
	injectCookies(cookies: CookieLike[]): Promise<void>;

	/** 登录成功判据（本地存储标记或登录态 Cookie） */
	isLoggedIn(): Promise<boolean>;
	readCookies(): Promise<CookieLike[]>;

	/** 当前页面上的滑块验证；没有则返回 undefined */
	detectSlider(): Promise<SliderChallenge | undefined>;
	/** 验证浮层是否已消失 */
	sliderCleared(): Promise<boolean>;
	/** 换一张验证图 */
	refreshSlider(): Promise<void>;
}
