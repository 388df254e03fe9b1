/* 中文注释：滑块拖动档案（步数、节律、抖动预设） */
import type { SliderLevel } from "./types.js";

export interface SliderProfile {
	minSteps: number; // 轨迹最少步数
	maxSteps: number; // 轨迹最多步数
	noisePx: number; // 中间位置的随机扰动
	wobblePx: number; // 垂直抖动
	stepWaitMs: number; // 起步时的每步停顿，尾段逐步放慢
	overshootPx: [number, number]; // 过冲范围，[0,0] 表示不过冲
}

const profiles: Record<SliderLevel, SliderProfile> = {
	// 简单：匀加速后减速，无过冲
	easy: { minSteps: 12, maxSteps: 20, noisePx: 1, wobblePx: 1, stepWaitMs: 12, overshootPx: [0, 0] },
	// 困难：步数更多、抖动更大，末端轻微过冲后回拉
	hard: { minSteps: 20, maxSteps: 32, noisePx: 2, wobblePx: 2, stepWaitMs: 16, overshootPx: [2, 6] },
};

export function getSliderProfile(level: SliderLevel = "easy"): SliderProfile {
	return profiles[level];
}
