/* 中文注释：滑块拖动轨迹（纯函数）：前快后慢，各步水平增量之和严格等于目标距离 */
import { easeOutCubic, easeOutQuart } from "../core/timing.js";
import { randomInt, randomUniform, type Rng } from "../core/distributions.js";
import { getSliderProfile } from "../profiles.js";
import type { SliderLevel, SliderPlanOptions, SliderStep } from "../types.js";

/**
 * 生成滑块拖动轨迹
 *
 * 先按缓动曲线求出每一步的整数目标位置（中间位置加少量扰动并保持单调），
 * 再取相邻位置之差作为增量；最后一个位置固定为目标距离，所以增量之和恒等于 distance。
 * hard 档在末端越过目标几个像素再拉回。
 */
export function planSliderTrack(
	distance: number,
	level: SliderLevel = "easy",
	opts: Omit<SliderPlanOptions, "level"> = {},
	rng: Rng = Math.random,
): SliderStep[] {
	const target = Math.round(distance);
	if (!Number.isFinite(target) || target <= 0) throw new RangeError(`滑块距离必须为正数: ${distance}`);

	const profile = getSliderProfile(level);
	const easing = level === "hard" ? easeOutQuart : easeOutCubic;
	const steps = Math.min(target, Math.max(1, Math.floor(opts.steps ?? randomInt(profile.minSteps, profile.maxSteps, rng))));
	const wobble = Math.max(0, opts.wobblePx ?? profile.wobblePx);
	const [overMin, overMax] = profile.overshootPx;
	const overshoot =
		level === "hard" && target > 20 ? Math.max(0, Math.round(opts.overshootPx ?? randomUniform(overMin, overMax, rng))) : 0;

	// 主段走到 target + overshoot，之后回拉到 target
	const peak = target + overshoot;
	const positions: number[] = [];
	let prev = 0;
	for (let i = 1; i <= steps; i++) {
		const t = i / steps;
		const ideal = i === steps ? peak : Math.round(peak * easing(t) + randomUniform(-1, 1, rng) * profile.noisePx);
		const pos = Math.min(peak, Math.max(prev, ideal));
		positions.push(pos);
		prev = pos;
	}
	if (overshoot > 0) {
		const half = Math.ceil(overshoot / 2);
		positions.push(target + overshoot - half, target);
	}

	const track: SliderStep[] = [];
	let last = 0;
	positions.forEach((pos, i) => {
		const dx = pos - last;
		last = pos;
		if (dx === 0) return;
		const t = (i + 1) / positions.length;
		track.push({
			dx,
			dy: Math.round(randomUniform(-1, 1, rng) * wobble),
			waitMs: Math.round(profile.stepWaitMs * (1 + 2 * t * t)),
		});
	});
	// 松手前回到水平基线
	track[track.length - 1] = { ...track[track.length - 1], dy: 0 };
	return track;
}

/** 轨迹的水平总位移 */
export function trackDistance(track: SliderStep[]): number {
	return track.reduce((sum, s) => sum + s.dx, 0);
}
