/* 中文注释：滑块拖动回放（按下 → 逐步移动 → 松开） */
import type { Mouse } from "playwright-core";
import { sleep as defaultSleep, type SleepFn } from "../../lib/backoff.js";
import type { Box, SliderStep } from "../types.js";

export type SliderMouse = Pick<Mouse, "move" | "down" | "up">;

export interface DragOptions {
	signal?: AbortSignal;
	sleep?: SleepFn;
}

/**
 * 从滑块手柄中心出发回放轨迹
 *
 * @returns 松开时相对起点的水平位移
 */
export async function dragSlider(mouse: SliderMouse, handle: Box, track: SliderStep[], opts: DragOptions = {}): Promise<number> {
	const sleep = opts.sleep ?? defaultSleep;
	const startX = handle.x + handle.width / 2;
	const startY = handle.y + handle.height / 2;
	await mouse.move(startX, startY);
	await mouse.down();
	let offset = 0;
	try {
		for (const step of track) {
			offset += step.dx;
			await mouse.move(startX + offset, startY + step.dy, { steps: 1 });
			await sleep(step.waitMs, opts.signal);
		}
	} finally {
		await mouse.up();
	}
	return offset;
}
