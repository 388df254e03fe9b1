/* 中文注释：滑块轨迹与拖动回放测试 */
import { describe, it, expect } from "vitest";
import { planSliderTrack, trackDistance } from "../../../src/humanization/plans/sliderPlan.js";
import { dragSlider } from "../../../src/humanization/actions/slider.js";
import { CancelledError } from "../../../src/core/errors/CancelledError.js";
import { FakeMouse, instantSleep } from "../../helpers/fakes.js";

describe("planSliderTrack", () => {
	it("两档轨迹的水平位移之和都严格等于目标距离", () => {
		for (let d = 1; d <= 2000; d++) {
			expect(trackDistance(planSliderTrack(d, "easy"))).toBe(d);
			expect(trackDistance(planSliderTrack(d, "hard"))).toBe(d);
		}
	});

	it("easy 单调前进，没有回拉", () => {
		for (let i = 0; i < 50; i++) {
			const track = planSliderTrack(180, "easy");
			expect(track.every((s) => s.dx > 0)).toBe(true);
		}
	});

	it("hard 在较长距离上先过冲再回拉", () => {
		const track = planSliderTrack(150, "hard");
		expect(track[track.length - 1].dx).toBeLessThan(0);
		const peak = track.filter((s) => s.dx > 0).reduce((sum, s) => sum + s.dx, 0);
		expect(peak).toBeGreaterThan(150);
	});

	it("最后一步回到水平基线，步数不超过距离", () => {
		const track = planSliderTrack(5, "easy", { steps: 40 });
		expect(track.length).toBeLessThanOrEqual(5);
		expect(track[track.length - 1].dy).toBe(0);
	});

	it("非正距离抛出 RangeError", () => {
		expect(() => planSliderTrack(0)).toThrow(RangeError);
		expect(() => planSliderTrack(-3, "hard")).toThrow(RangeError);
	});
});

describe("dragSlider", () => {
	const handle = { x: 10, y: 100, width: 40, height: 40 };

	it("从手柄中心按下，逐步移动后松开", async () => {
		const mouse = new FakeMouse();
		const waits: number[] = [];
		const track = [
			{ dx: 5, dy: 1, waitMs: 3 },
			{ dx: 7, dy: 0, waitMs: 4 },
		];
		await expect(dragSlider(mouse, handle, track, { sleep: instantSleep(waits) })).resolves.toBe(12);
		expect(mouse.events).toEqual([
			{ type: "move", x: 30, y: 120 },
			{ type: "down" },
			{ type: "move", x: 35, y: 121 },
			{ type: "move", x: 42, y: 120 },
			{ type: "up" },
		]);
		expect(waits).toEqual([3, 4]);
	});

	it("中途取消仍然松开鼠标", async () => {
		const mouse = new FakeMouse();
		const controller = new AbortController();
		controller.abort();
		const run = dragSlider(mouse, handle, [{ dx: 5, dy: 0, waitMs: 3 }], { sleep: instantSleep(), signal: controller.signal });
		await expect(run).rejects.toBeInstanceOf(CancelledError);
		expect(mouse.events.map((e) => e.type)).toEqual(["move", "down", "move", "up"]);
	});
});
