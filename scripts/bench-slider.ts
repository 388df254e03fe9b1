/* 中文注释：滑块轨迹与缓动的微基准 */
import { Bench } from "tinybench";
import { writeFile, mkdir } from "node:fs/promises";
import { planSliderTrack } from "../src/humanization/plans/sliderPlan.js";
import { easeOutCubic } from "../src/humanization/core/timing.js";

async function main() {
	const bench = new Bench({ time: 100, iterations: 100 });

	bench.add("slider-easy-260px", () => {
		planSliderTrack(260, "easy");
	});

	bench.add("slider-hard-260px", () => {
		planSliderTrack(260, "hard");
	});

	bench.add("slider-easy-1..2000px", () => {
		for (let d = 1; d <= 2000; d += 37) planSliderTrack(d, "easy");
	});

	bench.add("easing-cubic-1k", () => {
		let acc = 0;
		for (let i = 0; i < 1000; i++) acc += easeOutCubic(i / 999);
		return acc;
	});

	await bench.run();

	const results = bench.tasks.map((t) => ({
		name: t.name,
		hz: t.result?.hz,
		mean: t.result?.mean,
		min: t.result?.min,
		max: t.result?.max,
		samples: t.result?.samples.length,
	}));

	await mkdir("artifacts", { recursive: true });
	const path = `artifacts/bench-slider-${Date.now()}.json`;
	await writeFile(path, JSON.stringify({ date: new Date().toISOString(), results }, null, 2), "utf-8");
	console.log(JSON.stringify({ ok: true, path }, null, 2));
}

main().catch((err) => {
	console.error(err);
	process.exit(1);
});
