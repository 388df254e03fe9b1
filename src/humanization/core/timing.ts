/* 中文注释：缓动函数（easing）；拖动轨迹用 easeOut 系列做前快后慢 */
export type EasingFunction = (t: number) => number

export const easeOutCubic: EasingFunction = (t) => 1 - Math.pow(1 - t, 3)
export const easeOutQuart: EasingFunction = (t) => 1 - Math.pow(1 - t, 4)
