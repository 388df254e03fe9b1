/* 中文注释：拟人化动作的统一类型定义（计划层与执行层解耦） */
export interface Point { x: number; y: number }

// 元素包围盒（与 playwright boundingBox() 返回一致）
export interface Box { x: number; y: number; width: number; height: number }

export type SliderLevel = "easy" | "hard"

// 滑块轨迹的每一步：dx 为水平增量，dy 为相对起点的垂直偏移（非累计），waitMs 为步后停顿
export interface SliderStep { dx: number; dy: number; waitMs: number }

export interface SliderPlanOptions {
  level?: SliderLevel;
  steps?: number;            // 轨迹步数（未给则按档案随机）
  wobblePx?: number;         // 垂直抖动幅度
  overshootPx?: number;      // 末端过冲像素（仅 hard 档，0 关闭）
}
