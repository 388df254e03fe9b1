/* 中文注释：概率分布函数（均匀/整数），随机源可注入以便复现 */
export type Rng = () => number

export function randomUniform(min = 0, max = 1, rng: Rng = Math.random): number {
  return min + rng() * (max - min)
}

export function randomInt(min: number, max: number, rng: Rng = Math.random): number {
  return Math.floor(randomUniform(min, max + 1, rng))
}
