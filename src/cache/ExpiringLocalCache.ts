/* 中文注释：进程内带 TTL 的键值缓存（读时惰性过期 + 定时清扫） */

export interface ICache<V> {
	get(key: string): V | undefined;
	set(key: string, value: V, ttlSec: number): void;
	keys(pattern: string): string[];
	delete(key: string): void;
}

/**
 * 本地过期缓存
 *
 * 代理供应商用它记住未过期的租约；手机号登录从这里轮询外部写入的短信验证码。
 * 清扫定时器已 unref，不会阻止进程退出；不再使用时调用 close()。
 */
export class ExpiringLocalCache<V = string> implements ICache<V> {
	private container = new Map<string, { value: V; expiresAt: number }>();
	private timer?: NodeJS.Timeout;

	constructor(
		sweepIntervalMs = 10_000,
		private now: () => number = Date.now,
	) {
		if (sweepIntervalMs > 0) {
			this.timer = setInterval(() => this.sweep(), sweepIntervalMs);
			this.timer.unref?.();
		}
	}

	get(key: string): V | undefined {
		const entry = this.container.get(key);
		if (!entry) return undefined;
		if (entry.expiresAt < this.now()) {
			this.container.delete(key);
			return undefined;
		}
		return entry.value;
	}

	set(key: string, value: V, ttlSec: number): void {
		this.container.set(key, { value, expiresAt: this.now() + ttlSec * 1000 });
	}

	delete(key: string): void {
		this.container.delete(key);
	}

	/**
	 * 列出匹配的键：“*” 为全部，否则去掉通配符后按子串匹配
	 */
	keys(pattern: string): string[] {
		const all = [...this.container.keys()];
		if (pattern === "*") return all;
		const needle = pattern.replaceAll("*", "");
		return all.filter((k) => k.includes(needle));
	}

	get size(): number {
		return this.container.size;
	}

	sweep(): void {
		const now = this.now();
		for (const [key, entry] of this.container) {
			if (entry.expiresAt < now) this.container.delete(key);
		}
	}

	close(): void {
		if (this.timer) clearInterval(this.timer);
		this.timer = undefined;
	}
}
