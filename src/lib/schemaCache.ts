/* 中文注释：按键惰性填充的结构缓存，由持有者显式创建和传递 */

/**
 * 结构缓存
 *
 * 首次访问某个键时调用 loader 计算并记住结果，之后直接返回；
 * 没有全局状态，生命周期跟随持有它的对象。
 */
export class SchemaCache<V> {
	private entries = new Map<string, V>();

	get(key: string, loader: () => V): V {
		const hit = this.entries.get(key);
		if (hit !== undefined) return hit;
		const value = loader();
		this.entries.set(key, value);
		return value;
	}

	peek(key: string): V | undefined {
		return this.entries.get(key);
	}

	get size(): number {
		return this.entries.size;
	}

	clear(): void {
		this.entries.clear();
	}
}
