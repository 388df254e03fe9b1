/* 中文注释：命令行参数解析（--name=value / --flag），值中的 "=" 原样保留 */
/**
 * 解析布尔标志
 *
 * @example
 * ```typescript
 * const list = parseFlag("list-platforms", process.argv);
 * ```
 */
export function parseFlag(name: string, argv: string[]): boolean {
	return argv.some((a) => a === `--${name}`);
}

/**
 * 解析逗号列表参数，支持重复出现：--ids=a,b --ids=c
 */
export function parseList(name: string, argv: string[]): string[] | undefined {
	const prefix = `--${name}=`;
	const values = argv.filter((a) => a.startsWith(prefix)).map((a) => a.slice(prefix.length));
	if (values.length === 0) return undefined;
	return values
		.flatMap((v) => v.split(","))
		.map((x) => x.trim())
		.filter(Boolean);
}

/**
 * 命令行参数映射为环境变量覆盖，交给配置加载统一校验
 */
export function argvToEnv(argv: string[]): Record<string, string> {
	const env: Record<string, string> = {};
	const map: Array<[string, string]> = [
		["platforms", "PLATFORMS"],
		["type", "CRAWLER_TYPE"],
		["keywords", "KEYWORDS"],
		["ids", "SPECIFIED_IDS"],
		["creators", "CREATOR_IDS"],
		["login", "LOGIN_TYPE"],
		["output", "OUTPUT_DIR"],
	];
	for (const [flag, key] of map) {
		const list = parseList(flag, argv);
		if (list) env[key] = list.join(",");
	}
	return env;
}
