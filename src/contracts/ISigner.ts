/**
 * 请求签名器（平台私有算法，对核心不透明）
 */
export interface SignInput {
	method: string;
	uri: string;
	payload?: unknown;
	cookies: Readonly<Record<string, string>>;
}

export interface ISigner {
	sign(input: SignInput): Promise<Record<string, string>>;
}
