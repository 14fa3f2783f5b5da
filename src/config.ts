import { DEFAULT_MAX_DEPTH } from "./evaluator";

export interface InterpreterConfig {
	maxDepth?: number;
	prompt?: string;
}

export const DEFAULT_PROMPT = "lisp> ";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): InterpreterConfig {
	const config: InterpreterConfig = {
		maxDepth: DEFAULT_MAX_DEPTH,
		prompt: env.MINILISP_PROMPT ?? DEFAULT_PROMPT,
	};

	const rawDepth = env.MINILISP_MAX_DEPTH;
	if (rawDepth !== undefined && rawDepth.trim() !== "") {
		const depth = Number(rawDepth);
		if (!Number.isInteger(depth) || depth < 1) {
			throw new Error(`MINILISP_MAX_DEPTH must be a positive integer, got ${rawDepth}`);
		}
		config.maxDepth = depth;
	}

	return config;
}
