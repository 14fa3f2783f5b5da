import { Expr } from "./ast";
import { createGlobalEnvironment } from "./builtins";
import { InterpreterConfig } from "./config";
import { Environment } from "./environment";
import { formatError, Result } from "./errors";
import { evaluate } from "./evaluator";
import { read } from "./parser";
import { render } from "./printer";

/**
 * One interpreter lifetime: a global environment that survives across
 * lines. A failed line leaves earlier bindings, and any it made before
 * failing, in place.
 */
export class Session {
	readonly global: Environment;
	private readonly config: InterpreterConfig;

	constructor(config: InterpreterConfig = {}) {
		this.config = config;
		this.global = createGlobalEnvironment();
	}

	run(line: string): Result<Expr> {
		const expr = read(line);
		if (!expr.ok) return expr;
		return evaluate(expr.value, this.global, { maxDepth: this.config.maxDepth });
	}

	runAndRender(line: string): { ok: boolean; text: string } {
		const result = this.run(line);
		if (!result.ok) return { ok: false, text: formatError(result.error) };
		return { ok: true, text: render(result.value) };
	}
}
