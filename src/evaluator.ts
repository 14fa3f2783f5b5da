import { closure, Expr, FunctionExpr, isFunction, isList, isNumber, isSymbol, ListExpr } from "./ast";
import { Environment } from "./environment";
import { fail, ok, Result } from "./errors";

export const DEFAULT_MAX_DEPTH = 1000;

export interface EvaluateOptions {
	/** Deepest nesting of evaluations allowed before failing with a resource error. */
	maxDepth?: number;
}

// Only a nonzero number counts as true.
export const isTruthy = (v: Expr): boolean => isNumber(v) && v.value !== 0;

export function evaluate(expr: Expr, env: Environment, options: EvaluateOptions = {}): Result<Expr> {
	const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

	function evalExpr(node: Expr, scope: Environment, depth: number): Result<Expr> {
		if (depth > maxDepth) {
			return fail("resource", `maximum evaluation depth exceeded (${maxDepth})`);
		}

		switch (node.type) {
			case "Number":
			case "Function":
				return ok(node);
			case "Symbol":
				return scope.lookup(node.name);
			case "List":
				return evalList(node, scope, depth);
		}
	}

	function evalList(node: ListExpr, scope: Environment, depth: number): Result<Expr> {
		const items = node.items;
		if (items.length === 0) return ok(node);

		const head = items[0];
		if (!isSymbol(head)) return fail("syntax", "first element must be a symbol");

		switch (head.name) {
			case "define": return evalDefine(items, scope, depth);
			case "lambda": return evalLambda(items, scope);
			case "if": return evalIf(items, scope, depth);
		}

		const callee = evalExpr(head, scope, depth + 1);
		if (!callee.ok) return callee;
		if (!isFunction(callee.value)) return fail("type", "first element is not a function");

		const args: Expr[] = [];
		for (const arg of items.slice(1)) {
			const value = evalExpr(arg, scope, depth + 1);
			if (!value.ok) return value;
			args.push(value.value);
		}

		return apply(callee.value, args, depth);
	}

	// (define name expr)
	function evalDefine(items: readonly Expr[], scope: Environment, depth: number): Result<Expr> {
		const target = items[1];
		if (items.length !== 3 || !isSymbol(target)) return fail("syntax", "invalid define syntax");
		const value = evalExpr(items[2], scope, depth + 1);
		if (!value.ok) return value;
		return ok(scope.bind(target.name, value.value));
	}

	// (lambda (params...) body)
	function evalLambda(items: readonly Expr[], scope: Environment): Result<Expr> {
		const paramList = items[1];
		if (items.length !== 3 || !isList(paramList)) return fail("syntax", "invalid lambda syntax");
		const params: string[] = [];
		for (const p of paramList.items) {
			if (!isSymbol(p)) return fail("syntax", "lambda parameters must be symbols");
			params.push(p.name);
		}
		return ok(closure(params, items[2], scope));
	}

	// (if cond then else)
	function evalIf(items: readonly Expr[], scope: Environment, depth: number): Result<Expr> {
		if (items.length !== 4) return fail("syntax", "invalid if syntax");
		const cond = evalExpr(items[1], scope, depth + 1);
		if (!cond.ok) return cond;
		const branch = isTruthy(cond.value) ? items[2] : items[3];
		return evalExpr(branch, scope, depth + 1);
	}

	function apply(callee: FunctionExpr, args: Expr[], depth: number): Result<Expr> {
		const fn = callee.fn;
		if (fn.kind === "native") return fn.call(args);

		if (args.length !== fn.params.length) {
			return fail(
				"arity",
				`incorrect number of arguments: expected ${fn.params.length}, got ${args.length}`
			);
		}

		const local = fn.env.extend();
		fn.params.forEach((p, idx) => {
			local.bind(p, args[idx]);
		});
		return evalExpr(fn.body, local, depth + 1);
	}

	// A maxDepth above what the host stack holds overflows before the guard trips.
	try {
		return evalExpr(expr, env, 0);
	} catch (e) {
		if (e instanceof RangeError) {
			return fail("resource", "maximum evaluation depth exceeded (call stack exhausted)");
		}
		throw e;
	}
}
