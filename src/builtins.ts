import { Expr, isNumber, native, num } from "./ast";
import { Environment } from "./environment";
import { fail, ok, Result } from "./errors";

export interface Builtins {
	[name: string]: (args: readonly Expr[]) => Result<Expr>;
}

const toNumbers = (args: readonly Expr[], op: string): Result<number[]> => {
	const nums: number[] = [];
	for (const arg of args) {
		if (!isNumber(arg)) return fail("type", `arguments to '${op}' must be numbers`);
		nums.push(arg.value);
	}
	return ok(nums);
};

// Folds left to right; a single argument goes through `unary` instead.
const arithmetic = (
	op: string,
	step: (acc: number, n: number) => number,
	unary: (n: number) => number
) => (args: readonly Expr[]): Result<Expr> => {
	const nums = toNumbers(args, op);
	if (!nums.ok) return nums;
	if (nums.value.length === 0) return fail("arity", `'${op}' requires at least one argument`);
	const [first, ...rest] = nums.value;
	if (rest.length === 0) return ok(num(unary(first)));
	return ok(num(rest.reduce(step, first)));
};

// 1 when the relation holds for every adjacent pair, else 0.
const comparison = (op: string, holds: (a: number, b: number) => boolean) =>
	(args: readonly Expr[]): Result<Expr> => {
		const nums = toNumbers(args, op);
		if (!nums.ok) return nums;
		const values = nums.value;
		if (values.length < 2) return fail("arity", `'${op}' requires at least two arguments`);
		for (let i = 1; i < values.length; i++) {
			if (!holds(values[i - 1], values[i])) return ok(num(0));
		}
		return ok(num(1));
	};

export const builtins: Builtins = {
	"+": function (args) {
		const nums = toNumbers(args, "+");
		if (!nums.ok) return nums;
		return ok(num(nums.value.reduce((acc, n) => acc + n, 0)));
	},

	"*": function (args) {
		const nums = toNumbers(args, "*");
		if (!nums.ok) return nums;
		return ok(num(nums.value.reduce((acc, n) => acc * n, 1)));
	},

	"-": arithmetic("-", (acc, n) => acc - n, n => -n),

	"/": arithmetic("/", (acc, n) => acc / n, n => 1 / n),

	"%": function (args) {
		const nums = toNumbers(args, "%");
		if (!nums.ok) return nums;
		if (nums.value.length !== 2) return fail("arity", "'%' requires exactly two arguments");
		const [a, b] = nums.value;
		return ok(num(a % b));
	},

	"<": comparison("<", (a, b) => a < b),
	">": comparison(">", (a, b) => a > b),
	"<=": comparison("<=", (a, b) => a <= b),
	">=": comparison(">=", (a, b) => a >= b),
	"==": comparison("==", (a, b) => a === b),
	"!=": comparison("!=", (a, b) => a !== b),
};

export function installBuiltins(env: Environment): Environment {
	for (const [name, call] of Object.entries(builtins)) {
		env.bind(name, native(name, call));
	}
	return env;
}

export function createGlobalEnvironment(): Environment {
	return installBuiltins(new Environment());
}
