import type { Environment } from "./environment";
import type { Result } from "./errors";

export type Token =
	| { type: "LPAREN"; text: "(" }
	| { type: "RPAREN"; text: ")" }
	| { type: "NUMBER"; text: string }
	| { type: "SYMBOL"; text: string };

export interface Closure {
	readonly kind: "closure";
	readonly params: readonly string[];
	readonly body: Expr;
	readonly env: Environment;
}

export interface NativeFunction {
	readonly kind: "native";
	readonly name: string;
	readonly call: (args: readonly Expr[]) => Result<Expr>;
}

export type LispFunction = Closure | NativeFunction;

export type Expr =
	| { readonly type: "Number"; readonly value: number }
	| { readonly type: "Symbol"; readonly name: string }
	| { readonly type: "List"; readonly items: readonly Expr[] }
	| { readonly type: "Function"; readonly fn: LispFunction };

export type NumberExpr = Extract<Expr, { type: "Number" }>;
export type SymbolExpr = Extract<Expr, { type: "Symbol" }>;
export type ListExpr = Extract<Expr, { type: "List" }>;
export type FunctionExpr = Extract<Expr, { type: "Function" }>;

export function num(value: number): NumberExpr {
	return { type: "Number", value };
}

export function sym(name: string): SymbolExpr {
	return { type: "Symbol", name };
}

export function list(items: readonly Expr[]): ListExpr {
	return { type: "List", items };
}

export function closure(params: readonly string[], body: Expr, env: Environment): FunctionExpr {
	return { type: "Function", fn: { kind: "closure", params, body, env } };
}

export function native(name: string, call: NativeFunction["call"]): FunctionExpr {
	return { type: "Function", fn: { kind: "native", name, call } };
}

export const isNumber = (e: Expr): e is NumberExpr => e.type === "Number";
export const isSymbol = (e: Expr): e is SymbolExpr => e.type === "Symbol";
export const isList = (e: Expr): e is ListExpr => e.type === "List";
export const isFunction = (e: Expr): e is FunctionExpr => e.type === "Function";
