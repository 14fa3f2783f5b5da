import { Expr } from "./ast";

// String(-0) drops the sign.
const formatNumber = (n: number): string => (Object.is(n, -0) ? "-0" : String(n));

/** Text the read-loop prints for a result. Lists and functions stay opaque. */
export function render(expr: Expr): string {
	switch (expr.type) {
		case "Number": return formatNumber(expr.value);
		case "Symbol": return expr.name;
		case "Function": return "<function>";
		case "List": return "<list>";
	}
}

/** Structural form of an expression; reading it back gives the same tree. */
export function toSource(expr: Expr): string {
	switch (expr.type) {
		case "Number": return formatNumber(expr.value);
		case "Symbol": return expr.name;
		case "Function": return "<function>";
		case "List": return `(${expr.items.map(toSource).join(" ")})`;
	}
}
