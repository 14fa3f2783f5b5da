import { Expr, list, num, sym, Token } from "./ast";
import { fail, ok, Result } from "./errors";
import { lex } from "./lexer";

export interface Parsed {
	expr: Expr;
	/** Cursor just past the consumed expression. */
	next: number;
}

/**
 * Parses one expression starting at `start`. Tokens after it are left for
 * the caller.
 */
export function parse(tokens: readonly Token[], start = 0): Result<Parsed> {
	let pos = start;

	function parseExpr(): Result<Expr> {
		const t = tokens[pos];
		if (t === undefined) return fail("parse", "unexpected token: end of input");

		switch (t.type) {
			case "NUMBER": {
				pos++;
				const value = Number(t.text);
				if (Number.isNaN(value)) return fail("parse", `malformed number: ${t.text}`);
				return ok(num(value));
			}

			case "SYMBOL":
				pos++;
				return ok(sym(t.text));

			case "LPAREN": {
				pos++;
				const items: Expr[] = [];

				while (true) {
					const p = tokens[pos];
					if (p === undefined) return fail("parse", "missing closing parenthesis");
					if (p.type === "RPAREN") break;
					const item = parseExpr();
					if (!item.ok) return item;
					items.push(item.value);
				}

				pos++;
				return ok(list(items));
			}

			case "RPAREN":
				return fail("parse", `unexpected token: ${t.text}`);
		}
	}

	const expr = parseExpr();
	if (!expr.ok) return expr;
	return ok({ expr: expr.value, next: pos });
}

// Only the first form on the line is read; anything after it is dropped.
export function read(source: string): Result<Expr> {
	const tokens = lex(source);
	if (!tokens.ok) return tokens;
	const parsed = parse(tokens.value);
	if (!parsed.ok) return parsed;
	return ok(parsed.value.expr);
}
