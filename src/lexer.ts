import { Token } from "./ast";
import { fail, ok, Result } from "./errors";

export function lex(input: string): Result<Token[]> {
	const tokens: Token[] = [];
	let i = 0;

	const isSpace = (c: string) => /\s/.test(c);
	const isDigit = (c: string | undefined) => c !== undefined && /[0-9]/.test(c);
	const isSymbolStart = (c: string) => /[A-Za-z+\-*/%<>=!]/.test(c);
	const isSymbolPart = (c: string) => /[A-Za-z0-9+\-*/%<>=!]/.test(c);

	while (i < input.length) {
		const ch = input[i];

		if (isSpace(ch)) {
			i++;
			continue;
		}

		if (ch === "(") {
			tokens.push({ type: "LPAREN", text: "(" });
			i++;
			continue;
		}

		if (ch === ")") {
			tokens.push({ type: "RPAREN", text: ")" });
			i++;
			continue;
		}

		// A dash directly before a digit is a sign, otherwise it names subtraction.
		if (isDigit(ch) || (ch === "-" && isDigit(input[i + 1]))) {
			const start = i;
			i++;
			while (i < input.length && (isDigit(input[i]) || input[i] === ".")) i++;
			tokens.push({ type: "NUMBER", text: input.slice(start, i) });
			continue;
		}

		if (isSymbolStart(ch)) {
			const start = i;
			i++;
			while (i < input.length && isSymbolPart(input[i])) i++;
			tokens.push({ type: "SYMBOL", text: input.slice(start, i) });
			continue;
		}

		const bad = String.fromCodePoint(input.codePointAt(i) ?? 0);
		return fail("lex", `unexpected character: ${bad}`);
	}

	return ok(tokens);
}
