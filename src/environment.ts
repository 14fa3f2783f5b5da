import type { Expr } from "./ast";
import { fail, ok, Result } from "./errors";

export class Environment {
	readonly outer?: Environment;
	private readonly bindings: Map<string, Expr>;

	constructor(outer?: Environment) {
		this.outer = outer;
		this.bindings = new Map();
	}

	has(name: string): boolean {
		if (this.bindings.has(name)) return true;
		return this.outer ? this.outer.has(name) : false;
	}

	lookup(name: string): Result<Expr> {
		const value = this.bindings.get(name);
		if (value !== undefined) return ok(value);
		if (this.outer) return this.outer.lookup(name);
		return fail("name", `undefined symbol: ${name}`);
	}

	/** Binds in this scope only, shadowing any outer binding of the same name. */
	bind(name: string, value: Expr): Expr {
		this.bindings.set(name, value);
		return value;
	}

	extend(): Environment {
		return new Environment(this);
	}
}
