#!/usr/bin/env node
import { loadConfig } from "./config";
import { runRepl } from "./repl";

async function main() {
	const config = loadConfig();
	await runRepl({
		input: process.stdin,
		output: process.stdout,
		error: process.stderr,
		config,
	});
}

main().catch(err => {
	console.error(err);
	process.exit(1);
});
