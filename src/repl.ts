import * as readline from "readline";
import { DEFAULT_PROMPT, InterpreterConfig } from "./config";
import { Session } from "./session";

export interface ReplOptions {
	input: NodeJS.ReadableStream;
	output: NodeJS.WritableStream;
	error: NodeJS.WritableStream;
	config?: InterpreterConfig;
	/** Reuse an existing session instead of starting from a fresh global environment. */
	session?: Session;
}

/**
 * Reads one expression per line until input ends. Results go to `output`,
 * failures to `error`; neither stops the loop.
 */
export async function runRepl(options: ReplOptions): Promise<Session> {
	const config = options.config ?? {};
	const session = options.session ?? new Session(config);
	const prompt = config.prompt ?? DEFAULT_PROMPT;
	const rl = readline.createInterface({ input: options.input, terminal: false });

	try {
		options.output.write(prompt);
		for await (const line of rl) {
			if (line.trim() !== "") {
				const { ok, text } = session.runAndRender(line);
				(ok ? options.output : options.error).write(text + "\n");
			}
			options.output.write(prompt);
		}
	} finally {
		rl.close();
	}

	return session;
}
