export * from "./ast";
export * from "./errors";
export { lex } from "./lexer";
export { parse, read } from "./parser";
export type { Parsed } from "./parser";
export { Environment } from "./environment";
export { evaluate, isTruthy, DEFAULT_MAX_DEPTH } from "./evaluator";
export type { EvaluateOptions } from "./evaluator";
export { builtins, installBuiltins, createGlobalEnvironment } from "./builtins";
export { render, toSource } from "./printer";
export { loadConfig, DEFAULT_PROMPT } from "./config";
export type { InterpreterConfig } from "./config";
export { Session } from "./session";
export { runRepl } from "./repl";
export type { ReplOptions } from "./repl";
