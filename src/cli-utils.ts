/**
 * ZKIR CLI Utilities
 *
 * Extracted CLI functions for testability and reusability:
 * - Argument parsing (subcommands, flags and options)
 * - File discovery (glob patterns)
 * - Message loading (JSON documents, in consumer order)
 */

import { readFile } from "node:fs/promises";
import { globSync } from "glob";
import { parseMessages } from "./codec.ts";
import { invalidResult, validResult } from "./errors.ts";
import type { ValidationError, ValidationResult } from "./errors.ts";
import type { Message } from "./types.ts";

export const COMMANDS = ["validate", "evaluate", "reduce", "checks", "example"] as const;
export type Command = (typeof COMMANDS)[number];

/**
 * CLI options interface
 */
export interface Options {
	command: Command | null;
	patterns: string[];
	verifier: boolean;
	verbose: boolean;
	help: boolean;
	gates?: string;
}

export const USAGE = `Usage: zkir <command> [files...] [options]

Commands:
  validate <files...>   Check the semantic rules of a statement
  evaluate <files...>   Evaluate a statement in plaintext and check its assertions
  reduce <files...>     Rewrite relations into a gate set (requires --gates)
  checks                List the implemented checks
  example               Print the example statement as JSON

Options:
  --gates <list>        Comma-separated gate set, e.g. add,mul or arithmetic
  --verifier            Validate as verifier even when witness messages are given
  --verbose, -v         Warn about wires that are never freed
  --help, -h            Show this help`;

function isCommand(arg: string): arg is Command {
	return COMMANDS.some((c) => c === arg);
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--help": case "-h": options.help = true; return true;
	case "--verifier": options.verifier = true; return true;
	default: return false;
	}
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 *
 * The first bare word naming a command selects it; every other bare word is a
 * file pattern. `--gates` takes the next argument as its value.
 */
export function parseArgs(args: string[]): Options {
	const options: Options = { command: null, patterns: [], verifier: false, verbose: false, help: false };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		if (processFlag(options, arg)) continue;
		if (arg === "--gates") {
			const next = args[i + 1];
			if (next !== undefined && !next.startsWith("-")) {
				options.gates = next;
				i++;
			}
			continue;
		}
		if (arg.startsWith("--gates=")) {
			options.gates = arg.slice("--gates=".length);
			continue;
		}
		if (arg.startsWith("-")) continue;
		if (options.command === null && isCommand(arg)) {
			options.command = arg;
		} else {
			options.patterns.push(arg);
		}
	}

	return options;
}

/**
 * Expand file patterns relative to `cwd`. Matches are sorted and deduplicated;
 * patterns matching nothing are returned separately.
 */
export function expandPatterns(patterns: string[], cwd: string): { files: string[]; unmatched: string[] } {
	const files = new Set<string>();
	const unmatched: string[] = [];
	for (const pattern of patterns) {
		const matches = globSync(pattern, { cwd, absolute: true, nodir: true });
		if (matches.length === 0) unmatched.push(pattern);
		for (const match of matches.sort()) files.add(match);
	}
	return { files: [...files], unmatched };
}

/**
 * Consumers need every input value before the gates that consume it:
 * instances first, then witnesses, then relations, each in reading order.
 */
export function orderMessages(messages: readonly Message[]): Message[] {
	const rank = { instance: 0, witness: 1, relation: 2 } as const;
	return [...messages].sort((a, b) => rank[a.kind] - rank[b.kind]);
}

/**
 * Read and decode every file. Errors are reported with the file name as path prefix.
 */
export async function readMessages(files: string[]): Promise<ValidationResult<Message[]>> {
	const messages: Message[] = [];
	const errors: ValidationError[] = [];

	for (const file of files) {
		let text: string;
		try {
			text = await readFile(file, "utf-8");
		} catch (e) {
			errors.push({ path: file, message: e instanceof Error ? e.message : String(e) });
			continue;
		}
		const decoded = parseMessages(text);
		if (decoded.valid && decoded.value) {
			messages.push(...decoded.value);
		} else {
			errors.push(...decoded.errors.map((err) => ({ path: file + ":" + err.path, message: err.message })));
		}
	}

	return errors.length > 0 ? invalidResult<Message[]>(errors) : validResult(messages);
}
