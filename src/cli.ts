#!/usr/bin/env tsx
// SPDX-License-Identifier: MIT
// ZKIR Command Line

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { expandPatterns, orderMessages, parseArgs, readMessages, USAGE } from "./cli-utils.ts";
import type { Options } from "./cli-utils.ts";
import { stringifyMessages } from "./codec.ts";
import { ZKIRError, exhaustive } from "./errors.ts";
import { Evaluator } from "./evaluator.ts";
import { exampleMessages } from "./examples.ts";
import { parseGateSet } from "./gates.ts";
import { reduceGateSetFrom } from "./reduction.ts";
import type { Message } from "./types.ts";
import { Validator } from "./validator.ts";

export interface CliIO {
	print(line: string): void;
	error(line: string): void;
}

const consoleIO: CliIO = {
	print: (line) => { console.log(line); },
	error: (line) => { console.error(line); },
};

//==============================================================================
// Commands
//==============================================================================

function validate(messages: Message[], options: Options, io: CliIO): number {
	const asProver = !options.verifier && messages.some((m) => m.kind === "witness");
	const validator = new Validator({ asProver, warnLiveWires: options.verbose });
	for (const msg of messages) {
		validator.ingestMessage(msg);
	}
	const violations = validator.getViolations();
	for (const v of violations) io.print(v);
	if (violations.length > 0) {
		io.print(`Validation failed (${asProver ? "prover" : "verifier"}): ${violations.length} violation(s)`);
		return 1;
	}
	io.print(`Validation passed (${asProver ? "prover" : "verifier"})`);
	return 0;
}

function evaluate(messages: Message[], io: CliIO): number {
	const violations = Evaluator.fromMessages(messages).getViolations();
	for (const v of violations) io.print(v);
	if (violations.length > 0) {
		io.print(`Evaluation failed: ${violations.length} violation(s)`);
		return 1;
	}
	io.print("Evaluation passed");
	return 0;
}

/** Reduce every relation, sharing one temporary-wire counter across them. */
function reduce(messages: Message[], mask: number, io: CliIO): number {
	const validator = Validator.asVerifier({ warnLiveWires: false });
	for (const msg of messages) {
		if (msg.kind === "relation") validator.ingestRelation(msg.relation);
	}
	let next = validator.getFreeTemporaryWire();
	const reduced = messages.map((msg): Message => {
		if (msg.kind !== "relation") return msg;
		const result = reduceGateSetFrom(msg.relation, mask, next);
		next = result.nextTemporaryWire;
		return { kind: "relation", relation: result.relation };
	});
	io.print(stringifyMessages(reduced));
	return 0;
}

//==============================================================================
// Entry Point
//==============================================================================

/**
 * Run the CLI and return its exit code. Fatal errors (ZKIRError, unknown gate
 * names) are reported on the error stream.
 */
export async function run(args: string[], io: CliIO = consoleIO, cwd: string = process.cwd()): Promise<number> {
	const options = parseArgs(args);

	if (options.help || options.command === null) {
		io.print(USAGE);
		return options.help ? 0 : 1;
	}
	if (options.command === "checks") {
		io.print(Validator.implementedChecks());
		return 0;
	}
	if (options.command === "example") {
		io.print(stringifyMessages(exampleMessages()));
		return 0;
	}

	const command = options.command;
	let mask = 0;
	if (command === "reduce") {
		if (options.gates === undefined) {
			io.error("The reduce command requires --gates <list>");
			return 1;
		}
		try {
			mask = parseGateSet(options.gates);
		} catch (e) {
			if (e instanceof RangeError) {
				io.error(e.message);
				return 1;
			}
			throw e;
		}
	}

	const { files, unmatched } = expandPatterns(options.patterns, cwd);
	for (const pattern of unmatched) io.error(`No file matches ${pattern}`);
	if (files.length === 0) {
		io.error("No input files");
		return 1;
	}

	const loaded = await readMessages(files);
	if (!loaded.valid || !loaded.value) {
		for (const err of loaded.errors) io.error(`${err.path}: ${err.message}`);
		return 1;
	}
	const messages = orderMessages(loaded.value);

	try {
		switch (command) {
		case "validate":
			return validate(messages, options, io);
		case "evaluate":
			return evaluate(messages, io);
		case "reduce":
			return reduce(messages, mask, io);
		default:
			return exhaustive(command);
		}
	} catch (e) {
		if (e instanceof ZKIRError) {
			io.error(`${e.code}: ${e.message}`);
			return 1;
		}
		throw e;
	}
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
	run(process.argv.slice(2)).then(
		(code) => { process.exitCode = code; },
		(e: unknown) => {
			console.error(e);
			process.exitCode = 1;
		},
	);
}
