// SPDX-License-Identifier: MIT
// ZKIR CLI Utilities - Unit Tests

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
	expandPatterns,
	orderMessages,
	parseArgs,
	readMessages,
	type Options,
} from "../src/cli-utils.ts";
import { stringifyMessages } from "../src/codec.ts";
import { exampleMessages } from "../src/examples.ts";

//==============================================================================
// Test Fixtures
//==============================================================================

const defaultOptions: Options = {
	command: null,
	patterns: [],
	verifier: false,
	verbose: false,
	help: false,
};

//==============================================================================
// Test Suite
//==============================================================================

describe("CLI Utils - Unit Tests", () => {

	//==========================================================================
	// parseArgs Tests
	//==========================================================================

	describe("parseArgs", () => {
		it("should return defaults for no arguments", () => {
			assert.deepStrictEqual(parseArgs([]), defaultOptions);
		});

		it("should take the first command word and keep the rest as patterns", () => {
			const options = parseArgs(["validate", "a.json", "checks"]);
			assert.equal(options.command, "validate");
			assert.deepStrictEqual(options.patterns, ["a.json", "checks"]);
		});

		it("should treat a leading non-command word as a pattern", () => {
			const options = parseArgs(["a.json", "evaluate"]);
			assert.equal(options.command, "evaluate");
			assert.deepStrictEqual(options.patterns, ["a.json"]);
		});

		it("should parse flags", () => {
			const options = parseArgs(["validate", "-v", "--verifier", "-h"]);
			assert.equal(options.verbose, true);
			assert.equal(options.verifier, true);
			assert.equal(options.help, true);
		});

		it("should read --gates in both forms", () => {
			assert.equal(parseArgs(["reduce", "--gates", "add,mul", "x.json"]).gates, "add,mul");
			assert.equal(parseArgs(["reduce", "--gates=xor,and"]).gates, "xor,and");
		});

		it("should leave --gates unset when its value is missing", () => {
			const options = parseArgs(["reduce", "--gates", "--verifier"]);
			assert.equal(options.gates, undefined);
			assert.equal(options.verifier, true);
		});

		it("should ignore unknown flags", () => {
			assert.deepStrictEqual(parseArgs(["--unknown"]), defaultOptions);
		});
	});

	//==========================================================================
	// File discovery and loading
	//==========================================================================

	describe("files", () => {
		let dir = "";

		before(async () => {
			dir = await mkdtemp(join(tmpdir(), "zkir-cli-utils-"));
			await mkdir(join(dir, "nested"));
			const [instance, witness, relation] = exampleMessages();
			await writeFile(join(dir, "b.json"), stringifyMessages(relation ? [relation] : []));
			await writeFile(join(dir, "a.json"), stringifyMessages([instance, witness].flatMap((m) => (m ? [m] : []))));
			await writeFile(join(dir, "nested", "broken.json"), "{ not json");
		});

		after(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it("should expand, sort and deduplicate patterns", () => {
			const { files, unmatched } = expandPatterns(["*.json", "a.json", "missing/*.json"], dir);
			assert.deepStrictEqual(files, [join(dir, "a.json"), join(dir, "b.json")]);
			assert.deepStrictEqual(unmatched, ["missing/*.json"]);
		});

		it("should read every message from the files", async () => {
			const result = await readMessages([join(dir, "b.json"), join(dir, "a.json")]);
			assert.equal(result.valid, true);
			assert.deepStrictEqual(result.value?.map((m) => m.kind), ["relation", "instance", "witness"]);
		});

		it("should prefix decoding errors with the file name", async () => {
			const file = join(dir, "nested", "broken.json");
			const result = await readMessages([file]);
			assert.equal(result.valid, false);
			assert.equal(result.errors[0]?.path, file + ":$");
		});

		it("should report unreadable files", async () => {
			const file = join(dir, "absent.json");
			const result = await readMessages([file]);
			assert.equal(result.valid, false);
			assert.equal(result.errors[0]?.path, file);
		});
	});

	describe("orderMessages", () => {
		it("should put instances, then witnesses, then relations, keeping reading order", () => {
			const [instance, witness, relation] = exampleMessages();
			const input = [relation, witness, instance, relation].flatMap((m) => (m ? [m] : []));
			const ordered = orderMessages(input);
			assert.deepStrictEqual(ordered.map((m) => m.kind), ["instance", "witness", "relation", "relation"]);
			assert.equal(ordered[2], input[0]);
			assert.equal(ordered[3], input[3]);
		});
	});
});
