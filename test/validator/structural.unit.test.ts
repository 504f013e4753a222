// SPDX-License-Identifier: MIT
// ZKIR Validator - Structural Gate Tests
// Functions, calls, anonymous calls, switches, loops, conversions and plugins.

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { exampleHeader } from "../../src/examples.ts";
import {
	addConstantGate, addGate, assertZeroGate, constantGate, copyGate, instanceGate, mulGate, witnessGate,
} from "../../src/gates.ts";
import { count, createHeader, fieldDescriptor, literal32 } from "../../src/types.ts";
import type { Conversion, FunctionDecl, Gate, Header, IterExpr, Relation } from "../../src/types.ts";
import { Validator } from "../../src/validator.ts";
import { wireRange } from "../../src/wire.ts";

//==============================================================================
// Test Fixtures
//==============================================================================

interface RelationParts {
	header?: Header;
	functions?: FunctionDecl[];
	plugins?: string[];
	conversions?: Conversion[];
}

function relation(gates: Gate[], parts: RelationParts = {}): Relation {
	return {
		header: parts.header ?? exampleHeader(),
		plugins: parts.plugins ?? [],
		conversions: parts.conversions ?? [],
		functions: parts.functions ?? [],
		gates,
	};
}

function gatesFunction(name: string, gates: Gate[], signature: Partial<Omit<FunctionDecl, "name" | "body">> = {}): FunctionDecl {
	return {
		name,
		outputCount: signature.outputCount ?? [count(0, 1)],
		inputCount: signature.inputCount ?? [count(0, 1)],
		instanceCount: signature.instanceCount ?? [],
		witnessCount: signature.witnessCount ?? [],
		body: { kind: "gates", gates },
	};
}

const square = gatesFunction("square", [mulGate(0, 0, 1, 1)]);

function verify(rel: Relation): string[] {
	const validator = Validator.asVerifier({ warnLiveWires: false });
	validator.ingestRelation(rel);
	return validator.getViolations();
}

const iter = (name: string): IterExpr => ({ kind: "name", name });
const constant = (value: number): IterExpr => ({ kind: "const", value });

//==============================================================================
// Test Suite
//==============================================================================

describe("Validator - Structural Gates", () => {

	//==========================================================================
	// Functions and calls
	//==========================================================================

	describe("functions", () => {
		it("should accept a call matching the signature", () => {
			const gates: Gate[] = [
				constantGate(0, 0, [2]),
				{ kind: "call", name: "square", outputs: [wireRange(0, 1)], inputs: [wireRange(0, 0)] },
			];
			assert.deepEqual(verify(relation(gates, { functions: [square] })), []);
		});

		it("should report output count mismatches", () => {
			const gates: Gate[] = [
				constantGate(0, 0, [2]),
				{ kind: "call", name: "square", outputs: [wireRange(0, 1, 2)], inputs: [wireRange(0, 0)] },
			];
			assert.deepEqual(verify(relation(gates, { functions: [square] })), [
				"Call to function square: number of output wires mismatch.",
			]);
		});

		it("should report unknown functions", () => {
			const gates: Gate[] = [
				constantGate(0, 0, [2]),
				{ kind: "call", name: "cube", outputs: [wireRange(0, 1)], inputs: [wireRange(0, 0)] },
			];
			assert.deepEqual(verify(relation(gates)), ["Unknown function cube."]);
		});

		it("should report duplicate function names", () => {
			assert.deepEqual(verify(relation([], { functions: [square, square] })), [
				"Function square is defined more than once.",
			]);
		});

		it("should report outputs a function body never assigns", () => {
			const broken = gatesFunction("broken", [assertZeroGate(0, 1)]);
			assert.deepEqual(verify(relation([], { functions: [broken] })), [
				"The output wire 0 of the function broken is never assigned.",
			]);
		});

		it("should report declared instance values a body leaves unconsumed", () => {
			const f = gatesFunction("f", [constantGate(0, 0, [1])], { inputCount: [], instanceCount: [count(0, 1)] });
			assert.deepEqual(verify(relation([], { functions: [f] })), [
				"Too many Instance values declared by the function f (1 of type 0 not consumed)",
			]);
		});

		it("should consume the instance values a call declares", () => {
			const readPublic = gatesFunction("readPublic", [instanceGate(0, 0)], {
				inputCount: [],
				instanceCount: [count(0, 1)],
			});
			const call: Gate = { kind: "call", name: "readPublic", outputs: [wireRange(0, 0)], inputs: [] };

			const withValue = Validator.asVerifier({ warnLiveWires: false });
			withValue.ingestInstance({ header: exampleHeader(), inputs: [[literal32(7)]] });
			withValue.ingestRelation(relation([call], { functions: [readPublic] }));
			assert.deepEqual(withValue.getViolations(), []);

			assert.deepEqual(verify(relation([call], { functions: [readPublic] })), [
				"Not enough Instance values for the call to readPublic (type 0: 1 needed, 0 available)",
			]);
		});
	});

	//==========================================================================
	// Anonymous calls
	//==========================================================================

	describe("anonymous calls", () => {
		it("should check the body in its own scope", () => {
			const gates: Gate[] = [
				constantGate(0, 0, [3]),
				{
					kind: "anonCall",
					outputs: [wireRange(0, 1)],
					inputs: [wireRange(0, 0)],
					instanceCount: [],
					witnessCount: [],
					body: [mulGate(0, 0, 1, 1)],
				},
			];
			assert.deepEqual(verify(relation(gates)), []);
		});

		it("should not see the caller's wires inside the body", () => {
			const validator = Validator.asProver({ warnLiveWires: false });
			validator.ingestRelation(relation([
				constantGate(0, 0, [3]),
				constantGate(0, 2, [4]),
				{
					kind: "anonCall",
					outputs: [wireRange(0, 1)],
					inputs: [wireRange(0, 0)],
					instanceCount: [],
					witnessCount: [],
					body: [mulGate(0, 0, 2, 2)],
				},
			]));
			assert.deepEqual(validator.getViolations(), [
				"The wire 2 is used but was not assigned a value, or has been freed already.",
			]);
		});
	});

	//==========================================================================
	// Switches
	//==========================================================================

	describe("switch", () => {
		const privateBranches: Gate = {
			kind: "switch",
			typeId: 0,
			condition: 0,
			outputs: [wireRange(0, 2)],
			cases: [[0], [1]],
			branches: [
				{
					kind: "anonCall",
					inputs: [wireRange(0, 1)],
					instanceCount: [],
					witnessCount: [count(0, 1)],
					body: [witnessGate(0, 2), addGate(0, 0, 1, 2)],
				},
				{
					kind: "anonCall",
					inputs: [wireRange(0, 1)],
					instanceCount: [],
					witnessCount: [count(0, 2)],
					body: [witnessGate(0, 2), witnessGate(0, 3), addGate(0, 4, 2, 3), addGate(0, 0, 1, 4)],
				},
			],
		};

		function proveSwitch(witnessValues: number[]): string[] {
			const validator = Validator.asProver({ warnLiveWires: false });
			validator.ingestWitness({ header: exampleHeader(), inputs: [witnessValues.map(literal32)] });
			validator.ingestRelation(relation([constantGate(0, 0, [1]), constantGate(0, 1, [5]), privateBranches]));
			return validator.getViolations();
		}

		it("should accept branches with enough witness values for the largest", () => {
			assert.deepEqual(proveSwitch([1, 2]), []);
		});

		it("should require the maximum witness count over the branches", () => {
			assert.deepEqual(proveSwitch([1]), [
				"Not enough Witness values for a switch (type 0: 2 needed, 1 available)",
			]);
		});

		it("should match case values with branches", () => {
			const gates: Gate[] = [
				constantGate(0, 0, [1]),
				{
					kind: "switch",
					typeId: 0,
					condition: 0,
					outputs: [wireRange(0, 1)],
					cases: [[1], [1, 0]],
					branches: [
						{ kind: "anonCall", inputs: [], instanceCount: [], witnessCount: [], body: [constantGate(0, 0, [1])] },
						{ kind: "anonCall", inputs: [], instanceCount: [], witnessCount: [], body: [constantGate(0, 0, [2])] },
					],
				},
			];
			assert.deepEqual(verify(relation(gates)), ["The switch case value [1, 0] is used more than once."]);
		});

		it("should report a case count different from the branch count", () => {
			const gates: Gate[] = [
				constantGate(0, 0, [1]),
				{
					kind: "switch",
					typeId: 0,
					condition: 0,
					outputs: [wireRange(0, 1)],
					cases: [[0]],
					branches: [
						{ kind: "anonCall", inputs: [], instanceCount: [], witnessCount: [], body: [constantGate(0, 0, [1])] },
						{ kind: "anonCall", inputs: [], instanceCount: [], witnessCount: [], body: [constantGate(0, 0, [2])] },
					],
				},
			];
			assert.deepEqual(verify(relation(gates)), ["The switch has 1 case values but 2 branches."]);
		});
	});

	//==========================================================================
	// For loops
	//==========================================================================

	describe("for loops", () => {
		function loop(end: number, input: IterExpr = iter("i")): Gate {
			return {
				kind: "for",
				iterator: "i",
				start: 0,
				end,
				outputs: [wireRange(0, 10, 12)],
				body: {
					kind: "anonCall",
					outputs: [{ typeId: 0, first: { kind: "add", left: constant(10), right: iter("i") } }],
					inputs: [{ typeId: 0, first: input }],
					instanceCount: [],
					witnessCount: [],
					body: [copyGate(0, 0, 1)],
				},
			};
		}

		const inputs = [constantGate(0, 0, [1]), constantGate(0, 1, [2]), constantGate(0, 2, [3])];

		it("should accept iterations covering every output", () => {
			assert.deepEqual(verify(relation([...inputs, loop(2)])), []);
		});

		it("should report writes outside the declared outputs", () => {
			assert.deepEqual(verify(relation([...inputs, loop(3)])), [
				"The wire 13 written by iteration 3 is not an output of the for loop.",
			]);
		});

		it("should report outputs no iteration assigns", () => {
			assert.deepEqual(verify(relation([...inputs, loop(1)])), [
				"The for loop output wire 12 is never assigned.",
			]);
		});

		it("should report iterator expressions resolving to negative wires", () => {
			const previous: IterExpr = { kind: "sub", left: iter("i"), right: constant(1) };
			assert.deepEqual(verify(relation([...inputs, loop(2, previous)])), [
				"Invalid iterator expression in the for loop over i at iteration 0.",
				"The for loop output wire 10 is never assigned.",
			]);
		});
	});

	//==========================================================================
	// Conversions and plugins
	//==========================================================================

	describe("conversions", () => {
		const header = createHeader([fieldDescriptor(7), fieldDescriptor(101)]);
		const gates: Gate[] = [
			constantGate(0, 0, [1]),
			constantGate(0, 1, [2]),
			{ kind: "convert", output: wireRange(1, 0), input: wireRange(0, 0, 1) },
		];

		it("should accept a declared conversion", () => {
			const conversions: Conversion[] = [{ output: count(1, 1), input: count(0, 2) }];
			assert.deepEqual(verify(relation(gates, { header, conversions })), []);
		});

		it("should report an undeclared conversion", () => {
			assert.deepEqual(verify(relation(gates, { header })), [
				"The conversion 1:1<-0:2 is not declared in the relation.",
			]);
		});
	});

	describe("plugins", () => {
		const vectorAdd: FunctionDecl = {
			name: "vector_add",
			outputCount: [count(0, 2)],
			inputCount: [count(0, 4)],
			instanceCount: [],
			witnessCount: [],
			body: {
				kind: "plugin",
				plugin: { name: "vector", operation: "add", params: ["0", "2"], instanceCount: [], witnessCount: [] },
			},
		};

		it("should accept a function backed by a declared plugin", () => {
			assert.deepEqual(verify(relation([], { functions: [vectorAdd], plugins: ["vector"] })), []);
		});

		it("should report an undeclared plugin", () => {
			assert.deepEqual(verify(relation([], { functions: [vectorAdd] })), [
				"The plugin vector used by function vector_add is not declared in the relation.",
			]);
		});
	});

	describe("value checks inside bodies", () => {
		it("should check constants in nested bodies against the header", () => {
			const f = gatesFunction("f", [addConstantGate(0, 0, 1, [150])]);
			assert.deepEqual(verify(relation([], { functions: [f] })), [
				"The Gate::AddConstant_0 cannot be represented in the field specified in Header (150 >= 101).",
			]);
		});
	});
});
