// SPDX-License-Identifier: MIT
// ZKIR Plaintext Evaluator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes, ZKIRError } from "../src/errors.ts";
import { Evaluator } from "../src/evaluator.ts";
import {
	booleanHeader, exampleHeader, exampleInstance, exampleMessages, exampleRelation, exampleWitnessIncorrect,
} from "../src/examples.ts";
import {
	addConstantGate, addGate, andGate, assertZeroGate, constantGate, copyGate, mulConstantGate,
	notGate, witnessGate, xorGate,
} from "../src/gates.ts";
import type { Gate, Header, Relation } from "../src/types.ts";

//==============================================================================
// Test Fixtures
//==============================================================================

function relation(gates: Gate[], header: Header = exampleHeader()): Relation {
	return { header, plugins: [], conversions: [], functions: [], gates };
}

function evaluate(gates: Gate[], header?: Header): Evaluator {
	const evaluator = new Evaluator();
	evaluator.ingestRelation(relation(gates, header));
	return evaluator;
}

const range = (first: number, last: number) => ({ typeId: 0, first, last });

//==============================================================================
// Test Suite
//==============================================================================

describe("Evaluator", () => {

	describe("example statement", () => {
		it("should satisfy every assertion with the correct witness", () => {
			const evaluator = Evaluator.fromMessages(exampleMessages());
			assert.deepEqual(evaluator.getViolations(), []);
		});

		it("should drop freed wires", () => {
			const evaluator = Evaluator.fromMessages(exampleMessages());
			assert.equal(evaluator.getWireValue(0, 8), undefined);
		});

		it("should report the failing assertion with the incorrect witness", () => {
			const evaluator = Evaluator.fromMessages(exampleMessages(exampleWitnessIncorrect()));
			assert.deepEqual(evaluator.getViolations(), ["Wire 8 should be 0, while it is 9"]);
		});

		it("should report missing witness values", () => {
			const evaluator = new Evaluator();
			evaluator.ingestInstance(exampleInstance());
			evaluator.ingestRelation(exampleRelation());
			assert.deepEqual(evaluator.getViolations(), [
				"No value available for the Witness wire 1",
				"No value available for the Witness wire 2",
				"Wire 8 should be 0, while it is 76",
			]);
		});
	});

	describe("arithmetic", () => {
		it("should reduce results modulo the characteristic", () => {
			const evaluator = evaluate([
				constantGate(0, 0, [100]),
				addConstantGate(0, 1, 0, [5]),
				mulConstantGate(0, 2, 0, [100]),
				copyGate(0, 3, 1),
			]);
			assert.equal(evaluator.getWireValue(0, 1), 4n);
			// 100 * 100 = 10000 = 99 * 101 + 1
			assert.equal(evaluator.getWireValue(0, 2), 1n);
			assert.equal(evaluator.getWireValue(0, 3), 4n);
			assert.deepEqual(evaluator.getViolations(), []);
		});

		it("should treat xor, and and not as GF(2) arithmetic", () => {
			const evaluator = evaluate([
				constantGate(0, 0, [1]),
				constantGate(0, 1, [1]),
				xorGate(0, 2, 0, 1),
				andGate(0, 3, 0, 1),
				notGate(0, 4, 3),
			], booleanHeader());
			assert.equal(evaluator.getWireValue(0, 2), 0n);
			assert.equal(evaluator.getWireValue(0, 3), 1n);
			assert.equal(evaluator.getWireValue(0, 4), 0n);
		});

		it("should report wires used before assignment", () => {
			const evaluator = evaluate([addGate(0, 0, 1, 2)]);
			assert.deepEqual(evaluator.getViolations(), [
				"Wire 1 is used but was not assigned a value",
				"Wire 2 is used but was not assigned a value",
			]);
			assert.equal(evaluator.getWireValue(0, 0), 0n);
		});

		it("should keep its violations to itself", () => {
			const evaluator = evaluate([constantGate(0, 0, [1]), assertZeroGate(0, 0)]);
			evaluator.getViolations().push("extra");
			assert.deepEqual(evaluator.getViolations(), ["Wire 0 should be 0, while it is 1"]);
		});
	});

	describe("calls", () => {
		it("should map anonymous call inputs after the outputs", () => {
			const evaluator = evaluate([
				constantGate(0, 1, [3]),
				constantGate(0, 2, [4]),
				{
					kind: "anonCall",
					outputs: [range(0, 0)],
					inputs: [range(1, 2)],
					instanceCount: [],
					witnessCount: [],
					body: [addGate(0, 0, 1, 2)],
				},
			]);
			assert.equal(evaluator.getWireValue(0, 0), 7n);
			assert.deepEqual(evaluator.getViolations(), []);
		});

		it("should not leak body wires into the caller", () => {
			const evaluator = evaluate([
				constantGate(0, 1, [3]),
				{
					kind: "anonCall",
					outputs: [range(0, 0)],
					inputs: [range(1, 1)],
					instanceCount: [],
					witnessCount: [],
					body: [constantGate(0, 5, [9]), copyGate(0, 0, 1)],
				},
			]);
			assert.equal(evaluator.getWireValue(0, 0), 3n);
			assert.equal(evaluator.getWireValue(0, 5), undefined);
		});
	});

	describe("errors", () => {
		it("should reject calls to unknown functions", () => {
			assert.throws(
				() => evaluate([{ kind: "call", name: "nope", outputs: [], inputs: [] }]),
				{ name: "ZKIRError", message: "Function nope does not exist" },
			);
		});

		it("should reject switch gates", () => {
			assert.throws(
				() => evaluate([{ kind: "switch", typeId: 0, condition: 0, outputs: [], cases: [], branches: [] }]),
				(e: unknown) => e instanceof ZKIRError
					&& e.code === ErrorCodes.Unsupported
					&& e.message === "Evaluating switch gates is not supported",
			);
		});

		it("should reject wires of undeclared types", () => {
			assert.throws(
				() => evaluate([witnessGate(3, 0)]),
				{ message: "Type id 3 is not defined, cannot evaluate the gate" },
			);
		});
	});
});
