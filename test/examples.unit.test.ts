// SPDX-License-Identifier: MIT
// ZKIR Example Statements - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { Evaluator } from "../src/evaluator.ts";
import {
	exampleHeader, exampleInstance, exampleRelation, exampleWitness, exampleWitnessIncorrect, negativeOne,
} from "../src/examples.ts";
import { mulConstantGate } from "../src/gates.ts";
import { createHeader } from "../src/types.ts";
import type { Header, Message, Witness } from "../src/types.ts";
import { Validator } from "../src/validator.ts";

//==============================================================================
// Test Fixtures
//==============================================================================

function statement(header: Header, witness: Witness = exampleWitness(header)): Message[] {
	return [
		{ kind: "instance", instance: exampleInstance(header) },
		{ kind: "witness", witness },
		{ kind: "relation", relation: exampleRelation(header) },
	];
}

//==============================================================================
// Test Suite
//==============================================================================

describe("Example statements", () => {

	describe("negativeOne", () => {
		it("should encode the characteristic minus one", () => {
			assert.deepEqual(negativeOne(101n), [100]);
			assert.deepEqual(negativeOne([13]), [12]);
			assert.deepEqual(negativeOne([1, 1]), [0, 1]);
		});
	});

	describe("exampleHeader", () => {
		it("should default to GF(101)", () => {
			assert.deepEqual(exampleHeader().fields, [{ characteristic: [101], degree: 1 }]);
		});

		it("should take another modulus", () => {
			assert.deepEqual(exampleHeader(257).fields, [{ characteristic: [1, 1], degree: 1 }]);
		});
	});

	describe("exampleRelation", () => {
		it("should negate with the field's own -1", () => {
			assert.deepEqual(exampleRelation(exampleHeader(13)).gates[8], mulConstantGate(0, 7, 3, [12]));
		});

		it("should hold over another field", () => {
			const messages = statement(exampleHeader(13));
			const validator = Validator.asProver({ warnLiveWires: false });
			for (const msg of messages) validator.ingestMessage(msg);
			assert.deepEqual(validator.getViolations(), []);
			assert.deepEqual(Evaluator.fromMessages(messages).getViolations(), []);
		});

		it("should fail with the incorrect witness over another field", () => {
			const header = exampleHeader(13);
			// 9 + 25 - 25 = 9
			assert.deepEqual(
				Evaluator.fromMessages(statement(header, exampleWitnessIncorrect(header))).getViolations(),
				["Wire 8 should be 0, while it is 9"],
			);
		});

		it("should reject a header without fields", () => {
			assert.throws(() => exampleRelation(createHeader([])), {
				name: "ZKIRError",
				message: "Type id 0 is not defined, cannot build the example relation",
			});
		});
	});
});
