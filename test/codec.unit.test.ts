// SPDX-License-Identifier: MIT
// ZKIR JSON Codec - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	decodeMessage, decodeMessages, encodeMessage, parseMessages, stringifyMessages,
} from "../src/codec.ts";
import { exampleHeader, exampleInstance, exampleMessages } from "../src/examples.ts";
import { constantGate } from "../src/gates.ts";
import type { Message } from "../src/types.ts";

describe("JSON Codec", () => {

	describe("decodeMessage", () => {
		it("should decode an instance document", () => {
			const result = decodeMessage({ instance: exampleInstance() });
			assert.equal(result.valid, true);
			assert.deepEqual(result.value, { kind: "instance", instance: exampleInstance() });
		});

		it("should default the optional relation tables", () => {
			const result = decodeMessage({ relation: { header: exampleHeader(), gates: [constantGate(0, 0, [1])] } });
			assert.deepEqual(result.value, {
				kind: "relation",
				relation: {
					header: exampleHeader(),
					plugins: [],
					conversions: [],
					functions: [],
					gates: [constantGate(0, 0, [1])],
				},
			});
		});

		it("should reject bytes outside 0..255", () => {
			const result = decodeMessage({ instance: { header: exampleHeader(), inputs: [[[256]]] } });
			assert.equal(result.valid, false);
			assert.equal(result.value, undefined);
		});

		it("should reject documents holding two messages", () => {
			const result = decodeMessage({ instance: exampleInstance(), witness: exampleInstance() });
			assert.equal(result.valid, false);
		});
	});

	describe("decodeMessages", () => {
		it("should accept a single document", () => {
			const result = decodeMessages({ instance: exampleInstance() });
			assert.deepEqual(result.value?.map((m) => m.kind), ["instance"]);
		});

		it("should report array element errors under their index", () => {
			const result = decodeMessages([{ instance: exampleInstance() }, { bogus: 1 }]);
			assert.equal(result.valid, false);
			assert.ok(result.errors.length > 0);
			for (const err of result.errors) {
				assert.ok(err.path === "1" || err.path.startsWith("1."), err.path);
			}
		});

		it("should report errors of a single document at the root", () => {
			const result = decodeMessages({ bogus: 1 });
			assert.equal(result.valid, false);
			assert.ok(result.errors.every((err) => err.path === "$" || !/^\d/.test(err.path)));
		});
	});

	describe("parseMessages", () => {
		it("should read back what stringifyMessages writes", () => {
			const messages = exampleMessages();
			const result = parseMessages(stringifyMessages(messages));
			assert.equal(result.valid, true);
			assert.deepEqual(result.value, messages);
		});

		it("should report invalid JSON at the root", () => {
			const result = parseMessages("{ not json");
			assert.equal(result.valid, false);
			assert.equal(result.errors.length, 1);
			assert.equal(result.errors[0]?.path, "$");
			assert.ok(result.errors[0]?.message.startsWith("Invalid JSON: "));
		});
	});

	describe("encodeMessage", () => {
		it("should wrap each message under its kind", () => {
			const msg: Message = { kind: "instance", instance: exampleInstance() };
			assert.deepEqual(encodeMessage(msg), { instance: exampleInstance() });
		});

		it("should indent with tabs", () => {
			const text = stringifyMessages([{ kind: "instance", instance: { header: exampleHeader(), inputs: [] } }]);
			assert.equal(text.split("\n")[1], "\t{");
		});
	});
});
