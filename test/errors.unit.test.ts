import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	ZKIRError,
	ErrorCodes,
	validResult,
	invalidResult,
	exhaustive,
} from "../src/errors.ts";

describe("ZKIRError class", () => {
	it("constructor sets code, message and name", () => {
		const err = new ZKIRError(ErrorCodes.InvalidGateSet, "test msg");
		assert.equal(err.code, "InvalidGateSet");
		assert.equal(err.message, "test msg");
		assert.equal(err.name, "ZKIRError");
		assert.ok(err instanceof Error);
	});
});

describe("ErrorCodes", () => {
	it("lists the builder, reduction and evaluation codes", () => {
		assert.deepEqual(Object.keys(ErrorCodes), [
			"UnknownType",
			"UnknownFunction",
			"DuplicateFunction",
			"DuplicatePlugin",
			"ArityError",
			"InvalidFunction",
			"FreedOutputWire",
			"InvalidGateSet",
			"UnsatisfiableGateSet",
			"Unsupported",
		]);
	});
});

describe("Static factories", () => {
	it("unknownType", () => {
		const err = ZKIRError.unknownType(3, "cannot push instance value.");
		assert.equal(err.code, "UnknownType");
		assert.equal(err.message, "Type id 3 is not defined, cannot push instance value.");
	});

	it("unknownFunction", () => {
		const err = ZKIRError.unknownFunction("square");
		assert.equal(err.code, "UnknownFunction");
		assert.equal(err.message, "Function square does not exist");
	});

	it("duplicateFunction and duplicatePlugin", () => {
		assert.equal(ZKIRError.duplicateFunction("f").message, "Function f already exists");
		assert.equal(ZKIRError.duplicatePlugin("p").code, "DuplicatePlugin");
	});

	it("arityError", () => {
		const err = ZKIRError.arityError("custom_sub", "input wires");
		assert.equal(err.code, "ArityError");
		assert.equal(err.message, "Call to function custom_sub: number of input wires mismatch.");
	});

	it("unsupported", () => {
		assert.equal(ZKIRError.unsupported("Evaluating for loops").message, "Evaluating for loops is not supported");
	});
});

describe("Validation results", () => {
	it("validResult carries the value", () => {
		assert.deepEqual(validResult(42), { valid: true, errors: [], value: 42 });
	});

	it("invalidResult carries the errors", () => {
		const result = invalidResult<number>([{ path: "$", message: "bad" }]);
		assert.equal(result.valid, false);
		assert.equal(result.value, undefined);
		assert.deepEqual(result.errors, [{ path: "$", message: "bad" }]);
	});
});

describe("exhaustive", () => {
	it("throws on any value reaching it", () => {
		const value: unknown = "surprise";
		assert.throws(
			() => exhaustive(value as never),
			/Unexpected value: surprise/,
		);
	});
});
