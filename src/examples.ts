// SPDX-License-Identifier: MIT
// ZKIR Example Statements
// A right-triangle check over GF(101): 3² + 4² = 5².

import {
	addGate, assertZeroGate, freeGate, instanceGate, mulConstantGate, mulGate, newGate, witnessGate,
} from "./gates.ts";
import { ZKIRError } from "./errors.ts";
import {
	bigIntToValue, characteristicOf, count, createHeader, fieldDescriptor, literal32, Profiles, valueToBigInt,
} from "./types.ts";
import type { Gate, Header, Instance, Message, Relation, TypeId, Value, WireId, Witness } from "./types.ts";

export const EXAMPLE_MODULUS = 101;

/** A single prime field; the example statement holds over any modulus above 5. */
export function exampleHeader(modulus: number | bigint = EXAMPLE_MODULUS): Header {
	return createHeader([fieldDescriptor(modulus)]);
}

/** The encoding of -1, i.e. `characteristic - 1`. */
export function negativeOne(characteristic: Value | bigint): Value {
	const c = typeof characteristic === "bigint" ? characteristic : valueToBigInt(characteristic);
	return bigIntToValue(c - 1n);
}

/** A single GF(2) field under the boolean profile. */
export function booleanHeader(): Header {
	return createHeader([fieldDescriptor(2)], Profiles.Boolean);
}

export function exampleInstance(header: Header = exampleHeader()): Instance {
	return { header, inputs: [[literal32(5)]] };
}

export function exampleWitness(header: Header = exampleHeader()): Witness {
	return { header, inputs: [[literal32(3), literal32(4)]] };
}

export function exampleWitnessIncorrect(header: Header = exampleHeader()): Witness {
	return { header, inputs: [[literal32(3), literal32(4 + 1)]] };
}

const square = (out: WireId, input: WireId, typeId: TypeId): Gate => ({
	kind: "call",
	name: "square",
	outputs: [{ typeId, first: out, last: out }],
	inputs: [{ typeId, first: input, last: input }],
});

export function exampleRelation(header: Header = exampleHeader()): Relation {
	const t: TypeId = 0;
	const characteristic = characteristicOf(header, t);
	if (characteristic === undefined) {
		throw ZKIRError.unknownType(t, "cannot build the example relation");
	}
	return {
		header,
		plugins: [],
		conversions: [],
		functions: [{
			name: "square",
			outputCount: [count(t, 1)],
			inputCount: [count(t, 1)],
			instanceCount: [],
			witnessCount: [],
			body: { kind: "gates", gates: [mulGate(t, 0, 1, 1)] },
		}],
		gates: [
			newGate(t, 0, 2),
			instanceGate(t, 0),
			witnessGate(t, 1),
			witnessGate(t, 2),
			square(3, 0, t),
			square(4, 1, t),
			square(5, 2, t),
			addGate(t, 6, 4, 5),
			mulConstantGate(t, 7, 3, negativeOne(characteristic)),
			addGate(t, 8, 6, 7),
			assertZeroGate(t, 8),
			freeGate(t, 0, 2),
			freeGate(t, 3, 8),
		],
	};
}

/** Instance, witness and relation messages, in the order a consumer reads them. */
export function exampleMessages(witness: Witness = exampleWitness()): Message[] {
	return [
		{ kind: "instance", instance: exampleInstance() },
		{ kind: "witness", witness },
		{ kind: "relation", relation: exampleRelation() },
	];
}
