// SPDX-License-Identifier: MIT
// ZKIR Gates
// Gate constructors, gate-set masks and traversal helpers over nested bodies.

import type {
	AddConstantGate, AddGate, AndGate, AssertZeroGate, ConstantGate, CopyGate, FreeGate,
	Gate, GateKind, InstanceGate, MulConstantGate, MulGate, NewGate, NotGate,
	TypeId, Value, WireId, WitnessGate, XorGate,
} from "./types.ts";

//==============================================================================
// Gate Constructors
//==============================================================================

export const constantGate = (typeId: TypeId, out: WireId, value: Value): ConstantGate =>
	({ kind: "constant", typeId, out, value });

export const assertZeroGate = (typeId: TypeId, input: WireId): AssertZeroGate =>
	({ kind: "assertZero", typeId, input });

export const copyGate = (typeId: TypeId, out: WireId, input: WireId): CopyGate =>
	({ kind: "copy", typeId, out, input });

export const addGate = (typeId: TypeId, out: WireId, left: WireId, right: WireId): AddGate =>
	({ kind: "add", typeId, out, left, right });

export const mulGate = (typeId: TypeId, out: WireId, left: WireId, right: WireId): MulGate =>
	({ kind: "mul", typeId, out, left, right });

export const addConstantGate = (typeId: TypeId, out: WireId, input: WireId, constant: Value): AddConstantGate =>
	({ kind: "addConstant", typeId, out, input, constant });

export const mulConstantGate = (typeId: TypeId, out: WireId, input: WireId, constant: Value): MulConstantGate =>
	({ kind: "mulConstant", typeId, out, input, constant });

export const andGate = (typeId: TypeId, out: WireId, left: WireId, right: WireId): AndGate =>
	({ kind: "and", typeId, out, left, right });

export const xorGate = (typeId: TypeId, out: WireId, left: WireId, right: WireId): XorGate =>
	({ kind: "xor", typeId, out, left, right });

export const notGate = (typeId: TypeId, out: WireId, input: WireId): NotGate =>
	({ kind: "not", typeId, out, input });

export const instanceGate = (typeId: TypeId, out: WireId): InstanceGate =>
	({ kind: "instance", typeId, out });

export const witnessGate = (typeId: TypeId, out: WireId): WitnessGate =>
	({ kind: "witness", typeId, out });

/** Free a single wire, or the inclusive range first..last. */
export function freeGate(typeId: TypeId, first: WireId, last?: WireId): FreeGate {
	return last === undefined ? { kind: "free", typeId, first } : { kind: "free", typeId, first, last };
}

export const newGate = (typeId: TypeId, first: WireId, last: WireId): NewGate =>
	({ kind: "new", typeId, first, last });

//==============================================================================
// Gate Masks
//==============================================================================

export const ADD = 0x0001;
export const ADDC = 0x0002;
export const MUL = 0x0004;
export const MULC = 0x0008;
export const XOR = 0x0010;
export const AND = 0x0020;
export const NOT = 0x0040;

export const ARITHMETIC_GATES = ADD | ADDC | MUL | MULC;
export const BOOLEAN_GATES = XOR | AND | NOT;
export const ALL_GATES = ARITHMETIC_GATES | BOOLEAN_GATES;

const gateSetNames: readonly (readonly [string, number])[] = [
	["add", ADD],
	["addc", ADDC],
	["mul", MUL],
	["mulc", MULC],
	["xor", XOR],
	["and", AND],
	["not", NOT],
];

export function containsFeature(mask: number, feature: number): boolean {
	return (mask & feature) === feature;
}

/**
 * Parse a comma-separated gate set such as "add,mul,addc".
 * Also accepts the group names "arithmetic" and "boolean".
 */
export function parseGateSet(spec: string): number {
	let mask = 0;
	for (const raw of spec.split(",")) {
		const name = raw.trim().toLowerCase();
		if (name === "") continue;
		if (name === "arithmetic") { mask |= ARITHMETIC_GATES; continue; }
		if (name === "boolean") { mask |= BOOLEAN_GATES; continue; }
		const entry = gateSetNames.find(([n]) => n === name);
		if (!entry) {
			throw new RangeError("Unknown gate name: " + raw.trim());
		}
		mask |= entry[1];
	}
	return mask;
}

export function formatGateSet(mask: number): string {
	return gateSetNames
		.filter(([, flag]) => containsFeature(mask, flag))
		.map(([n]) => n)
		.join(",");
}

/** The mask flag of a primitive gate kind, or 0 for kinds outside the masks. */
export function featureOf(kind: GateKind): number {
	switch (kind) {
	case "add": return ADD;
	case "addConstant": return ADDC;
	case "mul": return MUL;
	case "mulConstant": return MULC;
	case "xor": return XOR;
	case "and": return AND;
	case "not": return NOT;
	default: return 0;
	}
}

/** Name used in diagnostics, e.g. "AddConstant". */
export function gateName(kind: GateKind): string {
	return kind.charAt(0).toUpperCase() + kind.slice(1);
}

//==============================================================================
// Traversal
//==============================================================================

/** Direct nested bodies of a gate (anonymous calls, switch branches, loop bodies). */
export function nestedBodies(gate: Gate): Gate[][] {
	switch (gate.kind) {
	case "anonCall":
		return [gate.body];
	case "switch":
		return gate.branches.flatMap((b) => (b.kind === "anonCall" ? [b.body] : []));
	case "for":
		return gate.body.kind === "anonCall" ? [gate.body.body] : [];
	default:
		return [];
	}
}

/** Visit every gate, depth-first, including gates inside nested bodies. */
export function forEachGate(gates: readonly Gate[], visit: (gate: Gate) => void): void {
	for (const gate of gates) {
		visit(gate);
		for (const body of nestedBodies(gate)) {
			forEachGate(body, visit);
		}
	}
}

/** Gate-set mask actually used by a gate list (nested bodies included). */
export function gateMaskOf(gates: readonly Gate[]): number {
	let mask = 0;
	forEachGate(gates, (gate) => { mask |= featureOf(gate.kind); });
	return mask;
}

/** Type ids on which boolean primitives (xor, and, not) are used. */
export function booleanTypeIds(gates: readonly Gate[]): Set<TypeId> {
	const ids = new Set<TypeId>();
	forEachGate(gates, (gate) => {
		if (gate.kind === "xor" || gate.kind === "and" || gate.kind === "not") {
			ids.add(gate.typeId);
		}
	});
	return ids;
}
