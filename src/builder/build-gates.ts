// SPDX-License-Identifier: MIT
// ZKIR Build Gates
// Gate descriptions without output wires; the builder allocates the outputs.

import { exhaustive } from "../errors.ts";
import type { Gate, TypeId, Value, WireId, WireRange } from "../types.ts";

//==============================================================================
// Simple Gates
//==============================================================================

export interface BuildConstant { kind: "constant"; typeId: TypeId; value: Value }
export interface BuildCopy { kind: "copy"; typeId: TypeId; input: WireId }
export interface BuildBinary { kind: "add" | "mul" | "and" | "xor"; typeId: TypeId; left: WireId; right: WireId }
export interface BuildWithConstant { kind: "addConstant" | "mulConstant"; typeId: TypeId; input: WireId; constant: Value }
export interface BuildNot { kind: "not"; typeId: TypeId; input: WireId }
/** An input gate; the value is only given at top level, never inside a function body. */
export interface BuildInput { kind: "instance" | "witness"; typeId: TypeId; value?: Value | undefined }

export interface BuildAssertZero { kind: "assertZero"; typeId: TypeId; input: WireId }
export interface BuildFree { kind: "free"; typeId: TypeId; first: WireId; last?: WireId | undefined }
export interface BuildNew { kind: "new"; typeId: TypeId; first: WireId; last: WireId }

/** Build gates that assign exactly one fresh output wire. */
export type OutputBuildGate = BuildConstant | BuildCopy | BuildBinary | BuildWithConstant | BuildNot | BuildInput;
/** Build gates without an output wire. */
export type EffectBuildGate = BuildAssertZero | BuildFree | BuildNew;
export type BuildGate = OutputBuildGate | EffectBuildGate;

export const Build = {
	constant: (typeId: TypeId, value: Value): BuildConstant => ({ kind: "constant", typeId, value }),
	copy: (typeId: TypeId, input: WireId): BuildCopy => ({ kind: "copy", typeId, input }),
	add: (typeId: TypeId, left: WireId, right: WireId): BuildBinary => ({ kind: "add", typeId, left, right }),
	mul: (typeId: TypeId, left: WireId, right: WireId): BuildBinary => ({ kind: "mul", typeId, left, right }),
	and: (typeId: TypeId, left: WireId, right: WireId): BuildBinary => ({ kind: "and", typeId, left, right }),
	xor: (typeId: TypeId, left: WireId, right: WireId): BuildBinary => ({ kind: "xor", typeId, left, right }),
	addConstant: (typeId: TypeId, input: WireId, constant: Value): BuildWithConstant =>
		({ kind: "addConstant", typeId, input, constant }),
	mulConstant: (typeId: TypeId, input: WireId, constant: Value): BuildWithConstant =>
		({ kind: "mulConstant", typeId, input, constant }),
	not: (typeId: TypeId, input: WireId): BuildNot => ({ kind: "not", typeId, input }),
	instance: (typeId: TypeId, value?: Value): BuildInput => ({ kind: "instance", typeId, value }),
	witness: (typeId: TypeId, value?: Value): BuildInput => ({ kind: "witness", typeId, value }),
	assertZero: (typeId: TypeId, input: WireId): BuildAssertZero => ({ kind: "assertZero", typeId, input }),
	free: (typeId: TypeId, first: WireId, last?: WireId): BuildFree => ({ kind: "free", typeId, first, last }),
	new: (typeId: TypeId, first: WireId, last: WireId): BuildNew => ({ kind: "new", typeId, first, last }),
} as const;

export function hasOutput(gate: BuildGate): gate is OutputBuildGate {
	return gate.kind !== "assertZero" && gate.kind !== "free" && gate.kind !== "new";
}

export function withOutput(gate: OutputBuildGate, out: WireId): Gate {
	switch (gate.kind) {
	case "constant":
		return { kind: "constant", typeId: gate.typeId, out, value: gate.value };
	case "copy":
	case "not":
		return { kind: gate.kind, typeId: gate.typeId, out, input: gate.input };
	case "add":
	case "mul":
	case "and":
	case "xor":
		return { kind: gate.kind, typeId: gate.typeId, out, left: gate.left, right: gate.right };
	case "addConstant":
	case "mulConstant":
		return { kind: gate.kind, typeId: gate.typeId, out, input: gate.input, constant: gate.constant };
	case "instance":
	case "witness":
		return { kind: gate.kind, typeId: gate.typeId, out };
	default:
		return exhaustive(gate);
	}
}

export function withoutOutput(gate: EffectBuildGate): Gate {
	switch (gate.kind) {
	case "assertZero":
		return gate;
	case "free":
		return gate.last === undefined
			? { kind: "free", typeId: gate.typeId, first: gate.first }
			: { kind: "free", typeId: gate.typeId, first: gate.first, last: gate.last };
	case "new":
		return gate;
	default:
		return exhaustive(gate);
	}
}

//==============================================================================
// Complex Gates
//==============================================================================

export interface BuildCall { kind: "call"; name: string; inputs: WireRange[] }
export interface BuildConvert { kind: "convert"; outputTypeId: TypeId; outputCount: number; input: WireRange }
export type BuildComplexGate = BuildCall | BuildConvert;
