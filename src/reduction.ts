// SPDX-License-Identifier: MIT
// ZKIR Gate-Set Reduction
// Rewrites a relation so that it only uses the primitive gates of a target mask.

import { ErrorCodes, ZKIRError } from "./errors.ts";
import {
	ADD, AND, MUL, NOT, XOR, ADDC, MULC,
	addGate, andGate, booleanTypeIds, constantGate, containsFeature,
	mulGate, xorGate, BOOLEAN_GATES,
} from "./gates.ts";
import { isCharacteristicTwo } from "./types.ts";
import type { CaseInvoke, ForLoopBody, Gate, Relation, TypeId, WireId } from "./types.ts";
import { Validator } from "./validator.ts";

/** Shared temporary-wire counter, threaded through every recursive rewrite. */
export interface WireCounter {
	next: WireId;
}

export interface ReductionResult {
	relation: Relation;
	nextTemporaryWire: WireId;
}

function takeTemporary(counter: WireCounter): WireId {
	const wire = counter.next;
	counter.next += 1;
	return wire;
}

//==============================================================================
// Gate Rewriting
//==============================================================================

function reduceBody(gates: readonly Gate[], counter: WireCounter, mask: number): Gate[] {
	const out: Gate[] = [];
	for (const gate of gates) {
		reduceGate(gate, counter, mask, out);
	}
	return out;
}

function reduceCase(branch: CaseInvoke, counter: WireCounter, mask: number): CaseInvoke {
	if (branch.kind === "call") return branch;
	return { ...branch, body: reduceBody(branch.body, counter, mask) };
}

function reduceLoopBody(body: ForLoopBody, counter: WireCounter, mask: number): ForLoopBody {
	if (body.kind === "call") return body;
	return { ...body, body: reduceBody(body.body, counter, mask) };
}

/**
 * Append the rewrite of one gate to `out`. Replacements are reduced again,
 * except the direct and→mul and xor→add fallbacks which would otherwise loop.
 */
function reduceGate(gate: Gate, counter: WireCounter, mask: number, out: Gate[]): void {
	switch (gate.kind) {
	case "anonCall":
		out.push({ ...gate, body: reduceBody(gate.body, counter, mask) });
		return;

	case "switch":
		out.push({ ...gate, branches: gate.branches.map((b) => reduceCase(b, counter, mask)) });
		return;

	case "for":
		out.push({ ...gate, body: reduceLoopBody(gate.body, counter, mask) });
		return;

	case "add":
		if (containsFeature(mask, ADD)) {
			out.push(gate);
		} else {
			reduceGate(xorGate(gate.typeId, gate.out, gate.left, gate.right), counter, mask, out);
		}
		return;

	case "addConstant":
		if (containsFeature(mask, ADDC)) {
			out.push(gate);
		} else {
			const tmp = takeTemporary(counter);
			out.push(constantGate(gate.typeId, tmp, gate.constant));
			reduceGate(addGate(gate.typeId, gate.out, gate.input, tmp), counter, mask, out);
		}
		return;

	case "mul":
		if (containsFeature(mask, MUL)) {
			out.push(gate);
		} else {
			reduceGate(andGate(gate.typeId, gate.out, gate.left, gate.right), counter, mask, out);
		}
		return;

	case "mulConstant":
		if (containsFeature(mask, MULC)) {
			out.push(gate);
		} else {
			const tmp = takeTemporary(counter);
			out.push(constantGate(gate.typeId, tmp, gate.constant));
			reduceGate(mulGate(gate.typeId, gate.out, gate.input, tmp), counter, mask, out);
		}
		return;

	case "and":
		if (containsFeature(mask, AND)) {
			out.push(gate);
		} else if (containsFeature(mask, MUL)) {
			out.push(mulGate(gate.typeId, gate.out, gate.left, gate.right));
		} else {
			throw new ZKIRError(
				ErrorCodes.UnsatisfiableGateSet,
				"Cannot eliminate an And gate without a Mul gate in the target gate set",
			);
		}
		return;

	case "xor":
		if (containsFeature(mask, XOR)) {
			out.push(gate);
		} else if (containsFeature(mask, ADD)) {
			out.push(addGate(gate.typeId, gate.out, gate.left, gate.right));
		} else {
			throw new ZKIRError(
				ErrorCodes.UnsatisfiableGateSet,
				"Cannot eliminate a Xor gate without an Add gate in the target gate set",
			);
		}
		return;

	case "not":
		if (containsFeature(mask, NOT)) {
			out.push(gate);
		} else {
			const tmp = takeTemporary(counter);
			out.push(constantGate(gate.typeId, tmp, [1]));
			reduceGate(xorGate(gate.typeId, gate.out, gate.input, tmp), counter, mask, out);
		}
		return;

	default:
		out.push(gate);
	}
}

//==============================================================================
// Entry Points
//==============================================================================

function checkCharacteristics(relation: Relation, mask: number): void {
	const fields = relation.header.fields;
	const usedOn: TypeId[] = [...booleanTypeIds(relation.gates)];
	for (const fn of relation.functions) {
		if (fn.body.kind === "gates") usedOn.push(...booleanTypeIds(fn.body.gates));
	}
	for (const typeId of usedOn) {
		const field = fields[typeId];
		if (!field || !isCharacteristicTwo(field)) {
			throw new ZKIRError(
				ErrorCodes.InvalidGateSet,
				"The input relation uses Xor, And or Not over type " + String(typeId) + ", whose characteristic is not 2",
			);
		}
	}
	if ((mask & BOOLEAN_GATES) !== 0 && !fields.every(isCharacteristicTwo)) {
		throw new ZKIRError(
			ErrorCodes.InvalidGateSet,
			"The target gate set contains Xor, And or Not, but a field has a characteristic other than 2",
		);
	}
}

/**
 * Reduce `relation` to the gates allowed by `mask`, allocating temporary wires
 * from `tmpWireStart` upwards. The caller must ensure no existing wire id is at or
 * above `tmpWireStart`.
 *
 * The output keeps the header, plugins and conversions, and has an empty function table.
 */
export function reduceGateSetFrom(relation: Relation, mask: number, tmpWireStart: WireId): ReductionResult {
	checkCharacteristics(relation, mask);

	const counter: WireCounter = { next: tmpWireStart };
	const gates = reduceBody(relation.gates, counter, mask);

	return {
		relation: {
			header: relation.header,
			plugins: relation.plugins,
			conversions: relation.conversions,
			functions: [],
			gates,
		},
		nextTemporaryWire: counter.next,
	};
}

/** Reduce with temporary wires starting just past every wire the relation touches. */
export function reduceGateSet(relation: Relation, mask: number): Relation {
	const validator = Validator.asVerifier({ warnLiveWires: false });
	validator.ingestRelation(relation);
	return reduceGateSetFrom(relation, mask, validator.getFreeTemporaryWire()).relation;
}
