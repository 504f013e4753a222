// SPDX-License-Identifier: MIT
// ZKIR Output-Wire Renumbering
// Canonicalizes a function body so its declared outputs sit at local ids 0..n-1.

import { ErrorCodes, ZKIRError, exhaustive } from "./errors.ts";
import { copyGate } from "./gates.ts";
import { formatWire, wireKey } from "./types.ts";
import type { Gate, TypeId, WireId, WireRange } from "./types.ts";
import { expandWireRanges } from "./wire.ts";

interface Renumbering {
	typeId: TypeId;
	from: WireId;
	to: WireId;
}

//==============================================================================
// Phase 1: read-only scan
//==============================================================================

/** Wires inside range constructs that must be kept as they are. */
function protectedWires(gates: readonly Gate[]): Set<string> {
	const keys = new Set<string>();
	const protect = (ranges: readonly WireRange[]): void => {
		for (const [typeId, wire] of expandWireRanges(ranges)) keys.add(wireKey(typeId, wire));
	};
	for (const gate of gates) {
		switch (gate.kind) {
		case "new":
			protect([gate]);
			break;
		case "convert":
			protect([gate.output, gate.input]);
			break;
		case "call":
		case "anonCall":
			protect(gate.outputs);
			protect(gate.inputs);
			break;
		case "switch":
			protect(gate.outputs);
			for (const branch of gate.branches) protect(branch.inputs);
			break;
		case "for":
			protect(gate.outputs);
			break;
		default:
			break;
		}
	}
	return keys;
}

function freedWires(gates: readonly Gate[]): Set<string> {
	const keys = new Set<string>();
	for (const gate of gates) {
		if (gate.kind !== "free") continue;
		for (let wire = gate.first; wire <= (gate.last ?? gate.first); wire++) {
			keys.add(wireKey(gate.typeId, wire));
		}
	}
	return keys;
}

//==============================================================================
// Phase 2: rewrite
//==============================================================================

function renumberGate(gate: Gate, wire: (typeId: TypeId, id: WireId) => WireId): Gate {
	switch (gate.kind) {
	case "constant":
	case "instance":
	case "witness":
		return { ...gate, out: wire(gate.typeId, gate.out) };
	case "assertZero":
		return { ...gate, input: wire(gate.typeId, gate.input) };
	case "copy":
	case "not":
	case "addConstant":
	case "mulConstant":
		return { ...gate, out: wire(gate.typeId, gate.out), input: wire(gate.typeId, gate.input) };
	case "add":
	case "mul":
	case "and":
	case "xor":
		return {
			...gate,
			out: wire(gate.typeId, gate.out),
			left: wire(gate.typeId, gate.left),
			right: wire(gate.typeId, gate.right),
		};
	case "switch":
		return { ...gate, condition: wire(gate.typeId, gate.condition) };
	case "free":
	case "new":
	case "convert":
	case "call":
	case "anonCall":
	case "for":
		return gate;
	default:
		return exhaustive(gate);
	}
}

/**
 * Move the declared outputs of a function body to canonical ids: per type id,
 * in declaration order, starting at 0.
 *
 * Outputs that appear inside a range construct (new, call, convert, anonymous
 * call, switch, for), or any output when the body contains a for loop whose
 * iterator expressions may address it, are exposed through a trailing
 * `copy(canonical, old)` instead. All other occurrences are rewritten in place.
 * Function inputs, and outputs already claimed by an earlier position, are
 * copied the same way. An output already at its canonical id is left alone.
 *
 * @throws ZKIRError FreedOutputWire when a free gate covers an output.
 */
export function replaceOutputWires(
	gates: readonly Gate[],
	outputs: readonly WireRange[],
	inputs: readonly WireRange[] = [],
): Gate[] {
	const protectedKeys = protectedWires(gates);
	for (const [typeId, wire] of expandWireRanges(inputs)) protectedKeys.add(wireKey(typeId, wire));
	const freed = freedWires(gates);
	const hasLoop = gates.some((g) => g.kind === "for");

	const next = new Map<TypeId, WireId>();
	const rewrites = new Map<string, WireId>();
	const copies: Renumbering[] = [];
	const claimed = new Set<string>();

	for (const [typeId, from] of expandWireRanges(outputs)) {
		const to = next.get(typeId) ?? 0;
		next.set(typeId, to + 1);

		const key = wireKey(typeId, from);
		if (freed.has(key)) {
			throw new ZKIRError(
				ErrorCodes.FreedOutputWire,
				"The output wire " + formatWire(typeId, from) + " is freed by the function body",
			);
		}
		const repeated = claimed.has(key);
		claimed.add(key);
		if (from === to && !repeated) continue;
		if (repeated || hasLoop || protectedKeys.has(key)) {
			copies.push({ typeId, from, to });
		} else {
			rewrites.set(key, to);
		}
	}

	const wire = (typeId: TypeId, id: WireId): WireId => rewrites.get(wireKey(typeId, id)) ?? id;
	const result = rewrites.size === 0 ? [...gates] : gates.map((g) => renumberGate(g, wire));
	// A repeated output reads the id its first position was moved to.
	for (const c of copies) {
		result.push(copyGate(c.typeId, c.to, wire(c.typeId, c.from)));
	}
	return result;
}
