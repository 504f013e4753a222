// SPDX-License-Identifier: MIT
// ZKIR Wire Ranges
// Helpers over typed inclusive wire ranges and iterator-addressed ranges.

import { exhaustive } from "./errors.ts";
import { countMapsEqual, countsToMap } from "./types.ts";
import type { Count, IterExpr, IterExprWireRange, TypeId, WireId, WireRange } from "./types.ts";

export function wireRange(typeId: TypeId, first: WireId, last: WireId = first): WireRange {
	return { typeId, first, last };
}

/** Number of wires in an inclusive range; inverted ranges are empty. */
export function rangeLength(range: WireRange): number {
	return range.last >= range.first ? range.last - range.first + 1 : 0;
}

/** Expand ranges into the ordered list of (type id, wire id) pairs they cover. */
export function expandWireRanges(ranges: readonly WireRange[]): [TypeId, WireId][] {
	const result: [TypeId, WireId][] = [];
	for (const range of ranges) {
		for (let id = range.first; id <= range.last; id++) {
			result.push([range.typeId, id]);
		}
	}
	return result;
}

/** Per-type wire counts of a range list. */
export function countWireRanges(ranges: readonly WireRange[]): Map<TypeId, number> {
	return countsToMap(ranges.map((r) => ({ typeId: r.typeId, count: rangeLength(r) })));
}

/** True when the ranges cover exactly the declared number of wires of each type. */
export function checkWireRangesWithCounts(ranges: readonly WireRange[], counts: readonly Count[]): boolean {
	return countMapsEqual(countWireRanges(ranges), countsToMap(counts));
}

/**
 * Local input wires of a function or nested body: per type, inputs are numbered
 * right after the outputs.
 */
export function localInputRanges(outputCount: readonly Count[], inputCount: readonly Count[]): WireRange[] {
	const next = countsToMap(outputCount);
	const ranges: WireRange[] = [];
	for (const c of inputCount) {
		if (c.count === 0) continue;
		const first = next.get(c.typeId) ?? 0;
		ranges.push({ typeId: c.typeId, first, last: first + c.count - 1 });
		next.set(c.typeId, first + c.count);
	}
	return ranges;
}

//==============================================================================
// Iterator Expressions
//==============================================================================

/**
 * Evaluate an iterator expression under the given loop bindings.
 * Returns null when a name is unbound. Division rounds down.
 */
export function evalIterExpr(expr: IterExpr, bindings: ReadonlyMap<string, number>): number | null {
	switch (expr.kind) {
	case "const":
		return expr.value;
	case "name":
		return bindings.get(expr.name) ?? null;
	case "add":
	case "sub":
	case "mul": {
		const left = evalIterExpr(expr.left, bindings);
		const right = evalIterExpr(expr.right, bindings);
		if (left === null || right === null) return null;
		if (expr.kind === "add") return left + right;
		if (expr.kind === "sub") return left - right;
		return left * right;
	}
	case "divConst": {
		const left = evalIterExpr(expr.left, bindings);
		if (left === null || expr.divisor === 0) return null;
		return Math.floor(left / expr.divisor);
	}
	default:
		return exhaustive(expr);
	}
}

/** Resolve iterator-addressed ranges to concrete ranges, or null if any bound is invalid. */
export function resolveIterRanges(
	ranges: readonly IterExprWireRange[],
	bindings: ReadonlyMap<string, number>,
): WireRange[] | null {
	const resolved: WireRange[] = [];
	for (const range of ranges) {
		const first = evalIterExpr(range.first, bindings);
		const last = range.last === undefined ? first : evalIterExpr(range.last, bindings);
		if (first === null || last === null || first < 0 || last < first) return null;
		resolved.push({ typeId: range.typeId, first, last });
	}
	return resolved;
}
