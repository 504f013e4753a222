// SPDX-License-Identifier: MIT
// ZKIR Type Definitions
// Field/value model shared by the validator, the reduction engine and the builder.
// Document-serializable types live in zod-schemas.ts and are re-exported here.

import type { Count, FieldDescriptor, Header, TypeId, Value, WireId } from "./zod-schemas.ts";

export type {
	AddConstantGate, AddGate, AndGate, AnonCallGate, AssertZeroGate,
	CallGate, CaseAnonCall, CaseCall, CaseInvoke, ConstantGate, Conversion, ConvertGate,
	CopyGate, Count, FieldDescriptor, ForAnonCallBody, ForCallBody, ForGate, ForLoopBody,
	FreeGate, FunctionBody, FunctionDecl, Gate, GateKind, GatesFunctionBody, Header,
	Instance, InstanceGate, IterExpr, IterExprWireRange, Message, MulConstantGate, MulGate,
	NewGate, NotGate, PluginBody, PluginFunctionBody, Relation, SwitchGate, TypeId, Value,
	WireId, WireRange, Witness, WitnessGate, XorGate,
} from "./zod-schemas.ts";

//==============================================================================
// Constants
//==============================================================================

export const IR_VERSION = "2.0.0";

export const Profiles = {
	Arithmetic: "circ_arithmetic_simple",
	Boolean: "circ_boolean_simple",
} as const;

export type Profile = (typeof Profiles)[keyof typeof Profiles];

//==============================================================================
// Value Encoding (little-endian byte strings)
//==============================================================================

/**
 * Encode a non-negative integer as a little-endian byte string of fixed width.
 */
export function literal(value: number | bigint, width: number): Value {
	let rest = BigInt(value);
	if (rest < 0n) {
		throw new RangeError("Cannot encode negative value " + rest.toString());
	}
	const bytes: number[] = [];
	for (let i = 0; i < width; i++) {
		bytes.push(Number(rest & 0xffn));
		rest >>= 8n;
	}
	if (rest !== 0n) {
		throw new RangeError("Value " + String(value) + " does not fit in " + String(width) + " bytes");
	}
	return bytes;
}

/** 4-byte little-endian encoding, the width used by the examples. */
export function literal32(value: number): Value {
	return literal(value, 4);
}

/** Decode a little-endian byte string. The empty string decodes to 0. */
export function valueToBigInt(value: Value): bigint {
	let result = 0n;
	for (let i = value.length - 1; i >= 0; i--) {
		result = (result << 8n) | BigInt(value[i] ?? 0);
	}
	return result;
}

/** Minimal little-endian encoding (at least one byte). */
export function bigIntToValue(n: bigint): Value {
	if (n < 0n) {
		throw new RangeError("Cannot encode negative value " + n.toString());
	}
	const bytes: number[] = [];
	let rest = n;
	do {
		bytes.push(Number(rest & 0xffn));
		rest >>= 8n;
	} while (rest > 0n);
	return bytes;
}

/** Render bytes the way diagnostics quote them, e.g. `[101, 0, 0, 0]`. */
export function formatValue(value: Value): string {
	return "[" + value.join(", ") + "]";
}

export function valuesEqual(a: Value, b: Value): boolean {
	return valueToBigInt(a) === valueToBigInt(b);
}

//==============================================================================
// Field Descriptors
//==============================================================================

export function fieldDescriptor(characteristic: number | bigint): FieldDescriptor {
	return { characteristic: bigIntToValue(BigInt(characteristic)), degree: 1 };
}

export function characteristicOf(header: Header, typeId: TypeId): bigint | undefined {
	const field = header.fields[typeId];
	return field ? valueToBigInt(field.characteristic) : undefined;
}

/** True when the field's byte-serialized characteristic decodes to exactly 2. */
export function isCharacteristicTwo(field: FieldDescriptor): boolean {
	return valueToBigInt(field.characteristic) === 2n;
}

export function createHeader(
	fields: FieldDescriptor[],
	profile: string = Profiles.Arithmetic,
	version: string = IR_VERSION,
): Header {
	return { version, profile, fields };
}

//==============================================================================
// Counts
//==============================================================================

export function count(typeId: TypeId, n: number): Count {
	return { typeId, count: n };
}

/** Collapse counts into a per-type map, summing repeated type ids and dropping zeros. */
export function countsToMap(counts: readonly Count[]): Map<TypeId, number> {
	const map = new Map<TypeId, number>();
	for (const c of counts) {
		if (c.count === 0) continue;
		map.set(c.typeId, (map.get(c.typeId) ?? 0) + c.count);
	}
	return map;
}

export function mapToCounts(map: ReadonlyMap<TypeId, number>): Count[] {
	return [...map.entries()]
		.filter(([, n]) => n > 0)
		.sort(([a], [b]) => a - b)
		.map(([typeId, n]) => ({ typeId, count: n }));
}

export function countMapsEqual(a: ReadonlyMap<TypeId, number>, b: ReadonlyMap<TypeId, number>): boolean {
	if (a.size !== b.size) return false;
	for (const [typeId, n] of a) {
		if (b.get(typeId) !== n) return false;
	}
	return true;
}

//==============================================================================
// Wire Keys
//==============================================================================

/** Stable string key for a (type id, wire id) pair, used in sets and maps. */
export function wireKey(typeId: TypeId, wireId: WireId): string {
	return String(typeId) + ":" + String(wireId);
}

/** `W (type T)`, or just `W` when the type is implied by a single-field header. */
export function formatWire(typeId: TypeId, wireId: WireId, withType = true): string {
	return withType ? String(wireId) + " (type " + String(typeId) + ")" : String(wireId);
}

/** Format a wire for diagnostics under `header`: the type is shown only when it declares several fields. */
export function formatWireIn(header: Header | null, typeId: TypeId, wireId: WireId): string {
	return formatWire(typeId, wireId, header === null || header.fields.length > 1);
}
