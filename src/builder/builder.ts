// SPDX-License-Identifier: MIT
// ZKIR Gate Builder
// Allocates wire ids, builds gates and functions, and tracks the instance and
// witness values they consume.

import { ErrorCodes, ZKIRError } from "../errors.ts";
import { replaceOutputWires } from "../renumber.ts";
import { countMapsEqual, countsToMap, mapToCounts } from "../types.ts";
import type {
	Conversion, Count, FieldDescriptor, FunctionDecl, Gate,
	PluginBody, TypeId, Value, WireId, WireRange,
} from "../types.ts";
import { checkWireRangesWithCounts, expandWireRanges, localInputRanges, rangeLength } from "../wire.ts";
import { WireAllocator } from "./allocator.ts";
import { hasOutput, withOutput, withoutOutput } from "./build-gates.ts";
import type { BuildComplexGate, BuildConvert, BuildGate, EffectBuildGate, OutputBuildGate } from "./build-gates.ts";
import { MessageBuilder } from "./message-builder.ts";
import type { BuilderOptions } from "./message-builder.ts";
import type { Sink } from "./sink.ts";

//==============================================================================
// Shared Types
//==============================================================================

/** What a call site needs to know about a function. */
export interface FunctionCounts {
	outputCount: Count[];
	inputCount: Count[];
	instanceCount: Map<TypeId, number>;
	witnessCount: Map<TypeId, number>;
}

/** A finished function, with the conversions its body relies on. */
export interface FunctionWithInfos {
	function: FunctionDecl;
	usedConversions: Conversion[];
}

function conversionKey(c: Conversion): string {
	return `${c.output.typeId}:${c.output.count}<-${c.input.typeId}:${c.input.count}`;
}

function convertConversion(gate: BuildConvert): Conversion {
	return {
		output: { typeId: gate.outputTypeId, count: gate.outputCount },
		input: { typeId: gate.input.typeId, count: rangeLength(gate.input) },
	};
}

function lookupFunction(known: ReadonlyMap<string, FunctionCounts>, name: string): FunctionCounts {
	const counts = known.get(name);
	if (!counts) throw ZKIRError.unknownFunction(name);
	return counts;
}

/** Per-type value counts of a values-by-type-id table. */
function valueCounts(values: readonly Value[][]): Map<TypeId, number> {
	const map = new Map<TypeId, number>();
	values.forEach((v, typeId) => {
		if (v.length > 0) map.set(typeId, v.length);
	});
	return map;
}

function complexGate(gate: BuildComplexGate, outputs: WireRange[]): Gate {
	if (gate.kind === "call") {
		return { kind: "call", name: gate.name, outputs, inputs: gate.inputs };
	}
	const [output] = outputs;
	if (!output) {
		throw new ZKIRError(ErrorCodes.ArityError, "A Convert gate must produce at least one wire");
	}
	return { kind: "convert", output, input: gate.input };
}

/** Output shape of a complex gate. */
function complexOutputCount(gate: BuildComplexGate, known: ReadonlyMap<string, FunctionCounts>): Count[] {
	if (gate.kind === "convert") {
		return [{ typeId: gate.outputTypeId, count: gate.outputCount }];
	}
	const counts = lookupFunction(known, gate.name);
	if (!checkWireRangesWithCounts(gate.inputs, counts.inputCount)) {
		throw ZKIRError.arityError(gate.name, "input wires");
	}
	return counts.outputCount;
}

function allocateOutputs(allocator: WireAllocator, outputCount: readonly Count[]): WireRange[] {
	return outputCount
		.filter((c) => c.count > 0)
		.map((c) => allocator.allocRange(c.typeId, c.count));
}

export function createPluginFunction(
	name: string,
	outputCount: Count[],
	inputCount: Count[],
	plugin: PluginBody,
): FunctionDecl {
	if (name === "") {
		throw new ZKIRError(ErrorCodes.InvalidFunction, "Cannot create a function with an empty name");
	}
	if (plugin.name === "") {
		throw new ZKIRError(ErrorCodes.InvalidFunction, "Cannot create a plugin function with an empty plugin name");
	}
	if (plugin.operation === "") {
		throw new ZKIRError(ErrorCodes.InvalidFunction, "Cannot create a plugin function with an empty plugin operation");
	}
	return {
		name,
		outputCount,
		inputCount,
		instanceCount: plugin.instanceCount,
		witnessCount: plugin.witnessCount,
		body: { kind: "plugin", plugin },
	};
}

//==============================================================================
// Gate Builder
//==============================================================================

/**
 * Builds a top-level relation together with its instance and witness values.
 *
 * ```ts
 * const b = new GateBuilder(new MemorySink(), [fieldDescriptor(101)]);
 * const w = b.createGate(Build.constant(0, [0]));
 * b.createGate(Build.assertZero(0, w));
 * const sink = b.finish();
 * ```
 */
export class GateBuilder<S extends Sink> {
	private readonly msg: MessageBuilder<S>;
	private readonly functions = new Map<string, FunctionCounts>();
	private readonly plugins = new Set<string>();
	private readonly conversions = new Set<string>();
	private readonly allocator = new WireAllocator();

	constructor(sink: S, fields: FieldDescriptor[], options: BuilderOptions = {}) {
		this.msg = new MessageBuilder(sink, fields, options);
	}

	/** Allocate the output (if any), push the gate and any value it carries. */
	createGate(gate: OutputBuildGate): WireId;
	createGate(gate: EffectBuildGate): undefined;
	createGate(gate: BuildGate): WireId | undefined;
	createGate(gate: BuildGate): WireId | undefined {
		if (gate.typeId >= this.msg.header.fields.length) {
			throw ZKIRError.unknownType(gate.typeId, "we cannot create the gate");
		}
		if (!hasOutput(gate)) {
			this.msg.pushGate(withoutOutput(gate));
			return undefined;
		}

		const out = this.allocator.alloc(gate.typeId);
		if (gate.kind === "instance" && gate.value !== undefined) {
			this.msg.pushInstanceValue(gate.typeId, gate.value);
		}
		if (gate.kind === "witness" && gate.value !== undefined) {
			this.msg.pushWitnessValue(gate.typeId, gate.value);
		}
		this.msg.pushGate(withOutput(gate, out));
		return out;
	}

	/**
	 * Push a call or a conversion together with the values it consumes, given per
	 * type id. A call must match its function's signature exactly, per type.
	 */
	createComplexGate(
		gate: BuildComplexGate,
		instanceValues: Value[][] = [],
		witnessValues: Value[][] = [],
	): WireRange[] {
		const outputCount = complexOutputCount(gate, this.functions);

		if (gate.kind === "call") {
			const counts = lookupFunction(this.functions, gate.name);
			if (!countMapsEqual(valueCounts(instanceValues), counts.instanceCount)) {
				throw ZKIRError.arityError(gate.name, "instance values");
			}
			if (!countMapsEqual(valueCounts(witnessValues), counts.witnessCount)) {
				throw ZKIRError.arityError(gate.name, "witness values");
			}
		} else {
			if (gate.outputTypeId >= this.msg.header.fields.length) {
				throw ZKIRError.unknownType(gate.outputTypeId, "we cannot create the conversion");
			}
			if (valueCounts(instanceValues).size > 0 || valueCounts(witnessValues).size > 0) {
				throw new ZKIRError(ErrorCodes.ArityError, "A Convert gate does not consume instance or witness values");
			}
			this.declareConversion(convertConversion(gate));
		}

		instanceValues.forEach((values, typeId) => {
			for (const value of values) this.msg.pushInstanceValue(typeId, value);
		});
		witnessValues.forEach((values, typeId) => {
			for (const value of values) this.msg.pushWitnessValue(typeId, value);
		});

		const outputs = allocateOutputs(this.allocator, outputCount);
		this.msg.pushGate(complexGate(gate, outputs));
		return outputs;
	}

	newFunctionBuilder(name: string, outputCount: Count[], inputCount: Count[]): FunctionBuilder {
		return new FunctionBuilder(name, outputCount, inputCount, this.functions);
	}

	pushFunction(fn: FunctionWithInfos): void {
		const decl = fn.function;
		if (this.functions.has(decl.name)) {
			throw ZKIRError.duplicateFunction(decl.name);
		}
		this.functions.set(decl.name, {
			outputCount: decl.outputCount,
			inputCount: decl.inputCount,
			instanceCount: countsToMap(decl.instanceCount),
			witnessCount: countsToMap(decl.witnessCount),
		});

		if (decl.body.kind === "plugin" && !this.plugins.has(decl.body.plugin.name)) {
			this.plugins.add(decl.body.plugin.name);
			this.msg.pushPlugin(decl.body.plugin.name);
		}
		for (const conversion of fn.usedConversions) {
			this.declareConversion(conversion);
		}
		this.msg.pushFunction(decl);
	}

	/** Declare a plugin function; its counts come from the plugin body. */
	pushPlugin(fn: FunctionDecl): void {
		if (fn.body.kind !== "plugin") {
			throw new ZKIRError(ErrorCodes.InvalidFunction, "pushPlugin must be called with a plugin function");
		}
		if (this.functions.has(fn.name)) {
			throw ZKIRError.duplicatePlugin(fn.name);
		}
		this.pushFunction({ function: fn, usedConversions: [] });
	}

	finish(): S {
		return this.msg.finish();
	}

	private declareConversion(conversion: Conversion): void {
		const key = conversionKey(conversion);
		if (this.conversions.has(key)) return;
		this.conversions.add(key);
		this.msg.pushConversion(conversion);
	}
}

//==============================================================================
// Function Builder
//==============================================================================

/**
 * Builds a function body against local numbering: outputs take the lowest ids,
 * inputs follow, and the body allocates after them. Instance and witness
 * consumption is counted on the fly.
 */
export class FunctionBuilder {
	readonly name: string;
	private readonly outputCount: Count[];
	private readonly inputCount: Count[];
	private readonly known: ReadonlyMap<string, FunctionCounts>;
	private readonly allocator: WireAllocator;

	private gates: Gate[] = [];
	private readonly instanceCount = new Map<TypeId, number>();
	private readonly witnessCount = new Map<TypeId, number>();
	private readonly usedConversions = new Map<string, Conversion>();

	constructor(name: string, outputCount: Count[], inputCount: Count[], known: ReadonlyMap<string, FunctionCounts>) {
		this.name = name;
		this.outputCount = outputCount;
		this.inputCount = inputCount;
		this.known = known;
		this.allocator = new WireAllocator([...outputCount, ...inputCount]);
	}

	/** Local input wires, in declaration order. */
	inputWires(): [TypeId, WireId][] {
		return expandWireRanges(localInputRanges(this.outputCount, this.inputCount));
	}

	createGate(gate: OutputBuildGate): WireId;
	createGate(gate: EffectBuildGate): undefined;
	createGate(gate: BuildGate): WireId | undefined;
	createGate(gate: BuildGate): WireId | undefined {
		if (!hasOutput(gate)) {
			this.gates.push(withoutOutput(gate));
			return undefined;
		}
		if (gate.kind === "instance" || gate.kind === "witness") {
			if (gate.value !== undefined) {
				throw new ZKIRError(
					ErrorCodes.InvalidFunction,
					"Function " + this.name + ": input values cannot be given inside a function body",
				);
			}
			const table = gate.kind === "instance" ? this.instanceCount : this.witnessCount;
			table.set(gate.typeId, (table.get(gate.typeId) ?? 0) + 1);
		}
		const out = this.allocator.alloc(gate.typeId);
		this.gates.push(withOutput(gate, out));
		return out;
	}

	createComplexGate(gate: BuildComplexGate): WireRange[] {
		const outputCount = complexOutputCount(gate, this.known);

		if (gate.kind === "call") {
			const counts = lookupFunction(this.known, gate.name);
			for (const [typeId, n] of counts.instanceCount) {
				this.instanceCount.set(typeId, (this.instanceCount.get(typeId) ?? 0) + n);
			}
			for (const [typeId, n] of counts.witnessCount) {
				this.witnessCount.set(typeId, (this.witnessCount.get(typeId) ?? 0) + n);
			}
		} else {
			const conversion = convertConversion(gate);
			this.usedConversions.set(conversionKey(conversion), conversion);
		}

		const outputs = allocateOutputs(this.allocator, outputCount);
		this.gates.push(complexGate(gate, outputs));
		return outputs;
	}

	/**
	 * Check the output shape and move the outputs to their canonical ids.
	 */
	finish(outputs: WireRange[]): FunctionWithInfos {
		if (!checkWireRangesWithCounts(outputs, this.outputCount)) {
			throw new ZKIRError(
				ErrorCodes.InvalidFunction,
				"Function " + this.name + " cannot be created (wrong number of output wires)",
			);
		}
		this.gates = replaceOutputWires(this.gates, outputs, localInputRanges(this.outputCount, this.inputCount));

		return {
			function: {
				name: this.name,
				outputCount: this.outputCount,
				inputCount: this.inputCount,
				instanceCount: mapToCounts(this.instanceCount),
				witnessCount: mapToCounts(this.witnessCount),
				body: { kind: "gates", gates: [...this.gates] },
			},
			usedConversions: [...this.usedConversions.values()],
		};
	}
}
