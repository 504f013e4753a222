// SPDX-License-Identifier: MIT
// ZKIR Message Builder
// Buffers instance values, witness values and relation parts, and flushes
// them to a sink once enough items are pending.

import { ZKIRError } from "../errors.ts";
import { createHeader, IR_VERSION } from "../types.ts";
import type { Conversion, FieldDescriptor, FunctionDecl, Gate, Header, TypeId, Value } from "../types.ts";
import type { Sink } from "./sink.ts";

export const DEFAULT_MAX_LEN = 100_000;

export interface BuilderOptions {
	/** Maximum number of pending gates, or of pending values of one kind. */
	maxLen?: number;
	profile?: string;
}

export class MessageBuilder<S extends Sink> {
	readonly sink: S;
	readonly header: Header;
	readonly maxLen: number;

	private instanceValues: Value[][];
	private witnessValues: Value[][];
	private gates: Gate[] = [];
	private functions: FunctionDecl[] = [];
	private plugins: string[] = [];
	private conversions: Conversion[] = [];
	/** Gates held by pending functions; a plugin function counts as one. */
	private functionsSize = 0;

	constructor(sink: S, fields: FieldDescriptor[], options: BuilderOptions = {}) {
		this.sink = sink;
		this.header = createHeader(fields, options.profile, IR_VERSION);
		this.maxLen = options.maxLen ?? DEFAULT_MAX_LEN;
		this.instanceValues = fields.map(() => []);
		this.witnessValues = fields.map(() => []);
	}

	pushInstanceValue(typeId: TypeId, value: Value): void {
		const values = this.instanceValues[typeId];
		if (!values) throw ZKIRError.unknownType(typeId, "cannot push instance value.");
		values.push(value);
		if (pendingValues(this.instanceValues) >= this.maxLen) this.flushInstance();
	}

	pushWitnessValue(typeId: TypeId, value: Value): void {
		const values = this.witnessValues[typeId];
		if (!values) throw ZKIRError.unknownType(typeId, "cannot push witness value.");
		values.push(value);
		if (pendingValues(this.witnessValues) >= this.maxLen) this.flushWitness();
	}

	pushGate(gate: Gate): void {
		this.gates.push(gate);
		this.flushRelationIfFull();
	}

	pushPlugin(name: string): void {
		this.plugins.push(name);
		this.flushRelationIfFull();
	}

	pushConversion(conversion: Conversion): void {
		this.conversions.push(conversion);
		this.flushRelationIfFull();
	}

	pushFunction(fn: FunctionDecl): void {
		this.functionsSize += fn.body.kind === "gates" ? fn.body.gates.length : 1;
		this.functions.push(fn);
		this.flushRelationIfFull();
	}

	/** Flush everything still pending and hand back the sink. */
	finish(): S {
		if (pendingValues(this.instanceValues) > 0) this.flushInstance();
		if (pendingValues(this.witnessValues) > 0) this.flushWitness();
		if (this.relationSize() > 0) this.flushRelation();
		return this.sink;
	}

	private relationSize(): number {
		return this.gates.length + this.plugins.length + this.conversions.length + this.functionsSize;
	}

	private flushRelationIfFull(): void {
		if (this.relationSize() >= this.maxLen) this.flushRelation();
	}

	private flushInstance(): void {
		this.sink.pushInstanceMessage({ header: this.header, inputs: this.instanceValues });
		this.instanceValues = this.instanceValues.map(() => []);
	}

	private flushWitness(): void {
		this.sink.pushWitnessMessage({ header: this.header, inputs: this.witnessValues });
		this.witnessValues = this.witnessValues.map(() => []);
	}

	private flushRelation(): void {
		this.sink.pushRelationMessage({
			header: this.header,
			plugins: this.plugins,
			conversions: this.conversions,
			functions: this.functions,
			gates: this.gates,
		});
		this.gates = [];
		this.functions = [];
		this.plugins = [];
		this.conversions = [];
		this.functionsSize = 0;
	}
}

function pendingValues(values: readonly Value[][]): number {
	return values.reduce((n, v) => n + v.length, 0);
}
