// SPDX-License-Identifier: MIT
// ZKIR Plaintext Evaluator
// Computes every wire over bigint, modulo the characteristic of its type.

import { ZKIRError, exhaustive } from "./errors.ts";
import { characteristicOf, formatWireIn, valueToBigInt, wireKey } from "./types.ts";
import type {
	FunctionDecl, Gate, Header, Instance, Message, Relation, TypeId, WireId, WireRange, Witness,
} from "./types.ts";
import { countWireRanges, expandWireRanges } from "./wire.ts";

type Wires = Map<string, bigint>;

export class Evaluator {
	private header: Header | null = null;
	private readonly functions = new Map<string, FunctionDecl>();
	private readonly instanceQueue = new Map<TypeId, bigint[]>();
	private readonly witnessQueue = new Map<TypeId, bigint[]>();
	private readonly wires: Wires = new Map();
	private readonly violations: string[] = [];

	static fromMessages(messages: Iterable<Message>): Evaluator {
		const evaluator = new Evaluator();
		for (const msg of messages) {
			evaluator.ingestMessage(msg);
		}
		return evaluator;
	}

	ingestMessage(msg: Message): void {
		switch (msg.kind) {
		case "instance":
			this.ingestInstance(msg.instance);
			break;
		case "witness":
			this.ingestWitness(msg.witness);
			break;
		case "relation":
			this.ingestRelation(msg.relation);
			break;
		default:
			exhaustive(msg);
		}
	}

	ingestInstance(instance: Instance): void {
		this.header ??= instance.header;
		enqueue(this.instanceQueue, instance.inputs.map((values) => values.map(valueToBigInt)));
	}

	ingestWitness(witness: Witness): void {
		this.header ??= witness.header;
		enqueue(this.witnessQueue, witness.inputs.map((values) => values.map(valueToBigInt)));
	}

	/**
	 * @throws ZKIRError Unsupported for switch, for, convert and plugin calls.
	 */
	ingestRelation(relation: Relation): void {
		this.header ??= relation.header;
		for (const fn of relation.functions) {
			this.functions.set(fn.name, fn);
		}
		for (const gate of relation.gates) {
			this.evalGate(this.wires, gate);
		}
	}

	getWireValue(typeId: TypeId, wireId: WireId): bigint | undefined {
		return this.wires.get(wireKey(typeId, wireId));
	}

	getViolations(): string[] {
		return [...this.violations];
	}

	//==========================================================================
	// Gates
	//==========================================================================

	private evalGate(scope: Wires, gate: Gate): void {
		switch (gate.kind) {
		case "constant":
			this.set(scope, gate.typeId, gate.out, valueToBigInt(gate.value));
			break;
		case "assertZero": {
			const value = this.get(scope, gate.typeId, gate.input);
			if (value !== 0n) {
				this.violations.push(`Wire ${formatWireIn(this.header, gate.typeId, gate.input)} should be 0, while it is ${value.toString()}`);
			}
			break;
		}
		case "copy":
			this.set(scope, gate.typeId, gate.out, this.get(scope, gate.typeId, gate.input));
			break;
		case "add":
		case "xor":
			this.set(scope, gate.typeId, gate.out,
				this.get(scope, gate.typeId, gate.left) + this.get(scope, gate.typeId, gate.right));
			break;
		case "mul":
		case "and":
			this.set(scope, gate.typeId, gate.out,
				this.get(scope, gate.typeId, gate.left) * this.get(scope, gate.typeId, gate.right));
			break;
		case "addConstant":
			this.set(scope, gate.typeId, gate.out, this.get(scope, gate.typeId, gate.input) + valueToBigInt(gate.constant));
			break;
		case "mulConstant":
			this.set(scope, gate.typeId, gate.out, this.get(scope, gate.typeId, gate.input) * valueToBigInt(gate.constant));
			break;
		case "not":
			this.set(scope, gate.typeId, gate.out, this.get(scope, gate.typeId, gate.input) + 1n);
			break;
		case "instance":
			this.set(scope, gate.typeId, gate.out, this.take(this.instanceQueue, gate.typeId, "Instance", gate.out));
			break;
		case "witness":
			this.set(scope, gate.typeId, gate.out, this.take(this.witnessQueue, gate.typeId, "Witness", gate.out));
			break;
		case "free":
			for (let wire = gate.first; wire <= (gate.last ?? gate.first); wire++) {
				scope.delete(wireKey(gate.typeId, wire));
			}
			break;
		case "new":
			break;
		case "call": {
			const fn = this.functions.get(gate.name);
			if (!fn) throw ZKIRError.unknownFunction(gate.name);
			if (fn.body.kind === "plugin") {
				throw ZKIRError.unsupported("Evaluating the plugin " + fn.body.plugin.name);
			}
			this.evalBody(scope, fn.body.gates, gate.outputs, gate.inputs);
			break;
		}
		case "anonCall":
			this.evalBody(scope, gate.body, gate.outputs, gate.inputs);
			break;
		case "convert":
			throw ZKIRError.unsupported("Evaluating convert gates");
		case "switch":
			throw ZKIRError.unsupported("Evaluating switch gates");
		case "for":
			throw ZKIRError.unsupported("Evaluating for loops");
		default:
			exhaustive(gate);
		}
	}

	/**
	 * Run a body in a fresh scope. Per type, the caller's outputs map to local ids
	 * from 0 and its inputs to the local ids right after them.
	 */
	private evalBody(caller: Wires, gates: readonly Gate[], outputs: WireRange[], inputs: WireRange[]): void {
		const local: Wires = new Map();
		const next = countWireRanges(outputs);
		for (const [typeId, wire] of expandWireRanges(inputs)) {
			const localId = next.get(typeId) ?? 0;
			next.set(typeId, localId + 1);
			local.set(wireKey(typeId, localId), this.get(caller, typeId, wire));
		}

		for (const gate of gates) {
			this.evalGate(local, gate);
		}

		const position = new Map<TypeId, WireId>();
		for (const [typeId, wire] of expandWireRanges(outputs)) {
			const localId = position.get(typeId) ?? 0;
			position.set(typeId, localId + 1);
			this.set(caller, typeId, wire, this.get(local, typeId, localId));
		}
	}

	//==========================================================================
	// Wires & Values
	//==========================================================================

	private modulus(typeId: TypeId): bigint {
		const characteristic = this.header === null ? undefined : characteristicOf(this.header, typeId);
		if (characteristic === undefined) {
			throw ZKIRError.unknownType(typeId, "cannot evaluate the gate");
		}
		return characteristic;
	}

	private set(scope: Wires, typeId: TypeId, wire: WireId, value: bigint): void {
		scope.set(wireKey(typeId, wire), value % this.modulus(typeId));
	}

	private get(scope: Wires, typeId: TypeId, wire: WireId): bigint {
		const value = scope.get(wireKey(typeId, wire));
		if (value === undefined) {
			this.violations.push(`Wire ${formatWireIn(this.header, typeId, wire)} is used but was not assigned a value`);
			return 0n;
		}
		return value;
	}

	private take(queue: Map<TypeId, bigint[]>, typeId: TypeId, kind: string, wire: WireId): bigint {
		const value = queue.get(typeId)?.shift();
		if (value === undefined) {
			this.violations.push(`No value available for the ${kind} wire ${formatWireIn(this.header, typeId, wire)}`);
			return 0n;
		}
		return value;
	}
}

function enqueue(queue: Map<TypeId, bigint[]>, inputs: bigint[][]): void {
	inputs.forEach((values, typeId) => {
		const pending = queue.get(typeId) ?? [];
		pending.push(...values);
		queue.set(typeId, pending);
	});
}
