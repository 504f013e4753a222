// SPDX-License-Identifier: MIT
// ZKIR Semantic Validator
// Streaming checker over Instance/Witness/Relation messages. Every rule violation
// is appended to an ordered list; the pass never stops early.

import { exhaustive } from "./errors.ts";
import { gateName } from "./gates.ts";
import {
	characteristicOf,
	countsToMap,
	formatValue,
	formatWireIn,
	Profiles,
	valueToBigInt,
} from "./types.ts";
import type {
	CaseInvoke,
	Count,
	ForGate,
	FunctionDecl,
	Gate,
	GateKind,
	Header,
	Instance,
	Message,
	Relation,
	SwitchGate,
	TypeId,
	Value,
	WireId,
	WireRange,
	Witness,
} from "./types.ts";
import { VERSION_PATTERN } from "./zod-schemas.ts";
import {
	checkWireRangesWithCounts,
	countWireRanges,
	expandWireRanges,
	localInputRanges,
	resolveIterRanges,
} from "./wire.ts";

const IMPLEMENTED_CHECKS = String.raw`
Here is the list of implemented semantic/syntactic checks:

Header Validation
 - Ensure that every field characteristic is strictly greater than 1.
 - Ensure that every field degree is exactly 1.
 - Ensure that the version string has the correct format (e.g. matches the following regular expression “^\d+\.\d+\.\d+$”).
 - Ensure that the profile name is either circ_arithmetic_simple or circ_boolean_simple.
     - If circ_boolean_simple, checks that every field characteristic is exactly 2.
 - Ensure header messages are coherent.
     - Profile names should be identical.
     - Versions should be identical.
     - Field characteristics and field degrees should be the same.

Inputs Validation (Instances / Witnesses)
 - Ensure that Instance gates are given a value in Instance messages.
 - Ensure that Witness gates are given a value in Witness messages (prover only).
 - Ensure that no unused Instance or Witness values are given.
 - Ensure that the value they are set to is indeed encoding an element lying in the underlying field.
   For degree 1 fields, it can be achieved by ensuring that the encoded value is strictly smaller than the field characteristic.

Gates Validation
 - Ensure that gates used are coherent with the profile.
   - @not/@and/@xor are not allowed with circ_arithmetic_simple.
   - @add/@addc/@mul/@mulc are not allowed with circ_boolean_simple.
 - Ensure constants given in @addc/@mulc are actual field elements.
 - Ensure input wires of gates map to an already set variable.
 - Enforce Single Static Assignment by checking that the same wire is used only once as an output wire.
 - Ensure that freed wires are live, and that bulk allocations do not overlap live wires.
 - Ensure that calls, anonymous calls, switches and loops match the signatures they invoke,
   and that their bodies are valid in their own scope.
 - Ensure that conversions and plugins are declared before use.
`;

//==============================================================================
// Validator State
//==============================================================================

export interface ValidatorOptions {
	asProver?: boolean;
	/** Log the wires still live when violations are collected. Default true. */
	warnLiveWires?: boolean;
}

interface FunctionSignature {
	outputCount: Count[];
	inputCount: Count[];
	instanceCount: Count[];
	witnessCount: Count[];
}

/** Wire liveness and pending input values of one scope (top level or a nested body). */
interface Scope {
	live: Map<TypeId, Set<WireId>>;
	allocated: Map<TypeId, Set<WireId>>;
	instanceQueue: Map<TypeId, number>;
	witnessQueue: Map<TypeId, number>;
}

type InputKind = "Instance" | "Witness";

function emptyScope(): Scope {
	return { live: new Map(), allocated: new Map(), instanceQueue: new Map(), witnessQueue: new Map() };
}

function wiresOf(table: Map<TypeId, Set<WireId>>, typeId: TypeId): Set<WireId> {
	let set = table.get(typeId);
	if (!set) {
		set = new Set();
		table.set(typeId, set);
	}
	return set;
}

function conversionKey(output: Count, input: Count): string {
	return `${output.typeId}:${output.count}<-${input.typeId}:${input.count}`;
}

const arithmeticKinds = new Set<GateKind>(["add", "mul", "addConstant", "mulConstant"]);
const booleanKinds = new Set<GateKind>(["and", "xor", "not"]);

//==============================================================================
// Validator
//==============================================================================

export class Validator {
	private readonly asProver: boolean;
	private readonly warnLiveWires: boolean;

	private header: Header | null = null;
	private profileKind: "arithmetic" | "boolean" | null = null;

	private readonly root: Scope = emptyScope();
	private readonly functions = new Map<string, FunctionSignature>();
	private readonly plugins = new Set<string>();
	private readonly conversions = new Set<string>();

	private maxWire = -1;
	private finalized = false;
	private readonly violations: string[] = [];

	constructor(options: ValidatorOptions = {}) {
		this.asProver = options.asProver ?? false;
		this.warnLiveWires = options.warnLiveWires ?? true;
	}

	static asVerifier(options: Omit<ValidatorOptions, "asProver"> = {}): Validator {
		return new Validator({ ...options, asProver: false });
	}

	static asProver(options: Omit<ValidatorOptions, "asProver"> = {}): Validator {
		return new Validator({ ...options, asProver: true });
	}

	static implementedChecks(): string {
		return IMPLEMENTED_CHECKS;
	}

	static printImplementedChecks(): void {
		console.log(IMPLEMENTED_CHECKS);
	}

	/**
	 * Finalize the pass and return every violation in traversal order.
	 * Unconsumed input values are violations; wires still live are only a warning.
	 */
	getViolations(): string[] {
		if (!this.finalized) {
			this.finalized = true;
			this.ensureAllValuesConsumed(this.root.instanceQueue, "Instance");
			if (this.asProver) {
				this.ensureAllValuesConsumed(this.root.witnessQueue, "Witness");
			}
			const stillLive: string[] = [];
			for (const [typeId, wires] of this.root.live) {
				for (const wire of wires) stillLive.push(formatWireIn(this.header, typeId, wire));
			}
			if (this.warnLiveWires && stillLive.length > 0) {
				console.warn(`[Validator] WARNING: these wires were not freed: ${stillLive.slice(0, 10).join(", ")}${stillLive.length > 10 ? ", ..." : ""}.`);
			}
		}
		return [...this.violations];
	}

	/** First wire id guaranteed not to collide with any wire seen so far, in any type. */
	getFreeTemporaryWire(): WireId {
		return this.maxWire + 1;
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

	//==========================================================================
	// Header
	//==========================================================================

	ingestHeader(header: Header): void {
		const snapshot = this.header;
		if (snapshot !== null) {
			if (snapshot.fields.length !== header.fields.length) {
				this.violate("The number of fields is not consistent across headers.");
			} else {
				const characteristicsDiffer = snapshot.fields.some((f, i) =>
					valueToBigInt(f.characteristic) !== valueToBigInt(header.fields[i]?.characteristic ?? []));
				if (characteristicsDiffer) {
					this.violate("The field_characteristic field is not consistent across headers.");
				}
				if (snapshot.fields.some((f, i) => f.degree !== header.fields[i]?.degree)) {
					this.violate("The field_degree is not consistent across headers.");
				}
			}
			if (snapshot.profile !== header.profile) {
				this.violate("The profile name is not consistent across headers.");
			}
			if (snapshot.version !== header.version) {
				this.violate("The profile version is not consistent across headers.");
			}
			return;
		}

		this.header = header;

		if (header.fields.length === 0) {
			this.violate("The header must declare at least one field.");
		}
		// TODO: check that characteristics are prime, or in a list of pre-defined primes.
		if (header.fields.some((f) => valueToBigInt(f.characteristic) <= 1n)) {
			this.violate("The field_characteristic should be > 1");
		}
		if (header.fields.some((f) => f.degree !== 1)) {
			this.violate("field_degree must be = 1");
		}

		switch (header.profile.trim()) {
		case Profiles.Arithmetic:
			this.profileKind = "arithmetic";
			break;
		case Profiles.Boolean:
			this.profileKind = "boolean";
			if (header.fields.some((f) => valueToBigInt(f.characteristic) !== 2n)) {
				this.violate("With profile 'circ_boolean_simple', the field characteristic can only be 2.");
			}
			break;
		default:
			this.violate("The profile name should match either 'circ_arithmetic_simple' or 'circ_boolean_simple'.");
		}

		if (!VERSION_PATTERN.test(header.version.trim())) {
			this.violate("The profile version should match the following format <major>.<minor>.<patch>.");
		}
	}

	//==========================================================================
	// Inputs
	//==========================================================================

	ingestInstance(instance: Instance): void {
		this.ingestHeader(instance.header);
		this.ingestValues(instance.inputs, this.root.instanceQueue, "instance");
	}

	ingestWitness(witness: Witness): void {
		if (!this.asProver) {
			this.violate("As verifier, got an unexpected Witness message.");
		}
		this.ingestHeader(witness.header);
		this.ingestValues(witness.inputs, this.root.witnessQueue, "witness");
	}

	private ingestValues(inputs: Value[][], queue: Map<TypeId, number>, what: "instance" | "witness"): void {
		inputs.forEach((values, typeId) => {
			if (values.length === 0) return;
			if (!this.ensureTypeDeclared(typeId)) return;
			for (const value of values) {
				this.ensureValueInField(typeId, value, () => `${what} value ${formatValue(value)}`);
			}
			queue.set(typeId, (queue.get(typeId) ?? 0) + values.length);
		});
	}

	//==========================================================================
	// Relation
	//==========================================================================

	ingestRelation(relation: Relation): void {
		this.ingestHeader(relation.header);

		for (const plugin of relation.plugins) {
			this.plugins.add(plugin);
		}
		for (const conversion of relation.conversions) {
			this.conversions.add(conversionKey(conversion.output, conversion.input));
		}
		for (const fn of relation.functions) {
			this.ingestFunction(fn);
		}
		for (const gate of relation.gates) {
			this.ingestGate(gate);
		}
	}

	private ingestFunction(fn: FunctionDecl): void {
		if (this.functions.has(fn.name)) {
			this.violate(`Function ${fn.name} is defined more than once.`);
			return;
		}
		this.functions.set(fn.name, {
			outputCount: fn.outputCount,
			inputCount: fn.inputCount,
			instanceCount: fn.instanceCount,
			witnessCount: fn.witnessCount,
		});

		if (fn.body.kind === "plugin") {
			if (!this.plugins.has(fn.body.plugin.name)) {
				this.violate(`The plugin ${fn.body.plugin.name} used by function ${fn.name} is not declared in the relation.`);
			}
			return;
		}

		const inputs = localInputRanges(fn.outputCount, fn.inputCount);
		this.checkBody(fn.body.gates, fn.outputCount, inputs, fn.instanceCount, fn.witnessCount, `function ${fn.name}`);
	}

	//==========================================================================
	// Gates
	//==========================================================================

	ingestGate(gate: Gate): void {
		this.checkGate(this.root, gate);
	}

	private checkGate(scope: Scope, gate: Gate): void {
		if (arithmeticKinds.has(gate.kind)) this.ensureArithmetic(gate.kind);
		if (booleanKinds.has(gate.kind)) this.ensureBoolean(gate.kind);

		switch (gate.kind) {
		case "constant":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			this.ensureValueInField(gate.typeId, gate.value, () => "Gate::Constant constant");
			this.ensureUndefinedAndSet(scope, gate.typeId, gate.out);
			break;

		case "assertZero":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			this.ensureDefinedAndSet(scope, gate.typeId, gate.input);
			break;

		case "copy":
		case "not":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			this.ensureDefinedAndSet(scope, gate.typeId, gate.input);
			this.ensureUndefinedAndSet(scope, gate.typeId, gate.out);
			break;

		case "add":
		case "mul":
		case "and":
		case "xor":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			this.ensureDefinedAndSet(scope, gate.typeId, gate.left);
			this.ensureDefinedAndSet(scope, gate.typeId, gate.right);
			this.ensureUndefinedAndSet(scope, gate.typeId, gate.out);
			break;

		case "addConstant":
		case "mulConstant":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			this.ensureValueInField(gate.typeId, gate.constant, () => `Gate::${gateName(gate.kind)}_${gate.out}`);
			this.ensureDefinedAndSet(scope, gate.typeId, gate.input);
			this.ensureUndefinedAndSet(scope, gate.typeId, gate.out);
			break;

		case "instance":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			this.ensureUndefinedAndSet(scope, gate.typeId, gate.out);
			if (!this.consumeValue(scope.instanceQueue, gate.typeId)) {
				this.violate(`No value available for the Instance wire ${formatWireIn(this.header, gate.typeId, gate.out)}.`);
			}
			break;

		case "witness":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			this.ensureUndefinedAndSet(scope, gate.typeId, gate.out);
			if (this.asProver && !this.consumeValue(scope.witnessQueue, gate.typeId)) {
				this.violate(`No value available for the Witness wire ${formatWireIn(this.header, gate.typeId, gate.out)}.`);
			}
			break;

		case "free":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			// all wires between first and last INCLUSIVE
			for (let wire = gate.first; wire <= (gate.last ?? gate.first); wire++) {
				this.freeWire(scope, gate.typeId, wire);
			}
			break;

		case "new":
			if (!this.ensureTypeDeclared(gate.typeId)) return;
			for (let wire = gate.first; wire <= gate.last; wire++) {
				this.touch(wire);
				if (wiresOf(scope.live, gate.typeId).has(wire) || wiresOf(scope.allocated, gate.typeId).has(wire)) {
					this.violate(`The wire ${formatWireIn(this.header, gate.typeId, wire)} has already been initialized before. This violates the SSA property.`);
					continue;
				}
				wiresOf(scope.allocated, gate.typeId).add(wire);
			}
			break;

		case "convert": {
			if (!this.ensureRangesTyped([gate.input, gate.output])) return;
			const key = conversionKey(
				{ typeId: gate.output.typeId, count: gate.output.last - gate.output.first + 1 },
				{ typeId: gate.input.typeId, count: gate.input.last - gate.input.first + 1 },
			);
			if (!this.conversions.has(key)) {
				this.violate(`The conversion ${key} is not declared in the relation.`);
			}
			this.ensureRangesDefined(scope, [gate.input]);
			this.ensureRangesUndefined(scope, [gate.output]);
			break;
		}

		case "call": {
			if (!this.ensureRangesTyped([...gate.inputs, ...gate.outputs])) return;
			const sig = this.functions.get(gate.name);
			if (!sig) {
				this.violate(`Unknown function ${gate.name}.`);
			} else {
				this.checkSignatureShape(gate.name, sig, gate.outputs, gate.inputs);
			}
			this.ensureRangesDefined(scope, gate.inputs);
			this.ensureRangesUndefined(scope, gate.outputs);
			if (sig) this.consumeCounts(scope, sig.instanceCount, sig.witnessCount, `the call to ${gate.name}`);
			break;
		}

		case "anonCall":
			if (!this.ensureRangesTyped([...gate.inputs, ...gate.outputs])) return;
			this.ensureRangesDefined(scope, gate.inputs);
			this.ensureRangesUndefined(scope, gate.outputs);
			this.consumeCounts(scope, gate.instanceCount, gate.witnessCount, "an anonymous call");
			this.checkBody(
				gate.body,
				rangeCounts(gate.outputs),
				localInputRanges(rangeCounts(gate.outputs), rangeCounts(gate.inputs)),
				gate.instanceCount,
				gate.witnessCount,
				"anonymous call",
			);
			break;

		case "switch":
			this.checkSwitch(scope, gate);
			break;

		case "for":
			this.checkFor(scope, gate);
			break;

		default:
			exhaustive(gate);
		}
	}

	//==========================================================================
	// Structural Gates
	//==========================================================================

	private checkSwitch(scope: Scope, gate: SwitchGate): void {
		if (!this.ensureTypeDeclared(gate.typeId)) return;
		if (!this.ensureRangesTyped(gate.outputs)) return;

		this.ensureDefinedAndSet(scope, gate.typeId, gate.condition);

		if (gate.cases.length !== gate.branches.length) {
			this.violate(`The switch has ${gate.cases.length} case values but ${gate.branches.length} branches.`);
		}
		const seen = new Set<bigint>();
		for (const value of gate.cases) {
			this.ensureValueInField(gate.typeId, value, () => `switch case value ${formatValue(value)}`);
			const n = valueToBigInt(value);
			if (seen.has(n)) {
				this.violate(`The switch case value ${formatValue(value)} is used more than once.`);
			}
			seen.add(n);
		}

		const instanceMax = new Map<TypeId, number>();
		const witnessMax = new Map<TypeId, number>();
		const outputCount = rangeCounts(gate.outputs);
		for (const branch of gate.branches) {
			const counts = this.checkCase(scope, branch, gate.outputs, outputCount);
			if (!counts) continue;
			mergeMax(instanceMax, counts.instanceCount);
			mergeMax(witnessMax, counts.witnessCount);
		}

		this.ensureRangesUndefined(scope, gate.outputs);
		this.consumeCounts(scope, toCounts(instanceMax), toCounts(witnessMax), "a switch");
	}

	private checkCase(
		scope: Scope,
		branch: CaseInvoke,
		outputs: WireRange[],
		outputCount: Count[],
	): { instanceCount: Count[]; witnessCount: Count[] } | null {
		if (!this.ensureRangesTyped(branch.inputs)) return null;
		this.ensureRangesDefined(scope, branch.inputs);

		if (branch.kind === "call") {
			const sig = this.functions.get(branch.name);
			if (!sig) {
				this.violate(`Unknown function ${branch.name}.`);
				return null;
			}
			this.checkSignatureShape(branch.name, sig, outputs, branch.inputs);
			return { instanceCount: sig.instanceCount, witnessCount: sig.witnessCount };
		}

		this.checkBody(
			branch.body,
			outputCount,
			localInputRanges(outputCount, rangeCounts(branch.inputs)),
			branch.instanceCount,
			branch.witnessCount,
			"switch branch",
		);
		return { instanceCount: branch.instanceCount, witnessCount: branch.witnessCount };
	}

	private checkFor(scope: Scope, gate: ForGate): void {
		if (!this.ensureRangesTyped(gate.outputs)) return;

		const declared = new Set(expandWireRanges(gate.outputs).map(([t, w]) => `${t}:${w}`));
		const body = gate.body;
		let bodyShape: { outputs: WireRange[]; inputs: WireRange[] } | null = null;

		for (let i = gate.start; i <= gate.end; i++) {
			const bindings = new Map([[gate.iterator, i]]);
			const outputs = resolveIterRanges(body.outputs, bindings);
			const inputs = resolveIterRanges(body.inputs, bindings);
			if (outputs === null || inputs === null || !this.ensureRangesTyped([...outputs, ...inputs])) {
				this.violate(`Invalid iterator expression in the for loop over ${gate.iterator} at iteration ${i}.`);
				continue;
			}
			bodyShape ??= { outputs, inputs };

			if (body.kind === "call") {
				const sig = this.functions.get(body.name);
				if (!sig) {
					this.violate(`Unknown function ${body.name}.`);
					return;
				}
				this.checkSignatureShape(body.name, sig, outputs, inputs);
				this.consumeCounts(scope, sig.instanceCount, sig.witnessCount, `the call to ${body.name}`);
			} else {
				this.consumeCounts(scope, body.instanceCount, body.witnessCount, "a for loop body");
			}

			this.ensureRangesDefined(scope, inputs);
			for (const [typeId, wire] of expandWireRanges(outputs)) {
				if (!declared.has(`${typeId}:${wire}`)) {
					this.violate(`The wire ${formatWireIn(this.header, typeId, wire)} written by iteration ${i} is not an output of the for loop.`);
				}
				this.ensureUndefinedAndSet(scope, typeId, wire);
			}
		}

		if (body.kind === "anonCall" && bodyShape !== null) {
			const outputCount = rangeCounts(bodyShape.outputs);
			this.checkBody(
				body.body,
				outputCount,
				localInputRanges(outputCount, rangeCounts(bodyShape.inputs)),
				body.instanceCount,
				body.witnessCount,
				"for loop body",
			);
		}

		for (const [typeId, wire] of expandWireRanges(gate.outputs)) {
			this.touch(wire);
			if (!wiresOf(scope.live, typeId).has(wire)) {
				this.violate(`The for loop output wire ${formatWireIn(this.header, typeId, wire)} is never assigned.`);
				wiresOf(scope.live, typeId).add(wire);
			}
		}
	}

	/**
	 * Validate a nested body in its own scope: outputs occupy the lowest local ids,
	 * inputs follow, and the scope holds exactly the declared input values.
	 */
	private checkBody(
		gates: Gate[],
		outputCount: Count[],
		inputs: WireRange[],
		instanceCount: Count[],
		witnessCount: Count[],
		context: string,
	): void {
		const scope = emptyScope();
		for (const [typeId, wire] of expandWireRanges(inputs)) {
			this.touch(wire);
			wiresOf(scope.live, typeId).add(wire);
		}
		for (const c of instanceCount) {
			scope.instanceQueue.set(c.typeId, (scope.instanceQueue.get(c.typeId) ?? 0) + c.count);
		}
		for (const c of witnessCount) {
			scope.witnessQueue.set(c.typeId, (scope.witnessQueue.get(c.typeId) ?? 0) + c.count);
		}

		for (const gate of gates) {
			this.checkGate(scope, gate);
		}

		for (const [typeId, n] of countsToMap(outputCount)) {
			for (let wire = 0; wire < n; wire++) {
				if (!wiresOf(scope.live, typeId).has(wire)) {
					this.violate(`The output wire ${formatWireIn(this.header, typeId, wire)} of the ${context} is never assigned.`);
				}
			}
		}
		for (const [typeId, n] of scope.instanceQueue) {
			if (n > 0) this.violate(`Too many Instance values declared by the ${context} (${n} of type ${typeId} not consumed)`);
		}
		if (this.asProver) {
			for (const [typeId, n] of scope.witnessQueue) {
				if (n > 0) this.violate(`Too many Witness values declared by the ${context} (${n} of type ${typeId} not consumed)`);
			}
		}
	}

	private checkSignatureShape(name: string, sig: FunctionSignature, outputs: WireRange[], inputs: WireRange[]): void {
		if (!checkWireRangesWithCounts(outputs, sig.outputCount)) {
			this.violate(`Call to function ${name}: number of output wires mismatch.`);
		}
		if (!checkWireRangesWithCounts(inputs, sig.inputCount)) {
			this.violate(`Call to function ${name}: number of input wires mismatch.`);
		}
	}

	//==========================================================================
	// Wire Liveness
	//==========================================================================

	private touch(wire: WireId): void {
		if (wire > this.maxWire) this.maxWire = wire;
	}

	private declare(scope: Scope, typeId: TypeId, wire: WireId): void {
		this.touch(wire);
		wiresOf(scope.allocated, typeId).delete(wire);
		wiresOf(scope.live, typeId).add(wire);
	}

	private ensureDefinedAndSet(scope: Scope, typeId: TypeId, wire: WireId): void {
		this.touch(wire);
		if (wiresOf(scope.live, typeId).has(wire)) return;
		if (this.asProver) {
			// all wires must have been assigned before being read
			this.violate(`The wire ${formatWireIn(this.header, typeId, wire)} is used but was not assigned a value, or has been freed already.`);
		}
		// declaring it avoids reporting the same undefined wire again
		this.declare(scope, typeId, wire);
	}

	private ensureUndefinedAndSet(scope: Scope, typeId: TypeId, wire: WireId): void {
		if (wiresOf(scope.live, typeId).has(wire)) {
			this.violate(`The wire ${formatWireIn(this.header, typeId, wire)} has already been initialized before. This violates the SSA property.`);
		}
		this.declare(scope, typeId, wire);
	}

	private freeWire(scope: Scope, typeId: TypeId, wire: WireId): void {
		this.touch(wire);
		if (wiresOf(scope.live, typeId).delete(wire)) return;
		if (wiresOf(scope.allocated, typeId).delete(wire)) return;
		if (this.asProver) {
			this.violate(`The wire ${formatWireIn(this.header, typeId, wire)} is used but was not assigned a value, or has been freed already.`);
		} else {
			this.violate(`The wire ${formatWireIn(this.header, typeId, wire)} is being freed, but was not defined previously, or has been already freed`);
		}
	}

	private ensureRangesDefined(scope: Scope, ranges: WireRange[]): void {
		for (const [typeId, wire] of expandWireRanges(ranges)) {
			this.ensureDefinedAndSet(scope, typeId, wire);
		}
	}

	private ensureRangesUndefined(scope: Scope, ranges: WireRange[]): void {
		for (const [typeId, wire] of expandWireRanges(ranges)) {
			this.ensureUndefinedAndSet(scope, typeId, wire);
		}
	}

	//==========================================================================
	// Input Queues
	//==========================================================================

	private consumeValue(queue: Map<TypeId, number>, typeId: TypeId): boolean {
		const available = queue.get(typeId) ?? 0;
		if (available === 0) return false;
		queue.set(typeId, available - 1);
		return true;
	}

	private consumeCounts(scope: Scope, instanceCount: Count[], witnessCount: Count[], context: string): void {
		this.consumeMany(scope.instanceQueue, instanceCount, "Instance", context);
		if (this.asProver) {
			this.consumeMany(scope.witnessQueue, witnessCount, "Witness", context);
		}
	}

	private consumeMany(queue: Map<TypeId, number>, counts: Count[], kind: InputKind, context: string): void {
		for (const [typeId, n] of countsToMap(counts)) {
			const available = queue.get(typeId) ?? 0;
			if (available < n) {
				this.violate(`Not enough ${kind} values for ${context} (type ${typeId}: ${n} needed, ${available} available)`);
			}
			queue.set(typeId, Math.max(0, available - n));
		}
	}

	private ensureAllValuesConsumed(queue: Map<TypeId, number>, kind: InputKind): void {
		for (const [typeId, n] of queue) {
			if (n > 0) {
				this.violate(`Too many ${kind} values of type ${typeId} (${n} not consumed)`);
			}
		}
	}

	//==========================================================================
	// Field & Profile Checks
	//==========================================================================

	private ensureTypeDeclared(typeId: TypeId): boolean {
		if (this.header === null || typeId < this.header.fields.length) return true;
		this.violate(`Type id ${typeId} is not declared in the Header.`);
		return false;
	}

	private ensureRangesTyped(ranges: WireRange[]): boolean {
		return ranges.every((r) => this.ensureTypeDeclared(r.typeId));
	}

	private ensureValueInField(typeId: TypeId, value: Value, name: () => string): void {
		if (value.length === 0) {
			this.violate(`The ${name()} is empty.`);
		}
		if (this.header === null) return;
		const characteristic = characteristicOf(this.header, typeId);
		if (characteristic === undefined) return;
		const int = valueToBigInt(value);
		if (int >= characteristic) {
			this.violate(`The ${name()} cannot be represented in the field specified in Header (${int} >= ${characteristic}).`);
		}
	}

	private ensureArithmetic(kind: GateKind): void {
		if (this.profileKind === "boolean") {
			this.violate(`Arithmetic gate found (${gateName(kind)}), while boolean circuit.`);
		}
	}

	private ensureBoolean(kind: GateKind): void {
		if (this.profileKind === "arithmetic") {
			this.violate(`Boolean gate found (${gateName(kind)}), while arithmetic circuit.`);
		}
	}

	private violate(message: string): void {
		this.violations.push(message);
	}
}

//==============================================================================
// Helpers
//==============================================================================

function rangeCounts(ranges: WireRange[]): Count[] {
	return toCounts(countWireRanges(ranges));
}

function toCounts(map: Map<TypeId, number>): Count[] {
	return [...map.entries()].map(([typeId, n]) => ({ typeId, count: n }));
}

function mergeMax(target: Map<TypeId, number>, counts: Count[]): void {
	for (const [typeId, n] of countsToMap(counts)) {
		target.set(typeId, Math.max(target.get(typeId) ?? 0, n));
	}
}
