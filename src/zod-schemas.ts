// SPDX-License-Identifier: MIT
// ZKIR Zod Schemas
// Single source of truth for every message that crosses the codec boundary.
//
// Type interfaces are defined manually (not via z.infer) because Zod v4's
// z.discriminatedUnion doesn't support recursion, and z.union typed as
// z.ZodType erases inferred types to `unknown`. We define the types explicitly
// and annotate recursive schemas with z.ZodType<ExplicitType>.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

/** Semantic version pattern accepted by the IR */
export const VERSION_PATTERN = /^\d+\.\d+\.\d+$/;

/** Little-endian byte string encoding one field element */
export type Value = number[];
export type TypeId = number;
export type WireId = number;

//==============================================================================
// Header & Counts - Manual Interfaces
//==============================================================================

export interface FieldDescriptor { characteristic: Value; degree: number }
export interface Header { version: string; profile: string; fields: FieldDescriptor[] }

export interface Count { typeId: TypeId; count: number }
export interface WireRange { typeId: TypeId; first: WireId; last: WireId }
export interface Conversion { output: Count; input: Count }

//==============================================================================
// Iterator Expressions (for-loop index arithmetic)
//==============================================================================

export interface IterConst { kind: "const"; value: number }
export interface IterName { kind: "name"; name: string }
export interface IterAdd { kind: "add"; left: IterExpr; right: IterExpr }
export interface IterSub { kind: "sub"; left: IterExpr; right: IterExpr }
export interface IterMul { kind: "mul"; left: IterExpr; right: IterExpr }
export interface IterDivConst { kind: "divConst"; left: IterExpr; divisor: number }

export type IterExpr = IterConst | IterName | IterAdd | IterSub | IterMul | IterDivConst;

export interface IterExprWireRange { typeId: TypeId; first: IterExpr; last?: IterExpr | undefined }

//==============================================================================
// Gate Domain - Manual Interfaces
//==============================================================================

export interface ConstantGate { kind: "constant"; typeId: TypeId; out: WireId; value: Value }
export interface AssertZeroGate { kind: "assertZero"; typeId: TypeId; input: WireId }
export interface CopyGate { kind: "copy"; typeId: TypeId; out: WireId; input: WireId }
export interface AddGate { kind: "add"; typeId: TypeId; out: WireId; left: WireId; right: WireId }
export interface MulGate { kind: "mul"; typeId: TypeId; out: WireId; left: WireId; right: WireId }
export interface AddConstantGate { kind: "addConstant"; typeId: TypeId; out: WireId; input: WireId; constant: Value }
export interface MulConstantGate { kind: "mulConstant"; typeId: TypeId; out: WireId; input: WireId; constant: Value }
export interface AndGate { kind: "and"; typeId: TypeId; out: WireId; left: WireId; right: WireId }
export interface XorGate { kind: "xor"; typeId: TypeId; out: WireId; left: WireId; right: WireId }
export interface NotGate { kind: "not"; typeId: TypeId; out: WireId; input: WireId }
export interface InstanceGate { kind: "instance"; typeId: TypeId; out: WireId }
export interface WitnessGate { kind: "witness"; typeId: TypeId; out: WireId }
export interface FreeGate { kind: "free"; typeId: TypeId; first: WireId; last?: WireId | undefined }
export interface NewGate { kind: "new"; typeId: TypeId; first: WireId; last: WireId }
export interface ConvertGate { kind: "convert"; output: WireRange; input: WireRange }
export interface CallGate { kind: "call"; name: string; outputs: WireRange[]; inputs: WireRange[] }
export interface AnonCallGate {
	kind: "anonCall";
	outputs: WireRange[];
	inputs: WireRange[];
	instanceCount: Count[];
	witnessCount: Count[];
	body: Gate[];
}

export interface CaseCall { kind: "call"; name: string; inputs: WireRange[] }
export interface CaseAnonCall { kind: "anonCall"; inputs: WireRange[]; instanceCount: Count[]; witnessCount: Count[]; body: Gate[] }
export type CaseInvoke = CaseCall | CaseAnonCall;

export interface SwitchGate {
	kind: "switch";
	typeId: TypeId;
	condition: WireId;
	outputs: WireRange[];
	cases: Value[];
	branches: CaseInvoke[];
}

export interface ForCallBody { kind: "call"; name: string; outputs: IterExprWireRange[]; inputs: IterExprWireRange[] }
export interface ForAnonCallBody {
	kind: "anonCall";
	outputs: IterExprWireRange[];
	inputs: IterExprWireRange[];
	instanceCount: Count[];
	witnessCount: Count[];
	body: Gate[];
}
export type ForLoopBody = ForCallBody | ForAnonCallBody;

export interface ForGate {
	kind: "for";
	iterator: string;
	start: number;
	end: number;
	outputs: WireRange[];
	body: ForLoopBody;
}

export type Gate =
	| ConstantGate | AssertZeroGate | CopyGate
	| AddGate | MulGate | AddConstantGate | MulConstantGate
	| AndGate | XorGate | NotGate
	| InstanceGate | WitnessGate | FreeGate | NewGate
	| ConvertGate | CallGate | AnonCallGate | SwitchGate | ForGate;

export type GateKind = Gate["kind"];

//==============================================================================
// Relation Domain - Manual Interfaces
//==============================================================================

export interface PluginBody {
	name: string;
	operation: string;
	params: string[];
	instanceCount: Count[];
	witnessCount: Count[];
}

export interface GatesFunctionBody { kind: "gates"; gates: Gate[] }
export interface PluginFunctionBody { kind: "plugin"; plugin: PluginBody }
export type FunctionBody = GatesFunctionBody | PluginFunctionBody;

export interface FunctionDecl {
	name: string;
	outputCount: Count[];
	inputCount: Count[];
	instanceCount: Count[];
	witnessCount: Count[];
	body: FunctionBody;
}

export interface Instance { header: Header; inputs: Value[][] }
export interface Witness { header: Header; inputs: Value[][] }
export interface Relation {
	header: Header;
	plugins: string[];
	conversions: Conversion[];
	functions: FunctionDecl[];
	gates: Gate[];
}

export type Message =
	| { kind: "instance"; instance: Instance }
	| { kind: "witness"; witness: Witness }
	| { kind: "relation"; relation: Relation };

//==============================================================================
// Zod Schemas - Primitives
//==============================================================================

const Id = z.number().int().nonnegative();

export const ValueSchema = z.array(z.number().int().min(0).max(255))
	.meta({ id: "Value", title: "Field Element", description: "Little-endian byte encoding of a field element" });

export const FieldDescriptorSchema = z.object({
	characteristic: ValueSchema,
	degree: z.number().int(),
}).meta({ id: "FieldDescriptor", title: "Field Descriptor", description: "Field characteristic and extension degree" });

// The version is checked semantically by the validator, so any string is accepted here.
export const HeaderSchema = z.object({
	version: z.string(),
	profile: z.string(),
	fields: z.array(FieldDescriptorSchema),
}).meta({ id: "Header", title: "Header", description: "Version, profile and field list shared by every message" });

export const CountSchema = z.object({
	typeId: Id,
	count: Id,
}).meta({ id: "Count", title: "Count", description: "Number of wires or values of one type" });

export const WireRangeSchema = z.object({
	typeId: Id,
	first: Id,
	last: Id,
}).meta({ id: "WireRange", title: "Wire Range", description: "Inclusive range of wires of one type" });

export const ConversionSchema = z.object({
	output: CountSchema,
	input: CountSchema,
}).meta({ id: "Conversion", title: "Conversion", description: "Declared cross-type conversion shape" });

//==============================================================================
// Zod Schemas - Iterator Expressions
//==============================================================================

export const IterExprSchema: z.ZodType<IterExpr> = z.union([
	z.object({ kind: z.literal("const"), value: Id }),
	z.object({ kind: z.literal("name"), name: z.string() }),
	z.object({ kind: z.literal("add"), get left() { return IterExprSchema; }, get right() { return IterExprSchema; } }),
	z.object({ kind: z.literal("sub"), get left() { return IterExprSchema; }, get right() { return IterExprSchema; } }),
	z.object({ kind: z.literal("mul"), get left() { return IterExprSchema; }, get right() { return IterExprSchema; } }),
	z.object({ kind: z.literal("divConst"), get left() { return IterExprSchema; }, divisor: z.number().int().positive() }),
]).meta({ id: "IterExpr", title: "Iterator Expression", description: "Wire index arithmetic over loop iterators" });

export const IterExprWireRangeSchema: z.ZodType<IterExprWireRange> = z.object({
	typeId: Id,
	first: IterExprSchema,
	last: IterExprSchema.optional(),
}).meta({ id: "IterExprWireRange", title: "Iterator Wire Range", description: "Wire range addressed through iterator expressions" });

//==============================================================================
// Zod Schemas - Gates
//==============================================================================

const binaryGate = <K extends "add" | "mul" | "and" | "xor">(kind: K) => z.object({
	kind: z.literal(kind),
	typeId: Id,
	out: Id,
	left: Id,
	right: Id,
});

const constantOpGate = <K extends "addConstant" | "mulConstant">(kind: K) => z.object({
	kind: z.literal(kind),
	typeId: Id,
	out: Id,
	input: Id,
	constant: ValueSchema,
});

const gateList = (): z.ZodType<Gate[]> => z.array(GateSchema);

export const CaseInvokeSchema: z.ZodType<CaseInvoke> = z.union([
	z.object({ kind: z.literal("call"), name: z.string(), inputs: z.array(WireRangeSchema) }),
	z.object({
		kind: z.literal("anonCall"),
		inputs: z.array(WireRangeSchema),
		instanceCount: z.array(CountSchema),
		witnessCount: z.array(CountSchema),
		get body() { return gateList(); },
	}),
]).meta({ id: "CaseInvoke", title: "Switch Branch", description: "Named or anonymous body selected by a switch case" });

export const ForLoopBodySchema: z.ZodType<ForLoopBody> = z.union([
	z.object({
		kind: z.literal("call"),
		name: z.string(),
		outputs: z.array(IterExprWireRangeSchema),
		inputs: z.array(IterExprWireRangeSchema),
	}),
	z.object({
		kind: z.literal("anonCall"),
		outputs: z.array(IterExprWireRangeSchema),
		inputs: z.array(IterExprWireRangeSchema),
		instanceCount: z.array(CountSchema),
		witnessCount: z.array(CountSchema),
		get body() { return gateList(); },
	}),
]).meta({ id: "ForLoopBody", title: "For Loop Body", description: "Named or anonymous body invoked once per iteration" });

/** Union of all gate variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const GateSchema: z.ZodType<Gate> = z.union([
	z.object({ kind: z.literal("constant"), typeId: Id, out: Id, value: ValueSchema }),
	z.object({ kind: z.literal("assertZero"), typeId: Id, input: Id }),
	z.object({ kind: z.literal("copy"), typeId: Id, out: Id, input: Id }),
	binaryGate("add"),
	binaryGate("mul"),
	constantOpGate("addConstant"),
	constantOpGate("mulConstant"),
	binaryGate("and"),
	binaryGate("xor"),
	z.object({ kind: z.literal("not"), typeId: Id, out: Id, input: Id }),
	z.object({ kind: z.literal("instance"), typeId: Id, out: Id }),
	z.object({ kind: z.literal("witness"), typeId: Id, out: Id }),
	z.object({ kind: z.literal("free"), typeId: Id, first: Id, last: Id.optional() }),
	z.object({ kind: z.literal("new"), typeId: Id, first: Id, last: Id }),
	z.object({ kind: z.literal("convert"), output: WireRangeSchema, input: WireRangeSchema }),
	z.object({
		kind: z.literal("call"),
		name: z.string(),
		outputs: z.array(WireRangeSchema),
		inputs: z.array(WireRangeSchema),
	}),
	z.object({
		kind: z.literal("anonCall"),
		outputs: z.array(WireRangeSchema),
		inputs: z.array(WireRangeSchema),
		instanceCount: z.array(CountSchema),
		witnessCount: z.array(CountSchema),
		get body() { return gateList(); },
	}),
	z.object({
		kind: z.literal("switch"),
		typeId: Id,
		condition: Id,
		outputs: z.array(WireRangeSchema),
		cases: z.array(ValueSchema),
		get branches() { return z.array(CaseInvokeSchema); },
	}),
	z.object({
		kind: z.literal("for"),
		iterator: z.string(),
		start: Id,
		end: Id,
		outputs: z.array(WireRangeSchema),
		get body() { return ForLoopBodySchema; },
	}),
]).meta({ id: "Gate", title: "Gate", description: "Union of all ZKIR gate variants" });

//==============================================================================
// Zod Schemas - Relation, Instance, Witness
//==============================================================================

export const PluginBodySchema = z.object({
	name: z.string(),
	operation: z.string(),
	params: z.array(z.string()),
	instanceCount: z.array(CountSchema),
	witnessCount: z.array(CountSchema),
}).meta({ id: "PluginBody", title: "Plugin Body", description: "Opaque external gate family invocation" });

export const FunctionBodySchema: z.ZodType<FunctionBody> = z.union([
	z.object({ kind: z.literal("gates"), get gates() { return gateList(); } }),
	z.object({ kind: z.literal("plugin"), plugin: PluginBodySchema }),
]).meta({ id: "FunctionBody", title: "Function Body", description: "Gate list or plugin descriptor" });

export const FunctionDeclSchema: z.ZodType<FunctionDecl> = z.object({
	name: z.string(),
	outputCount: z.array(CountSchema),
	inputCount: z.array(CountSchema),
	instanceCount: z.array(CountSchema),
	witnessCount: z.array(CountSchema),
	body: FunctionBodySchema,
}).meta({ id: "Function", title: "Function", description: "Named reusable subcircuit with its full signature" });

export const InstanceSchema = z.object({
	header: HeaderSchema,
	inputs: z.array(z.array(ValueSchema)),
}).meta({ id: "Instance", title: "Instance", description: "Public input values, one list per type id" });

export const WitnessSchema = z.object({
	header: HeaderSchema,
	inputs: z.array(z.array(ValueSchema)),
}).meta({ id: "Witness", title: "Witness", description: "Private input values, one list per type id" });

export const RelationSchema: z.ZodType<Relation> = z.object({
	header: HeaderSchema,
	plugins: z.array(z.string()).default([]),
	conversions: z.array(ConversionSchema).default([]),
	functions: z.array(FunctionDeclSchema).default([]),
	gates: z.array(GateSchema),
}).meta({ id: "Relation", title: "Relation", description: "Gates, functions, plugins and conversions of a circuit" });

/** A message document holds exactly one of the three message kinds. */
export const MessageDocumentSchema = z.union([
	z.object({ instance: InstanceSchema }).strict(),
	z.object({ witness: WitnessSchema }).strict(),
	z.object({ relation: RelationSchema }).strict(),
]).meta({ id: "MessageDocument", title: "ZKIR Message", description: "One Instance, Witness or Relation message" });

export type MessageDocument = z.infer<typeof MessageDocumentSchema>;
