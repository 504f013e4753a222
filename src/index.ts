// ZKIR - Zero-Knowledge Circuit IR core
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	CaseInvoke, Conversion, Count, FieldDescriptor, ForLoopBody, FunctionBody, FunctionDecl,
	Gate, GateKind, Header, Instance, IterExpr, IterExprWireRange, Message, PluginBody,
	Profile, Relation, TypeId, Value, WireId, WireRange, Witness,
} from "./types.ts";

export type { ErrorCode, ValidationError, ValidationResult } from "./errors.ts";

//==============================================================================
// Values, Fields & Headers
//==============================================================================

export {
	IR_VERSION, Profiles,
	bigIntToValue, characteristicOf, count, createHeader, fieldDescriptor, formatValue,
	formatWire, formatWireIn, literal, literal32, valueToBigInt, valuesEqual, wireKey,
} from "./types.ts";

//==============================================================================
// Gates & Wire Ranges
//==============================================================================

export {
	ADD, ADDC, ALL_GATES, AND, ARITHMETIC_GATES, BOOLEAN_GATES, MUL, MULC, NOT, XOR,
	addConstantGate, addGate, andGate, assertZeroGate, constantGate, containsFeature, copyGate,
	forEachGate, formatGateSet, freeGate, gateMaskOf, instanceGate, mulConstantGate, mulGate,
	newGate, notGate, parseGateSet, witnessGate, xorGate,
} from "./gates.ts";

export {
	checkWireRangesWithCounts, countWireRanges, evalIterExpr, expandWireRanges,
	resolveIterRanges, wireRange,
} from "./wire.ts";

//==============================================================================
// Error Codes
//==============================================================================

export { ErrorCodes, ZKIRError, invalidResult, validResult } from "./errors.ts";

//==============================================================================
// Validation, Reduction & Evaluation
//==============================================================================

export { Validator, type ValidatorOptions } from "./validator.ts";
export { reduceGateSet, reduceGateSetFrom, type ReductionResult, type WireCounter } from "./reduction.ts";
export { replaceOutputWires } from "./renumber.ts";
export { Evaluator } from "./evaluator.ts";

//==============================================================================
// Builder
//==============================================================================

export { WireAllocator } from "./builder/allocator.ts";
export {
	Build, type BuildComplexGate, type BuildGate, type EffectBuildGate, type OutputBuildGate,
} from "./builder/build-gates.ts";
export {
	FunctionBuilder, GateBuilder, createPluginFunction,
	type FunctionCounts, type FunctionWithInfos,
} from "./builder/builder.ts";
export { DEFAULT_MAX_LEN, MessageBuilder, type BuilderOptions } from "./builder/message-builder.ts";
export { MemorySink, type Sink } from "./builder/sink.ts";

//==============================================================================
// Codec & Examples
//==============================================================================

export { decodeMessage, decodeMessages, encodeMessage, parseMessages, stringifyMessages } from "./codec.ts";
export {
	EXAMPLE_MODULUS, booleanHeader, exampleHeader, exampleInstance, exampleMessages, negativeOne,
	exampleRelation, exampleWitness, exampleWitnessIncorrect,
} from "./examples.ts";
