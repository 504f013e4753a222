// SPDX-License-Identifier: MIT
// ZKIR JSON Codec
// Two-phase decoding: Zod safeParse for structure, then conversion to messages.

import type { z } from "zod/v4";
import { exhaustive, invalidResult, validResult } from "./errors.ts";
import type { ValidationError, ValidationResult } from "./errors.ts";
import type { Message } from "./types.ts";
import { MessageDocumentSchema } from "./zod-schemas.ts";
import type { MessageDocument } from "./zod-schemas.ts";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError, prefix: string[] = []): ValidationError[] {
	return error.issues.map(issue => ({
		path: [...prefix, ...issue.path.map(String)].join(".") || "$",
		message: issue.message,
	}));
}

function fromDocument(doc: MessageDocument): Message {
	if ("instance" in doc) return { kind: "instance", instance: doc.instance };
	if ("witness" in doc) return { kind: "witness", witness: doc.witness };
	return { kind: "relation", relation: doc.relation };
}

//==============================================================================
// Decoding
//==============================================================================

export function decodeMessage(doc: unknown): ValidationResult<Message> {
	const parsed = MessageDocumentSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<Message>(zodToValidationErrors(parsed.error));
	}
	return validResult(fromDocument(parsed.data));
}

/**
 * Decode a single message document or an array of them. Errors of array
 * elements are reported under their index.
 */
export function decodeMessages(doc: unknown): ValidationResult<Message[]> {
	const docs: unknown[] = Array.isArray(doc) ? doc : [doc];
	const messages: Message[] = [];
	const errors: ValidationError[] = [];

	docs.forEach((item, index) => {
		const parsed = MessageDocumentSchema.safeParse(item);
		if (parsed.success) {
			messages.push(fromDocument(parsed.data));
		} else {
			errors.push(...zodToValidationErrors(parsed.error, Array.isArray(doc) ? [String(index)] : []));
		}
	});

	return errors.length > 0 ? invalidResult<Message[]>(errors) : validResult(messages);
}

/** Parse JSON text, then decode it with {@link decodeMessages}. */
export function parseMessages(text: string): ValidationResult<Message[]> {
	let doc: unknown;
	try {
		doc = JSON.parse(text);
	} catch (e) {
		return invalidResult<Message[]>([{
			path: "$",
			message: "Invalid JSON: " + (e instanceof Error ? e.message : String(e)),
		}]);
	}
	return decodeMessages(doc);
}

//==============================================================================
// Encoding
//==============================================================================

export function encodeMessage(msg: Message): MessageDocument {
	switch (msg.kind) {
	case "instance":
		return { instance: msg.instance };
	case "witness":
		return { witness: msg.witness };
	case "relation":
		return { relation: msg.relation };
	default:
		return exhaustive(msg);
	}
}

export function stringifyMessages(messages: readonly Message[]): string {
	return JSON.stringify(messages.map(encodeMessage), null, "\t");
}
