// SPDX-License-Identifier: MIT
// ZKIR Message Sinks

import type { Instance, Message, Relation, Witness } from "../types.ts";

/** Destination of the messages a builder flushes, one message at a time. */
export interface Sink {
	pushInstanceMessage(instance: Instance): void;
	pushWitnessMessage(witness: Witness): void;
	pushRelationMessage(relation: Relation): void;
}

/** Keeps a copy of every pushed message in memory. */
export class MemorySink implements Sink {
	readonly instances: Instance[] = [];
	readonly witnesses: Witness[] = [];
	readonly relations: Relation[] = [];

	pushInstanceMessage(instance: Instance): void {
		this.instances.push(structuredClone(instance));
	}

	pushWitnessMessage(witness: Witness): void {
		this.witnesses.push(structuredClone(witness));
	}

	pushRelationMessage(relation: Relation): void {
		this.relations.push(structuredClone(relation));
	}

	/** All messages, instances first, then witnesses, then relations. */
	messages(): Message[] {
		return [
			...this.instances.map((instance): Message => ({ kind: "instance", instance })),
			...this.witnesses.map((witness): Message => ({ kind: "witness", witness })),
			...this.relations.map((relation): Message => ({ kind: "relation", relation })),
		];
	}
}
