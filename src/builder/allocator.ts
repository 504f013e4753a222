// SPDX-License-Identifier: MIT
// ZKIR Wire Allocator

import { ErrorCodes, ZKIRError } from "../errors.ts";
import type { Count, TypeId, WireId, WireRange } from "../types.ts";

/**
 * Hands out fresh wire ids per type id from a monotonically increasing counter.
 */
export class WireAllocator {
	private readonly next = new Map<TypeId, WireId>();

	/** Seed the counters, e.g. to skip the local ids a function reserves for outputs and inputs. */
	constructor(offsets: readonly Count[] = []) {
		for (const c of offsets) {
			this.next.set(c.typeId, (this.next.get(c.typeId) ?? 0) + c.count);
		}
	}

	peek(typeId: TypeId): WireId {
		return this.next.get(typeId) ?? 0;
	}

	alloc(typeId: TypeId): WireId {
		const id = this.peek(typeId);
		this.next.set(typeId, id + 1);
		return id;
	}

	/** Reserve `n` contiguous ids and return them as an inclusive range. */
	allocRange(typeId: TypeId, n: number): WireRange {
		if (!Number.isInteger(n) || n <= 0) {
			throw new ZKIRError(ErrorCodes.ArityError, "Cannot allocate a range of " + String(n) + " wires");
		}
		const first = this.peek(typeId);
		this.next.set(typeId, first + n);
		return { typeId, first, last: first + n - 1 };
	}
}
