/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * A fund, a fee kind and a principal are all plain strings at runtime; the
 * brands stop a FeeKind from being passed where a FundId is expected.
 */

import { ValidationError } from "../lib/validation/index.js";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Stable identity of a fund instance. Survives migration to a new controller. */
export type FundId = Brand<string, "FundId">;
/** Name of a registered fee implementation (e.g. "management"). */
export type FeeKind = Brand<string, "FeeKind">;
/** A principal that holds shares or calls into the engine. */
export type AccountId = Brand<string, "AccountId">;

// ── Factory functions with validation ────────────────────────────────

/** @throws ValidationError if the value is empty after trimming */
function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new ValidationError(`${label} cannot be empty`, [
			{ path: [], message: `${label} cannot be empty` },
		]);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated FundId from a raw string. */
export function fundId(value: string): FundId {
	return createBrandedId(value, "FundId");
}

/** Create a validated FeeKind from a raw string. */
export function feeKind(value: string): FeeKind {
	return createBrandedId(value, "FeeKind");
}

/** Create a validated AccountId from a raw string. */
export function accountId(value: string): AccountId {
	return createBrandedId(value, "AccountId");
}

// ── Utility: extract raw string ──────────────────────────────────────

/** Extract the raw string from any branded identifier type. */
export function idToString(id: FundId | FeeKind | AccountId): string {
	return id;
}
