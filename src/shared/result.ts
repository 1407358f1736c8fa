/**
 * Result<T, E> — a success value or an error, without throwing.
 *
 * Settlement throws FeeEngineError so a unit of work can roll back as a whole.
 * Result is for callers that treat a failure as an outcome: validating user
 * input, or driving the engine from a simulation loop that records rejected
 * operations instead of stopping.
 */

import { type FeeEngineError, classifyError } from "./errors.js";

export type Result<T, E = FeeEngineError> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/** The value, or the error rethrown. */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
	return result.ok ? result.value : fallback;
}

export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

/**
 * Runs an engine operation and captures a throw as a classified FeeEngineError.
 *
 * @example
 * ```ts
 * const bought = attempt(() => controller.buyShares(fund, investor, amount));
 * if (!bought.ok) rejected.push(bought.error.code);
 * ```
 */
export function attempt<T>(fn: () => T): Result<T> {
	try {
		return ok(fn());
	} catch (error) {
		return err(classifyError(error));
	}
}
