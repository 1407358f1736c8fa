/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Fee settings and environment configuration are parsed through here.
 * Re-exports `z` so schemas can be built without a direct zod import.
 */

import { z } from "zod";
import { ErrorCategory, FeeEngineError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Input-domain error containing one or more validation issues. */
export class ValidationError extends FeeEngineError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.InputDomain, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	label = "Validation failed",
): Result<z.output<S>, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError(label, issues));
}

/**
 * Like `validate`, but throws the ValidationError.
 * @throws ValidationError if the data does not match the schema
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	label = "Validation failed",
): z.output<S> {
	const result = validate(schema, data, label);
	if (!result.ok) {
		throw result.error;
	}
	return result.value;
}
