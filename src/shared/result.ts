/**
 * Result<T, E>: explicit success/failure values for ledger operations.
 *
 * Domain code never throws for a violated precondition: it returns err() and
 * the atomic scope that wraps the operation rolls back on the error branch.
 */

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving errors untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/** Chain a fallible step on the success value; short-circuits on error. */
export function flatMap<T, U, E>(
	result: Result<T, E>,
	fn: (value: T) => Result<U, E>,
): Result<U, E> {
	return result.ok ? fn(result.value) : result;
}

/**
 * Run fallible steps in order, stopping at the first error.
 * @returns ok with every value, or the first error encountered
 */
export function sequence<T, E>(steps: Iterable<() => Result<T, E>>): Result<T[], E> {
	const values: T[] = [];
	for (const step of steps) {
		const result = step();
		if (!result.ok) return result;
		values.push(result.value);
	}
	return ok(values);
}

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Type guard: narrows a Result to its success variant. */
export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

/** Type guard: narrows a Result to its error variant. */
export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}
