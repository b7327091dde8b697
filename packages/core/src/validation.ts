/**
 * Runtime validation utilities.
 *
 * Fluent validators for settings values. Each builder exposes a
 * `validate` function returning a discriminated {@link Check}.
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export type Check<T> = { valid: true; value: T } | { valid: false; error: string };

export type ValidatorFn<T = unknown> = (value: unknown) => Check<T>;

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

// ─── Validator Classes ───────────────────────────────────────────────────────

class StringValidator {
	private minLen?: number;
	private patternRe?: RegExp;

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	pattern(re: RegExp): this {
		this.patternRe = re;
		return this;
	}

	validate: ValidatorFn<string> = (value) => {
		if (typeof value !== "string") {
			return { valid: false, error: `Expected string, received ${describe(value)}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `String length ${value.length} is below minimum ${this.minLen}` };
		}
		if (this.patternRe && !this.patternRe.test(value)) {
			return { valid: false, error: `String does not match pattern ${this.patternRe}` };
		}
		return { valid: true, value };
	};
}

class NumberValidator {
	private minVal?: number;
	private intOnly = false;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	integer(): this {
		this.intOnly = true;
		return this;
	}

	validate: ValidatorFn<number> = (value) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `Expected number, received ${describe(value)}` };
		}
		if (this.intOnly && !Number.isInteger(value)) {
			return { valid: false, error: `Expected integer, received ${value}` };
		}
		if (this.minVal !== undefined && value < this.minVal) {
			return { valid: false, error: `Number ${value} is below minimum ${this.minVal}` };
		}
		return { valid: true, value };
	};
}

class ArrayValidator<T> {
	constructor(private readonly itemValidator: ValidatorFn<T>) {}

	validate: ValidatorFn<T[]> = (value) => {
		if (!Array.isArray(value)) {
			return { valid: false, error: `Expected array, received ${describe(value)}` };
		}
		const validated: T[] = [];
		for (let i = 0; i < value.length; i++) {
			const result = this.itemValidator(value[i]);
			if (!result.valid) {
				return { valid: false, error: `[${i}]: ${result.error}` };
			}
			validated.push(result.value);
		}
		return { valid: true, value: validated };
	};
}

class OneOfValidator<T extends string> {
	constructor(private readonly options: readonly T[]) {}

	validate: ValidatorFn<T> = (value) => {
		const match = this.options.find((o) => o === value);
		if (match === undefined) {
			return {
				valid: false,
				error: `Expected one of ${this.options.map((o) => JSON.stringify(o)).join(", ")}, received ${JSON.stringify(value)}`,
			};
		}
		return { valid: true, value: match };
	};
}

/** A plain JSON object: not null, not an array. */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * ```ts
 * const intervalV = v.number().integer().min(1).validate;
 * const levelV = v.oneOf(["debug", "info"] as const).validate;
 * ```
 */
export const v = {
	string: () => new StringValidator(),
	number: () => new NumberValidator(),
	array: <T>(itemValidator: ValidatorFn<T>) => new ArrayValidator<T>(itemValidator),
	oneOf: <T extends string>(options: readonly T[]) => new OneOfValidator<T>(options),
};
