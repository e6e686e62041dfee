// ============================================================================
// Vitrin - Assertions
// Plain value checks for journeys. Page objects already wait, so assertions
// compare what they returned:
//
// expect(await results.getProductCount()).toBeGreaterThan(100);
// expect(keyword, 'keyword shown in title').toContain('laptop');
// expect(await results.isNoResultsMessageDisplayed()).not.toBeTruthy();
// ============================================================================

import { inspect, isDeepStrictEqual } from 'node:util';

/**
 * Create assertions on a value. The optional message leads the failure text.
 */
export function expect<T>(actual: T, message?: string): ValueAssertions<T> {
	return new ValueAssertions(actual, message);
}

/**
 * Assertions on one value. Every matcher throws AssertionError on failure.
 */
export class ValueAssertions<T> {
	private _not = false;

	constructor(
		private readonly actual: T,
		private readonly message?: string,
	) {}

	/** Negate the assertion */
	get not(): ValueAssertions<T> {
		const negated = new ValueAssertions(this.actual, this.message);
		negated._not = !this._not;
		return negated;
	}

	/** Same value (Object.is) */
	toBe(expected: T): void {
		this.check(Object.is(this.actual, expected), `to be ${show(expected)}`);
	}

	/** Structurally equal */
	toEqual(expected: T): void {
		this.check(isDeepStrictEqual(this.actual, expected), `to equal ${show(expected)}`);
	}

	toBeTruthy(): void {
		this.check(Boolean(this.actual), 'to be truthy');
	}

	toBeFalsy(): void {
		this.check(!this.actual, 'to be falsy');
	}

	toBeGreaterThan(expected: number): void {
		this.compare('>', expected, (a) => a > expected);
	}

	toBeGreaterThanOrEqual(expected: number): void {
		this.compare('>=', expected, (a) => a >= expected);
	}

	toBeLessThan(expected: number): void {
		this.compare('<', expected, (a) => a < expected);
	}

	toBeLessThanOrEqual(expected: number): void {
		this.compare('<=', expected, (a) => a <= expected);
	}

	/**
	 * Substring of a string, or element of an array.
	 *
	 * ```ts
	 * expect('Samsung Galaxy A16').toContain('Samsung');
	 * expect(['Kadın', 'Erkek']).toContain('Erkek');
	 * ```
	 */
	toContain(expected: unknown): void {
		const { actual } = this;
		let contains = false;
		if (typeof actual === 'string' && typeof expected === 'string') {
			contains = actual.includes(expected);
		} else if (Array.isArray(actual)) {
			const items: unknown[] = actual;
			contains = items.some((item) => isDeepStrictEqual(item, expected));
		} else if (!this._not) {
			return this.fail(`to be a string or an array to search for ${show(expected)}`);
		}
		this.check(contains, `to contain ${show(expected)}`);
	}

	toMatch(expected: RegExp | string): void {
		const { actual } = this;
		if (typeof actual !== 'string') {
			return this.fail(`to be a string to match against ${show(expected)}`);
		}
		const matches = typeof expected === 'string' ? actual.includes(expected) : expected.test(actual);
		this.check(matches, `to match ${show(expected)}`);
	}

	toHaveLength(expected: number): void {
		const length = lengthOf(this.actual);
		if (length === undefined) {
			return this.fail('to have a length');
		}
		this.check(length === expected, `to have length ${expected} (actual length ${length})`);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private compare(operator: string, expected: number, test: (actual: number) => boolean): void {
		const { actual } = this;
		if (typeof actual !== 'number') {
			return this.fail(`to be a number to compare ${operator} ${expected}`);
		}
		this.check(test(actual), `to be ${operator} ${expected}`);
	}

	private check(pass: boolean, expectation: string): void {
		if (pass === this._not) {
			return this.fail(`${this._not ? 'not ' : ''}${expectation}`);
		}
	}

	private fail(expectation: string): never {
		const prefix = this.message ? `${this.message}: ` : '';
		throw new AssertionError(`${prefix}Expected ${show(this.actual)} ${expectation}`);
	}
}

function show(value: unknown): string {
	return inspect(value, { depth: 3, breakLength: Number.POSITIVE_INFINITY });
}

function lengthOf(value: unknown): number | undefined {
	if (typeof value === 'string' || Array.isArray(value)) return value.length;
	if (typeof value === 'object' && value !== null && 'length' in value && typeof value.length === 'number') {
		return value.length;
	}
	return undefined;
}

// ---------------------------------------------------------------------------
// Custom assertion error
// ---------------------------------------------------------------------------

/**
 * Error thrown when an assertion fails.
 */
export class AssertionError extends Error {
	override readonly name = 'AssertionError';
}
