import { describe, expect as vitestExpect, it } from 'vitest';
import { AssertionError, expect } from './expect.js';

describe('expect', () => {
	it('should pass matching values silently', () => {
		expect(5).toBe(5);
		expect({ brand: 'Apple', prices: [1, 2] }).toEqual({ brand: 'Apple', prices: [1, 2] });
		expect('laptop').toBeTruthy();
		expect(0).toBeFalsy();
		expect(10).toBeGreaterThan(9);
		expect(10).toBeGreaterThanOrEqual(10);
		expect(3).toBeLessThan(4);
		expect(3).toBeLessThanOrEqual(3);
		expect('Samsung Galaxy A16').toContain('Galaxy');
		expect(['Kadın', 'Erkek']).toContain('Erkek');
		expect('67049+ Ürün').toMatch(/^\d+\+ Ürün$/);
		expect('Sepetim').toMatch('Sepet');
		expect([1, 2, 3]).toHaveLength(3);
	});

	it('should throw an AssertionError describing the mismatch', () => {
		vitestExpect(() => expect(5).toBe(6)).toThrow(new AssertionError('Expected 5 to be 6'));
		vitestExpect(() => expect('laptop').toContain('telefon')).toThrow(
			new AssertionError("Expected 'laptop' to contain 'telefon'"),
		);
		vitestExpect(() => expect('abc').toHaveLength(2)).toThrow(
			new AssertionError("Expected 'abc' to have length 2 (actual length 3)"),
		);
	});

	it('should lead with the custom message', () => {
		vitestExpect(() => expect(1, 'product count').toBeGreaterThan(2)).toThrow(
			new AssertionError('product count: Expected 1 to be > 2'),
		);
	});

	it('should negate with not', () => {
		expect(5).not.toBe(6);
		expect('laptop').not.toContain('telefon');
		vitestExpect(() => expect(true).not.toBeTruthy()).toThrow(new AssertionError('Expected true not to be truthy'));
	});

	it('should reject values of the wrong type', () => {
		vitestExpect(() => expect('5').toBeGreaterThan(1)).toThrow(
			new AssertionError("Expected '5' to be a number to compare > 1"),
		);
		vitestExpect(() => expect(42).toMatch(/4/)).toThrow(new AssertionError('Expected 42 to be a string to match against /4/'));
		vitestExpect(() => expect(42).toContain(4)).toThrow(
			new AssertionError('Expected 42 to be a string or an array to search for 4'),
		);
		vitestExpect(() => expect(42).toHaveLength(2)).toThrow(new AssertionError('Expected 42 to have a length'));
	});

	it('should name the error AssertionError', () => {
		let caught: unknown;
		try {
			expect(1).toBe(2);
		} catch (err) {
			caught = err;
		}
		vitestExpect(caught).toBeInstanceOf(AssertionError);
		vitestExpect(caught).toHaveProperty('name', 'AssertionError');
	});
});
