import { describe, expect, it } from 'vitest';
import { constraintNames, MalformedConstraint, RegexConstraint, resolveConstraint } from '../src';

describe('resolveConstraint', () => {
	it.each([
		['int', '42', 'x42'],
		['integer', '0', '-1'],
		['numeric', '3.14', '.5'],
		['alpha', 'abcXYZ', 'abc1'],
		['alphanumeric', 'abc123', 'abc-123'],
		['alphanum', 'A1', 'A_1'],
		['slug', 'hello-world-2', 'Hello--world'],
		['uuid', '123e4567-e89b-12d3-a456-426614174000', '123e4567e89b12d3a456426614174000'],
		['email', 'jane@example.test', 'jane@localhost'],
	])('%s accepts %s and rejects %s', (name, valid, invalid) => {
		const constraint = resolveConstraint(name);

		expect(constraint.matches(valid)).toBe(true);
		expect(constraint.matches(invalid)).toBe(false);
	});

	it('accepts upper case uuids', () => {
		expect(resolveConstraint('uuid').matches('123E4567-E89B-12D3-A456-426614174000')).toBe(true);
	});

	it('shares the instance of an alias', () => {
		expect(resolveConstraint('integer')).toBe(resolveConstraint('int'));
		expect(resolveConstraint('alphanum')).toBe(resolveConstraint('alphanumeric'));
	});

	it('exposes the regex fragment', () => {
		expect(resolveConstraint('int').pattern).toBe('\\d+');
		expect(resolveConstraint('[a-f]{3}').pattern).toBe('[a-f]{3}');
	});

	it('treats unknown names as regex fragments', () => {
		const constraint = resolveConstraint('[a-f]{3}');

		expect(constraint).toBeInstanceOf(RegexConstraint);
		expect(constraint.matches('abc')).toBe(true);
		expect(constraint.matches('abcd')).toBe(false);
	});

	it('does not mistake object keys for built-ins', () => {
		expect(resolveConstraint('constructor').matches('constructor')).toBe(true);
		expect(resolveConstraint('constructor').matches('other')).toBe(false);
	});

	it('fails on an invalid fragment', () => {
		expect(() => resolveConstraint('(', 'id')).toThrow(new MalformedConstraint('id', '('));
		expect(() => resolveConstraint('(', 'id')).toThrow("Constraint '(' of parameter 'id' is not a valid pattern");
	});

	it('lists the built-in names', () => {
		expect(constraintNames).toEqual(['int', 'numeric', 'alpha', 'alphanumeric', 'slug', 'uuid', 'email', 'integer', 'alphanum']);
	});
});
