import { MalformedConstraint } from '../exception/router.exception';

/**
 * Validator for a single path parameter.
 * `pattern` is an unanchored fragment embedded in the route pattern,
 * `matches` checks a whole value against it.
 */
export interface RouteConstraint {
	readonly pattern: string;
	matches(value: string): boolean;
}

export class RegexConstraint implements RouteConstraint {
	private readonly regex: RegExp;

	constructor(
		readonly pattern: string,
		flags: string = '',
	) {
		this.regex = new RegExp(`^(?:${pattern})$`, flags);
	}

	matches(value: string): boolean {
		return this.regex.test(value);
	}
}

const builtins = {
	int: new RegexConstraint('\\d+'),
	numeric: new RegexConstraint('\\d+\\.?\\d*'),
	alpha: new RegexConstraint('[a-zA-Z]+'),
	alphanumeric: new RegexConstraint('[a-zA-Z0-9]+'),
	slug: new RegexConstraint('[a-z0-9]+(?:-[a-z0-9]+)*'),
	uuid: new RegexConstraint('[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}'),
	email: new RegexConstraint('[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}'),
} as const satisfies Record<string, RouteConstraint>;

const aliases: Record<string, RouteConstraint> = {
	...builtins,
	integer: builtins.int,
	alphanum: builtins.alphanumeric,
};

export const constraintNames = Object.keys(aliases);

export function isBuiltinConstraint(spec: string): boolean {
	return Object.hasOwn(aliases, spec);
}

/**
 * Resolve a constraint specifier: a built-in name (`int`, `integer`, `numeric`, `alpha`,
 * `alphanumeric`, `alphanum`, `slug`, `uuid`, `email`) or a custom regex fragment.
 *
 * @param param - parameter the constraint belongs to, only used for the error
 * @throws {MalformedConstraint} when a custom fragment does not compile
 */
export function resolveConstraint(spec: string, param: string = ''): RouteConstraint {
	if (isBuiltinConstraint(spec)) return aliases[spec];

	try {
		return new RegexConstraint(spec);
	} catch (error) {
		throw new MalformedConstraint(param, spec, error);
	}
}
