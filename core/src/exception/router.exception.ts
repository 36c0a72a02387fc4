import { Exception } from '.';

/**
 * Raised while registering a route whose name is already taken
 */
export class DuplicateRouteName extends Exception {
	constructor(public readonly routeName: string) {
		super(`Route name '${routeName}' is already registered`, 500, { name: routeName });
	}
}

export class InvalidRouteTemplate extends Exception {
	constructor(
		public readonly template: string,
		reason: string,
	) {
		super(`Invalid route template '${template}': ${reason}`, 500, { template, reason });
	}
}

/**
 * A custom constraint fragment that is not a valid regular expression
 */
export class MalformedConstraint extends Exception {
	constructor(
		public readonly param: string,
		public readonly fragment: string,
		cause?: unknown,
	) {
		super(`Constraint '${fragment}' of parameter '${param}' is not a valid pattern`, 500, { param, fragment });
		this.cause = cause;
	}
}

export class InvalidRouteDefinition extends Exception {
	constructor(fields: unknown) {
		super('Invalid route definition', 500, fields);
	}
}

export class UnresolvedMiddleware extends Exception {
	constructor(public readonly reference: string) {
		super(`Middleware '${reference}' could not be resolved`, 500, { middleware: reference });
	}
}
