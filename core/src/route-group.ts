import type { GroupOptions, Handler, MethodOpts, RouteOptions } from './types';
import { Registrar } from './registrar';
import { asArray, buildPath } from './helpers/utils';
import { safeValidate } from './validator';
import { groupOptionsSchema } from './routing/schemas';
import { InvalidRouteDefinition } from './exception/router.exception';

export type GroupScope = {
	prefix: string;
	middleware: string[];
	where: Record<string, string>;
	domain: string;
};

type AddRoute = (method: MethodOpts, path: string, handler: Handler, options: RouteOptions) => void;

export const rootScope: GroupScope = { prefix: '', middleware: [], where: {}, domain: '' };

/**
 * Inner scope extended by a group: prefixes concatenate, middleware and constraints accumulate,
 * a group domain replaces the inherited one
 */
export function extendScope(scope: GroupScope, options: GroupOptions): GroupScope {
	const { error } = safeValidate(groupOptionsSchema, options, 'Invalid group definition');
	if (error) throw new InvalidRouteDefinition(error.fields);

	return {
		prefix: options.prefix ? buildPath(scope.prefix, options.prefix) : scope.prefix,
		middleware: [...scope.middleware, ...asArray(options.middleware)],
		where: { ...scope.where, ...options.where },
		domain: options.domain || scope.domain,
	};
}

/**
 * Routes registered through a group get the group attributes merged into their own
 */
export class RouteGroup extends Registrar {
	constructor(
		private readonly scope: GroupScope,
		private readonly addRoute: AddRoute,
	) {
		super();
	}

	add(method: MethodOpts, path: string, handler: Handler, options: RouteOptions = {}) {
		this.addRoute(method, this.scope.prefix ? buildPath(this.scope.prefix, path) : path, handler, {
			...options,
			middleware: [...this.scope.middleware, ...asArray(options.middleware)],
			constraints: { ...this.scope.where, ...options.constraints },
			domain: options.domain || this.scope.domain || undefined,
		});
		return this;
	}

	group(options: GroupOptions, callback: (group: Registrar) => void) {
		callback(new RouteGroup(extendScope(this.scope, options), this.addRoute));
		return this;
	}
}
