import type { MiddlewareContainer, MiddlewareDefinition, MiddlewareEntry } from '../types';
import { UnresolvedMiddleware } from '../exception/router.exception';
import { createLogger, type Logger } from '../helpers/logger';
import { toHandlerMiddleware } from './adapters';

export type MiddlewareRegistryOptions = {
	container?: MiddlewareContainer;
	strict?: boolean;
	logger?: Logger;
};

/**
 * Split `throttle:60,1` into its name and arguments
 */
export function parseReference(reference: string): { name: string; params: string[] } {
	const separator = reference.indexOf(':');
	if (separator === -1) return { name: reference, params: [] };

	const params = reference
		.slice(separator + 1)
		.split(',')
		.map((param) => param.trim())
		.filter(Boolean);

	return { name: reference.slice(0, separator), params };
}

/**
 * Named middleware, their priorities and named groups of one router.
 */
export class MiddlewareRegistry {
	private readonly middleware = new Map<string, MiddlewareDefinition>();

	private readonly priorities = new Map<string, number>();

	private readonly groups = new Map<string, string[]>();

	private container: MiddlewareContainer | undefined;

	private strict: boolean;

	private readonly log: Logger;

	constructor(options: MiddlewareRegistryOptions = {}) {
		this.container = options.container;
		this.strict = options.strict ?? false;
		this.log = options.logger ?? createLogger('middleware');
	}

	register(name: string, middleware: MiddlewareDefinition, priority: number = 0) {
		this.middleware.set(name, middleware);
		this.priorities.set(name, priority);
		return this;
	}

	/** Priority of a middleware supplied by the container */
	setPriority(name: string, priority: number) {
		this.priorities.set(name, priority);
		return this;
	}

	getPriority(name: string): number {
		return this.priorities.get(name) ?? 0;
	}

	/** Members may be middleware references or other group names */
	group(name: string, references: string[]) {
		this.groups.set(name, [...references]);
		return this;
	}

	setContainer(container: MiddlewareContainer | undefined) {
		this.container = container;
		return this;
	}

	setStrict(strict: boolean) {
		this.strict = strict;
		return this;
	}

	has(name: string): boolean {
		return this.middleware.has(name) || this.groups.has(name);
	}

	/**
	 * Replace group names by their members, depth first and in order.
	 * A group met again while it is being expanded is skipped.
	 */
	expand(references: string[], stack: string[] = []): string[] {
		const expanded: string[] = [];

		for (const reference of references) {
			const members = this.groups.get(reference);
			if (!members) {
				expanded.push(reference);
				continue;
			}

			if (stack.includes(reference)) {
				this.log.warn(`Middleware group '${reference}' includes itself (${[...stack, reference].join(' > ')}), skipped`);
				continue;
			}

			expanded.push(...this.expand(members, [...stack, reference]));
		}

		return expanded;
	}

	/**
	 * Resolve one reference against the registered middleware, then the container.
	 * Arguments of a parameterized reference are handed to the instance `setParameters`.
	 *
	 * @returns `null` when neither knows the name
	 */
	resolve(reference: string): MiddlewareEntry | null {
		const { name, params } = parseReference(reference);

		const definition = this.middleware.get(name) ?? (this.container?.has(name) ? this.container.get(name) : undefined);
		if (!definition) return null;

		const middleware = toHandlerMiddleware(definition);
		if (params.length) middleware.setParameters?.(params);

		return { middleware, priority: this.getPriority(name) };
	}

	/**
	 * Expand and resolve a middleware list.
	 *
	 * @throws {UnresolvedMiddleware} in strict mode, otherwise unknown references are dropped
	 */
	resolveAll(references: string[]): MiddlewareEntry[] {
		const entries: MiddlewareEntry[] = [];

		for (const reference of this.expand(references)) {
			const entry = this.resolve(reference);
			if (entry) {
				entries.push(entry);
				continue;
			}

			if (this.strict) throw new UnresolvedMiddleware(reference);
			this.log.debug(`Middleware '${reference}' is not registered, dropped`);
		}

		return entries;
	}
}
