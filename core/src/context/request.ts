import type { CompiledRoute } from '../types';
import { Store } from './store';

/**
 * Inbound request as seen by middleware and handlers: the Fetch `Request`
 * plus the routing view of it (method, path, host) and an attribute bag.
 */
export class RouterRequest {
	readonly method: string;

	readonly url: URL;

	readonly attributes: Store;

	private matched: CompiledRoute | null = null;

	constructor(
		readonly raw: Request,
		attributes?: Record<string, unknown>,
	) {
		this.method = raw.method.toUpperCase();
		this.url = new URL(raw.url);
		this.attributes = new Store(attributes);
	}

	/** Wraps a Fetch request, a `RouterRequest` is returned untouched */
	static from(input: Request | RouterRequest): RouterRequest {
		return input instanceof RouterRequest ? input : new RouterRequest(input);
	}

	/** Percent-encoded path, without the query string */
	get path(): string {
		return this.url.pathname;
	}

	/** Host name, without the port */
	get host(): string {
		return this.url.hostname;
	}

	get headers(): Headers {
		return this.raw.headers;
	}

	/** Route selected by the dispatcher, `null` until one matched */
	get route(): CompiledRoute | null {
		return this.matched;
	}

	bindRoute(route: CompiledRoute) {
		this.matched = route;
		return this;
	}

	/** Bound route parameter or domain token */
	param(name: string): string | undefined {
		const value = this.attributes.find(name);
		return typeof value === 'string' ? value : undefined;
	}
}
