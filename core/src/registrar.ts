import type { GroupOptions, Handler, Method, MethodOpts, RouteOptions } from './types';
import { anyMethods } from './constants';

/**
 * Registration shortcuts shared by the router and its groups
 */
export abstract class Registrar {
	/**
	 * Register `handler` for one or more methods.
	 * With several methods, `options.name` goes to the route of the first one.
	 */
	abstract add(method: MethodOpts, path: string, handler: Handler, options?: RouteOptions): this;

	/**
	 * Run `callback` with a group whose routes share a prefix, middleware, constraints and domain.
	 * Groups nest, the inner group extends the outer one.
	 */
	abstract group(options: GroupOptions, callback: (group: Registrar) => void): this;

	get(path: string, handler: Handler, options?: RouteOptions) {
		return this.add('GET', path, handler, options);
	}

	post(path: string, handler: Handler, options?: RouteOptions) {
		return this.add('POST', path, handler, options);
	}

	put(path: string, handler: Handler, options?: RouteOptions) {
		return this.add('PUT', path, handler, options);
	}

	patch(path: string, handler: Handler, options?: RouteOptions) {
		return this.add('PATCH', path, handler, options);
	}

	delete(path: string, handler: Handler, options?: RouteOptions) {
		return this.add('DELETE', path, handler, options);
	}

	options(path: string, handler: Handler, options?: RouteOptions) {
		return this.add('OPTIONS', path, handler, options);
	}

	head(path: string, handler: Handler, options?: RouteOptions) {
		return this.add('HEAD', path, handler, options);
	}

	/** GET, POST, PUT, PATCH, DELETE and OPTIONS; HEAD is answered by the GET route */
	any(path: string, handler: Handler, options?: RouteOptions) {
		return this.add([...anyMethods], path, handler, options);
	}

	match(methods: Method[], path: string, handler: Handler, options?: RouteOptions) {
		return this.add(methods, path, handler, options);
	}

	/**
	 * GET route answering with a redirect to `to`
	 *
	 * @example
	 * router.redirect('/old-blog', '/blog', 301);
	 */
	redirect(from: string, to: string, status: number = 302, options?: RouteOptions) {
		return this.add(
			'GET',
			from,
			() =>
				new Response(null, {
					status,
					headers: { Location: to },
				}),
			options,
		);
	}
}
