import type {
	CompiledRoute,
	ErrorHandler,
	FallbackHandler,
	Method,
	MethodNotAllowedHandler,
	NotFoundHandler,
	TrailingSlashStrategy,
} from './types';
import { RouterRequest } from './context/request';
import { createResponse, withoutBody } from './context/response';
import { Exception } from './exception';
import { createLogger, type Logger } from './helpers/logger';
import { trimTrailingSlash, uniqueSorted } from './helpers/utils';
import { MiddlewarePipeline } from './pipeline/pipeline';
import type { MiddlewareRegistry } from './pipeline/registry';
import { matchDomain, matchPath } from './routing/compiler';
import type { RouteTable } from './routing/route-table';
import { defaultErrorHandler, defaultMethodNotAllowedHandler, defaultNotFoundHandler } from './constants';

export type DispatcherOptions = {
	trailingSlash: TrailingSlashStrategy;
	globalMiddleware: string[];
	notFoundHandler?: NotFoundHandler;
	methodNotAllowedHandler?: MethodNotAllowedHandler;
	fallbackHandler?: FallbackHandler;
	errorHandler?: ErrorHandler;
	logger?: Logger;
};

const own = (record: Record<string, string>, key: string): string | undefined => (Object.hasOwn(record, key) ? record[key] : undefined);

/**
 * Resolves a request against a route table and runs the selected route through its middleware.
 *
 * `dispatch` never rejects: thrown errors become the error handler response.
 */
export class Dispatcher {
	private readonly log: Logger;

	constructor(
		private readonly table: RouteTable,
		private readonly registry: MiddlewareRegistry,
		private readonly options: DispatcherOptions,
	) {
		this.log = options.logger ?? createLogger('dispatcher');
	}

	async dispatch(input: Request | RouterRequest): Promise<Response> {
		const request = RouterRequest.from(input);

		try {
			return await this.handle(request);
		} catch (error) {
			const ex = Exception.parse(error);
			this.log.error(request.method, request.path, `STATUS::${ex.status}`, ex.message);

			const response = await this.createErrorResponse(request, ex);
			return request.method === 'HEAD' ? withoutBody(response) : response;
		}
	}

	private async handle(request: RouterRequest): Promise<Response> {
		let path = request.path;

		if (path !== '/' && path.endsWith('/')) {
			if (this.options.trailingSlash === 'redirect') {
				return new Response(null, {
					status: 301,
					// a single leading slash keeps the target on this host
					headers: { Location: `/${trimTrailingSlash(path).replace(/^\/+/, '')}${request.url.search}` },
				});
			}
			if (this.options.trailingSlash === 'strip') path = trimTrailingSlash(path);
		}

		const trialMethods = request.method === 'HEAD' ? ['HEAD', 'GET'] : [request.method];
		const allowed = new Set<Method>();
		const routes = this.table.all();

		for (const method of trialMethods) {
			for (const route of routes) {
				const tokens = matchDomain(route, request.host);
				if (!tokens) continue;

				const params = matchPath(route, path);
				if (!params) continue;

				if (route.method !== method) {
					allowed.add(route.method);
					continue;
				}

				const response = await this.run(request, route, params, tokens);
				return request.method === 'HEAD' && method === 'GET' ? withoutBody(response) : response;
			}
		}

		if (request.method === 'OPTIONS' && allowed.size) {
			return new Response(null, {
				status: 200,
				headers: {
					Allow: uniqueSorted<Method>([...allowed, 'OPTIONS']).join(', '),
					'Content-Length': '0',
				},
			});
		}

		if (allowed.size) {
			if (allowed.has('GET')) allowed.add('HEAD');
			return this.methodNotAllowed(request, uniqueSorted(allowed));
		}

		if (this.options.fallbackHandler) {
			return createResponse(await this.options.fallbackHandler(request));
		}

		return this.notFound(request);
	}

	/**
	 * Bind the route parameters and domain tokens, then run route and global middleware around the handler
	 */
	private async run(request: RouterRequest, route: CompiledRoute, params: Record<string, string>, tokens: Record<string, string>) {
		request.bindRoute(route);

		for (const [name, value] of Object.entries(tokens)) {
			request.attributes.set(name, value);
		}

		const values: string[] = [];
		for (const name of route.paramNames) {
			const value = own(params, name) ?? own(route.defaults, name);
			// an absent optional parameter without default is not passed on
			if (value === undefined) continue;

			request.attributes.set(name, value);
			values.push(value);
		}

		const pipeline = new MiddlewarePipeline();
		for (const { middleware, priority } of this.registry.resolveAll([...this.options.globalMiddleware, ...route.middleware])) {
			pipeline.pipe(middleware, priority);
		}

		return pipeline.process(request, async (req) => createResponse(await route.handler(req, ...values)));
	}

	private async methodNotAllowed(request: RouterRequest, allowedMethods: Method[]) {
		this.log.warn('Method not allowed', {
			method: request.method,
			path: request.path,
			host: request.host,
			allowedMethods,
		});

		const handler = this.options.methodNotAllowedHandler ?? defaultMethodNotAllowedHandler;
		return createResponse(await handler(request, allowedMethods), {
			status: 405,
			headers: { Allow: allowedMethods.join(', ') },
		});
	}

	private async notFound(request: RouterRequest) {
		this.log.info('Route not found', {
			method: request.method,
			path: request.path,
			host: request.host,
		});

		const handler = this.options.notFoundHandler ?? defaultNotFoundHandler;
		return createResponse(await handler(request), { status: 404 });
	}

	/**
	 * Exception to Response with the error handler.
	 * A failing error handler still yields a plain-text 500.
	 */
	private async createErrorResponse(request: RouterRequest, ex: Exception) {
		try {
			const handler = this.options.errorHandler ?? defaultErrorHandler;
			return createResponse(await handler(request, ex), { status: ex.status });
		} catch (error) {
			const safeError = error instanceof Error ? error.message : String(error);

			const messages = [
				'Failed to serialize the exception response',
				`Error: ${safeError}`,
				'The exception handler itself threw an error, review and fix its logic',
			];

			return new Response(messages.join('\n'), {
				headers: { 'Content-Type': 'text/plain' },
				status: 500,
			});
		}
	}
}
