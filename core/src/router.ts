import z from 'zod';
import type {
	CompiledRoute,
	ErrorHandler,
	FallbackHandler,
	GroupOptions,
	Handler,
	Method,
	MethodNotAllowedHandler,
	MethodOpts,
	MiddlewareContainer,
	MiddlewareDefinition,
	NotFoundHandler,
	RouteOptions,
	RouterOptions,
	RouteTableData,
	TrailingSlashStrategy,
	UrlRegistry,
} from './types';
import type { RouterRequest } from './context/request';
import { config } from './config';
import { methods as allMethods } from './constants';
import { Dispatcher } from './dispatcher';
import { InvalidRouteDefinition } from './exception/router.exception';
import { createLogger, type Logger } from './helpers/logger';
import { MiddlewareRegistry } from './pipeline/registry';
import { Registrar } from './registrar';
import { extendScope, rootScope, RouteGroup } from './route-group';
import { compileRoute } from './routing/compiler';
import { RouteTable } from './routing/route-table';
import { methodSchema, routeOptionsSchema } from './routing/schemas';
import { safeValidate } from './validator';

type Settings = {
	trailingSlash: TrailingSlashStrategy;
	notFoundHandler?: NotFoundHandler;
	methodNotAllowedHandler?: MethodNotAllowedHandler;
	fallbackHandler?: FallbackHandler;
	errorHandler?: ErrorHandler;
	urlRegistry?: UrlRegistry;
};

const methodListSchema = z.array(methodSchema).min(1);

/**
 * Route registration and request dispatch.
 *
 * Every router owns its route table, middleware registry and handlers.
 *
 * @example
 * const router = new Router({ trailingSlash: 'redirect' });
 *
 * router
 * 	.registerMiddleware('auth', auth, 100)
 * 	.get('/users/{id:int}', (request, id) => ({ id }), { name: 'users.show', middleware: ['auth'] });
 *
 * const response = await router.dispatch(new Request('http://localhost/users/42'));
 */
export class Router extends Registrar {
	private readonly table = new RouteTable();

	private readonly registry: MiddlewareRegistry;

	private readonly globalMiddleware: string[] = [];

	private readonly settings: Settings;

	private readonly log: Logger;

	private readonly dispatcherLog: Logger;

	// rebuilt after any change to the settings or global middleware
	private dispatcher: Dispatcher | null = null;

	constructor(options: RouterOptions = {}) {
		super();
		this.log = createLogger('router', options.logLevel);
		this.dispatcherLog = createLogger('dispatcher', options.logLevel);

		this.settings = {
			trailingSlash: options.trailingSlash ?? config.get('trailingSlash'),
			notFoundHandler: options.notFoundHandler,
			methodNotAllowedHandler: options.methodNotAllowedHandler,
			fallbackHandler: options.fallbackHandler,
			errorHandler: options.errorHandler,
			urlRegistry: options.urlRegistry,
		};

		this.registry = new MiddlewareRegistry({
			container: options.container,
			strict: options.strictMiddleware ?? config.get('strictMiddleware'),
			logger: createLogger('middleware', options.logLevel),
		});
	}

	private resolveMethods(method: MethodOpts): Method[] {
		const list = method === '*' ? [...allMethods] : Array.isArray(method) ? method : [method];

		const { data, error } = safeValidate(methodListSchema, list, 'Invalid route methods');
		if (error) throw new InvalidRouteDefinition({ methods: error.fields });

		return [...new Set(data)];
	}

	add(method: MethodOpts, path: string, handler: Handler, options: RouteOptions = {}) {
		const { error } = safeValidate(routeOptionsSchema, options, 'Invalid route definition');
		if (error) throw new InvalidRouteDefinition(error.fields);
		if (typeof handler !== 'function') throw new InvalidRouteDefinition({ handler: ['Expected a function'] });

		const methods = this.resolveMethods(method);

		// compile everything first, a bad template leaves the table untouched
		const routes = methods.map((m, index) =>
			compileRoute({ ...options, name: index === 0 ? options.name : undefined, method: m, path, handler }),
		);

		for (const route of routes) {
			this.table.add(route);
			this.log.debug(`${route.method} ${route.path}${route.name ? ` (${route.name})` : ''}`);
		}

		const [first] = routes;
		if (first?.name) this.settings.urlRegistry?.register(first.name, first.path, methods, first.paramNames);

		return this;
	}

	group(options: GroupOptions, callback: (group: Registrar) => void) {
		const scope = extendScope(rootScope, options);
		callback(new RouteGroup(scope, (method, path, handler, routeOptions) => this.add(method, path, handler, routeOptions)));
		return this;
	}

	/**
	 * Register a named middleware, higher priority runs first.
	 * Legacy middleware is adapted when resolved, the pipeline only sees the continuation-object shape.
	 */
	registerMiddleware(name: string, middleware: MiddlewareDefinition, priority: number = 0) {
		this.registry.register(name, middleware, priority);
		return this;
	}

	/** Priority for a middleware the container provides */
	setMiddlewarePriority(name: string, priority: number) {
		this.registry.setPriority(name, priority);
		return this;
	}

	/**
	 * Name a list of middleware references, groups may include other groups
	 *
	 * @example
	 * router.registerMiddlewareGroup('api', ['cors', 'throttle:60,1', 'auth']);
	 */
	registerMiddlewareGroup(name: string, references: string[]) {
		this.registry.group(name, references);
		return this;
	}

	/** Middleware references run on every matched route, before the route own middleware */
	use(...references: string[]) {
		this.globalMiddleware.push(...references);
		this.dispatcher = null;
		return this;
	}

	setContainer(container: MiddlewareContainer | undefined) {
		this.registry.setContainer(container);
		return this;
	}

	setStrictMiddleware(strict: boolean) {
		this.registry.setStrict(strict);
		return this;
	}

	setTrailingSlashStrategy(strategy: TrailingSlashStrategy) {
		return this.configure({ trailingSlash: strategy });
	}

	getTrailingSlashStrategy(): TrailingSlashStrategy {
		return this.settings.trailingSlash;
	}

	setNotFoundHandler(handler: NotFoundHandler) {
		return this.configure({ notFoundHandler: handler });
	}

	setMethodNotAllowedHandler(handler: MethodNotAllowedHandler) {
		return this.configure({ methodNotAllowedHandler: handler });
	}

	/** Catch-all for requests that matched no route and no other method of a route */
	fallback(handler: FallbackHandler) {
		return this.configure({ fallbackHandler: handler });
	}

	setErrorHandler(handler: ErrorHandler) {
		return this.configure({ errorHandler: handler });
	}

	/** Receives the named routes registered from now on */
	setUrlRegistry(registry: UrlRegistry) {
		this.settings.urlRegistry = registry;
		return this;
	}

	private configure(settings: Partial<Settings>) {
		Object.assign(this.settings, settings);
		this.dispatcher = null;
		return this;
	}

	getRoutes(): readonly CompiledRoute[] {
		return this.table.all();
	}

	getRoute(name: string): CompiledRoute | undefined {
		return this.table.getByName(name);
	}

	hasRoute(name: string): boolean {
		return this.table.hasName(name);
	}

	exportRoutes(): RouteTableData {
		return this.table.export();
	}

	/** Replace every registered route with a snapshot from `exportRoutes()` */
	importRoutes(data: RouteTableData) {
		this.table.import(data);
		return this;
	}

	dispatch(request: Request | RouterRequest): Promise<Response> {
		this.dispatcher ??= new Dispatcher(this.table, this.registry, {
			...this.settings,
			globalMiddleware: [...this.globalMiddleware],
			logger: this.dispatcherLog,
		});

		return this.dispatcher.dispatch(request);
	}
}
