import type { RouterRequest } from './context/request';
import type { Exception } from './exception';
import type { LogLevel } from './helpers/logger';
import type { methods, modes, trailingSlashStrategies } from './constants';

export type Method = (typeof methods)[number];

export type MethodOpts = Method | Method[] | '*';

export type AppMode = (typeof modes)[number];

/**
 * How a request path ending in `/` is treated before matching.
 * - `strip`:    `/foo/` is matched as `/foo` (default)
 * - `redirect`: `/foo/` answers `301 Location: /foo`
 * - `both`:     the path is matched as received
 */
export type TrailingSlashStrategy = (typeof trailingSlashStrategies)[number];

/**
 * Anything a handler may return. Normalized into a `Response`:
 * - `Response` → as-is
 * - `null` → empty body
 * - `string` → text/plain
 * - `object` → JSON
 */
export type Result = string | object | null | Response;

export type Handler = (request: RouterRequest, ...params: string[]) => Result | Promise<Result>;

export type NotFoundHandler = (request: RouterRequest) => Result | Promise<Result>;

export type MethodNotAllowedHandler = (request: RouterRequest, allowedMethods: Method[]) => Result | Promise<Result>;

export type FallbackHandler = (request: RouterRequest) => Result | Promise<Result>;

export type ErrorHandler = (request: RouterRequest, exception: Exception) => Result | Promise<Result>;

// ─────────────────────────────── Middleware ───────────────────────────────

/** The next stage of the pipeline, seen by continuation-object middleware. */
export interface RequestHandler {
	handle(request: RouterRequest): Promise<Response>;
}

/** The next stage of the pipeline, seen by legacy middleware. */
export type NextFunction = (request: RouterRequest) => Promise<Response>;

type ParameterSetter = {
	/**
	 * Receives the arguments of a parameterized reference (`throttle:60,1` → `['60', '1']`).
	 * Called on every resolution of the reference, so it must be idempotent.
	 */
	setParameters?: (params: string[]) => void;
};

/** Continuation-object style middleware. */
export type HandlerMiddleware = ParameterSetter & {
	readonly kind: 'handler';
	process(request: RouterRequest, handler: RequestHandler): Promise<Response> | Response;
};

/** Legacy continuation-function style middleware. */
export type LegacyMiddleware = ParameterSetter & {
	readonly kind: 'legacy';
	process(request: RouterRequest, next: NextFunction): Promise<Response> | Response;
};

export type MiddlewareDefinition = HandlerMiddleware | LegacyMiddleware;

export type MiddlewareEntry = {
	middleware: HandlerMiddleware;
	priority: number;
};

/**
 * Outer dependency container consulted when a middleware name is not registered on the router.
 */
export interface MiddlewareContainer {
	has(name: string): boolean;
	get(name: string): MiddlewareDefinition | undefined;
}

// ─────────────────────────────── Routes ───────────────────────────────

export type RouteMeta = Record<string, unknown>;

/**
 * Registration-time attributes of a single route.
 */
export type RouteOptions = {
	/** Globally unique route name; empty or omitted means unnamed */
	name?: string;

	/** Middleware references, possibly parameterized (`'throttle:60,1'`) or naming a group */
	middleware?: string | string[];

	/** Per-parameter constraint (`int`, `slug`, … or a regex fragment). Inline `{id:int}` wins. */
	constraints?: Record<string, string>;

	/** Values bound to optional parameters absent from the path */
	defaults?: Record<string, string>;

	/** Host the route is bound to, may contain `{token}` placeholders */
	domain?: string;

	/** Opaque data carried along with the route */
	meta?: RouteMeta;
};

export type CompiledRoute = {
	method: Method;
	path: string;
	pattern: RegExp;
	paramNames: string[];
	optionalParams: string[];
	specificity: number;
	name: string;
	middleware: string[];
	constraints: Record<string, string>;
	defaults: Record<string, string>;
	domain: string;
	domainPattern: RegExp | null;
	meta: RouteMeta;
	handler: Handler;
};

/** Snapshot exchanged with a route cache */
export type RouteTableData = {
	routes: CompiledRoute[];
	namedRoutes: Record<string, number>;
};

/**
 * Receives every named route at registration, e.g. a reverse-routing URL generator.
 */
export interface UrlRegistry {
	register(name: string, path: string, methods: Method[], paramNames: string[]): void;
}

export type GroupOptions = {
	prefix?: string;
	middleware?: string | string[];
	where?: Record<string, string>;
	domain?: string;
};

// ─────────────────────────────── Config ───────────────────────────────

/**
 * Values read from the environment by `config`
 */
export type EnvConfig = {
	/**
	 * Application mode, drives the default log level
	 * @env inferance: 'APP_MODE'
	 * @default 'development'
	 */
	mode: AppMode;

	/**
	 * @env inferance: 'ROUTER_TRAILING_SLASH'
	 * @default 'strip'
	 */
	trailingSlash: TrailingSlashStrategy;

	/**
	 * Fail with `UnresolvedMiddleware` instead of dropping unknown middleware references
	 * @env inferance: 'ROUTER_STRICT_MIDDLEWARE'
	 * @default false
	 */
	strictMiddleware: boolean;
};

/**
 * Per-router configuration, anything omitted falls back to `config` or the defaults in `constants`
 */
export type RouterOptions = Partial<EnvConfig> & {
	/** Explicit log level for the router loggers, overrides the mode derived one */
	logLevel?: LogLevel;

	notFoundHandler?: NotFoundHandler;

	methodNotAllowedHandler?: MethodNotAllowedHandler;

	/** Invoked when no route matched and no method mismatch was recorded, before the 404 path */
	fallbackHandler?: FallbackHandler;

	errorHandler?: ErrorHandler;

	/** Consulted for middleware names the router has no registration for */
	container?: MiddlewareContainer;

	urlRegistry?: UrlRegistry;
};
