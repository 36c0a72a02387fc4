export { Router } from './router';
export { Registrar } from './registrar';
export { RouteGroup } from './route-group';
export { Dispatcher, type DispatcherOptions } from './dispatcher';
export type {
	AppMode,
	CompiledRoute,
	EnvConfig,
	ErrorHandler,
	FallbackHandler,
	GroupOptions,
	Handler,
	HandlerMiddleware,
	LegacyMiddleware,
	Method,
	MethodNotAllowedHandler,
	MethodOpts,
	MiddlewareContainer,
	MiddlewareDefinition,
	MiddlewareEntry,
	NextFunction,
	NotFoundHandler,
	RequestHandler,
	Result,
	RouteMeta,
	RouteOptions,
	RouterOptions,
	RouteTableData,
	TrailingSlashStrategy,
	UrlRegistry,
} from './types';
export { RouterRequest } from './context/request';
export { Store } from './context/store';
export { createResponse, withoutBody } from './context/response';
export { RouteTable } from './routing/route-table';
export { compileRoute, compileDomain, matchPath, matchDomain, type RouteDefinition } from './routing/compiler';
export { resolveConstraint, RegexConstraint, constraintNames, type RouteConstraint } from './routing/constraints';
export { MiddlewarePipeline } from './pipeline/pipeline';
export { MiddlewareRegistry, parseReference } from './pipeline/registry';
export { CallableHandler, LegacyMiddlewareAdapter, createMiddleware, createLegacyMiddleware } from './pipeline/adapters';
export { signals } from './middlewares/signals';
export { Exception, type ExceptionType } from './exception';
export { NotFound, MethodNotAllowed, InternalServerError } from './exception/http.exception';
export {
	DuplicateRouteName,
	InvalidRouteTemplate,
	MalformedConstraint,
	InvalidRouteDefinition,
	UnresolvedMiddleware,
} from './exception/router.exception';
export { config } from './config';
export { Logger, LogLevel, logger, createLogger } from './helpers/logger';
export { safeValidate } from './validator';
