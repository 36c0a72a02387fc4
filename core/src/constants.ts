import type { ErrorHandler, MethodNotAllowedHandler, NotFoundHandler } from './types';

export const methods = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'HEAD'] as const;

/** Methods registered by `any()`; HEAD is served from GET */
export const anyMethods = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;

export const modes = ['development', 'production', 'qa', 'staging', 'test'] as const;

export const trailingSlashStrategies = ['strip', 'redirect', 'both'] as const;

/** Specificity weights, higher score sorts first */
export const specificityWeights = {
	staticSegment: 1000,
	requiredParamSegment: 100,
	segment: 10,
	param: 1,
	optionalParam: -50,
} as const;

/** Fragment used by parameters without a constraint */
export const defaultParamFragment = '[^/]+';

/** Fragment used by `{name+}` catch-all parameters */
export const catchAllFragment = '.+';

/** Fragment standing for a `{token}` in a domain */
export const domainTokenFragment = '[^.]+';

export const defaultNotFoundHandler: NotFoundHandler = (request) =>
	new Response(`404 Not Found: ${request.path}`, {
		headers: { 'Content-Type': 'text/plain;charset=utf-8' },
		status: 404,
	});

export const defaultMethodNotAllowedHandler: MethodNotAllowedHandler = (_request, allowedMethods) =>
	new Response('405 Method Not Allowed', {
		headers: { 'Content-Type': 'text/plain;charset=utf-8', Allow: allowedMethods.join(', ') },
		status: 405,
	});

export const defaultErrorHandler: ErrorHandler = (_request, exception) => exception.toObject();
