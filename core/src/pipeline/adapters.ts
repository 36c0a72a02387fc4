import type { RouterRequest } from '../context/request';
import type { HandlerMiddleware, LegacyMiddleware, MiddlewareDefinition, NextFunction, RequestHandler } from '../types';

/**
 * `RequestHandler` over a plain function, the link between two pipeline stages
 */
export class CallableHandler implements RequestHandler {
	constructor(private readonly fn: NextFunction) {}

	handle(request: RouterRequest): Promise<Response> {
		return this.fn(request);
	}
}

/**
 * Exposes a legacy middleware through the continuation-object shape
 */
export class LegacyMiddlewareAdapter implements HandlerMiddleware {
	readonly kind = 'handler';

	constructor(readonly legacy: LegacyMiddleware) {}

	process(request: RouterRequest, handler: RequestHandler) {
		return this.legacy.process(request, (next) => handler.handle(next));
	}

	setParameters(params: string[]) {
		this.legacy.setParameters?.(params);
	}
}

export function toHandlerMiddleware(middleware: MiddlewareDefinition): HandlerMiddleware {
	return middleware.kind === 'legacy' ? new LegacyMiddlewareAdapter(middleware) : middleware;
}

/**
 * Shorthand for a stateless continuation-object middleware
 *
 * @example
 * router.registerMiddleware('timing', createMiddleware(async (request, handler) => {
 * 	const start = performance.now();
 * 	const response = await handler.handle(request);
 * 	response.headers.set('Server-Timing', `app;dur=${performance.now() - start}`);
 * 	return response;
 * }));
 */
export function createMiddleware(process: HandlerMiddleware['process']): HandlerMiddleware {
	return { kind: 'handler', process };
}

/** Shorthand for a stateless continuation-function middleware */
export function createLegacyMiddleware(process: LegacyMiddleware['process']): LegacyMiddleware {
	return { kind: 'legacy', process };
}
