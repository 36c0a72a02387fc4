import type { RouterRequest } from '../context/request';
import type { MiddlewareDefinition, MiddlewareEntry, NextFunction, RequestHandler } from '../types';
import { CallableHandler, toHandlerMiddleware } from './adapters';

/**
 * Chain of middleware around a final handler.
 *
 * Higher priority runs first on the way in and last on the way out;
 * equal priorities keep the order they were piped in.
 */
export class MiddlewarePipeline {
	private readonly entries: MiddlewareEntry[] = [];

	pipe(middleware: MiddlewareDefinition, priority: number = 0) {
		this.entries.push({ middleware: toHandlerMiddleware(middleware), priority });
		return this;
	}

	get size(): number {
		return this.entries.length;
	}

	process(request: RouterRequest, finalHandler: NextFunction): Promise<Response> {
		const ordered = [...this.entries].sort((a, b) => b.priority - a.priority);

		// innermost first, the last wrapper built is the outermost
		let next: RequestHandler = new CallableHandler(finalHandler);
		for (const { middleware } of ordered.reverse()) {
			const inner = next;
			next = new CallableHandler(async (req) => middleware.process(req, inner));
		}

		return next.handle(request);
	}
}
