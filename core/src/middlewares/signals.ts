import type { LegacyMiddleware } from '../types';
import { createLegacyMiddleware } from '../pipeline/adapters';
import { signal } from '../helpers/utils';

/**
 * Middleware that logs request signals: method, path, status and duration.
 *
 * By default, logs with `info` level, meaning output may be suppressed if the current
 * logger level is higher. If `force` is `true`, it logs regardless of the level using `print`.
 *
 * @param force - If `true`, logs are always printed
 *
 * @example
 * router.registerMiddleware('signals', signals(true), 1000).use('signals');
 */
export const signals = (force: boolean = false): LegacyMiddleware =>
	createLegacyMiddleware(async (request, next) => {
		const start = performance.now();

		const response = await next(request);

		const fn = response.status >= 400 ? 'error' : force ? 'print' : 'info';
		signal(fn, request.method, request.path, response.status, performance.now() - start);

		return response;
	});
