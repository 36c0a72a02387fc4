import type { Result } from '../types';
import { InternalServerError } from '../exception/http.exception';

/**
 * Normalizes an awaited `Result` value into a `Response` instance.
 *
 * Accepted types:
 * - `Response` → returned as-is.
 * - `null` → empty body
 * - `string` → plain text
 * - `object` → serializes JSON body
 *
 * @throws {InternalServerError} when the value is none of the above
 */
export function createResponse(result: Awaited<Result>, init: ResponseInit = {}): Response {
	if (result instanceof Response) return result;

	if (result === null) return new Response(null, init);

	if (typeof result === 'string') {
		return new Response(result, withContentType(init, 'text/plain;charset=utf-8'));
	}

	if (typeof result === 'object') {
		return new Response(JSON.stringify(result), withContentType(init, 'application/json'));
	}

	throw new InternalServerError(`Unable to parse response. Did you forget some 'return next()' on middlewares?`);
}

function withContentType(init: ResponseInit, contentType: string): ResponseInit {
	const headers = new Headers(init.headers);
	if (!headers.has('content-type')) headers.set('content-type', contentType);
	return { ...init, headers };
}

/**
 * Same status and headers, no body. Used to answer HEAD from a GET route.
 */
export async function withoutBody(response: Response): Promise<Response> {
	// release the underlying stream before dropping it
	if (response.body && !response.bodyUsed) await response.body.cancel();

	return new Response(null, {
		status: response.status,
		statusText: response.statusText,
		headers: response.headers,
	});
}
