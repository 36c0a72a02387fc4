import { Exception } from '.';

export class NotFound extends Exception {
	constructor(message?: string) {
		super(message ?? 'Not Found', 404);
	}
}

export class MethodNotAllowed extends Exception {
	constructor(
		public readonly allowedMethods: string[],
		message?: string,
	) {
		super(message ?? 'Method Not Allowed', 405, { allowedMethods });
	}
}

export class InternalServerError extends Exception {
	constructor(message?: string) {
		super(message ?? 'Internal Server Error', 500);
	}
}
