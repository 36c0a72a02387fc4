import { InternalServerError } from '../exception/http.exception';

/**
 * Request attribute bag, filled by the dispatcher with bound route parameters
 * and free for middleware to share values with the handler
 */
export class Store {
	private readonly data: Map<string, unknown>;

	constructor(initial?: Record<string, unknown>) {
		this.data = new Map<string, unknown>(Object.entries(initial ?? {}));
	}

	set(key: string, value: unknown) {
		this.data.set(key, value);
		return this;
	}

	has(key: string): boolean {
		return this.data.has(key);
	}

	/** @throws {InternalServerError} when the key was never set */
	get(key: string): unknown {
		if (!this.data.has(key)) throw new InternalServerError(`${key} doesnt exists in store`);
		return this.data.get(key);
	}

	find(key: string): unknown {
		return this.data.get(key);
	}

	delete(key: string) {
		this.data.delete(key);
		return this;
	}

	toObject(): Record<string, unknown> {
		return Object.fromEntries(this.data);
	}
}
