import { config } from '../config';

/**
 * Format of all layer exception
 */
export type ExceptionType = {
	status: number;
	message: string;
	fields?: unknown;
	debug?: {
		name: string;
		stack?: string;
		cause?: unknown;
	};
};

const defaultMessage = 'Internal Server Error';

export class Exception extends Error {
	constructor(
		message: string,
		public status: number,
		public fields?: unknown,
		public raw?: unknown,
	) {
		super(message);
		this.name = new.target.name;
	}

	getDebug(): Pick<ExceptionType, 'debug'> {
		return config.get('mode') !== 'production'
			? {
					debug: {
						name: this.name,
						stack: this.stack,
						cause: this.cause,
					},
				}
			: {};
	}

	toObject(): ExceptionType {
		return {
			status: this.status,
			message: this.message,
			fields: this.fields,
			...this.getDebug(),
		};
	}

	/**
	 * Convert any unknown error type to an Exception instance
	 */
	static parse(error: unknown, statusCode: number = 500): Exception {
		if (error instanceof Exception) return error;

		if (typeof error === 'string') {
			return new Exception(error, statusCode, undefined, error);
		}

		if (error && typeof error === 'object') {
			return new ExceptionObjectParser(error, statusCode).parse();
		}

		return new Exception(defaultMessage, statusCode, undefined, error);
	}
}

class ExceptionObjectParser {
	constructor(
		private readonly err: object,
		private readonly statusCode: number,
	) {}

	private field(name: string): unknown {
		return name in this.err ? Reflect.get(this.err, name) : undefined;
	}

	private pickString(name: string): string | undefined {
		const value = this.field(name);
		return typeof value === 'string' ? value : undefined;
	}

	private pickNumber(name: string): number | undefined {
		const value = this.field(name);
		return typeof value === 'number' ? value : undefined;
	}

	private resolveMessage(): string {
		return this.pickString('message') || defaultMessage;
	}

	private resolveStatus(): number {
		return this.pickNumber('status') || this.pickNumber('statusCode') || this.statusCode;
	}

	private resolveInvalidFields(): unknown {
		const value = this.field('fields');
		return value && typeof value === 'object' ? value : undefined;
	}

	parse(): Exception {
		let status = this.resolveStatus();
		if (status < 100 || status > 599) status = 500;

		const ex = new Exception(this.resolveMessage(), status, this.resolveInvalidFields(), this.err);
		if (this.err instanceof Error) ex.stack = this.err.stack;
		return ex;
	}
}
