import { config } from '../config';
import { getModeLogLevel } from './utils';

export enum LogLevel {
	DEBUG = 10,
	INFO = 20,
	WARN = 30,
	ERROR = 40,
}

const LogColors: Record<keyof typeof LogLevel, string> = {
	DEBUG: '\x1b[90m', // gray
	INFO: '\x1b[36m', // cyan
	WARN: '\x1b[33m', // yellow
	ERROR: '\x1b[31m', // red
};

const ResetColor = '\x1b[0m';

/**
 * Leveled console logger bound to a context name
 */
export class Logger {
	private logContext: string;
	private logLevel: LogLevel;

	constructor(level: LogLevel, context: string = 'default') {
		this.logLevel = level;
		this.logContext = context;
	}

	/**
	 * Set the current log level.
	 */
	level(level: LogLevel) {
		this.logLevel = level;
		return this;
	}

	getLevel(): LogLevel {
		return this.logLevel;
	}

	/**
	 * Set the current log context name.
	 */
	context(context: string) {
		this.logContext = context;
		return this;
	}

	private log(severity: keyof typeof LogLevel, force: boolean, ...data: unknown[]): void {
		if (LogLevel[severity] >= this.logLevel || force) {
			const color = LogColors[severity];
			const paddedSeverity = severity.padEnd(5, ' ');
			console.log(`${new Date().toISOString()} ${color}${paddedSeverity}${ResetColor} [${this.logContext}]`, ...data);
		}
	}

	/** print log on any log level */
	print(...data: unknown[]): void {
		this.log('INFO', true, ...data);
	}

	debug(...data: unknown[]): void {
		this.log('DEBUG', false, ...data);
	}

	info(...data: unknown[]): void {
		this.log('INFO', false, ...data);
	}

	warn(...data: unknown[]): void {
		this.log('WARN', false, ...data);
	}

	error(...data: unknown[]): void {
		this.log('ERROR', false, ...data);
	}
}

/**
 * Creates a new `Logger` instance bound to the given context.
 *
 * If a log level is explicitly provided, it will be used.
 * Otherwise, the level is resolved from the configured mode via `getModeLogLevel()`.
 *
 * @param context - Name of the log context (e.g. `router`, `dispatcher`).
 * @param level   - Optional log level to override the default resolved level.
 */
export const createLogger = (context: string, level?: LogLevel) => {
	const logLevel = level ?? getModeLogLevel(config.get('mode'));
	return new Logger(logLevel).context(context);
};

/**
 * Global Logger instance within 'default' context
 */
export const logger = (() => {
	const instance = new Logger(LogLevel.DEBUG);

	return {
		print: (...data: unknown[]) => instance.print(...data),
		info: (...data: unknown[]) => instance.info(...data),
		warn: (...data: unknown[]) => instance.warn(...data),
		error: (...data: unknown[]) => instance.error(...data),
	};
})();
