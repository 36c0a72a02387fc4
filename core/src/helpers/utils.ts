import type { AppMode } from '../types';
import { logger, LogLevel } from './logger';

/**
 * Normalizes and joins multiple path segments into a clean, well-formed URL path.
 *
 * - Trims each segment and removes empty fragments.
 * - Splits on slashes to support nested paths.
 * - Ensures the final path starts with a single '/' and contains no duplicate slashes.
 *
 * Placeholders are kept as written, so `buildPath('/api/', '{id}')` gives `/api/{id}`.
 */
export function buildPath(...parts: string[]): string {
	const result: string[] = [];

	for (const part of parts) {
		const cleanedSegments = part
			.split('/')
			.map((segment) => segment.trim())
			.filter(Boolean);
		result.push(...cleanedSegments);
	}

	return `/${result.join('/')}`;
}

/**
 * Removes every trailing `/`, the root path is left untouched
 */
export function trimTrailingSlash(path: string): string {
	if (path.length <= 1) return path;
	return path.replace(/\/+$/, '') || '/';
}

export function getModeLogLevel(mode: AppMode) {
	if (mode === 'production') return LogLevel.ERROR; // only errors
	if (mode === 'qa' || mode === 'staging') return LogLevel.INFO; // excludes DEBUG
	if (mode === 'test') return LogLevel.WARN;

	return LogLevel.DEBUG; // all levels
}

export function asArray<T>(value: T | T[] | null | undefined): T[] {
	if (!value) return [];
	if (Array.isArray(value)) return value;
	return [value];
}

/** Sorted copy without duplicates */
export function uniqueSorted<T extends string>(values: Iterable<T>): T[] {
	return [...new Set(values)].sort();
}

/**
 * Logs a single resolved request line.
 * Only the path is written, never the query string.
 *
 * @example
 * signal('info', 'GET', '/api/users', 200, 1.25);
 * // 2025-08-08T17:22:00.000Z INFO  [default] GET /api/users STATUS::200 1.25 ms
 */
export function signal(type: 'info' | 'print' | 'error', method: string, path: string, status: number, duration: number) {
	logger[type](method, path, `STATUS::${status}`, `${duration.toFixed(2)} ms`);
}
