import z, { type ZodType, type infer as ZodInfer } from 'zod';
import { modes } from './constants';
import { logger } from './helpers/logger';
import { codecs } from './helpers/codecs';
import type { EnvConfig } from './types';

const parse = <S extends ZodType>(index: string, rule: S, def: ZodInfer<S>): ZodInfer<S> => {
	const value = process.env[index];
	if (!value) return def;

	const res = rule.safeParse(value);
	if (res.success) return res.data;

	// Bad value, print a warn
	logger.warn(`'${index}' contains an invalid value (${value}). Falling back to the configured fallback value.`);
	return def;
};

/**
 * Build **EnvConfig** from environment variables.
 * Environment keys and defaults:
 * - `APP_MODE`                 → one of `modes`              (default: `"development"`)
 * - `ROUTER_TRAILING_SLASH`    → `strip|redirect|both`       (default: `"strip"`)
 * - `ROUTER_STRICT_MIDDLEWARE` → boolean                     (default: `false`)
 *
 * @see parse
 */
const extract = (): EnvConfig => ({
	mode: parse('APP_MODE', z.enum(modes), 'development'),
	trailingSlash: parse('ROUTER_TRAILING_SLASH', codecs.stringTrailingSlash, 'strip'),
	strictMiddleware: parse('ROUTER_STRICT_MIDDLEWARE', codecs.stringBoolean, false),
});

// read on first access, the logger and this module import each other
let configData: EnvConfig | undefined;

const all = (): EnvConfig => {
	configData ??= extract();
	return configData;
};

const get = <K extends keyof EnvConfig>(key: K): EnvConfig[K] => all()[key];

/** Read the environment again */
const reload = () => {
	configData = extract();
	return configData;
};

export const config = {
	get,
	reload,
};
