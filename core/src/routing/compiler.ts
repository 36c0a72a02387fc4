import type { CompiledRoute, Handler, Method, RouteOptions } from '../types';
import { catchAllFragment, defaultParamFragment, domainTokenFragment, specificityWeights } from '../constants';
import { InvalidRouteTemplate } from '../exception/router.exception';
import { asArray, trimTrailingSlash } from '../helpers/utils';
import { resolveConstraint } from './constraints';

export type RouteDefinition = RouteOptions & {
	method: Method;
	path: string;
	handler: Handler;
};

type Placeholder = {
	name: string;
	spec: string | undefined;
	optional: boolean;
	catchAll: boolean;
};

type TemplatePart = string | Placeholder;

const placeholderSyntax = /^([A-Za-z_][A-Za-z0-9_]*)(\+)?(?::(.+?))?(\?)?$/;

const escapeRegex = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Split a template into static text and `{...}` placeholders.
 * Braces nested inside a placeholder belong to its constraint (`{year:\d{4}}`).
 */
export function tokenize(template: string): TemplatePart[] {
	const parts: TemplatePart[] = [];
	let text = '';
	let body = '';
	let depth = 0;

	for (const char of template) {
		if (depth === 0) {
			if (char === '{') {
				if (text) parts.push(text);
				text = '';
				depth = 1;
			} else if (char === '}') {
				throw new InvalidRouteTemplate(template, 'unexpected "}"');
			} else {
				text += char;
			}
			continue;
		}

		if (char === '{') depth++;
		if (char === '}') depth--;

		if (depth > 0) {
			body += char;
			continue;
		}

		const syntax = placeholderSyntax.exec(body);
		if (!syntax) throw new InvalidRouteTemplate(template, `malformed placeholder "{${body}}"`);

		const [, name = '', plus, spec, question] = syntax;
		parts.push({ name, spec, catchAll: plus === '+', optional: question === '?' });
		body = '';
	}

	if (depth > 0) throw new InvalidRouteTemplate(template, 'unclosed "{"');
	if (text) parts.push(text);

	return parts;
}

function validate(template: string, parts: TemplatePart[]) {
	const seen = new Set<string>();
	let optionalSeen = false;

	parts.forEach((part, index) => {
		if (typeof part === 'string') {
			if (optionalSeen && part.replaceAll('/', '') !== '') {
				throw new InvalidRouteTemplate(template, 'optional parameters may only be followed by other optional parameters');
			}
			return;
		}

		if (seen.has(part.name)) throw new InvalidRouteTemplate(template, `parameter "${part.name}" is declared twice`);
		seen.add(part.name);

		if (optionalSeen && !part.optional) {
			throw new InvalidRouteTemplate(template, `required parameter "${part.name}" follows an optional one`);
		}
		if (part.optional) optionalSeen = true;

		if (part.catchAll && index !== parts.length - 1) {
			throw new InvalidRouteTemplate(template, `catch-all parameter "${part.name}" must end the template`);
		}
	});
}

/**
 * Score used to order routes of the same method, the most literal route wins.
 */
export function computeSpecificity(parts: TemplatePart[]): number {
	type Segment = { text: boolean; required: boolean; placeholder: boolean };

	const segments: Segment[] = [{ text: false, required: false, placeholder: false }];
	let params = 0;
	let optional = 0;

	for (const part of parts) {
		if (typeof part === 'string') {
			part.split('/').forEach((piece, index) => {
				if (index > 0) segments.push({ text: false, required: false, placeholder: false });
				if (piece) segments[segments.length - 1].text = true;
			});
			continue;
		}

		const current = segments[segments.length - 1];
		current.placeholder = true;
		if (!part.optional && !part.catchAll) current.required = true;

		params++;
		if (part.optional) optional++;
	}

	const used = segments.filter((segment) => segment.text || segment.placeholder);
	const staticCount = used.filter((segment) => !segment.placeholder).length;
	const requiredCount = used.filter((segment) => segment.required).length;

	return (
		staticCount * specificityWeights.staticSegment +
		requiredCount * specificityWeights.requiredParamSegment +
		used.length * specificityWeights.segment +
		params * specificityWeights.param +
		optional * specificityWeights.optionalParam
	);
}

function buildPattern(template: string, parts: TemplatePart[], constraints: Record<string, string>): RegExp {
	const pieces: string[] = [];

	parts.forEach((part, index) => {
		if (typeof part === 'string') {
			pieces.push(escapeRegex(part));
			return;
		}

		const spec = Object.hasOwn(constraints, part.name) ? constraints[part.name] : undefined;
		const fragment = spec ? resolveConstraint(spec, part.name).pattern : part.catchAll ? catchAllFragment : defaultParamFragment;
		const capture = `(?<${part.name}>${fragment})`;

		if (!part.optional) {
			pieces.push(capture);
			return;
		}

		// a whole-segment optional parameter takes its separator along
		const previous = pieces[pieces.length - 1] ?? '';
		const next = parts[index + 1];
		const fillsSegment = previous.endsWith('/') && (next === undefined || (typeof next === 'string' && next.startsWith('/')));

		if (fillsSegment) {
			pieces[pieces.length - 1] = previous.slice(0, -1);
			pieces.push(`(?:/${capture})?`);
		} else {
			pieces.push(`(?:${capture})?`);
		}
	});

	const body = pieces.join('');
	const source = template === '/' ? '^/$' : `^${body}/?$`;

	try {
		return new RegExp(source);
	} catch (error) {
		throw new InvalidRouteTemplate(template, error instanceof Error ? error.message : String(error));
	}
}

/**
 * Compile a host such as `{tenant}.example.com` into a case-insensitive pattern,
 * each `{token}` standing for one or more non-dot characters.
 */
export function compileDomain(domain: string): RegExp | null {
	if (!domain) return null;

	const pieces = tokenize(domain).map((part) => {
		if (typeof part === 'string') return escapeRegex(part);
		if (part.spec || part.optional || part.catchAll) {
			throw new InvalidRouteTemplate(domain, `domain placeholder "${part.name}" takes no modifiers`);
		}
		return `(?<${part.name}>${domainTokenFragment})`;
	});

	return new RegExp(`^${pieces.join('')}$`, 'i');
}

/**
 * Compile a route definition into the entry stored by the route table.
 *
 * Inline constraints (`{id:int}`) win over `constraints` entries of the same name.
 *
 * @throws {InvalidRouteTemplate} on unbalanced braces, malformed or duplicated placeholders,
 * an optional parameter followed by a required one, or a catch-all that does not end the template
 * @throws {MalformedConstraint} when a custom constraint is not a valid regex fragment
 */
export function compileRoute(definition: RouteDefinition): CompiledRoute {
	const withSlash = definition.path.startsWith('/') ? definition.path : `/${definition.path}`;
	const path = trimTrailingSlash(withSlash);

	const parts = tokenize(path);
	validate(path, parts);

	const placeholders = parts.filter((part): part is Placeholder => typeof part !== 'string');

	const constraints: Record<string, string> = { ...definition.constraints };
	for (const placeholder of placeholders) {
		if (placeholder.spec) constraints[placeholder.name] = placeholder.spec;
	}

	const domain = definition.domain ?? '';

	return {
		method: definition.method,
		path,
		pattern: buildPattern(path, parts, constraints),
		paramNames: placeholders.map((placeholder) => placeholder.name),
		optionalParams: placeholders.filter((placeholder) => placeholder.optional).map((placeholder) => placeholder.name),
		specificity: computeSpecificity(parts),
		name: definition.name ?? '',
		middleware: asArray(definition.middleware),
		constraints,
		defaults: { ...definition.defaults },
		domain,
		domainPattern: compileDomain(domain),
		meta: { ...definition.meta },
		handler: definition.handler,
	};
}

const decode = (value: string) => {
	try {
		return decodeURIComponent(value);
	} catch {
		return value;
	}
};

/**
 * Match a request path against a route, `null` when it does not match.
 * Absent optional parameters are left out of the result.
 */
export function matchPath(route: CompiledRoute, path: string): Record<string, string> | null {
	const match = route.pattern.exec(path);
	if (!match) return null;

	const params: Record<string, string> = {};
	for (const [name, value] of Object.entries(match.groups ?? {})) {
		if (value !== undefined) params[name] = decode(value);
	}
	return params;
}

/**
 * Match a request host against the route domain, tokens are returned by name.
 * Routes without a domain match every host.
 */
export function matchDomain(route: CompiledRoute, host: string): Record<string, string> | null {
	if (!route.domain) return {};
	if (route.domain.toLowerCase() === host.toLowerCase()) return {};

	const match = route.domainPattern?.exec(host);
	if (!match) return null;

	const tokens: Record<string, string> = {};
	for (const [name, value] of Object.entries(match.groups ?? {})) {
		if (value !== undefined) tokens[name] = value;
	}
	return tokens;
}
