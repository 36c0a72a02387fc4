import { afterEach, describe, expect, it, vi } from 'vitest';
import {
	config,
	createResponse,
	Exception,
	InternalServerError,
	logger,
	Logger,
	LogLevel,
	MethodNotAllowed,
	Router,
	RouterRequest,
	signals,
	Store,
	withoutBody,
} from '../src';

afterEach(() => {
	vi.restoreAllMocks();
	vi.unstubAllEnvs();
	config.reload();
});

describe('config', () => {
	it('reads the environment', () => {
		vi.stubEnv('ROUTER_TRAILING_SLASH', 'REDIRECT_301');
		vi.stubEnv('ROUTER_STRICT_MIDDLEWARE', 'yes');

		config.reload();

		expect(config.get('mode')).toBe('test');
		expect(config.get('trailingSlash')).toBe('redirect');
		expect(config.get('strictMiddleware')).toBe(true);
	});

	it('maps every trailing slash spelling', () => {
		for (const [value, expected] of [
			['strip', 'strip'],
			['ALLOW_BOTH', 'both'],
			['both', 'both'],
			['redirect', 'redirect'],
		] as const) {
			vi.stubEnv('ROUTER_TRAILING_SLASH', value);
			expect(config.reload().trailingSlash).toBe(expected);
		}
	});

	it('falls back on invalid values with a warning', () => {
		const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
		vi.stubEnv('APP_MODE', 'bogus');

		expect(config.reload().mode).toBe('development');
		expect(warn).toHaveBeenCalledWith("'APP_MODE' contains an invalid value (bogus). Falling back to the configured fallback value.");
	});

	it('warns on an unknown trailing slash strategy', () => {
		const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
		vi.stubEnv('ROUTER_TRAILING_SLASH', 'REDIRECT301');

		expect(config.reload().trailingSlash).toBe('strip');
		expect(warn).toHaveBeenCalledWith(
			"'ROUTER_TRAILING_SLASH' contains an invalid value (REDIRECT301). Falling back to the configured fallback value.",
		);
	});

	it('is the default of new routers', () => {
		vi.stubEnv('ROUTER_TRAILING_SLASH', 'both');
		config.reload();

		expect(new Router({ logLevel: LogLevel.ERROR }).getTrailingSlashStrategy()).toBe('both');
		expect(new Router({ logLevel: LogLevel.ERROR, trailingSlash: 'strip' }).getTrailingSlashStrategy()).toBe('strip');
	});
});

describe('Logger', () => {
	it('filters by level', () => {
		const print = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		const log = new Logger(LogLevel.WARN, 'test');

		log.debug('hidden');
		log.info('hidden');
		log.warn('shown');
		log.print('forced');

		expect(print).toHaveBeenCalledTimes(2);
		expect(print.mock.calls[0]?.[1]).toBe('shown');
		expect(print.mock.calls[1]?.[1]).toBe('forced');
		expect(String(print.mock.calls[0]?.[0])).toContain('[test]');
	});

	it('changes level and context', () => {
		const log = new Logger(LogLevel.DEBUG).level(LogLevel.ERROR).context('router');

		expect(log.getLevel()).toBe(LogLevel.ERROR);
	});
});

describe('Exception', () => {
	it('keeps exceptions as they are', () => {
		const ex = new MethodNotAllowed(['GET']);

		expect(Exception.parse(ex)).toBe(ex);
		expect(ex.toObject()).toMatchObject({ status: 405, message: 'Method Not Allowed', fields: { allowedMethods: ['GET'] } });
	});

	it('parses strings', () => {
		expect(Exception.parse('boom')).toMatchObject({ status: 500, message: 'boom' });
		expect(Exception.parse('teapot', 418).status).toBe(418);
	});

	it('parses objects with a status', () => {
		expect(Exception.parse({ status: 404, message: 'gone' })).toMatchObject({ status: 404, message: 'gone' });
		expect(Exception.parse({ statusCode: 409, message: 'taken', fields: { email: ['taken'] } })).toMatchObject({
			status: 409,
			fields: { email: ['taken'] },
		});
		expect(Exception.parse({ status: 42 }).status).toBe(500);
	});

	it('falls back on anything else', () => {
		expect(Exception.parse(undefined)).toMatchObject({ status: 500, message: 'Internal Server Error' });
	});

	it('adds debug details outside production', () => {
		const body = new InternalServerError('broken').toObject();

		expect(body.debug?.name).toBe('InternalServerError');
	});

	it('hides debug details in production', () => {
		vi.stubEnv('APP_MODE', 'production');
		config.reload();

		expect(new InternalServerError('broken').toObject()).toEqual({ status: 500, message: 'broken', fields: undefined });
	});
});

describe('Store', () => {
	it('stores attributes', () => {
		const store = new Store({ tenant: 'acme' }).set('id', '7');

		expect(store.has('tenant')).toBe(true);
		expect(store.get('id')).toBe('7');
		expect(store.find('missing')).toBeUndefined();
		expect(store.toObject()).toEqual({ tenant: 'acme', id: '7' });
		expect(store.delete('id').has('id')).toBe(false);
	});

	it('fails on a missing key', () => {
		expect(() => new Store().get('user')).toThrow('user doesnt exists in store');
	});
});

describe('RouterRequest', () => {
	it('exposes the routing view of a request', () => {
		const raw = new Request('http://Shop.Example.com:8080/cart/items?page=2', { method: 'post' });
		const request = RouterRequest.from(raw);

		expect(request.method).toBe('POST');
		expect(request.path).toBe('/cart/items');
		expect(request.host).toBe('shop.example.com');
		expect(request.raw).toBe(raw);
		expect(request.route).toBeNull();
		expect(RouterRequest.from(request)).toBe(request);
	});

	it('reads string attributes as parameters', () => {
		const request = new RouterRequest(new Request('http://localhost/'), { id: '7', count: 3 });

		expect(request.param('id')).toBe('7');
		expect(request.param('count')).toBeUndefined();
	});
});

describe('responses', () => {
	it('serializes objects as JSON', async () => {
		const response = createResponse({ ok: true }, { status: 201 });

		expect(response.status).toBe(201);
		expect(response.headers.get('content-type')).toBe('application/json');
		expect(await response.text()).toBe('{"ok":true}');
	});

	it('keeps an explicit content type', () => {
		const response = createResponse('<p>hi</p>', { headers: { 'Content-Type': 'text/html' } });

		expect(response.headers.get('content-type')).toBe('text/html');
	});

	it('drops the body only', async () => {
		const response = await withoutBody(new Response('payload', { status: 203, headers: { 'X-Kept': 'yes' } }));

		expect(response.status).toBe(203);
		expect(response.headers.get('x-kept')).toBe('yes');
		expect(await response.text()).toBe('');
	});
});

describe('signals', () => {
	it('logs method, path and status of each request', async () => {
		const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
		const router = new Router({ logLevel: LogLevel.ERROR })
			.registerMiddleware('signals', signals(), 1000)
			.use('signals')
			.get('/ping', () => 'pong');

		await router.dispatch(new Request('http://localhost/ping?token=test-secret'));

		expect(info).toHaveBeenCalledTimes(1);
		expect(info.mock.calls[0]?.slice(0, 3)).toEqual(['GET', '/ping', 'STATUS::200']);
		expect(String(info.mock.calls[0]?.[3])).toMatch(/^\d+\.\d{2} ms$/);
	});

	it('logs failed requests as errors', async () => {
		const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
		const router = new Router({ logLevel: LogLevel.ERROR })
			.registerMiddleware('signals', signals())
			.get('/teapot', () => new Response(null, { status: 418 }), { middleware: ['signals'] });

		await router.dispatch(new Request('http://localhost/teapot'));

		expect(error).toHaveBeenCalledWith('GET', '/teapot', 'STATUS::418', expect.stringMatching(/ ms$/));
	});
});
