import { describe, expect, it, vi } from 'vitest';
import {
	createMiddleware,
	DuplicateRouteName,
	InvalidRouteDefinition,
	InvalidRouteTemplate,
	LogLevel,
	Router,
	type Handler,
	type UrlRegistry,
} from '../src';

const req = (method: string, path: string) => new Request(`http://localhost${path}`, { method });

const createRouter = () => new Router({ logLevel: LogLevel.ERROR });

const describeRoutes = (router: Router) => router.getRoutes().map((route) => `${route.method} ${route.path}`);

describe('registration', () => {
	it('registers one route per method', () => {
		const router = createRouter()
			.get('/a', () => 'a')
			.post('/a', () => 'a')
			.put('/a', () => 'a')
			.patch('/a', () => 'a')
			.delete('/a', () => 'a')
			.options('/a', () => 'a')
			.head('/a', () => 'a');

		expect(describeRoutes(router)).toEqual(['DELETE /a', 'GET /a', 'HEAD /a', 'OPTIONS /a', 'PATCH /a', 'POST /a', 'PUT /a']);
	});

	it('registers any method but HEAD with any()', () => {
		const router = createRouter().any('/hook', () => 'hook');

		expect(describeRoutes(router)).toEqual(['DELETE /hook', 'GET /hook', 'OPTIONS /hook', 'PATCH /hook', 'POST /hook', 'PUT /hook']);
	});

	it('registers every method with *', () => {
		expect(createRouter().add('*', '/all', () => 'all').getRoutes()).toHaveLength(7);
	});

	it('names only the first route of a multi-method registration', () => {
		const router = createRouter().match(['POST', 'GET', 'POST'], '/forms', () => 'form', { name: 'forms' });

		expect(describeRoutes(router)).toEqual(['GET /forms', 'POST /forms']);
		expect(router.getRoute('forms')?.method).toBe('POST');
	});

	it('shares the handler across methods', async () => {
		const handler: Handler = (request) => request.method;
		const router = createRouter().match(['GET', 'PUT'], '/echo', handler);

		expect(await (await router.dispatch(req('PUT', '/echo'))).text()).toBe('PUT');
		expect(await (await router.dispatch(req('GET', '/echo'))).text()).toBe('GET');
	});

	it('rejects a duplicated route name', () => {
		const router = createRouter().get('/users', () => 'list', { name: 'users.index' });

		expect(() => router.post('/users', () => 'create', { name: 'users.index' })).toThrow(DuplicateRouteName);
		expect(router.getRoutes()).toHaveLength(1);
	});

	it('leaves the table untouched when a template is invalid', () => {
		const router = createRouter();

		expect(() => router.match(['GET', 'POST'], '/a/{x?}/{y}', () => 'x')).toThrow(InvalidRouteTemplate);
		expect(router.getRoutes()).toHaveLength(0);
	});

	it('validates route options', () => {
		const router = createRouter();

		expect(() => router.get('/x', () => 'x', { domain: 'bad domain!' })).toThrow(InvalidRouteDefinition);
		expect(() => router.get('/x', () => 'x', { constraints: { id: '' } })).toThrow(InvalidRouteDefinition);
		expect(() => router.get('/x', () => 'x', { middleware: [''] })).toThrow(InvalidRouteDefinition);
	});

	it('reports the invalid fields', () => {
		try {
			createRouter().get('/x', () => 'x', { domain: 'bad domain!' });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidRouteDefinition);
			expect(error).toMatchObject({ status: 500, fields: { domain: ['Only host characters and {token} placeholders'] } });
		}
	});

	it('looks routes up by name', () => {
		const router = createRouter()
			.get('/users/{id}', () => 'show', { name: 'users.show' })
			.get('/users', () => 'list');

		expect(router.hasRoute('users.show')).toBe(true);
		expect(router.hasRoute('users.index')).toBe(false);
		expect(router.getRoute('users.show')?.paramNames).toEqual(['id']);
	});
});

describe('url registry', () => {
	it('receives every named route', () => {
		const registry: UrlRegistry = { register: vi.fn() };
		const router = new Router({ urlRegistry: registry, logLevel: LogLevel.ERROR });

		router
			.get('/users/{id:int}', () => 'show', { name: 'users.show' })
			.match(['GET', 'POST'], '/forms', () => 'form', { name: 'forms' })
			.get('/anonymous', () => 'anonymous');

		expect(registry.register).toHaveBeenCalledTimes(2);
		expect(registry.register).toHaveBeenNthCalledWith(1, 'users.show', '/users/{id:int}', ['GET'], ['id']);
		expect(registry.register).toHaveBeenNthCalledWith(2, 'forms', '/forms', ['GET', 'POST'], []);
	});

	it('can be attached after construction', () => {
		const registry: UrlRegistry = { register: vi.fn() };

		createRouter().setUrlRegistry(registry).get('/home', () => 'home', { name: 'home' });

		expect(registry.register).toHaveBeenCalledWith('home', '/home', ['GET'], []);
	});
});

describe('redirect', () => {
	it('registers a GET route answering with a redirect', async () => {
		const router = createRouter().redirect('/old', '/new').redirect('/legacy', '/modern', 301);

		const temporary = await router.dispatch(req('GET', '/old'));
		expect(temporary.status).toBe(302);
		expect(temporary.headers.get('location')).toBe('/new');

		const permanent = await router.dispatch(req('GET', '/legacy'));
		expect(permanent.status).toBe(301);
		expect(permanent.headers.get('location')).toBe('/modern');
	});
});

describe('groups', () => {
	it('prefixes paths and merges middleware, constraints and domain', async () => {
		const trace: string[] = [];
		const tag = (label: string) =>
			createMiddleware((request, handler) => {
				trace.push(label);
				return handler.handle(request);
			});

		const router = createRouter()
			.registerMiddleware('auth', tag('auth'))
			.registerMiddleware('audit', tag('audit'))
			.group({ prefix: '/api', middleware: ['auth'], where: { id: 'int' } }, (api) => {
				api.get('/users/{id}', (_request, id) => `user ${id}`, { name: 'api.users.show' });
				api.group({ prefix: 'v2/', middleware: 'audit' }, (v2) => {
					v2.get('/ping', () => 'pong', { middleware: ['missing'] });
				});
			});

		expect(describeRoutes(router)).toEqual(['GET /api/v2/ping', 'GET /api/users/{id}']);
		expect(router.getRoute('api.users.show')?.constraints).toEqual({ id: 'int' });

		expect((await router.dispatch(req('GET', '/api/users/abc'))).status).toBe(404);
		expect(await (await router.dispatch(req('GET', '/api/users/5'))).text()).toBe('user 5');
		expect(trace).toEqual(['auth']);

		expect(await (await router.dispatch(req('GET', '/api/v2/ping'))).text()).toBe('pong');
		expect(trace).toEqual(['auth', 'auth', 'audit']);
	});

	it('lets the route override group constraints and domain', () => {
		const router = createRouter().group({ where: { id: 'int' }, domain: 'api.example.com' }, (group) => {
			group.get('/posts/{id}', () => 'post', { name: 'posts', constraints: { id: 'slug' }, domain: 'blog.example.com' });
			group.get('/users/{id}', () => 'user', { name: 'users' });
		});

		expect(router.getRoute('posts')).toMatchObject({ constraints: { id: 'slug' }, domain: 'blog.example.com' });
		expect(router.getRoute('users')).toMatchObject({ constraints: { id: 'int' }, domain: 'api.example.com' });
	});

	it('maps a group root to the prefix', () => {
		const router = createRouter().group({ prefix: '/admin' }, (admin) => {
			admin.get('/', () => 'dashboard');
		});

		expect(describeRoutes(router)).toEqual(['GET /admin']);
	});

	it('validates group options', () => {
		expect(() => createRouter().group({ domain: 'not a host' }, () => undefined)).toThrow(InvalidRouteDefinition);
	});
});

describe('route cache', () => {
	it('dispatches the same way after import', async () => {
		const source = createRouter()
			.get('/users/{id:int}', (_request, id) => `user ${id}`, { name: 'users.show' })
			.get('/users/admin', () => 'admin')
			.post('/users', () => 'created');

		const target = createRouter().importRoutes(source.exportRoutes());

		expect(target.getRoutes()).toEqual(source.getRoutes());
		expect(target.getRoute('users.show')).toBe(source.getRoute('users.show'));
		expect(await (await target.dispatch(req('GET', '/users/admin'))).text()).toBe('admin');
		expect(await (await target.dispatch(req('GET', '/users/12'))).text()).toBe('user 12');
		expect((await target.dispatch(req('DELETE', '/users'))).headers.get('allow')).toBe('POST');
	});
});
