import type { CompiledRoute, RouteTableData } from '../types';
import { DuplicateRouteName } from '../exception/router.exception';

/**
 * Compiled routes of one router, iterated by method then specificity.
 *
 * Sorting is deferred until the routes are read; the sort is stable, so routes
 * of equal specificity keep their registration order.
 */
export class RouteTable {
	private routes: CompiledRoute[] = [];

	private namedRoutes = new Map<string, number>();

	private dirty = false;

	/**
	 * @throws {DuplicateRouteName} when the route name is already taken
	 */
	add(route: CompiledRoute) {
		if (route.name && this.hasName(route.name)) throw new DuplicateRouteName(route.name);

		this.routes.push(route);
		// keeps the name reserved until the next sort rebuilds the index
		if (route.name) this.namedRoutes.set(route.name, this.routes.length - 1);
		this.dirty = true;
		return this;
	}

	all(): readonly CompiledRoute[] {
		this.sort();
		return this.routes;
	}

	getByName(name: string): CompiledRoute | undefined {
		this.sort();
		const index = this.namedRoutes.get(name);
		return index === undefined ? undefined : this.routes[index];
	}

	hasName(name: string): boolean {
		return this.namedRoutes.has(name);
	}

	get count(): number {
		return this.routes.length;
	}

	clear() {
		this.routes = [];
		this.namedRoutes = new Map();
		this.dirty = false;
		return this;
	}

	/** Sorted snapshot for a route cache */
	export(): RouteTableData {
		this.sort();
		return {
			routes: [...this.routes],
			namedRoutes: Object.fromEntries(this.namedRoutes),
		};
	}

	/**
	 * Replace the table with a snapshot produced by `export()`.
	 * Entries are installed as given, nothing is recompiled or checked.
	 */
	import(data: RouteTableData) {
		this.routes = [...data.routes];
		this.namedRoutes = new Map(Object.entries(data.namedRoutes));
		this.dirty = false;
		return this;
	}

	private sort() {
		if (!this.dirty) return;

		// Array.prototype.sort is stable
		this.routes.sort((a, b) => {
			if (a.method !== b.method) return a.method < b.method ? -1 : 1;
			return b.specificity - a.specificity;
		});

		this.namedRoutes = new Map();
		this.routes.forEach((route, index) => {
			if (route.name) this.namedRoutes.set(route.name, index);
		});
		this.dirty = false;
	}
}
