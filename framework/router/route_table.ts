/**
 * Route Table
 *
 * Ordered, immutable collection of routes. Declaration order is the
 * matching precedence; the name index serves URI generation.
 */

import { DuplicateRouteName } from './errors.ts';
import { createRoute, type Route, type RouteRecord } from './route.ts';

export class RouteTable implements Iterable<Route> {
  private readonly routes: readonly Route[];
  private readonly byName: ReadonlyMap<string, Route>;

  private constructor(routes: Route[], byName: Map<string, Route>) {
    this.routes = Object.freeze(routes);
    this.byName = byName;
  }

  /**
   * Build a table from records, keeping their order.
   * Throws on the first invalid record.
   */
  static build(records: Iterable<RouteRecord>): RouteTable {
    const routes: Route[] = [];
    const byName = new Map<string, Route>();

    for (const record of records) {
      if (byName.has(record.name)) {
        throw new DuplicateRouteName(record.name);
      }
      const route = createRoute(record);
      routes.push(route);
      byName.set(route.name, route);
    }

    return new RouteTable(routes, byName);
  }

  get size(): number {
    return this.routes.length;
  }

  findByName(name: string): Route | undefined {
    return this.byName.get(name);
  }

  iterInOrder(): IterableIterator<Route> {
    return this.routes.values();
  }

  [Symbol.iterator](): IterableIterator<Route> {
    return this.iterInOrder();
  }

  toArray(): Route[] {
    return [...this.routes];
  }
}
