/**
 * Named Route Router
 *
 * Matches request paths against an ordered route table and generates
 * URIs from route names. The table and its compiled matchers never change
 * after construction; to reload routes, build a new Router and swap it in.
 */

import type { Config } from '../config/config.ts';
import { getLogger, Logger } from '../telemetry/logger.ts';
import { setRouteAttribute } from '../telemetry/otel.ts';
import {
  InvalidRouteSource,
  MissingParameter,
  ParameterDoesNotMatchRequirement,
  RouteNotFound,
} from './errors.ts';
import { loadRouteRecords } from './loader.ts';
import { PathMatcher, type PathParams } from './path_matcher.ts';
import type { Route, RouteRecord } from './route.ts';
import { RouteTable } from './route_table.ts';

export interface RouteMatch {
  route: Route;
  params: PathParams;
  /** Value of the route's language placeholder, or '' */
  language: string;
}

/**
 * Result of `Router.resolve`, which tells a wrong method apart from an
 * unknown path
 */
export type RouteResolution =
  | { status: 'found'; match: RouteMatch }
  | { status: 'method-not-allowed'; allowed: string[] }
  | { status: 'not-found' };

export type UriParameters = Readonly<Record<string, string>>;

export interface RouterOptions {
  logger?: Logger;
}

export class Router {
  readonly table: RouteTable;
  private readonly matchers: readonly PathMatcher[];
  private readonly matchersByName = new Map<string, PathMatcher>();
  private readonly logger: Logger;

  constructor(routes: Iterable<RouteRecord> | RouteTable, options: RouterOptions = {}) {
    this.table = routes instanceof RouteTable ? routes : RouteTable.build(routes);
    this.logger = (options.logger ?? getLogger()).child({ component: 'router' });

    const matchers: PathMatcher[] = [];
    for (const route of this.table) {
      const matcher = new PathMatcher(route);
      matchers.push(matcher);
      this.matchersByName.set(route.name, matcher);
    }
    this.matchers = matchers;

    this.logger.debug('Route table built', { routes: this.table.size });
  }

  /**
   * Build a router from a YAML file or a directory of YAML files
   */
  static async fromSource(source: string, options: RouterOptions = {}): Promise<Router> {
    const records = await loadRouteRecords(source, options.logger);
    return new Router(records, options);
  }

  /**
   * Build a router from the `routes.source` setting, logging with the
   * configured level and format unless a logger is given
   */
  static async fromConfig(config: Config, options: RouterOptions = {}): Promise<Router> {
    const source = config.routesSource;
    if (!source) {
      throw new InvalidRouteSource('routes.source', 'no route source is configured');
    }
    const logger = options.logger ?? new Logger({ level: config.logLevel, format: config.logFormat });
    return Router.fromSource(source, { ...options, logger });
  }

  /**
   * Find the first route, in declaration order, that allows the method and
   * matches the whole path.
   *
   * Returns null both for an unknown path and for a known path requested
   * with a method it does not allow; use `resolve` to tell them apart.
   */
  getRoute(path: string, method: string): Route | null {
    return this.match(path, method)?.route ?? null;
  }

  /**
   * Like `getRoute`, but also returns the placeholder values
   */
  match(path: string, method: string): RouteMatch | null {
    const verb = method.toLowerCase();

    for (const matcher of this.matchers) {
      if (!matcher.route.methods.has(verb)) continue;

      const params = matcher.matches(path);
      if (params) {
        return this.found(matcher.route, params, verb, path);
      }
    }

    this.logger.debug('No route matched', { path, method: verb });
    return null;
  }

  resolve(path: string, method: string): RouteResolution {
    const verb = method.toLowerCase();
    const allowed = new Set<string>();

    for (const matcher of this.matchers) {
      const params = matcher.matches(path);
      if (!params) continue;

      if (matcher.route.methods.has(verb)) {
        return { status: 'found', match: this.found(matcher.route, params, verb, path) };
      }
      for (const candidate of matcher.route.methods) {
        allowed.add(candidate);
      }
    }

    this.logger.debug('No route matched', { path, method: verb });
    if (allowed.size > 0) {
      return { status: 'method-not-allowed', allowed: [...allowed].sort() };
    }
    return { status: 'not-found' };
  }

  /**
   * Generate the URI of a named route.
   * Parameters no placeholder refers to are ignored.
   */
  getUri(name: string, parameters: UriParameters = {}): string {
    const route = this.table.findByName(name);
    const matcher = this.matchersByName.get(name);
    if (!route || !matcher) {
      throw new RouteNotFound(name);
    }

    let uri = '';
    for (const segment of route.segments) {
      if (segment.kind === 'literal') {
        uri += segment.value;
        continue;
      }

      const value = Object.hasOwn(parameters, segment.name) ? parameters[segment.name] : undefined;
      if (value === undefined) {
        throw new MissingParameter(segment.name);
      }
      if (!matcher.accepts(segment.name, value)) {
        throw new ParameterDoesNotMatchRequirement(
          segment.name,
          value,
          route.requirements.get(segment.name) ?? ''
        );
      }
      uri += value;
    }

    return uri;
  }

  hasRoute(name: string): boolean {
    return this.table.findByName(name) !== undefined;
  }

  /**
   * All routes in declaration order
   */
  getRoutes(): Route[] {
    return this.table.toArray();
  }

  private found(route: Route, params: PathParams, method: string, path: string): RouteMatch {
    this.logger.debug('Route matched', { route: route.name, path, method });
    setRouteAttribute(route.path, method);

    const language = route.language ? params[route.language] ?? '' : '';
    return { route, params, language };
  }
}
