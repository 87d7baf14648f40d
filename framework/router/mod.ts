/**
 * Routing Layer
 *
 * Maps request paths and methods to named routes, and named routes back
 * to URIs.
 *
 * Responsibilities:
 * - Compile path templates and requirements once, at construction
 * - Match requests in declaration order
 * - Generate URIs from route names and parameters
 * - Load route definitions from YAML files
 */

export {
  Router,
  type RouteMatch,
  type RouteResolution,
  type RouterOptions,
  type UriParameters,
} from './router.ts';
export { RouteTable } from './route_table.ts';
export { PathMatcher, compilePath, escapeLiteral, type PathParams } from './path_matcher.ts';
export {
  createRoute,
  parseTemplate,
  normalizeMethods,
  DEFAULT_REQUIREMENT,
  type Route,
  type RouteRecord,
  type TemplateSegment,
} from './route.ts';
export { loadRouteRecords, parseRoutesDocument } from './loader.ts';
export {
  RouterError,
  RouterErrorCodes,
  DuplicateRouteName,
  UndeclaredPlaceholderRequirement,
  EmptyMethodList,
  InvalidRequirementPattern,
  DuplicatePlaceholder,
  InvalidRouteSource,
  RouteNotFound,
  MissingParameter,
  ParameterDoesNotMatchRequirement,
  type RouterErrorCode,
} from './errors.ts';
