/**
 * Route Source Loader
 *
 * Reads route records from a YAML file, or from every `.yaml` file under a
 * directory. The expected document shape is:
 *
 * ```yaml
 * routes:
 *   - home:
 *       path: /
 *       controller: home_controller::index
 *       methods: get
 *   - user:
 *       path: /user/{id}
 *       controller: user_controller::crud
 *       middleware: user_middleware::test
 *       methods: get, post, delete, put
 *       requirements:
 *         id: "^[0-9]+"
 * ```
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { parse } from 'yaml';

import { getLogger, type Logger } from '../telemetry/logger.ts';
import { withSpan } from '../telemetry/otel.ts';
import { InvalidRouteSource } from './errors.ts';
import type { RouteRecord } from './route.ts';

type YamlMapping = Record<string, unknown>;

function isMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function optionalString(
  fields: YamlMapping,
  key: string,
  source: string,
  routeName: string
): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) return undefined;
  if (!isScalar(value)) {
    throw new InvalidRouteSource(source, `route "${routeName}" has a non-scalar "${key}"`);
  }
  return String(value);
}

function requiredString(fields: YamlMapping, key: string, source: string, routeName: string): string {
  const value = optionalString(fields, key, source, routeName);
  if (value === undefined) {
    throw new InvalidRouteSource(source, `route "${routeName}" has no "${key}"`);
  }
  return value;
}

function parseMethods(
  value: unknown,
  source: string,
  routeName: string
): string | string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) {
    return value.map((method) => {
      if (!isScalar(method)) {
        throw new InvalidRouteSource(source, `route "${routeName}" has a non-scalar method`);
      }
      return String(method);
    });
  }
  if (!isScalar(value)) {
    throw new InvalidRouteSource(source, `route "${routeName}" has invalid "methods"`);
  }
  return String(value);
}

function parseRequirements(
  value: unknown,
  source: string,
  routeName: string
): Record<string, string> | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isMapping(value)) {
    throw new InvalidRouteSource(source, `route "${routeName}" has invalid "requirements"`);
  }

  const requirements: Array<[string, string]> = [];
  for (const [placeholder, pattern] of Object.entries(value)) {
    if (!isScalar(pattern)) {
      throw new InvalidRouteSource(
        source,
        `route "${routeName}" has a non-scalar requirement for "${placeholder}"`
      );
    }
    requirements.push([placeholder, String(pattern)]);
  }
  return Object.fromEntries(requirements);
}

function parseEntry(entry: unknown, source: string): RouteRecord {
  if (!isMapping(entry)) {
    throw new InvalidRouteSource(source, 'each routes entry must be a mapping');
  }
  const keys = Object.keys(entry);
  if (keys.length !== 1) {
    throw new InvalidRouteSource(source, 'each routes entry must map exactly one route name');
  }

  const [name] = keys;
  const fields = entry[name];
  if (!isMapping(fields)) {
    throw new InvalidRouteSource(source, `route "${name}" must be a mapping`);
  }

  return {
    name,
    path: requiredString(fields, 'path', source, name),
    controller: requiredString(fields, 'controller', source, name),
    middleware: optionalString(fields, 'middleware', source, name),
    methods: parseMethods(fields.methods, source, name),
    requirements: parseRequirements(fields.requirements, source, name),
    language: optionalString(fields, 'language', source, name),
  };
}

/**
 * Parse one YAML document into route records, in document order
 */
export function parseRoutesDocument(text: string, source: string): RouteRecord[] {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    throw new InvalidRouteSource(source, error instanceof Error ? error.message : String(error));
  }

  if (document === null || document === undefined) return [];
  if (!isMapping(document)) {
    throw new InvalidRouteSource(source, 'the document must be a mapping with a "routes" key');
  }

  const routes = document.routes;
  if (routes === undefined || routes === null) return [];
  if (!Array.isArray(routes)) {
    throw new InvalidRouteSource(source, '"routes" must be a sequence');
  }

  return routes.map((entry) => parseEntry(entry, source));
}

async function readRouteFile(path: string, logger: Logger): Promise<RouteRecord[]> {
  logger.debug('Reading route file', { path });
  return parseRoutesDocument(await readFile(path, 'utf8'), path);
}

async function walkRouteFolder(dir: string, logger: Logger): Promise<RouteRecord[]> {
  logger.debug('Reading route folder', { path: dir });
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const records: RouteRecord[] = [];
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      records.push(...(await walkRouteFolder(path, logger)));
    } else if (entry.isFile() && extname(entry.name).toLowerCase() === '.yaml') {
      records.push(...(await readRouteFile(path, logger)));
    } else {
      logger.debug('Skipping non-route file', { path });
    }
  }
  return records;
}

/**
 * Load route records from a YAML file or a directory tree.
 * Directory entries are read in name order, so declaration order (and
 * with it matching precedence) does not depend on the file system.
 */
export async function loadRouteRecords(
  source: string,
  baseLogger: Logger = getLogger()
): Promise<RouteRecord[]> {
  const logger = baseLogger.child({ component: 'route-loader' });

  return withSpan(
    'router.load_routes',
    async (span) => {
      let isDirectory: boolean;
      try {
        isDirectory = (await stat(source)).isDirectory();
      } catch (error) {
        throw new InvalidRouteSource(source, error instanceof Error ? error.message : String(error));
      }

      const records = isDirectory
        ? await walkRouteFolder(source, logger)
        : await readRouteFile(source, logger);

      span.setAttribute('router.routes', records.length);
      logger.info(
        records.length === 1 ? '1 route has been parsed' : `${records.length} routes have been parsed`,
        { source }
      );
      return records;
    },
    { attributes: { 'router.source': source } }
  );
}
