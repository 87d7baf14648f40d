/**
 * Route Model
 *
 * Turns a parsed route record into an immutable Route: methods are
 * normalized, the path template is split into literal and placeholder
 * segments, and every requirement is checked against the template.
 */

import {
  DuplicatePlaceholder,
  EmptyMethodList,
  InvalidRequirementPattern,
  UndeclaredPlaceholderRequirement,
} from './errors.ts';

/**
 * A route as handed over by the route source parser
 */
export interface RouteRecord {
  name: string;
  path: string;
  controller: string;
  middleware?: string;
  /** Comma-separated list (`"get, post"`) or an already split list */
  methods?: string | string[];
  /**
   * Placeholder name to pattern. Patterns use JavaScript RegExp syntax in
   * unicode mode, so classes like `\p{L}` are available.
   */
  requirements?: Record<string, string>;
  /** Placeholder whose matched value is the request language */
  language?: string;
}

export type TemplateSegment =
  | { kind: 'literal'; value: string }
  | { kind: 'placeholder'; name: string };

export interface Route {
  readonly name: string;
  readonly path: string;
  readonly controller: string;
  readonly middleware: string;
  readonly methods: ReadonlySet<string>;
  readonly requirements: ReadonlyMap<string, string>;
  readonly language: string;
  readonly placeholders: readonly string[];
  readonly segments: readonly TemplateSegment[];
}

export const DEFAULT_REQUIREMENT = '[^/]+';

const PLACEHOLDER = /\{([A-Za-z0-9_]+)\}/g;

/**
 * Split a path template into literal runs and placeholders
 */
export function parseTemplate(path: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let start = 0;

  for (const match of path.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    if (index > start) {
      segments.push({ kind: 'literal', value: path.slice(start, index) });
    }
    segments.push({ kind: 'placeholder', name: match[1] });
    start = index + match[0].length;
  }

  if (start < path.length || segments.length === 0) {
    segments.push({ kind: 'literal', value: path.slice(start) });
  }

  return segments;
}

/**
 * Normalize a method declaration into a set of lower-cased tokens
 */
export function normalizeMethods(methods: string | string[] | undefined): Set<string> {
  const tokens = typeof methods === 'string' ? methods.split(',') : methods ?? [];
  const normalized = new Set<string>();

  for (const token of tokens) {
    const method = token.trim().toLowerCase();
    if (method) normalized.add(method);
  }

  return normalized;
}

/**
 * Remove one leading `^` and one unescaped trailing `$`.
 *
 * Requirements are embedded inside an already anchored matcher, where an
 * inner `^` would only ever match at the start of the whole path.
 */
export function stripAnchors(pattern: string): string {
  let body = pattern.startsWith('^') ? pattern.slice(1) : pattern;

  if (body.endsWith('$')) {
    let backslashes = 0;
    for (let i = body.length - 2; i >= 0 && body[i] === '\\'; i--) {
      backslashes++;
    }
    if (backslashes % 2 === 0) {
      body = body.slice(0, -1);
    }
  }

  return body;
}

/**
 * Compile a requirement so that it has to match a whole value
 */
export function compileRequirement(routeName: string, placeholder: string, pattern: string): RegExp {
  try {
    return new RegExp(`^(?:${stripAnchors(pattern)})$`, 'u');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidRequirementPattern(routeName, placeholder, pattern, reason);
  }
}

/**
 * Build an immutable Route from a record
 */
export function createRoute(record: RouteRecord): Route {
  const methods = normalizeMethods(record.methods);
  if (methods.size === 0) {
    throw new EmptyMethodList(record.name);
  }

  const segments = parseTemplate(record.path);
  const placeholders: string[] = [];
  for (const segment of segments) {
    if (segment.kind !== 'placeholder') continue;
    if (placeholders.includes(segment.name)) {
      throw new DuplicatePlaceholder(record.name, segment.name);
    }
    placeholders.push(segment.name);
  }

  const requirements = new Map<string, string>();
  for (const [placeholder, pattern] of Object.entries(record.requirements ?? {})) {
    if (!placeholders.includes(placeholder)) {
      throw new UndeclaredPlaceholderRequirement(record.name, placeholder);
    }
    compileRequirement(record.name, placeholder, pattern);
    requirements.set(placeholder, pattern);
  }

  const language = record.language ?? '';
  if (language && !placeholders.includes(language)) {
    throw new UndeclaredPlaceholderRequirement(record.name, language, 'language');
  }

  return Object.freeze({
    name: record.name,
    path: record.path,
    controller: record.controller.replaceAll('/', '::'),
    middleware: record.middleware ?? '',
    methods,
    requirements,
    language,
    placeholders: Object.freeze(placeholders),
    segments: Object.freeze(segments),
  });
}
