/**
 * Path Matcher
 *
 * Compiles a route's path template and requirements into one anchored
 * regular expression, and extracts placeholder values from request paths.
 */

import { InvalidRequirementPattern } from './errors.ts';
import { compileRequirement, DEFAULT_REQUIREMENT, stripAnchors, type Route } from './route.ts';

export type PathParams = Record<string, string>;

/**
 * Escape every regex metacharacter in a literal run
 */
export function escapeLiteral(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Capture group names are generated, since placeholder identifiers
 * (`{1st}`) are not always valid group names.
 */
function groupName(index: number): string {
  return `__p${index}`;
}

/**
 * Compiled matcher for a single route
 */
export class PathMatcher {
  readonly regex: RegExp;
  private readonly placeholders: readonly string[];
  private readonly requirements = new Map<string, RegExp>();

  constructor(readonly route: Route) {
    this.placeholders = route.placeholders;

    for (const [placeholder, pattern] of route.requirements) {
      this.requirements.set(placeholder, compileRequirement(route.name, placeholder, pattern));
    }

    this.regex = compilePath(route);
  }

  /**
   * Match a whole request path.
   * Returns the placeholder values, or null when the path does not match.
   */
  matches(candidate: string): PathParams | null {
    const result = this.regex.exec(candidate);
    if (!result) return null;

    // fromEntries defines own properties, so `{__proto__}` is kept as a key
    const entries: Array<[string, string]> = [];
    this.placeholders.forEach((placeholder, index) => {
      const value = result.groups?.[groupName(index)];
      if (value !== undefined) {
        entries.push([placeholder, value]);
      }
    });
    return Object.fromEntries(entries);
  }

  test(candidate: string): boolean {
    return this.regex.test(candidate);
  }

  /**
   * Check a value against the placeholder's requirement.
   * Placeholders without a requirement accept anything.
   */
  accepts(placeholder: string, value: string): boolean {
    const requirement = this.requirements.get(placeholder);
    return requirement ? requirement.test(value) : true;
  }
}

/**
 * Build the anchored expression for a route's template.
 *
 * Requirements compile on their own but can still clash once combined,
 * e.g. two of them declaring the same named group; the prefix is
 * recompiled after each requirement to name the one that clashes.
 */
export function compilePath(route: Route): RegExp {
  let source = '';
  let index = 0;

  for (const segment of route.segments) {
    if (segment.kind === 'literal') {
      source += escapeLiteral(segment.value);
      continue;
    }
    const requirement = route.requirements.get(segment.name);
    const body = requirement === undefined ? DEFAULT_REQUIREMENT : stripAnchors(requirement);
    source += `(?<${groupName(index)}>${body})`;
    index++;

    if (requirement !== undefined) {
      try {
        new RegExp(`^${source}`, 'u');
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidRequirementPattern(route.name, segment.name, requirement, reason);
      }
    }
  }

  return new RegExp(`^${source}$`, 'u');
}
