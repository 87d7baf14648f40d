/**
 * Router Errors
 *
 * Construction errors are thrown while a route table is being built;
 * runtime errors are thrown by URI generation only.
 */

export const RouterErrorCodes = {
  DUPLICATE_ROUTE_NAME: 'DUPLICATE_ROUTE_NAME',
  UNDECLARED_PLACEHOLDER_REQUIREMENT: 'UNDECLARED_PLACEHOLDER_REQUIREMENT',
  EMPTY_METHOD_LIST: 'EMPTY_METHOD_LIST',
  INVALID_REQUIREMENT_PATTERN: 'INVALID_REQUIREMENT_PATTERN',
  DUPLICATE_PLACEHOLDER: 'DUPLICATE_PLACEHOLDER',
  INVALID_ROUTE_SOURCE: 'INVALID_ROUTE_SOURCE',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
  MISSING_PARAMETER: 'MISSING_PARAMETER',
  PARAMETER_DOES_NOT_MATCH_REQUIREMENT: 'PARAMETER_DOES_NOT_MATCH_REQUIREMENT',
} as const;

export type RouterErrorCode = (typeof RouterErrorCodes)[keyof typeof RouterErrorCodes];

/**
 * Base class for every error the router throws
 */
export class RouterError extends Error {
  constructor(
    message: string,
    public readonly code: RouterErrorCode,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'RouterError';
  }
}

export class DuplicateRouteName extends RouterError {
  constructor(public readonly routeName: string) {
    super(`Route "${routeName}" is declared more than once`, RouterErrorCodes.DUPLICATE_ROUTE_NAME, {
      routeName,
    });
    this.name = 'DuplicateRouteName';
  }
}

export class UndeclaredPlaceholderRequirement extends RouterError {
  constructor(
    public readonly routeName: string,
    public readonly placeholder: string,
    field = 'requirements'
  ) {
    super(
      `Route "${routeName}" names "${placeholder}" in ${field} but its path declares no {${placeholder}} placeholder`,
      RouterErrorCodes.UNDECLARED_PLACEHOLDER_REQUIREMENT,
      { routeName, placeholder, field }
    );
    this.name = 'UndeclaredPlaceholderRequirement';
  }
}

export class EmptyMethodList extends RouterError {
  constructor(public readonly routeName: string) {
    super(`Route "${routeName}" declares no methods`, RouterErrorCodes.EMPTY_METHOD_LIST, {
      routeName,
    });
    this.name = 'EmptyMethodList';
  }
}

export class InvalidRequirementPattern extends RouterError {
  constructor(
    public readonly routeName: string,
    public readonly placeholder: string,
    public readonly pattern: string,
    reason: string
  ) {
    super(
      `Route "${routeName}" has an invalid requirement for "${placeholder}" (${pattern}): ${reason}`,
      RouterErrorCodes.INVALID_REQUIREMENT_PATTERN,
      { routeName, placeholder, pattern, reason }
    );
    this.name = 'InvalidRequirementPattern';
  }
}

export class DuplicatePlaceholder extends RouterError {
  constructor(
    public readonly routeName: string,
    public readonly placeholder: string
  ) {
    super(
      `Route "${routeName}" declares {${placeholder}} more than once`,
      RouterErrorCodes.DUPLICATE_PLACEHOLDER,
      { routeName, placeholder }
    );
    this.name = 'DuplicatePlaceholder';
  }
}

export class InvalidRouteSource extends RouterError {
  constructor(
    public readonly source: string,
    reason: string
  ) {
    super(`Cannot read routes from "${source}": ${reason}`, RouterErrorCodes.INVALID_ROUTE_SOURCE, {
      source,
      reason,
    });
    this.name = 'InvalidRouteSource';
  }
}

export class RouteNotFound extends RouterError {
  constructor(public readonly routeName: string) {
    super(`Route "${routeName}" not found`, RouterErrorCodes.ROUTE_NOT_FOUND, { routeName });
    this.name = 'RouteNotFound';
  }
}

export class MissingParameter extends RouterError {
  constructor(public readonly placeholder: string) {
    super(`Missing value for parameter "${placeholder}"`, RouterErrorCodes.MISSING_PARAMETER, {
      placeholder,
    });
    this.name = 'MissingParameter';
  }
}

export class ParameterDoesNotMatchRequirement extends RouterError {
  constructor(
    public readonly placeholder: string,
    public readonly value: string,
    public readonly pattern: string
  ) {
    super(
      `Parameter "${placeholder}" value "${value}" does not match requirement ${pattern}`,
      RouterErrorCodes.PARAMETER_DOES_NOT_MATCH_REQUIREMENT,
      { placeholder, value, pattern }
    );
    this.name = 'ParameterDoesNotMatchRequirement';
  }
}
