export class ConditionError extends Error {
  override readonly name = 'ConditionError';

  constructor(
    readonly reason: 'parameter-count-mismatch',
    readonly expression: string,
    readonly markerCount: number,
    readonly parameterCount: number,
    message?: string,
  ) {
    super(
      message ??
        `Condition "${expression}" has ${markerCount} parameter marker(s) but ${parameterCount} parameter(s) were given`,
    );
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type TemplateErrorReason =
  | 'unresolved-variable'
  | 'unused-variable'
  | 'marker-count-mismatch'
  | 'unbound-marker';

export class TemplateError extends Error {
  override readonly name = 'TemplateError';

  constructor(
    readonly reason: TemplateErrorReason,
    readonly subject: string,
    message?: string,
  ) {
    super(message ?? TemplateError.describe(reason, subject));
    Object.setPrototypeOf(this, new.target.prototype);
  }

  private static describe(reason: TemplateErrorReason, subject: string): string {
    switch (reason) {
      case 'unresolved-variable':
        return `Template variable "${subject}" is referenced but has no value`;
      case 'unused-variable':
        return `Template variable "${subject}" is set but never referenced`;
      case 'marker-count-mismatch':
        return `Template parameter markers do not match explicit parameters: ${subject}`;
      case 'unbound-marker':
        return `Positional marker ${subject} has no parameter to bind`;
    }
  }
}

export class StructureError extends Error {
  override readonly name = 'StructureError';

  constructor(
    readonly reason: 'duplicate-field' | 'unknown-field',
    readonly field: string,
    message?: string,
  ) {
    super(
      message ??
        (reason === 'duplicate-field'
          ? `Field "${field}" is declared more than once`
          : `Field "${field}" is not part of the structure`),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ProjectionError extends Error {
  override readonly name = 'ProjectionError';

  constructor(
    readonly reason: 'unknown-alias' | 'duplicate-alias',
    readonly alias: string,
    message?: string,
  ) {
    super(
      message ??
        (reason === 'unknown-alias'
          ? `Projection has no field aliased "${alias}"`
          : `Projection alias "${alias}" is declared more than once`),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StatementError extends Error {
  override readonly name = 'StatementError';

  constructor(
    readonly reason: 'empty-update',
    readonly source: string,
    message?: string,
  ) {
    super(message ?? `Update of "${source}" sets no columns`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class HydrationError extends Error {
  override readonly name = 'HydrationError';

  constructor(
    readonly reason: 'missing-column' | 'invalid-data',
    readonly column: string,
    message?: string,
    override readonly cause?: unknown,
  ) {
    super(
      message ??
        (reason === 'missing-column'
          ? `Column "${column}" is missing from the result row`
          : `Column "${column}" holds invalid data`),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryExecutionError extends Error {
  override readonly name = 'QueryExecutionError';

  constructor(
    message: string,
    readonly sql: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
