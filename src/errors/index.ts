/**
 * Error taxonomy shared by validation, calculation and routes
 */

export type ValidationConstraint =
  | 'required'
  | 'type'
  | 'integer'
  | 'min'
  | 'max'
  | 'choice'
  | 'length'
  | 'unknown_key'
  | 'relation';

/**
 * User-correctable input problem. Surfaced to clients verbatim.
 */
export class ValidationError extends Error {
  readonly field: string;
  readonly constraint: ValidationConstraint;
  readonly bound?: number;

  constructor(field: string, constraint: ValidationConstraint, message: string, bound?: number) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
    this.constraint = constraint;
    this.bound = bound;
  }

  toJSON(): { field: string; constraint: ValidationConstraint; bound?: number; message: string } {
    return {
      field: this.field,
      constraint: this.constraint,
      bound: this.bound,
      message: this.message
    };
  }
}

/**
 * A quantity or cost went negative or non-finite after validation passed.
 * Indicates a defect; never shown to clients.
 */
export class InternalCalculationError extends Error {
  readonly quantity: string;
  readonly value: number;

  constructor(quantity: string, value: number) {
    super(`Invalid intermediate value for ${quantity}: ${value}`);
    this.name = 'InternalCalculationError';
    this.quantity = quantity;
    this.value = value;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class DatabaseNotConfiguredError extends Error {
  constructor(message = 'Database not configured') {
    super(message);
    this.name = 'DatabaseNotConfiguredError';
  }
}
