/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure show up in this codebase:
 *
 *   1. Operational errors — the store rejected a write (duplicate truck
 *      name, dangling foreign key) or a query plan was malformed. These are
 *      expected outcomes of bad input and carry a status code.
 *
 *   2. Programmer errors — code read a relationship it never loaded. These
 *      are flagged `isOperational = false`.
 *
 * Nothing catches these locally. The entry script is the only place that
 * handles an error, and it stops the process.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses whatever the compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string | number) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

/** Which store constraint rejected a write. */
export type ConstraintKind = 'unique' | 'foreign_key' | 'not_null' | 'check';

export class ConstraintViolationError extends AppError {
  public readonly constraint: ConstraintKind;

  constructor(message: string, constraint: ConstraintKind, options?: ErrorOptions) {
    super(message, 409, true, options);
    this.constraint = constraint;
  }
}

export class QueryConstructionError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class RelationshipAbsentError extends AppError {
  public readonly entity: string;
  public readonly relation: string;

  constructor(entity: string, relation: string, id: number, reason: 'not_loaded' | 'null') {
    super(
      reason === 'not_loaded'
        ? `${entity}#${id}.${relation} was not eager-loaded`
        : `${entity}#${id}.${relation} is empty`,
      500,
      false,
    );
    this.entity = entity;
    this.relation = relation;
  }
}
