/**
 * Error taxonomy shared by the domain, the stores and the HTTP surface.
 *
 * Every error the migrator raises on purpose is a MigratorError carrying a
 * stable code. Anything else reaching the HTTP layer is reported as a 500.
 */

export type MigratorErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_STATE"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "DUPLICATE_KEY";

/** Base class for expected failures. */
export class MigratorError extends Error {
  readonly code: MigratorErrorCode;

  constructor(code: MigratorErrorCode, message: string) {
    super(message);
    this.name = "MigratorError";
    this.code = code;
  }
}

/** Malformed or missing field, unknown enum value, boot-volume rule violation. */
export class InvalidArgumentError extends MigratorError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

/** Operation not allowed in the object's current state. */
export class InvalidStateError extends MigratorError {
  constructor(message: string) {
    super("INVALID_STATE", message);
    this.name = "InvalidStateError";
  }
}

export class NotFoundError extends MigratorError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

/** A store already holds an object under the given key. */
export class AlreadyExistsError extends MigratorError {
  constructor(message: string) {
    super("ALREADY_EXISTS", message);
    this.name = "AlreadyExistsError";
  }
}

/** A workload with the same IP is already registered. */
export class DuplicateKeyError extends MigratorError {
  constructor(message: string) {
    super("DUPLICATE_KEY", message);
    this.name = "DuplicateKeyError";
  }
}

const HTTP_STATUS: Readonly<Record<MigratorErrorCode, number>> = {
  INVALID_ARGUMENT: 400,
  INVALID_STATE: 400,
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  DUPLICATE_KEY: 409,
};

/** HTTP status for an error; 500 for anything that is not a MigratorError. */
export function httpStatusFor(err: unknown): number {
  return err instanceof MigratorError ? HTTP_STATUS[err.code] : 500;
}
