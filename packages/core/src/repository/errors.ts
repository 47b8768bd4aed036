/**
 * Repository errors shared by persistence adapters.
 */

/**
 * Error thrown when an entity is not found.
 */
export class NotFoundError extends Error {
  public readonly entity: string;
  public readonly id: string;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }

  static isNotFoundError(error: unknown): error is NotFoundError {
    return error instanceof NotFoundError;
  }
}

/**
 * Error thrown when an optimistic concurrency check fails.
 */
export class VersionConflictError extends Error {
  public readonly entity: string;
  public readonly id: string;
  public readonly expectedVersion: number;
  public readonly actualVersion: number;

  constructor(entity: string, id: string, expectedVersion: number, actualVersion: number) {
    super(`Version conflict for ${entity} ${id}: expected ${expectedVersion}, got ${actualVersion}`);
    this.name = "VersionConflictError";
    this.entity = entity;
    this.id = id;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }

  static isVersionConflictError(error: unknown): error is VersionConflictError {
    return error instanceof VersionConflictError;
  }
}
