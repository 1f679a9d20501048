export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum MAP_ERROR {
  KEY_NOT_FOUND = "KEY_NOT_FOUND",
  STALE_REFERENCE = "STALE_REFERENCE",
  MISSING_DEFAULT_VALUE = "MISSING_DEFAULT_VALUE",
}

export class MapError extends AppError {
  constructor(
    public readonly category: MAP_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_map_error(error: unknown): error is MapError {
  return error instanceof MapError;
}
