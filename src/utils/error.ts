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

export enum ECS_ERROR {
  COMPONENT_NOT_REGISTERED = "COMPONENT_NOT_REGISTERED",
  COMPONENT_ALREADY_PRESENT = "COMPONENT_ALREADY_PRESENT",
  COMPONENT_NOT_PRESENT = "COMPONENT_NOT_PRESENT",
  COLUMN_TYPE_MISMATCH = "COLUMN_TYPE_MISMATCH",
  ROW_OUT_OF_BOUNDS = "ROW_OUT_OF_BOUNDS",
  ARCHETYPE_NOT_FOUND = "ARCHETYPE_NOT_FOUND",
  ENTITY_NOT_FOUND = "ENTITY_NOT_FOUND",
  DUPLICATE_QUERY_COMPONENT = "DUPLICATE_QUERY_COMPONENT",
  EMPTY_QUERY = "EMPTY_QUERY",
  DUPLICATE_SYSTEM = "DUPLICATE_SYSTEM",
  INVALID_ENTITY_ID = "INVALID_ENTITY_ID",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
