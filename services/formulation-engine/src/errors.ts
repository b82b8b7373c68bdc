/**
 * Error codes raised by the engine.
 * Entity construction problems and redistribution constraint violations are
 * user-correctable; callers branch on `code` rather than on message text.
 */
export const ErrorCode = {
  INVALID_ENTITY: "INVALID_ENTITY",
  INVALID_RECORD: "INVALID_RECORD",
  INGREDIENT_NOT_FOUND: "INGREDIENT_NOT_FOUND",
  TARGET_NOT_POSITIVE: "TARGET_NOT_POSITIVE",
  LOCKED_EXCEEDS_TARGET: "LOCKED_EXCEEDS_TARGET",
  ALL_LOCKED: "ALL_LOCKED",
  UNLOCKED_ZERO_WEIGHT: "UNLOCKED_ZERO_WEIGHT",
  NEGATIVE_AMOUNT: "NEGATIVE_AMOUNT",
  PERCENT_OUT_OF_RANGE: "PERCENT_OUT_OF_RANGE",
  LOCKED_PERCENT_EXCEEDED: "LOCKED_PERCENT_EXCEEDED",
  PERCENT_BUDGET_NEGATIVE: "PERCENT_BUDGET_NEGATIVE",
  NO_FREE_INGREDIENTS: "NO_FREE_INGREDIENTS",
  NEGATIVE_PERCENT: "NEGATIVE_PERCENT",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class FormulationError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: object;

  constructor(message: string, code: ErrorCodeType, details?: object) {
    super(message);
    this.name = "FormulationError";
    this.code = code;
    if (details) this.details = details;
  }
}

export function isFormulationError(error: unknown): error is FormulationError {
  return error instanceof FormulationError;
}

export function invalidEntity(message: string, details?: object): FormulationError {
  return new FormulationError(message, ErrorCode.INVALID_ENTITY, details);
}
