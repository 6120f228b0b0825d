import { ValidationError } from "class-validator"
import { AppError } from "./app-error"
import { ErrorCodes, FieldError, FieldErrorCodes } from "./error-codes"

/** Nested errors (bulk items) are reported under a dotted path, e.g. `plans.2.dayOfWeek`. */
function toFieldErrors(err: ValidationError, parent?: string): FieldError[] {
  const field = parent ? `${parent}.${err.property}` : err.property
  const own = Object.keys(err.constraints ?? {}).map((rule) => ({
    field,
    code: FieldErrorCodes.INVALID,
    params: { constraint: rule },
  }))
  const nested = (err.children ?? []).flatMap((child) =>
    toFieldErrors(child, field),
  )
  return [...own, ...nested]
}

export function validationExceptionFactory(
  validationErrors: ValidationError[],
) {
  const fields = validationErrors.flatMap((err) => toFieldErrors(err))

  return new AppError(ErrorCodes.VALIDATION, { fields })
}
