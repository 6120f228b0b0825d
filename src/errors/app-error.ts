import { HttpException } from "@nestjs/common"

import {
  ApiErrorBody,
  ErrorCode,
  ErrorStatusMap,
  FieldError,
} from "./error-codes"

/**
 * Thrown outside the plan operations (guards, decorators, pipes) when a
 * request cannot reach the service at all. Plan operations themselves
 * return a ServiceResult instead of throwing.
 *
 * Examples
 * --------
 *  1) Caller id missing
 *  throw new AppError(ErrorCodes.UNAUTHORIZED,
 *    { params: { header: 'x-user-id' } });
 *
 *  2) Two field problems in one go
 *  throw new AppError(ErrorCodes.VALIDATION, {
 *    fields: [
 *      { field: 'dayOfWeek', code: FieldErrorCodes.INVALID },
 *      { field: 'startTime', code: FieldErrorCodes.REQUIRED }
 *    ]
 *  });
 */
export class AppError<
  P = Record<string, unknown>,
  F extends FieldError[] = FieldError[],
> extends HttpException {
  constructor(
    code: ErrorCode,
    opts?: { fields?: F; params?: P; debug?: string; status?: number },
  ) {
    const status = opts?.status ?? ErrorStatusMap[code]
    super(
      {
        code,
        ...(opts?.fields && { fields: opts.fields }),
        ...(opts?.params && { params: opts.params }),
        ...(opts?.debug && { debug: opts.debug }),
      } satisfies ApiErrorBody<P, F>,
      status,
    )
  }
}
