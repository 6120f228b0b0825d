import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common"
import { Request, Response } from "express"
import { ErrorCodes } from "./error-codes"
import { handleAppError, handleHttpException } from "./handlers"

/**
 * Converts anything thrown outside the plan operations into the
 * ApiErrorBody shape.
 * Order:
 *   1. AppError         → pass through
 *   2. Other HttpError  → map status → code
 *   3. Fallback         → INTERNAL 500
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name)

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>()
    const req = host.switchToHttp().getRequest<Request>()

    this.logger.error(
      `Error at ${req.method} ${req.url}`,
      exception instanceof Error ? exception.stack : String(exception),
    )

    /* 1 ─ already formatted by AppError */
    if (
      exception instanceof HttpException &&
      handleAppError(exception, req, res)
    ) {
      return
    }

    /* 2 ─ Generic NestJS HttpException */
    if (exception instanceof HttpException) {
      handleHttpException(exception, req, res)
      return
    }

    /* 3 ─ Anything else → 500 */
    res
      .status(HttpStatus.INTERNAL_SERVER_ERROR)
      .json({ code: ErrorCodes.INTERNAL })
  }
}
