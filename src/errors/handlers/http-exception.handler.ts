import { HttpException } from "@nestjs/common"
import { Request, Response } from "express"
import { ApiErrorBody, ErrorCodes, StatusToErrorCode } from "../error-codes"

/**
 * Raw NestJS exceptions (unknown route, unparsable JSON body) carry no
 * ApiErrorBody of their own; the status decides the code.
 */
export function handleHttpException(
  exception: HttpException,
  req: Request,
  res: Response,
): void {
  const status = exception.getStatus()
  const body: ApiErrorBody = {
    code: StatusToErrorCode[status] ?? ErrorCodes.INTERNAL,
  }

  if (body.code === ErrorCodes.NOT_FOUND) {
    body.params = { resource: "Endpoint" }
  }
  if (process.env.NODE_ENV !== "production") {
    body.path = req.path
  }

  res.status(status).json(body)
}
