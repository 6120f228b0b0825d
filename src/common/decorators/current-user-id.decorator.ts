import { createParamDecorator, ExecutionContext } from "@nestjs/common"
import type { Request } from "express"
import { isUUID } from "class-validator"
import { AppError } from "../../errors/app-error"
import { ErrorCodes } from "../../errors/error-codes"

export const USER_ID_HEADER = "x-user-id"

/**
 * Caller's user id, as forwarded by the authenticating gateway.
 */
export const CurrentUserId = createParamDecorator(
  (_: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<Request>()
    const userId = request.header(USER_ID_HEADER)
    if (!userId || !isUUID(userId)) {
      throw new AppError(ErrorCodes.UNAUTHORIZED, {
        params: { header: USER_ID_HEADER },
      })
    }
    return userId
  },
)
