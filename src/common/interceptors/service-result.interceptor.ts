import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from "@nestjs/common"
import type { Response } from "express"
import { map, type Observable } from "rxjs"
import {
  httpStatusOf,
  isServiceResult,
  toEnvelope,
} from "../types/service-result"

/**
 * Turns a ServiceResult returned by a handler into the `{ code, message, data }`
 * envelope and sets the matching HTTP status. Other return values pass through.
 */
@Injectable()
export class ServiceResultInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const response = context.switchToHttp().getResponse<Response>()

    return next.handle().pipe(
      map((result: unknown) => {
        if (!isServiceResult(result)) {
          return result
        }
        response.status(httpStatusOf(result))
        return toEnvelope(result)
      }),
    )
  }
}
