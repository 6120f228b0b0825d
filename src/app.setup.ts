import { INestApplication, ValidationPipe } from "@nestjs/common"
import { GlobalExceptionFilter } from "./errors/global-exception.filter"
import { validationExceptionFactory } from "./errors/validation-exception.factory"

/**
 * Filters and pipes shared by the real bootstrap and the e2e suites.
 */
export function configureApp(app: INestApplication): INestApplication {
  /* --------------------------- */
  /* ✅ Global Exception Filter
   *
   * Anything thrown before a plan operation runs (bad DTO, missing caller id,
   * unknown route) is rendered as ApiErrorBody.
   */
  app.useGlobalFilters(new GlobalExceptionFilter())

  /* --------------------------- */
  /* ✅ Validate all incoming data
   *
   * - `whitelist`: strips properties the DTO does not declare
   * - `forbidNonWhitelisted`: rejects requests carrying such properties
   * - `transform`: turns query strings into numbers where the DTO says so
   */
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: validationExceptionFactory,
    }),
  )

  return app
}
