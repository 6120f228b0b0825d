import { HttpStatus } from "@nestjs/common"

/**
 * ────────────────────────────────────────────────────────────────
 *  SHARED ERROR VOCABULARY
 * ────────────────────────────────────────────────────────────────
 *
 *  Two shapes leave this API:
 *
 *  1. Transport-level failures (bad DTO, missing caller id, unknown
 *     route) are rendered by GlobalExceptionFilter as ApiErrorBody:
 *     HTTP/1.1 422
 *     {
 *       "code": "VALIDATION",
 *       "fields": [
 *         { "field": "dayOfWeek", "code": "INVALID",
 *           "params": { "constraint": "max" } }
 *       ]
 *     }
 *
 *  2. Plan operations always answer with the result envelope
 *     ({ code, message, data }), whose numeric code comes from
 *     EnvelopeCodeMap below:
 *     HTTP/1.1 404
 *     {
 *       "code": 404,
 *       "message": "Plan … does not exist or you are not allowed to modify it.",
 *       "data": null
 *     }
 */

/*───────── 1️⃣ top-level codes → HTTP status ─────────*/
export const ErrorCodes = {
  BAD_REQUEST: "BAD_REQUEST",
  CONFLICT: "CONFLICT",
  NOT_FOUND: "NOT_FOUND",
  VALIDATION: "VALIDATION",
  FORBIDDEN: "FORBIDDEN",
  UNAUTHORIZED: "UNAUTHORIZED",
  INTERNAL: "INTERNAL",
  SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export const ErrorStatusMap: Record<ErrorCode, HttpStatus> = {
  BAD_REQUEST: HttpStatus.BAD_REQUEST, //400
  CONFLICT: HttpStatus.CONFLICT, // 409
  NOT_FOUND: HttpStatus.NOT_FOUND, // 404
  VALIDATION: HttpStatus.UNPROCESSABLE_ENTITY, // 422
  FORBIDDEN: HttpStatus.FORBIDDEN, // 403
  UNAUTHORIZED: HttpStatus.UNAUTHORIZED, // 401
  INTERNAL: HttpStatus.INTERNAL_SERVER_ERROR, // 500
  SERVICE_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
}

/**
 * Auto-generated reverse table (HTTP → code)
 * used by GlobalExceptionFilter to translate raw NestJS exceptions.
 */
export const StatusToErrorCode = Object.fromEntries(
  Object.entries(ErrorStatusMap).map(([c, s]) => [s, c]),
) as Record<number, ErrorCode>

/*───────── 2️⃣ service failure kinds → envelope code ─────────*/
export type ServiceErrorCode = Extract<
  ErrorCode,
  "VALIDATION" | "NOT_FOUND" | "INTERNAL"
>

export const EnvelopeCodeMap: Record<ServiceErrorCode, number> = {
  VALIDATION: 300,
  NOT_FOUND: 404,
  INTERNAL: 500,
}

/*───────── 3️⃣ field-level problem codes ─────────*/
export const FieldErrorCodes = {
  DUPLICATE: "DUPLICATE", // unique constraint
  BUSINESS_LOGIC: "BUSINESS_LOGIC", // logical conflict
  INVALID: "INVALID", // bad format
  REQUIRED: "REQUIRED", // missing
} as const

export type FieldErrorCode =
  (typeof FieldErrorCodes)[keyof typeof FieldErrorCodes]

/** One concrete problem concerning a single request field. */
export interface FieldError<P = Record<string, unknown>> {
  field: string
  code: FieldErrorCode
  params?: P
}

/*───────── 4️⃣ final error body sent to client ─────────*/
export interface ApiErrorBody<
  P = Record<string, unknown>, // top-level placeholders
  F = FieldError[], // list of detailed problems
> {
  code: ErrorCode
  params?: P
  fields?: F
  /* the two below are added / stripped by GlobalExceptionFilter */
  debug?: string
  path?: string
}
