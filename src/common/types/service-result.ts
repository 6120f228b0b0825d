import { HttpStatus } from "@nestjs/common"
import {
  EnvelopeCodeMap,
  ErrorStatusMap,
  ServiceErrorCode,
} from "../../errors/error-codes"

export type SuccessStatus = "OK" | "CREATED"

export interface ServiceSuccess<T> {
  ok: true
  status: SuccessStatus
  message: string
  data: T
}

export interface ServiceFailure {
  ok: false
  code: ServiceErrorCode
  message: string
  /** Underlying error text, only set for INTERNAL failures. */
  detail?: string
}

export type ServiceResult<T> = ServiceSuccess<T> | ServiceFailure

/** Wire shape every plan endpoint answers with. */
export interface Envelope<T> {
  code: number
  message: string
  data: T | null
}

const SuccessCodes: Record<SuccessStatus, HttpStatus> = {
  OK: HttpStatus.OK,
  CREATED: HttpStatus.CREATED,
}

export const succeed = <T>(message: string, data: T): ServiceSuccess<T> => ({
  ok: true,
  status: "OK",
  message,
  data,
})

export const created = <T>(message: string, data: T): ServiceSuccess<T> => ({
  ok: true,
  status: "CREATED",
  message,
  data,
})

export const fail = (
  code: ServiceErrorCode,
  message: string,
  detail?: string,
): ServiceFailure => ({
  ok: false,
  code,
  message,
  ...(detail !== undefined && { detail }),
})

export function isServiceResult(value: unknown): value is ServiceResult<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "ok" in value &&
    typeof value.ok === "boolean" &&
    "message" in value &&
    typeof value.message === "string"
  )
}

export function httpStatusOf(result: ServiceResult<unknown>): HttpStatus {
  return result.ok ? SuccessCodes[result.status] : ErrorStatusMap[result.code]
}

export function toEnvelope<T>(result: ServiceResult<T>): Envelope<T> {
  if (result.ok) {
    return {
      code: SuccessCodes[result.status],
      message: result.message,
      data: result.data,
    }
  }
  return { code: EnvelopeCodeMap[result.code], message: result.message, data: null }
}
