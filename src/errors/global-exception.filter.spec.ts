import {
  ArgumentsHost,
  BadRequestException,
  Logger,
  NotFoundException,
} from "@nestjs/common"
import { ValidationError } from "class-validator"
import { GlobalExceptionFilter } from "./global-exception.filter"
import { AppError } from "./app-error"
import { ErrorCodes } from "./error-codes"
import { validationExceptionFactory } from "./validation-exception.factory"

describe("GlobalExceptionFilter", () => {
  const filter = new GlobalExceptionFilter()
  const originalEnv = process.env.NODE_ENV

  const json = jest.fn()
  const res = { status: jest.fn(() => ({ json })) }
  const req = { method: "POST", url: "/plans?x=1", path: "/plans" }

  const host = {
    switchToHttp: () => ({
      getResponse: () => res,
      getRequest: () => req,
    }),
  } as unknown as ArgumentsHost

  let loggerSpy: jest.SpyInstance

  beforeEach(() => {
    jest.clearAllMocks()
    loggerSpy = jest
      .spyOn(Logger.prototype, "error")
      .mockImplementation(() => undefined)
  })

  afterEach(() => {
    process.env.NODE_ENV = originalEnv
    loggerSpy.mockRestore()
  })

  it("should render an AppError with the request path", () => {
    filter.catch(
      new AppError(ErrorCodes.UNAUTHORIZED, { params: { header: "x-user-id" } }),
      host,
    )

    expect(res.status).toHaveBeenCalledWith(401)
    expect(json).toHaveBeenCalledWith({
      code: "UNAUTHORIZED",
      params: { header: "x-user-id" },
      path: "/plans",
    })
  })

  it("should strip path and debug in production", () => {
    process.env.NODE_ENV = "production"

    filter.catch(
      new AppError(ErrorCodes.CONFLICT, { debug: "duplicate key" }),
      host,
    )

    expect(json).toHaveBeenCalledWith({ code: "CONFLICT" })
  })

  it("should default the resource of a NOT_FOUND AppError", () => {
    filter.catch(new AppError(ErrorCodes.NOT_FOUND), host)

    expect(res.status).toHaveBeenCalledWith(404)
    expect(json).toHaveBeenCalledWith({
      code: "NOT_FOUND",
      params: { resource: "Endpoint" },
      path: "/plans",
    })
  })

  it("should map a plain HttpException by status", () => {
    filter.catch(new NotFoundException("Cannot GET /nowhere"), host)

    expect(res.status).toHaveBeenCalledWith(404)
    expect(json).toHaveBeenCalledWith({
      code: "NOT_FOUND",
      params: { resource: "Endpoint" },
      path: "/plans",
    })
  })

  it("should leave the path out of a plain HttpException in production", () => {
    process.env.NODE_ENV = "production"

    filter.catch(new BadRequestException("Unexpected token"), host)

    expect(res.status).toHaveBeenCalledWith(400)
    expect(json).toHaveBeenCalledWith({ code: "BAD_REQUEST" })
  })

  it("should answer 500 for anything else", () => {
    filter.catch(new TypeError("boom"), host)

    expect(loggerSpy).toHaveBeenCalledWith(
      "Error at POST /plans?x=1",
      expect.stringContaining("TypeError: boom"),
    )
    expect(res.status).toHaveBeenCalledWith(500)
    expect(json).toHaveBeenCalledWith({ code: "INTERNAL" })
  })
})

describe("validationExceptionFactory", () => {
  const error = (
    property: string,
    constraints?: Record<string, string>,
    children: ValidationError[] = [],
  ): ValidationError => {
    const validationError = new ValidationError()
    validationError.property = property
    validationError.constraints = constraints
    validationError.children = children
    return validationError
  }

  it("should report nested item errors under a dotted path", () => {
    const appError = validationExceptionFactory([
      error("title", { maxLength: "too long" }),
      error("plans", undefined, [
        error("2", undefined, [
          error("dayOfWeek", { isInt: "not int", max: "too big" }),
        ]),
      ]),
    ])

    expect(appError.getStatus()).toBe(422)
    expect(appError.getResponse()).toEqual({
      code: "VALIDATION",
      fields: [
        { field: "title", code: "INVALID", params: { constraint: "maxLength" } },
        {
          field: "plans.2.dayOfWeek",
          code: "INVALID",
          params: { constraint: "isInt" },
        },
        {
          field: "plans.2.dayOfWeek",
          code: "INVALID",
          params: { constraint: "max" },
        },
      ],
    })
  })
})
