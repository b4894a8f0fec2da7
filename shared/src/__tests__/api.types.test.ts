import { describe, expect, it } from "vitest"
import { API_ERROR_DEFINITIONS, ApiErrorCode, getApiErrorDefinition } from "../api.types"

describe("API error catalogue", () => {
  it("lists only the codes the contact API returns", () => {
    expect(Object.values(ApiErrorCode).sort()).toEqual([
      "CHALLENGE_FAILED",
      "DATABASE_ERROR",
      "FORBIDDEN",
      "INTERNAL_ERROR",
      "INVALID_REQUEST",
      "INVALID_TOKEN",
      "NOT_FOUND",
      "RATE_LIMIT_EXCEEDED",
      "SERVICE_UNAVAILABLE",
      "UNAUTHORIZED",
      "VALIDATION_FAILED",
    ])
  })

  it("keys every definition by its own code", () => {
    for (const [key, definition] of Object.entries(API_ERROR_DEFINITIONS)) {
      expect(definition.code).toBe(key)
    }
  })

  it("maps submission gates to their statuses", () => {
    expect(getApiErrorDefinition(ApiErrorCode.CHALLENGE_FAILED).httpStatus).toBe(400)
    expect(getApiErrorDefinition(ApiErrorCode.RATE_LIMIT_EXCEEDED).httpStatus).toBe(429)
    expect(getApiErrorDefinition(ApiErrorCode.SERVICE_UNAVAILABLE).httpStatus).toBe(503)
  })

  it("falls back to INTERNAL_ERROR for unknown or missing codes", () => {
    expect(getApiErrorDefinition("TOKEN_EXPIRED").code).toBe(ApiErrorCode.INTERNAL_ERROR)
    expect(getApiErrorDefinition(null).httpStatus).toBe(500)
    expect(getApiErrorDefinition("toString").code).toBe(ApiErrorCode.INTERNAL_ERROR)
  })
})
